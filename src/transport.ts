import type net from "net";

import { WebSocket, type RawData } from "ws";

export type TransportHandlers = {
  data: (chunk: Buffer) => void;
  close: (error?: Error) => void;
};

/** byte channel a connection speaks the protocol over */
export interface Transport {
  readonly kind: "tcp" | "websocket";
  readonly remoteAddress: string;
  readonly closed: boolean;
  start(handlers: TransportHandlers): void;
  /** queue one encoded frame; `false` means the send buffer is full */
  send(frame: Buffer): boolean;
  /** resolves once the send buffer drained, or the transport closed */
  waitWritable(): Promise<void>;
  /** flush queued frames, then close */
  close(): void;
  /** close immediately */
  destroy(): void;
}

const CLOSE_FLUSH_TIMEOUT_MS = 1000;

export class SocketTransport implements Transport {
  readonly kind = "tcp";
  readonly remoteAddress: string;
  private isClosed = false;
  private lastError: Error | undefined;

  constructor(private readonly socket: net.Socket) {
    this.remoteAddress = formatAddress(socket.remoteAddress, socket.remotePort);
  }

  get closed() {
    return this.isClosed || this.socket.destroyed;
  }

  start(handlers: TransportHandlers) {
    this.socket.setNoDelay(true);
    this.socket.on("data", (chunk: Buffer) => handlers.data(chunk));
    this.socket.on("error", (err) => {
      this.lastError = err;
    });
    this.socket.once("close", () => {
      this.isClosed = true;
      handlers.close(this.lastError);
    });
  }

  send(frame: Buffer): boolean {
    if (this.closed || !this.socket.writable) return false;
    return this.socket.write(frame);
  }

  waitWritable(): Promise<void> {
    if (this.closed || !this.socket.writableNeedDrain) return Promise.resolve();
    return new Promise((resolve) => {
      const done = () => {
        this.socket.off("drain", done);
        this.socket.off("close", done);
        resolve();
      };
      this.socket.once("drain", done);
      this.socket.once("close", done);
    });
  }

  close() {
    if (this.closed) return;
    this.isClosed = true;
    this.socket.end();
    setTimeout(() => this.socket.destroy(), CLOSE_FLUSH_TIMEOUT_MS).unref();
  }

  destroy() {
    this.isClosed = true;
    this.socket.destroy();
  }
}

const WS_HIGH_WATER_MARK = 1024 * 1024;

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** carries protocol frames as binary WebSocket messages */
export class WebSocketTransport implements Transport {
  readonly kind = "websocket";
  private waiters: Array<() => void> = [];

  constructor(
    private readonly ws: WebSocket,
    readonly remoteAddress: string,
  ) {}

  get closed() {
    return this.ws.readyState !== WebSocket.OPEN;
  }

  start(handlers: TransportHandlers) {
    let lastError: Error | undefined;
    this.ws.on("message", (data) => handlers.data(rawDataToBuffer(data)));
    this.ws.on("error", (err) => {
      lastError = err;
    });
    this.ws.once("close", () => {
      this.releaseWaiters();
      handlers.close(lastError);
    });
  }

  send(frame: Buffer): boolean {
    if (this.closed) return false;
    this.ws.send(frame, { binary: true }, () => {
      if (this.ws.bufferedAmount < WS_HIGH_WATER_MARK) this.releaseWaiters();
    });
    return this.ws.bufferedAmount < WS_HIGH_WATER_MARK;
  }

  waitWritable(): Promise<void> {
    if (this.closed || this.ws.bufferedAmount < WS_HIGH_WATER_MARK) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close() {
    if (this.closed) return;
    this.ws.close(1000);
  }

  destroy() {
    this.ws.terminate();
  }

  private releaseWaiters() {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}

export function formatAddress(address: string | undefined, port: number | undefined): string {
  if (!address) return "unknown";
  const host = address.includes(":") ? `[${address}]` : address;
  return port === undefined ? host : `${host}:${port}`;
}
