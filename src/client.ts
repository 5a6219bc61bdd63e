import { EventEmitter } from "events";
import net from "net";
import os from "os";

import { FolderShellError, type ErrorCode } from "./errors";
import {
  FrameReader,
  PROTOCOL_VERSION,
  decodeServerMessage,
  encodeMessage,
  type ClientMessage,
  type FileEntry,
  type FolderInfo,
  type OutputStream,
  type ServerMessage,
  type ShellType,
} from "./protocol";

type ServerKind = ServerMessage["type"];
type ServerMessageOf<T extends ServerKind> = Extract<ServerMessage, { type: T }>;

function isKind<T extends ServerKind>(message: ServerMessage, kind: T): message is ServerMessageOf<T> {
  return message.type === kind;
}

export type FolderShellClientOptions = {
  host: string;
  port: number;
  /** client name reported in `connect` */
  name?: string;
  /** client version reported in `connect` */
  version?: string;
  /** features requested in `connect` */
  features?: string[];
  /** deadline for request/response exchanges in `ms` */
  requestTimeoutMs?: number;
};

export type ServerHello = {
  serverVersion: string;
  features: string[];
  folders: string[];
};

export type SessionInfo = {
  sessionId: string;
  prompt: string;
  workingDirectory: string;
};

export type ExecuteOptions = {
  /** environment for this command only */
  env?: Record<string, string>;
  /** called for every output chunk as it arrives */
  onOutput?: (stream: OutputStream, data: Buffer) => void;
};

export type CommandResult = {
  exitCode: number;
  durationMs: number;
  /** folder-relative working directory after the command */
  workingDirectory: string;
  signal?: string;
  error?: string;
  stdout: Buffer;
  stderr: Buffer;
};

type Waiter = {
  kind: ServerKind;
  resolve: (message: ServerMessage) => void;
  reject: (err: Error) => void;
};

type OutputCollector = {
  stdout: Buffer[];
  stderr: Buffer[];
  onOutput?: (stream: OutputStream, data: Buffer) => void;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Client for the folder shell protocol.
 *
 * Requests are answered in order; each call waits for the reply kind it
 * expects, and an `error` frame rejects the oldest outstanding call.
 *
 * Events: `disconnect` (reason), `server_error` (FolderShellError not tied to
 * a request), `close`.
 */
export class FolderShellClient extends EventEmitter {
  private socket: net.Socket | null = null;
  private readonly reader = new FrameReader();
  private waiters: Waiter[] = [];
  private output: OutputCollector | null = null;
  private closedError: FolderShellError | null = null;
  private nextNonce = 1;
  private readonly requestTimeoutMs: number;

  constructor(private readonly options: FolderShellClientOptions) {
    super();
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  get connected() {
    return this.socket !== null && this.closedError === null;
  }

  /** open the TCP connection and run the `connect` exchange */
  async connect(): Promise<ServerHello> {
    if (this.socket) {
      throw new FolderShellError("protocol_violation", "client is already connected");
    }
    const socket = net.connect({ host: this.options.host, port: this.options.port });
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        socket.off("connect", onConnect);
        reject(
          new FolderShellError(
            "transport_error",
            `failed to connect to ${this.options.host}:${this.options.port}: ${err.message}`,
            { cause: err },
          ),
        );
      };
      const onConnect = () => {
        socket.off("error", onError);
        resolve();
      };
      socket.once("error", onError);
      socket.once("connect", onConnect);
    });

    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => this.handleData(chunk));
    socket.on("error", (err) => {
      this.fail(new FolderShellError("transport_error", err.message, { cause: err }));
    });
    socket.on("close", () => {
      this.fail(new FolderShellError("transport_error", "connection closed"));
      this.emit("close");
    });

    const response = await this.request(
      {
        type: "connect",
        version: PROTOCOL_VERSION,
        client: {
          platform: os.platform(),
          name: this.options.name ?? "foldershell-client",
          version: this.options.version ?? PROTOCOL_VERSION,
        },
        features: this.options.features ?? [],
      },
      "connect_response",
    );
    if (!response.success) {
      throw new FolderShellError("protocol_violation", response.message ?? "connection rejected");
    }
    return {
      serverVersion: response.server_version,
      features: response.features,
      folders: response.folders,
    };
  }

  /** returns the authenticated identity */
  async authenticate(method: string, credentials: Record<string, string>): Promise<string> {
    const response = await this.request({ type: "authenticate", method, credentials }, "auth_response");
    if (!response.success) {
      throw new FolderShellError("auth_failure", response.message ?? "authentication failed");
    }
    return response.identity ?? "";
  }

  async bindFolder(folder: string, shell?: ShellType): Promise<FolderInfo> {
    const response = await this.request({ type: "folder_bind", folder, shell }, "folder_bound");
    if (!response.success || !response.folder) {
      throw new FolderShellError("folder_not_found", response.message ?? `folder not found: ${folder}`);
    }
    return response.folder;
  }

  async startSession(options: { env?: Record<string, string>; oneshot?: boolean } = {}): Promise<SessionInfo> {
    const response = await this.request(
      { type: "session_start", env: options.env, oneshot: options.oneshot },
      "session_ready",
    );
    return {
      sessionId: response.session_id,
      prompt: response.prompt,
      workingDirectory: response.working_directory,
    };
  }

  /**
   * Run one command and collect its output.
   *
   * Denials reject with the server's error code; a command that ran resolves
   * with its exit status whatever the exit code.
   */
  async execute(command: string, args: string[] = [], options: ExecuteOptions = {}): Promise<CommandResult> {
    if (this.output) {
      throw new FolderShellError("command_in_progress", "a command is already running");
    }
    const collector: OutputCollector = { stdout: [], stderr: [], onOutput: options.onOutput };
    this.output = collector;
    try {
      const complete = await this.request(
        { type: "command", command, args, env: options.env },
        "command_complete",
        null,
      );
      return {
        exitCode: complete.exit_code,
        durationMs: complete.duration_ms,
        workingDirectory: complete.working_directory,
        signal: complete.signal,
        error: complete.error,
        stdout: Buffer.concat(collector.stdout),
        stderr: Buffer.concat(collector.stderr),
      };
    } finally {
      if (this.output === collector) this.output = null;
    }
  }

  /** ask the server to terminate the running command */
  cancel() {
    this.send({ type: "cancel" });
  }

  async listFiles(path = "."): Promise<{ path: string; entries: FileEntry[] }> {
    const response = await this.request({ type: "file_list", path }, "file_list_response");
    return { path: response.path, entries: response.entries };
  }

  async readFile(
    path: string,
    options: { offset?: number; length?: number } = {},
  ): Promise<{ path: string; data: Buffer; eof: boolean }> {
    const response = await this.request(
      { type: "file_read", path, offset: options.offset, length: options.length },
      "file_read_response",
    );
    return { path: response.path, data: response.data, eof: response.eof };
  }

  /** returns the number of bytes written */
  async writeFile(path: string, data: Buffer | string, options: { append?: boolean } = {}): Promise<number> {
    const response = await this.request(
      {
        type: "file_write",
        path,
        data: Buffer.isBuffer(data) ? data : Buffer.from(data),
        append: options.append,
      },
      "file_write_response",
    );
    return response.bytes_written;
  }

  /** returns the round-trip time in `ms` */
  async ping(): Promise<number> {
    const nonce = this.nextNonce++;
    const started = Date.now();
    const response = await this.request({ type: "ping", nonce }, "pong");
    if (response.nonce !== nonce) {
      throw new FolderShellError("protocol_violation", `pong nonce ${response.nonce} != ${nonce}`);
    }
    return Date.now() - started;
  }

  /** say goodbye and wait for the socket to close */
  async disconnect(reason = "client_exit"): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) return;
    if (!this.closedError) this.send({ type: "disconnect", reason });
    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.end();
    });
  }

  close() {
    this.socket?.destroy();
  }

  // ---------------------------------------------------------------------------

  private send(message: ClientMessage) {
    const socket = this.socket;
    if (!socket || this.closedError) {
      throw this.closedError ?? new FolderShellError("transport_error", "client is not connected");
    }
    socket.write(encodeMessage(message));
  }

  private request<T extends ServerKind>(
    message: ClientMessage,
    kind: T,
    timeoutMs: number | null = this.requestTimeoutMs,
  ): Promise<ServerMessageOf<T>> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const waiter: Waiter = {
        kind,
        resolve: (reply) => {
          if (timer) clearTimeout(timer);
          if (isKind(reply, kind)) {
            resolve(reply);
          } else {
            reject(new FolderShellError("protocol_violation", `expected ${kind}, got ${reply.type}`));
          }
        },
        reject: (err) => {
          if (timer) clearTimeout(timer);
          reject(err);
        },
      };

      try {
        this.send(message);
      } catch (err) {
        reject(err);
        return;
      }
      this.waiters.push(waiter);

      if (timeoutMs !== null) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((entry) => entry !== waiter);
          reject(new FolderShellError("transport_error", `timed out waiting for ${kind}`));
        }, timeoutMs);
      }
    });
  }

  private handleData(chunk: Buffer) {
    try {
      this.reader.push(chunk, (frame) => this.handleMessage(decodeServerMessage(frame)));
    } catch (err) {
      const error =
        err instanceof FolderShellError
          ? err
          : new FolderShellError("protocol_violation", String(err), { cause: err });
      this.fail(error);
      this.socket?.destroy();
    }
  }

  private handleMessage(message: ServerMessage) {
    switch (message.type) {
      case "command_output": {
        const output = this.output;
        if (!output) return;
        (message.stream === "stdout" ? output.stdout : output.stderr).push(message.data);
        output.onOutput?.(message.stream, message.data);
        return;
      }
      case "ping":
        this.send({ type: "pong", nonce: message.nonce });
        return;
      case "disconnect": {
        const code: ErrorCode = message.reason === "session_timeout" ? "session_timeout" : "transport_error";
        this.fail(new FolderShellError(code, `server disconnected: ${message.reason}`));
        this.emit("disconnect", message.reason);
        return;
      }
      case "error": {
        const error = new FolderShellError(message.code, message.message);
        const waiter = this.waiters.shift();
        if (waiter) {
          waiter.reject(error);
        } else {
          this.emit("server_error", error);
        }
        return;
      }
      default: {
        const index = this.waiters.findIndex((waiter) => waiter.kind === message.type);
        if (index < 0) return;
        const [waiter] = this.waiters.splice(index, 1);
        waiter.resolve(message);
      }
    }
  }

  private fail(error: FolderShellError) {
    if (!this.closedError) this.closedError = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(error);
  }
}
