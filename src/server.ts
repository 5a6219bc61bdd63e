import { randomUUID } from "crypto";
import { EventEmitter } from "events";
import type { IncomingMessage } from "http";
import net from "net";

import { WebSocketServer, type WebSocket } from "ws";

import {
  AuditEmitter,
  JsonLinesAuditSink,
  NullAuditSink,
  type AuditEvent,
  type AuditSink,
} from "./audit";
import { CredentialStore, DEFAULT_DEV_TOKEN } from "./auth";
import { resolveServerOptions, type ResolvedServerOptions, type ServerOptions } from "./config";
import { Connection, type ConnectionContext } from "./connection";
import { stripTrailingNewline, type DebugComponent, type DebugFlag } from "./debug";
import { errorMessage, FolderShellError } from "./errors";
import { FolderRegistry } from "./folder-registry";
import { encodeMessage, MAX_FRAME } from "./protocol";
import { RateLimiter } from "./rate-limiter";
import { SessionManager } from "./session-manager";
import { ProcessShellExecutor, type ShellExecutor } from "./shell-executor";
import { formatAddress, SocketTransport, WebSocketTransport, type Transport } from "./transport";

export type FolderShellServerDeps = {
  /** command runner (default: child processes) */
  executor?: ShellExecutor;
  /** audit destination (default: `auditLogFile` as JSON lines, else none) */
  auditSink?: AuditSink;
  /** clock shared by sessions, rate limiting and token expiry */
  now?: () => number;
};

function listenTcp(server: net.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(
        new FolderShellError("transport_error", `failed to listen on ${host}:${port}: ${err.message}`, {
          cause: err,
        }),
      );
    };
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

function listenWebSocket(wss: WebSocketServer, where: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      wss.off("listening", onListening);
      reject(
        new FolderShellError("transport_error", `failed to listen on ${where}: ${err.message}`, {
          cause: err,
        }),
      );
    };
    const onListening = () => {
      wss.off("error", onError);
      resolve();
    };
    wss.once("error", onError);
    wss.once("listening", onListening);
  });
}

/**
 * Folder shell server.
 *
 * Events:
 * - `debug` (component, message) for every enabled debug component
 * - `log` (line) the same as a single `[component] message` string
 * - `audit` (event) for every emitted audit event
 * - `degraded` (message) once, when the audit sink starts failing
 */
export class FolderShellServer extends EventEmitter {
  private emitDebug(component: DebugComponent, message: string) {
    const normalized = stripTrailingNewline(message);
    this.emit("debug", component, normalized);
    // Legacy string log event
    this.emit("log", `[${component}] ${normalized}` + (message.endsWith("\n") ? "\n" : ""));
  }

  private readonly debugFlags: ReadonlySet<DebugFlag>;

  private hasDebug(flag: DebugFlag) {
    return this.debugFlags.has(flag);
  }

  readonly options: ResolvedServerOptions;
  readonly folders: FolderRegistry;
  readonly sessions: SessionManager;
  readonly auditEmitter: AuditEmitter;

  private readonly credentials: CredentialStore;
  private readonly rateLimiter: RateLimiter;
  private readonly context: ConnectionContext;
  private readonly connections = new Set<Connection>();
  private server: net.Server | null = null;
  private wss: WebSocketServer | null = null;
  private rateCleanupTimer: NodeJS.Timeout | null = null;
  private closePromise: Promise<void> | null = null;

  constructor(options: ServerOptions = {}, deps: FolderShellServerDeps = {}) {
    super();
    this.options = resolveServerOptions(options);
    this.debugFlags = new Set(this.options.debug);
    const now = deps.now ?? Date.now;

    this.folders = FolderRegistry.fromConfig(this.options.folders);
    this.credentials = new CredentialStore({
      methods: this.options.authMethods,
      tokens: this.options.tokens,
      users: this.options.users,
      now,
    });
    this.rateLimiter = new RateLimiter({ ...this.options.rateLimit, now });

    const sink =
      deps.auditSink ??
      (this.options.auditLogFile
        ? new JsonLinesAuditSink(this.options.auditLogFile)
        : new NullAuditSink());
    this.auditEmitter = new AuditEmitter(sink, {
      maxQueuedEvents: this.options.maxQueuedAuditEvents,
      onDegraded: (message) => {
        this.emitDebug("audit", message);
        this.emit("degraded", message);
      },
      onEvent: (event) => this.handleAuditEvent(event),
    });

    this.sessions = new SessionManager({
      maxSessions: this.options.maxSessions,
      idleTimeoutMs: this.options.sessionTimeoutMinutes * 60_000,
      sweepIntervalMs: this.options.sessionSweepIntervalMs,
      audit: this.auditEmitter,
      now,
      log: (message) => {
        if (this.hasDebug("session")) this.emitDebug("session", message);
      },
    });

    this.context = {
      options: this.options,
      folders: this.folders,
      credentials: this.credentials,
      rateLimiter: this.rateLimiter,
      sessions: this.sessions,
      executor: deps.executor ?? new ProcessShellExecutor({ killGraceMs: this.options.killGraceMs }),
      audit: this.auditEmitter,
      now,
      emitDebug: (component, message) => this.emitDebug(component, message),
      hasDebug: (flag) => this.hasDebug(flag),
    };
  }

  get connectionCount() {
    return this.connections.size;
  }

  /** TCP listen address (null before `listen()`) */
  get address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== "string" ? address : null;
  }

  /** WebSocket listen address (null when disabled) */
  get websocketAddress(): net.AddressInfo | null {
    const address = this.wss?.address();
    return address && typeof address !== "string" ? address : null;
  }

  async listen(): Promise<net.AddressInfo> {
    if (this.server) {
      throw new FolderShellError("transport_error", "server is already listening");
    }

    const server = net.createServer((socket) => {
      this.attachTransport(new SocketTransport(socket));
    });
    await listenTcp(server, this.options.port, this.options.host);
    server.on("error", (err) => {
      this.emitDebug("error", `listener error: ${err.message}`);
    });
    this.server = server;

    const websocket = this.options.websocket;
    if (websocket) {
      const wss = new WebSocketServer({
        host: websocket.host,
        port: websocket.port,
        path: websocket.path,
        maxPayload: MAX_FRAME + 8,
      });
      await listenWebSocket(wss, `ws://${websocket.host ?? this.options.host}:${websocket.port}`);
      wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
        const source = formatAddress(req.socket.remoteAddress, req.socket.remotePort);
        this.attachTransport(new WebSocketTransport(ws, source));
      });
      wss.on("error", (err) => {
        this.emitDebug("error", `websocket listener error: ${err.message}`);
      });
      this.wss = wss;
    }

    this.sessions.start();
    this.rateCleanupTimer = setInterval(() => {
      this.rateLimiter.cleanupExpired();
    }, this.options.rateLimit.windowMs);
    this.rateCleanupTimer.unref();

    if (this.credentials.usesDevToken) {
      this.emitDebug(
        "auth",
        `no tokens configured, accepting the development token '${DEFAULT_DEV_TOKEN}'`,
      );
    }

    const address = this.address;
    if (!address) {
      throw new FolderShellError("transport_error", "listener has no address");
    }
    if (this.hasDebug("server")) {
      this.emitDebug(
        "server",
        `listening on ${address.address}:${address.port} (${this.folders.size} folders)`,
      );
    }
    return address;
  }

  /**
   * Serve one already-established transport.
   *
   * Returns null when the transport was refused.
   */
  attachTransport(transport: Transport): Connection | null {
    if (this.closePromise) {
      transport.destroy();
      return null;
    }

    if (this.connections.size >= this.options.maxConnections) {
      this.auditEmitter.emit({
        type: "connection_refused",
        source: transport.remoteAddress,
        resource: "",
        detail: `limit=${this.options.maxConnections}`,
      });
      transport.start({ data: () => {}, close: () => {} });
      transport.send(
        encodeMessage({
          type: "error",
          code: "resource_exhausted",
          message: `connection limit reached (${this.options.maxConnections})`,
        }),
      );
      transport.close();
      return null;
    }

    const connection = new Connection(randomUUID(), transport, this.context, (closed) => {
      this.connections.delete(closed);
    });
    this.connections.add(connection);
    if (this.hasDebug("server")) {
      this.emitDebug(
        "server",
        `${connection.id} accepted ${transport.kind} connection from ${transport.remoteAddress}`,
      );
    }
    connection.start();
    return connection;
  }

  /** stop listening, end every session and wait for their processes */
  close(): Promise<void> {
    this.closePromise ??= this.closeInternal();
    return this.closePromise;
  }

  private async closeInternal() {
    this.sessions.stop();
    if (this.rateCleanupTimer) {
      clearInterval(this.rateCleanupTimer);
      this.rateCleanupTimer = null;
    }

    const server = this.server;
    this.server = null;
    const serverClosed = server
      ? new Promise<void>((resolve) => server.close(() => resolve()))
      : Promise.resolve();

    const connections = [...this.connections];
    for (const connection of connections) {
      connection.shutdown();
    }
    await this.sessions.closeAll();
    await Promise.all(connections.map((connection) => connection.idle()));

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    await serverClosed;

    try {
      await this.auditEmitter.close();
    } catch (err) {
      this.emitDebug("error", `audit sink close failed: ${errorMessage(err)}`);
    }
    if (this.hasDebug("server")) {
      this.emitDebug("server", "server closed");
    }
  }

  private handleAuditEvent(event: AuditEvent) {
    this.emit("audit", event);
    if (this.hasDebug("audit")) {
      const session = event.session_id ? ` session=${event.session_id}` : "";
      this.emitDebug(
        "audit",
        `${event.type} source=${event.source}${session} resource=${event.resource} ${event.detail}`,
      );
    }
  }
}
