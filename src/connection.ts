import fs from "fs";
import path from "path";

import type { AuditEmitter, AuditEventType } from "./audit";
import {
  ANONYMOUS_IDENTITY,
  AUTH_FAILURE_MESSAGE,
  Authenticator,
  type CredentialStore,
  type Identity,
} from "./auth";
import type { ResolvedServerOptions } from "./config";
import type { DebugComponent, DebugFlag } from "./debug";
import { errorMessage, FolderShellError, toFolderShellError, type ErrorCode } from "./errors";
import type { FolderDescriptor, FolderRegistry } from "./folder-registry";
import { OutputMultiplexer } from "./output-multiplexer";
import {
  FrameReader,
  PERMISSIONS,
  PROTOCOL_VERSION,
  decodeClientMessage,
  encodeMessage,
  type AuthenticateMessage,
  type ClientInfo,
  type ClientMessage,
  type CommandCompleteMessage,
  type CommandMessage,
  type ConnectMessage,
  type FileEntry,
  type FileEntryType,
  type FileListMessage,
  type FileReadMessage,
  type FileWriteMessage,
  type FolderBindMessage,
  type Permission,
  type ServerMessage,
  type SessionStartMessage,
  type ShellType,
} from "./protocol";
import type { RateLimiter } from "./rate-limiter";
import {
  bindFolder,
  checkArgumentPaths,
  checkCommand,
  parseCommandLine,
  relativeToRoot,
  requirePermission,
  resolveWithinRoot,
} from "./security";
import type { Session, TerminationReason } from "./session";
import type { SessionManager } from "./session-manager";
import {
  buildCommandLine,
  buildProcessEnv,
  SPAWN_FAILURE_EXIT_CODE,
  type ShellExecutor,
  type ShellProcess,
} from "./shell-executor";
import type { Transport } from "./transport";

export type ConnectionState =
  | "connected"
  | "authenticating"
  | "authenticated"
  | "folder_bound"
  | "session_active"
  | "closed"
  | "error";

type ClientKind = ClientMessage["type"];

const ACCEPTED: Record<ConnectionState, ReadonlySet<ClientKind>> = {
  connected: new Set<ClientKind>(["connect"]),
  authenticating: new Set<ClientKind>(["authenticate", "ping", "pong", "disconnect"]),
  authenticated: new Set<ClientKind>(["folder_bind", "ping", "pong", "disconnect"]),
  folder_bound: new Set<ClientKind>(["session_start", "ping", "pong", "disconnect"]),
  session_active: new Set<ClientKind>([
    "command",
    "cancel",
    "file_list",
    "file_read",
    "file_write",
    "ping",
    "pong",
    "disconnect",
  ]),
  closed: new Set<ClientKind>(),
  error: new Set<ClientKind>(),
};

/** optional protocol features this server implements */
export const SERVER_FEATURES: readonly string[] = ["file_transfer", "oneshot", "keepalive"];

/** server-wide collaborators shared by every connection */
export type ConnectionContext = {
  options: ResolvedServerOptions;
  folders: FolderRegistry;
  credentials: CredentialStore;
  rateLimiter: RateLimiter;
  sessions: SessionManager;
  executor: ShellExecutor;
  audit: AuditEmitter;
  now: () => number;
  emitDebug: (component: DebugComponent, message: string) => void;
  hasDebug: (flag: DebugFlag) => boolean;
};

type FolderBinding = {
  folder: FolderDescriptor;
  /** folder permissions intersected with the identity's */
  permissions: ReadonlySet<Permission>;
  shell: ShellType;
};

type Builtin = { name: "cd"; target: string } | { name: "pwd" };

/** recognise `cd [dir]` and `pwd`, which run without spawning */
export function parseBuiltin(line: string): Builtin | null {
  const { segments, substitutions } = parseCommandLine(line);
  if (segments.length !== 1 || substitutions.length > 0) return null;
  const [name, ...rest] = segments[0].words;
  if (name === "pwd" && rest.length === 0) return { name: "pwd" };
  if (name === "cd" && rest.length <= 1) return { name: "cd", target: rest[0] ?? "~" };
  return null;
}

function entryType(stat: fs.Stats): FileEntryType {
  if (stat.isSymbolicLink()) return "symlink";
  if (stat.isDirectory()) return "directory";
  if (stat.isFile()) return "file";
  return "other";
}

/** directories first, then by name */
export function compareEntries(a: FileEntry, b: FileEntry): number {
  const rank = (entry: FileEntry) => (entry.type === "directory" ? 0 : 1);
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) return byRank;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** show the folder root as `.` in command output */
function hostRootRewrite(root: string): { from: string; to: string } | undefined {
  if (path.parse(root).root === root) return undefined;
  return { from: root, to: "." };
}

function disconnectReason(reason: TerminationReason): string {
  switch (reason) {
    case "timeout":
      return "session_timeout";
    case "shutdown":
      return "server_shutdown";
    case "closed":
    case "connection_lost":
      return "session_closed";
  }
}

/**
 * Protocol state machine for one client connection.
 *
 * Frames are decoded and checked against the current state synchronously, in
 * arrival order. Commands and file operations then continue asynchronously so
 * that `cancel` and `ping` are served while a command runs.
 */
export class Connection {
  private currentState: ConnectionState = "connected";
  private readonly reader = new FrameReader();
  private readonly authenticator: Authenticator;
  private readonly pending = new Set<Promise<void>>();
  private identity: Identity | null = null;
  private binding: FolderBinding | null = null;
  private session: Session | null = null;
  private output: OutputMultiplexer | null = null;
  private handshakeTimer: NodeJS.Timeout | null = null;
  private client: ClientInfo | null = null;

  constructor(
    readonly id: string,
    private readonly transport: Transport,
    private readonly ctx: ConnectionContext,
    private readonly onClosed?: (connection: Connection) => void,
  ) {
    this.authenticator = new Authenticator(ctx.credentials, ctx.options.maxFailedAttempts);
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get source() {
    return this.transport.remoteAddress;
  }

  get sessionId(): string | undefined {
    return this.session?.id;
  }

  get clientInfo(): ClientInfo | null {
    return this.client;
  }

  private get active() {
    return this.currentState !== "closed" && this.currentState !== "error";
  }

  start() {
    this.audit("connection_opened", "", `transport=${this.transport.kind}`);
    const timeoutMs = this.ctx.options.connectionTimeoutSeconds * 1000;
    this.handshakeTimer = setTimeout(() => this.handleHandshakeTimeout(), timeoutMs);
    this.handshakeTimer.unref();

    this.transport.start({
      data: (chunk) => this.handleData(chunk),
      close: (err) =>
        this.close(err ? `transport error: ${err.message}` : "transport closed", "connection_lost"),
    });
  }

  /** resolves once every in-flight command and file operation finished */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** notify the client and close, as part of a server shutdown */
  shutdown() {
    if (!this.active) return;
    this.send({ type: "disconnect", reason: "server_shutdown" });
    this.close("server shutdown", "shutdown");
  }

  /**
   * Close the connection and release everything it owns.
   *
   * Safe to call more than once.
   */
  close(reason: string, termination: TerminationReason = "closed") {
    if (this.currentState === "closed") return;
    this.audit("connection_closed", "", reason);
    this.currentState = "closed";
    this.clearHandshakeTimer();
    this.output?.close();
    this.output = null;
    this.session = null;
    this.ctx.sessions.terminateForConnection(this.id, termination);
    this.ctx.rateLimiter.reset(this.id);
    this.transport.close();
    if (this.ctx.hasDebug("server")) {
      this.ctx.emitDebug("server", `${this.id} closed: ${reason}`);
    }
    this.onClosed?.(this);
  }

  // ---------------------------------------------------------------------------
  // Inbound

  private handleData(chunk: Buffer) {
    if (!this.active) return;
    try {
      this.reader.push(chunk, (frame) => {
        if (!this.active) return;
        this.handleMessage(decodeClientMessage(frame));
      });
    } catch (err) {
      this.protocolViolation(err);
    }
  }

  private handleMessage(message: ClientMessage) {
    if (this.ctx.hasDebug("protocol")) {
      this.ctx.emitDebug("protocol", `${this.id} rx type=${message.type} state=${this.currentState}`);
    }
    if (!ACCEPTED[this.currentState].has(message.type)) {
      throw new FolderShellError(
        "protocol_violation",
        `unexpected ${message.type} in state ${this.currentState}`,
      );
    }
    if (this.session) {
      // an idle session expires before the message can refresh it
      const session = this.activeSession();
      if (!session) return;
      this.ctx.sessions.touch(session);
    }

    try {
      this.dispatch(message);
    } catch (err) {
      this.reportError(err, message.type);
    }
  }

  private dispatch(message: ClientMessage) {
    switch (message.type) {
      case "connect":
        this.handleConnect(message);
        return;
      case "authenticate":
        this.handleAuthenticate(message);
        return;
      case "folder_bind":
        this.handleFolderBind(message);
        return;
      case "session_start":
        this.handleSessionStart(message);
        return;
      case "command":
        this.track(this.handleCommand(message), [message.command, ...message.args].join(" "));
        return;
      case "cancel":
        this.handleCancel();
        return;
      case "file_list":
        this.track(this.handleFileList(message), message.path);
        return;
      case "file_read":
        this.track(this.handleFileRead(message), message.path);
        return;
      case "file_write":
        this.track(this.handleFileWrite(message), message.path);
        return;
      case "ping":
        this.send({ type: "pong", nonce: message.nonce });
        return;
      case "pong":
        return;
      case "disconnect":
        this.close(`client disconnect: ${message.reason}`, "closed");
        return;
    }
  }

  private track(task: Promise<void>, resource: string) {
    const tracked: Promise<void> = task
      .catch((err) => this.reportError(err, resource))
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  // ---------------------------------------------------------------------------
  // Handshake

  private handleConnect(message: ConnectMessage) {
    const [major] = message.version.split(".");
    if (major !== PROTOCOL_VERSION.split(".")[0]) {
      this.send({
        type: "connect_response",
        success: false,
        server_version: PROTOCOL_VERSION,
        features: [],
        folders: [],
        message: `unsupported protocol version ${message.version}`,
      });
      this.close(`unsupported protocol version ${message.version}`);
      return;
    }

    this.client = message.client;
    if (this.ctx.options.requireAuthentication) {
      this.setState("authenticating");
    } else {
      this.identity = ANONYMOUS_IDENTITY;
      this.setState("authenticated");
    }

    this.send({
      type: "connect_response",
      success: true,
      server_version: PROTOCOL_VERSION,
      features: message.features.filter((feature) => SERVER_FEATURES.includes(feature)),
      folders: this.ctx.folders.names(),
    });
  }

  private handleAuthenticate(message: AuthenticateMessage) {
    const resource = message.credentials.username ?? message.method;
    const result = this.authenticator.authenticate(message.method, message.credentials);

    if (result.ok) {
      this.identity = result.identity;
      this.setState("authenticated");
      this.audit("auth_success", result.identity.name, `method=${message.method}`);
      if (this.ctx.hasDebug("auth")) {
        this.ctx.emitDebug("auth", `${this.id} authenticated as ${result.identity.name}`);
      }
      this.send({ type: "auth_response", success: true, identity: result.identity.name });
      return;
    }

    this.audit("auth_failure", resource, `method=${message.method} failures=${result.failures}`);
    this.send({ type: "auth_response", success: false, message: AUTH_FAILURE_MESSAGE });

    if (result.lockedOut || result.reason === "locked") {
      this.setState("error");
      this.audit("auth_lockout", resource, `failures=${result.failures}`);
      this.audit("suspicious_activity", resource, "authentication lockout");
      this.sendError("auth_lockout", "too many failed authentication attempts");
      this.close("authentication lockout", "connection_lost");
    }
  }

  private handleFolderBind(message: FolderBindMessage) {
    const identity = this.identity;
    if (!identity) {
      throw new FolderShellError("protocol_violation", "folder_bind before authentication");
    }

    let folder: FolderDescriptor;
    try {
      folder = bindFolder(this.ctx.folders, message.folder);
    } catch (err) {
      const error = toFolderShellError(err);
      this.audit("folder_not_found", message.folder, `identity=${identity.name}`);
      this.send({ type: "folder_bound", success: false, message: error.message });
      return;
    }

    const permissions = new Set(
      PERMISSIONS.filter(
        (permission) => folder.permissions.has(permission) && identity.permissions.has(permission),
      ),
    );
    // the folder's configured shell wins over the client's preference
    const shell = folder.shell;
    if (message.shell && message.shell !== shell && this.ctx.hasDebug("protocol")) {
      this.ctx.emitDebug("protocol", `${this.id} ignoring preferred shell ${message.shell} for ${folder.name}`);
    }
    this.binding = { folder, permissions, shell };
    this.setState("folder_bound");
    this.audit(
      "folder_bound",
      folder.name,
      `identity=${identity.name} permissions=${[...permissions].join(",")} shell=${shell}`,
    );
    this.send({
      type: "folder_bound",
      success: true,
      folder: {
        name: folder.name,
        working_directory: ".",
        permissions: [...permissions],
        shell,
        description: folder.description,
      },
    });
  }

  private handleSessionStart(message: SessionStartMessage) {
    const binding = this.binding;
    const identity = this.identity;
    if (!binding || !identity) {
      throw new FolderShellError("protocol_violation", "session_start before folder_bind");
    }

    const session = this.ctx.sessions.create({
      connectionId: this.id,
      source: this.source,
      folder: binding.folder,
      identity,
      permissions: binding.permissions,
      shell: binding.shell,
      mode: message.oneshot ? "oneshot" : "interactive",
      env: message.env,
      onTerminated: (_session, reason) => this.handleSessionEnded(reason),
    });

    this.session = session;
    this.clearHandshakeTimer();
    this.setState("session_active");
    this.send({
      type: "session_ready",
      session_id: session.id,
      prompt: session.prompt,
      working_directory: session.relativeWorkingDirectory,
    });
  }

  private handleSessionEnded(reason: TerminationReason) {
    if (!this.active) return;
    this.session = null;
    this.send({ type: "disconnect", reason: disconnectReason(reason) });
    this.close(`session ended (${reason})`, reason);
  }

  private handleHandshakeTimeout() {
    this.handshakeTimer = null;
    if (!this.active || this.currentState === "session_active") return;
    const seconds = this.ctx.options.connectionTimeoutSeconds;
    this.sendError("handshake_timeout", `handshake not completed within ${seconds}s`);
    this.close(`handshake timeout in state ${this.currentState}`, "connection_lost");
  }

  // ---------------------------------------------------------------------------
  // Session requests

  /** the live session, or undefined when it was evicted meanwhile */
  private activeSession(): Session | undefined {
    if (!this.session) return undefined;
    return this.ctx.sessions.get(this.session.id);
  }

  /** count one request against the connection's rate limit */
  private consumeRequest(resource: string) {
    if (this.ctx.rateLimiter.allow(this.id)) return;
    const { maxRequests, windowMs } = this.ctx.options.rateLimit;
    this.audit("rate_limited", resource, `limit=${maxRequests} window_ms=${windowMs}`);
    throw new FolderShellError("rate_limited", "rate limit exceeded");
  }

  private async handleCommand(message: CommandMessage) {
    const session = this.activeSession();
    if (!session) return;

    const line = buildCommandLine(session.shell, message.command, message.args);
    this.consumeRequest(line);
    requirePermission(session.permissions, "execute", "command");
    session.beginCommand();

    try {
      checkCommand(session.folder, line);
      const builtin = parseBuiltin(line);
      if (builtin) {
        await this.runBuiltin(session, builtin, line);
      } else {
        checkArgumentPaths(session.folder.root, session.workingDirectory, line);
        await this.runProcess(session, message, line);
      }
    } finally {
      session.endCommand();
    }

    if (session.mode === "oneshot") {
      this.ctx.sessions.terminate(session.id, "closed");
    }
  }

  private async runBuiltin(session: Session, builtin: Builtin, line: string) {
    const started = this.ctx.now();
    if (builtin.name === "cd") {
      await session.changeDirectory(builtin.target);
    } else {
      this.send({
        type: "command_output",
        stream: "stdout",
        data: Buffer.from(`${session.relativeWorkingDirectory}\n`),
      });
    }
    this.completeCommand(session, line, { exit_code: 0, duration_ms: this.ctx.now() - started });
  }

  private async runProcess(session: Session, message: CommandMessage, line: string) {
    const started = this.ctx.now();
    const env = buildProcessEnv({
      root: session.folder.root,
      cwd: session.workingDirectory,
      folderEnv: session.folder.env,
      clientEnv: [session.env, message.env],
    });

    let child: ShellProcess;
    try {
      child = await this.ctx.executor.execute({
        command: message.command,
        args: message.args,
        shell: session.shell,
        cwd: session.workingDirectory,
        env,
      });
    } catch (err) {
      const detail = errorMessage(err);
      this.ctx.emitDebug("error", `${this.id} spawn failed: ${detail}`);
      this.completeCommand(session, line, {
        exit_code: SPAWN_FAILURE_EXIT_CODE,
        duration_ms: this.ctx.now() - started,
        error: detail,
      });
      return;
    }

    if (this.ctx.hasDebug("exec")) {
      this.ctx.emitDebug("exec", `${this.id} spawned pid=${child.pid ?? "?"} cmd=${line}`);
    }
    session.attachProcess(child);

    const output = new OutputMultiplexer(
      {
        writeOutput: (chunk) => {
          this.ctx.sessions.touch(session);
          return this.send({ type: "command_output", stream: chunk.stream, data: chunk.data });
        },
        waitWritable: () => this.transport.waitWritable(),
      },
      {
        maxBufferedBytes: this.ctx.options.maxBufferedOutputBytes,
        replace: hostRootRewrite(session.folder.root),
      },
    );
    this.output = output;
    output.attach(child.stdout, "stdout");
    output.attach(child.stderr, "stderr");

    const status = await child.exited;
    await output.done;
    if (this.output === output) this.output = null;

    if (this.ctx.hasDebug("exec")) {
      this.ctx.emitDebug(
        "exec",
        `${this.id} exit pid=${child.pid ?? "?"} code=${status.exitCode}${status.signal ? ` signal=${status.signal}` : ""}`,
      );
    }
    this.completeCommand(session, line, {
      exit_code: status.exitCode,
      duration_ms: this.ctx.now() - started,
      signal: status.signal ?? undefined,
    });
  }

  private completeCommand(
    session: Session,
    line: string,
    result: Omit<CommandCompleteMessage, "type" | "working_directory">,
  ) {
    const error = result.error ? ` error=${result.error}` : "";
    this.audit(
      "command_executed",
      line,
      `identity=${session.identity.name} exit_code=${result.exit_code} duration_ms=${result.duration_ms}${error}`,
    );
    this.send({
      type: "command_complete",
      ...result,
      working_directory: session.relativeWorkingDirectory,
    });
  }

  private handleCancel() {
    const session = this.activeSession();
    if (!session) return;
    if (session.cancel() && this.ctx.hasDebug("exec")) {
      this.ctx.emitDebug("exec", `${this.id} cancel requested`);
    }
  }

  private async handleFileList(message: FileListMessage) {
    const session = this.activeSession();
    if (!session) return;
    this.consumeRequest(message.path);
    requirePermission(session.permissions, "read", "file_list");

    const root = session.folder.root;
    const dir = await resolveWithinRoot(root, session.workingDirectory, message.path);
    const dirents = await fs.promises.readdir(dir, { withFileTypes: true });
    const entries = await Promise.all(
      dirents.map(async (dirent): Promise<FileEntry> => {
        const stat = await fs.promises.lstat(path.join(dir, dirent.name));
        return {
          name: dirent.name,
          type: entryType(stat),
          size: stat.size,
          modified: Math.floor(stat.mtimeMs),
        };
      }),
    );
    entries.sort(compareEntries);

    const relative = relativeToRoot(root, dir);
    this.audit("file_access", relative, "op=list");
    this.send({ type: "file_list_response", path: relative, entries });
  }

  private async handleFileRead(message: FileReadMessage) {
    const session = this.activeSession();
    if (!session) return;
    this.consumeRequest(message.path);
    requirePermission(session.permissions, "read", "file_read");

    const root = session.folder.root;
    const file = await resolveWithinRoot(root, session.workingDirectory, message.path);
    const stat = await fs.promises.stat(file);
    if (!stat.isFile()) {
      throw new FolderShellError("not_found", `not a file: ${message.path}`);
    }

    const limit = this.ctx.options.maxFileReadBytes;
    const offset = Math.min(Math.max(0, Math.floor(message.offset ?? 0)), stat.size);
    const length = Math.min(
      Math.max(0, Math.floor(message.length ?? limit)),
      limit,
      stat.size - offset,
    );

    const buffer = Buffer.alloc(length);
    let bytesRead = 0;
    if (length > 0) {
      const handle = await fs.promises.open(file, "r");
      try {
        ({ bytesRead } = await handle.read(buffer, 0, length, offset));
      } finally {
        await handle.close();
      }
    }
    const data = buffer.subarray(0, bytesRead);

    const relative = relativeToRoot(root, file);
    this.audit("file_access", relative, `op=read offset=${offset} bytes=${data.length}`);
    this.send({
      type: "file_read_response",
      path: relative,
      data,
      eof: offset + data.length >= stat.size,
    });
  }

  private async handleFileWrite(message: FileWriteMessage) {
    const session = this.activeSession();
    if (!session) return;
    this.consumeRequest(message.path);
    requirePermission(session.permissions, "write", "file_write");

    const root = session.folder.root;
    const file = await resolveWithinRoot(root, session.workingDirectory, message.path, {
      allowMissing: true,
    });
    await fs.promises.writeFile(file, message.data, { flag: message.append ? "a" : "w" });

    const relative = relativeToRoot(root, file);
    this.audit(
      "file_access",
      relative,
      `op=${message.append ? "append" : "write"} bytes=${message.data.length}`,
    );
    this.send({ type: "file_write_response", path: relative, bytes_written: message.data.length });
  }

  // ---------------------------------------------------------------------------
  // Outbound

  private setState(next: ConnectionState) {
    if (this.ctx.hasDebug("protocol")) {
      this.ctx.emitDebug("protocol", `${this.id} state ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
  }

  private send(message: ServerMessage): boolean {
    if (this.transport.closed) return false;
    if (this.ctx.hasDebug("protocol") && message.type !== "command_output") {
      this.ctx.emitDebug("protocol", `${this.id} tx type=${message.type}`);
    }
    return this.transport.send(encodeMessage(message));
  }

  private sendError(code: ErrorCode, message: string) {
    this.send({ type: "error", code, message });
  }

  private audit(type: AuditEventType, resource: string, detail: string) {
    this.ctx.audit.emit({
      type,
      source: this.source,
      session_id: this.session?.id,
      resource,
      detail,
    });
  }

  private reportError(err: unknown, resource: string) {
    if (!this.active) return;
    const error = toFolderShellError(err);
    if (error.code === "protocol_violation") {
      this.protocolViolation(error);
      return;
    }

    switch (error.code) {
      case "command_blocked":
      case "command_not_allowed":
        this.audit("command_denied", resource, `${error.code}: ${error.message}`);
        break;
      case "path_escape":
        this.audit("path_escape", resource, error.message);
        break;
      case "permission_denied":
        this.audit("permission_denied", resource, error.message);
        break;
      case "io_error":
        this.ctx.emitDebug("error", `${this.id} ${resource}: ${errorMessage(error.cause ?? error)}`);
        break;
      default:
        break;
    }
    this.sendError(error.code, error.message);
  }

  private protocolViolation(err: unknown) {
    if (!this.active) return;
    const message = errorMessage(err);
    this.setState("error");
    this.audit("suspicious_activity", "", `protocol violation: ${message}`);
    this.sendError("protocol_violation", message);
    this.close(`protocol violation: ${message}`, "connection_lost");
  }

  private clearHandshakeTimer() {
    if (!this.handshakeTimer) return;
    clearTimeout(this.handshakeTimer);
    this.handshakeTimer = null;
  }
}
