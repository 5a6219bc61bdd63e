import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";

import { AuditEmitter, NullAuditSink, type AuditEvent } from "../../src/audit";
import { CredentialStore, type Identity } from "../../src/auth";
import { resolveServerOptions, type ServerOptions } from "../../src/config";
import { Connection, type ConnectionContext } from "../../src/connection";
import { FolderRegistry, type FolderDescriptor } from "../../src/folder-registry";
import {
  FrameReader,
  PROTOCOL_VERSION,
  decodeServerMessage,
  encodeMessage,
  type ClientMessage,
  type ServerMessage,
} from "../../src/protocol";
import { RateLimiter } from "../../src/rate-limiter";
import { SessionManager } from "../../src/session-manager";
import type { ExecRequest, ExitStatus, ShellExecutor, ShellProcess } from "../../src/shell-executor";
import type { Transport, TransportHandlers } from "../../src/transport";

export const TEST_TOKEN = "test-token";

export const TEST_IDENTITY: Identity = {
  name: "tester",
  method: "token",
  permissions: new Set(["read", "write", "execute"]),
};

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export function makeTempDir(prefix = "foldershell-test-"): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function makeFolder(root: string, overrides: Partial<FolderDescriptor> = {}): FolderDescriptor {
  return {
    name: "project",
    root,
    permissions: new Set(["read", "write", "execute"]),
    shell: "sh",
    allowedCommands: new Set(),
    blockedCommands: new Set(),
    env: {},
    readonly: false,
    ...overrides,
  };
}

/** process handle driven by the test */
export class FakeProcess implements ShellProcess {
  readonly pid = 4242;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly exited: Promise<ExitStatus>;
  terminateCalls = 0;
  private finished = false;
  private resolveExit: (status: ExitStatus) => void = () => {};

  constructor() {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  finish(exitCode = 0, signal: NodeJS.Signals | null = null) {
    if (this.finished) return;
    this.finished = true;
    this.stdout.end();
    this.stderr.end();
    this.resolveExit({ exitCode, signal });
  }

  terminate(): Promise<ExitStatus> {
    this.terminateCalls += 1;
    this.finish(143, "SIGTERM");
    return this.exited;
  }
}

export class FakeExecutor implements ShellExecutor {
  readonly requests: ExecRequest[] = [];
  readonly processes: FakeProcess[] = [];
  failWith: Error | null = null;
  /** runs right after a process is created */
  script: ((child: FakeProcess, request: ExecRequest) => void) | null = null;

  async execute(request: ExecRequest): Promise<ShellProcess> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    const child = new FakeProcess();
    this.processes.push(child);
    this.script?.(child, request);
    return child;
  }
}

/** in-memory transport that decodes everything the server sends */
export class FakeTransport implements Transport {
  readonly kind = "tcp";
  readonly remoteAddress = "127.0.0.1:50000";
  readonly sent: ServerMessage[] = [];
  closed = false;
  private handlers: TransportHandlers | null = null;
  private readonly reader = new FrameReader();

  start(handlers: TransportHandlers) {
    this.handlers = handlers;
  }

  send(frame: Buffer): boolean {
    if (this.closed) return false;
    this.reader.push(frame, (decoded) => this.sent.push(decodeServerMessage(decoded)));
    return true;
  }

  waitWritable(): Promise<void> {
    return Promise.resolve();
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.handlers?.close();
  }

  destroy() {
    this.close();
  }

  deliver(message: ClientMessage) {
    this.deliverRaw(encodeMessage(message));
  }

  deliverRaw(bytes: Buffer) {
    this.handlers?.data(bytes);
  }

  /** messages of one kind, in order */
  ofType<T extends ServerMessage["type"]>(type: T): Extract<ServerMessage, { type: T }>[] {
    const out: Extract<ServerMessage, { type: T }>[] = [];
    for (const message of this.sent) {
      if (isType(message, type)) out.push(message);
    }
    return out;
  }

  last(): ServerMessage | undefined {
    return this.sent[this.sent.length - 1];
  }
}

function isType<T extends ServerMessage["type"]>(
  message: ServerMessage,
  type: T,
): message is Extract<ServerMessage, { type: T }> {
  return message.type === type;
}

export type TestContextOptions = {
  options?: ServerOptions;
  executor?: ShellExecutor;
  credentials?: CredentialStore;
  now?: () => number;
  /** called synchronously for every audit event */
  onAudit?: (event: AuditEvent) => void;
};

export type TestContext = {
  ctx: ConnectionContext;
  events: AuditEvent[];
  executor: ShellExecutor;
};

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const resolved = resolveServerOptions({
    tokens: [{ token: TEST_TOKEN, identity: "tester" }],
    ...options.options,
    debug: false,
  });
  const now = options.now ?? Date.now;
  const events: AuditEvent[] = [];
  const audit = new AuditEmitter(new NullAuditSink(), {
    onEvent: (event) => {
      events.push(event);
      options.onAudit?.(event);
    },
  });
  const executor = options.executor ?? new FakeExecutor();

  const ctx: ConnectionContext = {
    options: resolved,
    folders: FolderRegistry.fromConfig(resolved.folders),
    credentials:
      options.credentials ??
      new CredentialStore({
        methods: resolved.authMethods,
        tokens: resolved.tokens,
        users: resolved.users,
        now,
      }),
    rateLimiter: new RateLimiter({ ...resolved.rateLimit, now }),
    sessions: new SessionManager({
      maxSessions: resolved.maxSessions,
      idleTimeoutMs: resolved.sessionTimeoutMinutes * 60_000,
      sweepIntervalMs: resolved.sessionSweepIntervalMs,
      audit,
      now,
    }),
    executor,
    audit,
    now,
    emitDebug: () => {},
    hasDebug: () => false,
  };
  return { ctx, events, executor };
}

export function openConnection(ctx: ConnectionContext, id = "conn-1") {
  const transport = new FakeTransport();
  const connection = new Connection(id, transport, ctx);
  connection.start();
  return { connection, transport };
}

export function connectMessage(version = PROTOCOL_VERSION): ClientMessage {
  return {
    type: "connect",
    version,
    client: { platform: "linux", name: "test-client", version: "1.0.0" },
    features: [],
  };
}

/** drive a connection from `connected` to `session_active` */
export function handshake(transport: FakeTransport, folder = "project", oneshot?: boolean) {
  transport.deliver(connectMessage());
  transport.deliver({ type: "authenticate", method: "token", credentials: { token: TEST_TOKEN } });
  transport.deliver({ type: "folder_bind", folder });
  transport.deliver({ type: "session_start", oneshot });
}
