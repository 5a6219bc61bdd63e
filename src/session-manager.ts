import { randomUUID } from "crypto";

import type { AuditEmitter } from "./audit";
import type { Identity } from "./auth";
import { FolderShellError } from "./errors";
import type { FolderDescriptor } from "./folder-registry";
import type { Permission, ShellType } from "./protocol";
import { Session, type SessionMode, type TerminationReason } from "./session";

export type SessionManagerOptions = {
  /** maximum simultaneous sessions */
  maxSessions: number;
  /** idle lifetime in `ms` */
  idleTimeoutMs: number;
  /** sweep interval in `ms` */
  sweepIntervalMs: number;
  audit: AuditEmitter;
  now?: () => number;
  /** debug logger */
  log?: (message: string) => void;
};

export type CreateSessionParams = {
  connectionId: string;
  source: string;
  folder: FolderDescriptor;
  identity: Identity;
  permissions: ReadonlySet<Permission>;
  shell: ShellType;
  mode?: SessionMode;
  env?: Record<string, string>;
  /** called once when the session ends, whatever the cause */
  onTerminated?: (session: Session, reason: TerminationReason) => void;
};

/**
 * Owner of the live session table.
 *
 * Every mutation of the table goes through this class.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly listeners = new Map<string, (session: Session, reason: TerminationReason) => void>();
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: SessionManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  get size() {
    return this.sessions.size;
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  create(params: CreateSessionParams): Session {
    if (this.sessions.size >= this.options.maxSessions) {
      throw new FolderShellError(
        "resource_exhausted",
        `session limit reached (${this.options.maxSessions})`,
      );
    }

    const session = new Session({
      id: randomUUID(),
      connectionId: params.connectionId,
      source: params.source,
      folder: params.folder,
      identity: params.identity,
      permissions: params.permissions,
      shell: params.shell,
      mode: params.mode ?? "interactive",
      env: params.env ?? {},
      now: this.now(),
    });
    this.sessions.set(session.id, session);
    if (params.onTerminated) {
      this.listeners.set(session.id, params.onTerminated);
    }

    this.options.audit.emit({
      type: "session_started",
      source: session.source,
      session_id: session.id,
      resource: session.folder.name,
      detail: `identity=${session.identity.name} mode=${session.mode} shell=${session.shell}`,
    });
    this.options.log?.(`session ${session.id} started in ${session.folder.name}`);
    return session;
  }

  private isExpired(session: Session, now: number) {
    return now - session.lastActivity > this.options.idleTimeoutMs;
  }

  /** look up a live session, evicting it first when it idled out */
  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (this.isExpired(session, this.now())) {
      this.terminate(id, "timeout");
      return undefined;
    }
    return session;
  }

  touch(session: Session) {
    session.touch(this.now());
  }

  /**
   * End a session and kill its process.
   *
   * Returns false (and does nothing) when the session is already gone.
   */
  terminate(id: string, reason: TerminationReason): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.sessions.delete(id);
    const listener = this.listeners.get(id);
    this.listeners.delete(id);

    if (!session.terminate(reason)) return false;

    const duration = this.now() - session.createdAt;
    this.options.audit.emit({
      type: reason === "timeout" ? "session_timeout" : "session_terminated",
      source: session.source,
      session_id: session.id,
      resource: session.folder.name,
      detail: `reason=${reason} duration_ms=${duration}`,
    });
    this.options.log?.(`session ${session.id} terminated (${reason})`);

    listener?.(session, reason);
    return true;
  }

  terminateForConnection(connectionId: string, reason: TerminationReason): number {
    let count = 0;
    for (const session of this.list()) {
      if (session.connectionId === connectionId && this.terminate(session.id, reason)) {
        count += 1;
      }
    }
    return count;
  }

  /** evict idle sessions; returns how many were evicted */
  sweep(now = this.now()): number {
    let evicted = 0;
    for (const session of this.list()) {
      if (this.isExpired(session, now) && this.terminate(session.id, "timeout")) {
        evicted += 1;
      }
    }
    return evicted;
  }

  start() {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop() {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  /** terminate every session and wait for their processes to exit */
  async closeAll(): Promise<void> {
    this.stop();
    const sessions = this.list();
    for (const session of sessions) {
      this.terminate(session.id, "shutdown");
    }
    await Promise.all(sessions.map((session) => session.settled()));
  }
}
