import fs from "fs";
import path from "path";

import { errorMessage } from "./errors";

export type AuditEventType =
  | "connection_opened"
  | "connection_closed"
  | "connection_refused"
  | "auth_success"
  | "auth_failure"
  | "auth_lockout"
  | "folder_bound"
  | "folder_not_found"
  | "session_started"
  | "session_terminated"
  | "session_timeout"
  | "command_executed"
  | "command_denied"
  | "path_escape"
  | "permission_denied"
  | "file_access"
  | "rate_limited"
  | "suspicious_activity";

export type AuditEvent = {
  /** ISO 8601 timestamp */
  timestamp: string;
  type: AuditEventType;
  /** remote address of the connection */
  source: string;
  session_id?: string;
  /** folder, path or command the event is about */
  resource: string;
  detail: string;
};

export type AuditEventInput = Omit<AuditEvent, "timestamp"> & {
  timestamp?: string;
};

/** destination for audit events; persistence is the sink's concern */
export interface AuditSink {
  write(event: AuditEvent): void | Promise<void>;
  close?(): Promise<void>;
}

export class NullAuditSink implements AuditSink {
  write() {}
}

/** appends one JSON object per line */
export class JsonLinesAuditSink implements AuditSink {
  private prepared = false;

  constructor(private readonly filePath: string) {}

  async write(event: AuditEvent) {
    if (!this.prepared) {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      this.prepared = true;
    }
    await fs.promises.appendFile(this.filePath, JSON.stringify(event) + "\n", "utf8");
  }
}

export type AuditEmitterOptions = {
  /** events queued before the oldest is dropped */
  maxQueuedEvents?: number;
  /** called once when the sink first fails */
  onDegraded?: (message: string) => void;
  /** called synchronously for every emitted event */
  onEvent?: (event: AuditEvent) => void;
  now?: () => Date;
};

export type AuditStats = {
  emitted: number;
  written: number;
  dropped: number;
  failures: number;
  degraded: boolean;
};

/**
 * Non-blocking audit emitter.
 *
 * `emit()` only enqueues; a background drain writes events to the sink in
 * order. Sink failures never propagate to the caller.
 */
export class AuditEmitter {
  private readonly queue: AuditEvent[] = [];
  private readonly maxQueuedEvents: number;
  private readonly now: () => Date;
  private draining = false;
  private idleWaiters: Array<() => void> = [];
  private readonly counters: AuditStats = {
    emitted: 0,
    written: 0,
    dropped: 0,
    failures: 0,
    degraded: false,
  };

  constructor(
    private readonly sink: AuditSink,
    private readonly options: AuditEmitterOptions = {},
  ) {
    this.maxQueuedEvents = options.maxQueuedEvents ?? 10_000;
    this.now = options.now ?? (() => new Date());
  }

  get stats(): AuditStats {
    return { ...this.counters };
  }

  emit(input: AuditEventInput): AuditEvent {
    const event: AuditEvent = {
      ...input,
      timestamp: input.timestamp ?? this.now().toISOString(),
    };
    this.counters.emitted += 1;

    if (this.queue.length >= this.maxQueuedEvents) {
      this.queue.shift();
      this.counters.dropped += 1;
    }
    this.queue.push(event);

    try {
      this.options.onEvent?.(event);
    } catch {
      // listeners cannot affect delivery
    }

    if (!this.draining) {
      this.draining = true;
      setImmediate(() => {
        void this.drain();
      });
    }
    return event;
  }

  /** resolves once every queued event was handed to the sink */
  flush(): Promise<void> {
    if (!this.draining && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async close() {
    await this.flush();
    await this.sink.close?.();
  }

  private async drain() {
    let event = this.queue.shift();
    while (event) {
      try {
        await this.sink.write(event);
        this.counters.written += 1;
      } catch (err) {
        this.counters.failures += 1;
        this.reportDegraded(err);
      }
      event = this.queue.shift();
    }

    this.draining = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private reportDegraded(err: unknown) {
    if (this.counters.degraded) return;
    this.counters.degraded = true;
    try {
      this.options.onDegraded?.(`audit sink failing, events are being dropped: ${errorMessage(err)}`);
    } catch {
      // warning delivery is best-effort
    }
  }
}
