import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import { AuditEmitter, JsonLinesAuditSink, type AuditEvent, type AuditSink } from "../src/audit";
import { makeTempDir } from "./helpers/fixtures";

class SlowSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  async write(event: AuditEvent) {
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.events.push(event);
  }
}

class FailingSink implements AuditSink {
  write(): void {
    throw new Error("disk full");
  }
}

function event(resource: string) {
  return { type: "file_access" as const, source: "127.0.0.1:50000", resource, detail: "op=read" };
}

test("emit stamps events and returns before the sink writes", async () => {
  const sink = new SlowSink();
  const seen: string[] = [];
  const audit = new AuditEmitter(sink, {
    now: () => new Date("2024-05-01T00:00:00.000Z"),
    onEvent: (entry) => seen.push(entry.resource),
  });

  const first = audit.emit(event("a.txt"));
  audit.emit(event("b.txt"));
  audit.emit(event("c.txt"));

  assert.equal(first.timestamp, "2024-05-01T00:00:00.000Z");
  assert.deepEqual(seen, ["a.txt", "b.txt", "c.txt"]);
  assert.equal(audit.stats.emitted, 3);
  assert.equal(audit.stats.written, 0);

  await audit.flush();
  assert.deepEqual(
    sink.events.map((entry) => entry.resource),
    ["a.txt", "b.txt", "c.txt"],
  );
  assert.equal(audit.stats.written, 3);
});

test("a failing sink degrades once and never throws", async () => {
  const warnings: string[] = [];
  const audit = new AuditEmitter(new FailingSink(), { onDegraded: (message) => warnings.push(message) });

  for (const name of ["a", "b", "c"]) {
    assert.doesNotThrow(() => audit.emit(event(name)));
  }
  await audit.flush();

  assert.deepEqual(warnings, ["audit sink failing, events are being dropped: disk full"]);
  assert.deepEqual(audit.stats, { emitted: 3, written: 0, dropped: 0, failures: 3, degraded: true });
});

test("a full queue drops the oldest event", async () => {
  const sink = new SlowSink();
  const audit = new AuditEmitter(sink, { maxQueuedEvents: 2 });
  audit.emit(event("first"));
  audit.emit(event("second"));
  audit.emit(event("third"));
  await audit.flush();

  assert.deepEqual(
    sink.events.map((entry) => entry.resource),
    ["second", "third"],
  );
  assert.equal(audit.stats.dropped, 1);
});

test("flush resolves at once when nothing is queued", async () => {
  const audit = new AuditEmitter(new SlowSink());
  await audit.flush();
  assert.equal(audit.stats.emitted, 0);
});

test("JsonLinesAuditSink appends one object per line", async () => {
  const dir = makeTempDir();
  try {
    const file = path.join(dir, "logs", "audit.jsonl");
    const audit = new AuditEmitter(new JsonLinesAuditSink(file), {
      now: () => new Date("2024-05-01T12:00:00.000Z"),
    });
    audit.emit({ type: "auth_failure", source: "10.0.0.5:4000", resource: "token", detail: "attempt=1" });
    audit.emit({
      type: "session_started",
      source: "10.0.0.5:4000",
      session_id: "s-1",
      resource: "project",
      detail: "identity=ci",
    });
    await audit.close();

    const lines = fs.readFileSync(file, "utf8").trimEnd().split("\n");
    assert.deepEqual(
      lines.map((line) => JSON.parse(line)),
      [
        {
          type: "auth_failure",
          source: "10.0.0.5:4000",
          resource: "token",
          detail: "attempt=1",
          timestamp: "2024-05-01T12:00:00.000Z",
        },
        {
          type: "session_started",
          source: "10.0.0.5:4000",
          session_id: "s-1",
          resource: "project",
          detail: "identity=ci",
          timestamp: "2024-05-01T12:00:00.000Z",
        },
      ],
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
