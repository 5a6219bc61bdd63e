import assert from "node:assert/strict";
import test from "node:test";

import cbor from "cbor";

import { FolderShellError } from "../src/errors";
import {
  FrameReader,
  MAX_FRAME,
  decodeClientMessage,
  decodeMessage,
  encodeFrame,
  encodeMessage,
  messageKind,
  messageTag,
  type Message,
} from "../src/protocol";

function decodeAll(...chunks: Buffer[]): Message[] {
  const reader = new FrameReader();
  const out: Message[] = [];
  for (const chunk of chunks) {
    reader.push(chunk, (frame) => out.push(decodeMessage(frame)));
  }
  return out;
}

function violation(message: string) {
  return (err: unknown) =>
    err instanceof FolderShellError && err.code === "protocol_violation" && err.message === message;
}

test("message tags follow the kind table", () => {
  assert.equal(messageTag("connect"), 1);
  assert.equal(messageTag("command_output"), 10);
  assert.equal(messageTag("error"), 22);
  assert.equal(messageKind(19), "ping");
  assert.equal(messageKind(0), undefined);
  assert.equal(messageKind(23), undefined);
});

test("encodeMessage writes magic, length and tag", () => {
  const frame = encodeMessage({ type: "ping", nonce: 7 });
  assert.deepEqual([...frame.subarray(0, 3)], [0x46, 0x53, 0x01]);
  assert.equal(frame.readUInt32BE(3), frame.length - 7);
  assert.equal(frame.readUInt8(7), messageTag("ping"));
});

test("FrameReader reassembles frames split into single bytes", () => {
  const frame = encodeMessage({ type: "folder_bind", folder: "My Project", shell: "sh" });
  const chunks = [...frame].map((byte) => Buffer.from([byte]));
  assert.deepEqual(decodeAll(...chunks), [{ type: "folder_bind", folder: "My Project", shell: "sh" }]);
});

test("FrameReader yields every frame of a coalesced chunk", () => {
  const bytes = Buffer.concat([
    encodeMessage({ type: "ping", nonce: 1 }),
    encodeMessage({ type: "cancel" }),
    encodeMessage({ type: "disconnect", reason: "client_exit" }),
  ]);
  assert.deepEqual(decodeAll(bytes), [
    { type: "ping", nonce: 1 },
    { type: "cancel" },
    { type: "disconnect", reason: "client_exit" },
  ]);
});

test("FrameReader rejects a bad magic prefix", () => {
  const reader = new FrameReader();
  assert.throws(
    () => reader.push(Buffer.from("GET / HTTP/1.1\r\n"), () => {}),
    violation("bad frame magic"),
  );
});

test("FrameReader rejects frames above the size limit before buffering them", () => {
  const header = Buffer.alloc(7);
  Buffer.from([0x46, 0x53, 0x01]).copy(header, 0);
  header.writeUInt32BE(MAX_FRAME + 1, 3);
  const reader = new FrameReader();
  assert.throws(() => reader.push(header, () => {}), violation(`frame too large: ${MAX_FRAME + 1}`));
});

test("FrameReader rejects a zero length frame", () => {
  const header = Buffer.from([0x46, 0x53, 0x01, 0, 0, 0, 0]);
  assert.throws(() => new FrameReader().push(header, () => {}), violation("empty frame"));
});

test("command_output carries a stream byte and raw data", () => {
  const frame = encodeMessage({ type: "command_output", stream: "stderr", data: Buffer.from("oops") });
  assert.equal(frame.readUInt8(8), 2);
  assert.equal(frame.subarray(9).toString(), "oops");

  const [decoded] = decodeAll(frame);
  assert.equal(decoded.type, "command_output");
  if (decoded.type !== "command_output") return;
  assert.equal(decoded.stream, "stderr");
  assert.equal(decoded.data.toString(), "oops");
});

test("unknown output stream flag is a violation", () => {
  const frame = encodeFrame(messageTag("command_output"), Buffer.from([3, 0x41]));
  assert.throws(() => decodeAll(frame), violation("unknown output stream 3"));
});

test("nested folder info survives a round trip", () => {
  const [decoded] = decodeAll(
    encodeMessage({
      type: "folder_bound",
      success: true,
      folder: {
        name: "docs",
        working_directory: ".",
        permissions: ["read"],
        shell: "bash",
      },
    }),
  );
  assert.deepEqual(decoded, {
    type: "folder_bound",
    success: true,
    folder: {
      name: "docs",
      working_directory: ".",
      permissions: ["read"],
      shell: "bash",
      description: undefined,
    },
    message: undefined,
  });
});

test("decodeClientMessage refuses server-only kinds", () => {
  const frame = encodeMessage({ type: "pong", nonce: 3 });
  const reader = new FrameReader();
  reader.push(frame, (decoded) => {
    assert.deepEqual(decodeClientMessage(decoded), { type: "pong", nonce: 3 });
  });

  const serverOnly = encodeMessage({ type: "session_ready", session_id: "s", prompt: "$ ", working_directory: "." });
  assert.throws(
    () => reader.push(serverOnly, (decoded) => decodeClientMessage(decoded)),
    violation("unexpected session_ready from client"),
  );
});

test("mistyped fields are violations", () => {
  const frame = encodeFrame(messageTag("ping"), cbor.encode({ nonce: "x" }));
  assert.throws(() => decodeAll(frame), violation("ping.nonce must be a number"));

  const command = encodeFrame(messageTag("command"), cbor.encode({ command: "ls", args: [1] }));
  assert.throws(() => decodeAll(command), violation("command.args must be an array of strings"));
});

test("unknown tags and non-map payloads are violations", () => {
  assert.throws(() => decodeAll(encodeFrame(99, Buffer.alloc(0))), violation("unknown message tag 99"));
  assert.throws(
    () => decodeAll(encodeFrame(messageTag("cancel"), cbor.encode([1, 2]))),
    violation("cancel payload must be a map"),
  );
});
