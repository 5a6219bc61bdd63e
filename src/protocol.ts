/**
 * Folder shell wire protocol.
 *
 * Frame layout (both directions, big-endian):
 * +-----------+-----------+--------+---------------------------+
 * | magic (3) | u32 len   | u8 tag | payload (len - 1 bytes)   |
 * +-----------+-----------+--------+---------------------------+
 * magic = 0x46 0x53 0x01, len counts the tag byte plus the payload.
 *
 * Payloads are CBOR maps, except `command_output` which is
 * `u8 stream (1 stdout, 2 stderr)` followed by the raw output bytes.
 *
 * Client → Server:
 * - connect, authenticate, folder_bind, session_start
 * - command, cancel, file_list, file_read, file_write
 * - ping, pong, disconnect
 *
 * Server → Client:
 * - connect_response, auth_response, folder_bound, session_ready
 * - command_output, command_complete
 * - file_list_response, file_read_response, file_write_response
 * - ping, pong, disconnect, error
 */
import cbor from "cbor";

import { ERROR_CODES, FolderShellError, type ErrorCode } from "./errors";

export const PROTOCOL_VERSION = "1.0";

export const FRAME_MAGIC = Buffer.from([0x46, 0x53, 0x01]);

/** maximum value of the length field in `bytes` */
export const MAX_FRAME = 10 * 1024 * 1024;

const LENGTH_BYTES = 4;
const HEADER_BYTES = FRAME_MAGIC.length + LENGTH_BYTES;

/** message kinds, tag = index + 1 */
export const MESSAGE_KINDS = [
  "connect",
  "connect_response",
  "authenticate",
  "auth_response",
  "folder_bind",
  "folder_bound",
  "session_start",
  "session_ready",
  "command",
  "command_output",
  "command_complete",
  "cancel",
  "file_list",
  "file_list_response",
  "file_read",
  "file_read_response",
  "file_write",
  "file_write_response",
  "ping",
  "pong",
  "disconnect",
  "error",
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

export const SHELL_TYPES = ["bash", "sh", "powershell", "cmd"] as const;
export type ShellType = (typeof SHELL_TYPES)[number];

export const PERMISSIONS = ["read", "write", "execute"] as const;
export type Permission = (typeof PERMISSIONS)[number];

export type OutputStream = "stdout" | "stderr";

export type ClientInfo = {
  /** client operating system */
  platform: string;
  /** client application name */
  name: string;
  /** client application version */
  version: string;
};

export type ConnectMessage = {
  type: "connect";
  /** protocol version spoken by the client */
  version: string;
  client: ClientInfo;
  /** optional features requested by the client */
  features: string[];
};

export type ConnectResponseMessage = {
  type: "connect_response";
  success: boolean;
  server_version: string;
  /** features the server will honour */
  features: string[];
  /** names of the folders exposed by the server */
  folders: string[];
  message?: string;
};

export type AuthenticateMessage = {
  type: "authenticate";
  /** authentication method (`token` or `password`) */
  method: string;
  credentials: Record<string, string>;
};

export type AuthResponseMessage = {
  type: "auth_response";
  success: boolean;
  /** authenticated identity (on success) */
  identity?: string;
  /** failure reason, identical for every kind of mismatch */
  message?: string;
};

export type FolderBindMessage = {
  type: "folder_bind";
  /** folder name as configured on the server */
  folder: string;
  /** preferred shell, overrides the folder default */
  shell?: ShellType;
};

export type FolderInfo = {
  name: string;
  /** folder-relative working directory (`.` is the root) */
  working_directory: string;
  /** effective permissions for this connection */
  permissions: Permission[];
  shell: ShellType;
  description?: string;
};

export type FolderBoundMessage = {
  type: "folder_bound";
  success: boolean;
  folder?: FolderInfo;
  message?: string;
};

export type SessionStartMessage = {
  type: "session_start";
  /** extra environment variables for every command of the session */
  env?: Record<string, string>;
  /** close the session after the first command completes */
  oneshot?: boolean;
};

export type SessionReadyMessage = {
  type: "session_ready";
  session_id: string;
  /** shell prompt hint */
  prompt: string;
  /** folder-relative working directory */
  working_directory: string;
};

export type CommandMessage = {
  type: "command";
  /** command line (may contain arguments when `args` is empty) */
  command: string;
  /** argument list appended to the command line */
  args: string[];
  /** environment variables for this command only */
  env?: Record<string, string>;
};

export type CommandOutputMessage = {
  type: "command_output";
  stream: OutputStream;
  data: Buffer;
};

export type CommandCompleteMessage = {
  type: "command_complete";
  /** process exit code (127 when the process could not be spawned) */
  exit_code: number;
  /** wall-clock execution time in `ms` */
  duration_ms: number;
  /** folder-relative working directory after the command */
  working_directory: string;
  /** terminating signal name (if any) */
  signal?: string;
  /** error detail when the command could not run */
  error?: string;
};

export type CancelMessage = {
  type: "cancel";
};

export type FileEntryType = "file" | "directory" | "symlink" | "other";

export type FileEntry = {
  name: string;
  type: FileEntryType;
  /** size in `bytes` */
  size: number;
  /** modification time in `ms` since the epoch */
  modified: number;
};

export type FileListMessage = {
  type: "file_list";
  path: string;
};

export type FileListResponseMessage = {
  type: "file_list_response";
  path: string;
  entries: FileEntry[];
};

export type FileReadMessage = {
  type: "file_read";
  path: string;
  /** start offset in `bytes` */
  offset?: number;
  /** maximum length in `bytes` */
  length?: number;
};

export type FileReadResponseMessage = {
  type: "file_read_response";
  path: string;
  data: Buffer;
  /** whether the read reached the end of the file */
  eof: boolean;
};

export type FileWriteMessage = {
  type: "file_write";
  path: string;
  data: Buffer;
  /** append instead of truncating */
  append?: boolean;
};

export type FileWriteResponseMessage = {
  type: "file_write_response";
  path: string;
  bytes_written: number;
};

export type PingMessage = {
  type: "ping";
  nonce: number;
};

export type PongMessage = {
  type: "pong";
  nonce: number;
};

export type DisconnectMessage = {
  type: "disconnect";
  reason: string;
};

export type ErrorMessage = {
  type: "error";
  /** stable error code */
  code: ErrorCode;
  /** human-readable error message */
  message: string;
};

export type ClientMessage =
  | ConnectMessage
  | AuthenticateMessage
  | FolderBindMessage
  | SessionStartMessage
  | CommandMessage
  | CancelMessage
  | FileListMessage
  | FileReadMessage
  | FileWriteMessage
  | PingMessage
  | PongMessage
  | DisconnectMessage;

export type ServerMessage =
  | ConnectResponseMessage
  | AuthResponseMessage
  | FolderBoundMessage
  | SessionReadyMessage
  | CommandOutputMessage
  | CommandCompleteMessage
  | FileListResponseMessage
  | FileReadResponseMessage
  | FileWriteResponseMessage
  | PingMessage
  | PongMessage
  | DisconnectMessage
  | ErrorMessage;

export type Message = ClientMessage | ServerMessage;

const CLIENT_KINDS: ReadonlySet<MessageKind> = new Set<MessageKind>([
  "connect",
  "authenticate",
  "folder_bind",
  "session_start",
  "command",
  "cancel",
  "file_list",
  "file_read",
  "file_write",
  "ping",
  "pong",
  "disconnect",
]);

const SERVER_KINDS: ReadonlySet<MessageKind> = new Set<MessageKind>([
  "connect_response",
  "auth_response",
  "folder_bound",
  "session_ready",
  "command_output",
  "command_complete",
  "file_list_response",
  "file_read_response",
  "file_write_response",
  "ping",
  "pong",
  "disconnect",
  "error",
]);

export function messageTag(kind: MessageKind): number {
  return MESSAGE_KINDS.indexOf(kind) + 1;
}

export function messageKind(tag: number): MessageKind | undefined {
  if (!Number.isInteger(tag) || tag < 1 || tag > MESSAGE_KINDS.length) {
    return undefined;
  }
  return MESSAGE_KINDS[tag - 1];
}

export function isClientMessage(message: Message): message is ClientMessage {
  return CLIENT_KINDS.has(message.type);
}

export function isServerMessage(message: Message): message is ServerMessage {
  return SERVER_KINDS.has(message.type);
}

export type Frame = {
  tag: number;
  payload: Buffer;
};

function violation(message: string): FolderShellError {
  return new FolderShellError("protocol_violation", message);
}

export class FrameReader {
  private buffer: Buffer = Buffer.alloc(0);
  private expectedLength: number | null = null;

  constructor(private readonly maxFrame = MAX_FRAME) {}

  /** bytes received but not yet delivered as frames */
  get bufferedBytes() {
    return this.buffer.length;
  }

  push(chunk: Buffer, onFrame: (frame: Frame) => void) {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    while (true) {
      if (this.expectedLength === null) {
        const magicBytes = Math.min(this.buffer.length, FRAME_MAGIC.length);
        if (!this.buffer.subarray(0, magicBytes).equals(FRAME_MAGIC.subarray(0, magicBytes))) {
          throw violation("bad frame magic");
        }
        if (this.buffer.length < HEADER_BYTES) return;
        const length = this.buffer.readUInt32BE(FRAME_MAGIC.length);
        if (length < 1) {
          throw violation("empty frame");
        }
        if (length > this.maxFrame) {
          throw violation(`frame too large: ${length}`);
        }
        this.expectedLength = length;
        this.buffer = this.buffer.subarray(HEADER_BYTES);
      }

      if (this.buffer.length < this.expectedLength) return;

      const body = this.buffer.subarray(0, this.expectedLength);
      this.buffer = this.buffer.subarray(this.expectedLength);
      this.expectedLength = null;
      onFrame({ tag: body.readUInt8(0), payload: body.subarray(1) });
    }
  }
}

export function encodeFrame(tag: number, payload: Buffer): Buffer {
  const header = Buffer.alloc(HEADER_BYTES + 1);
  FRAME_MAGIC.copy(header, 0);
  header.writeUInt32BE(payload.length + 1, FRAME_MAGIC.length);
  header.writeUInt8(tag, HEADER_BYTES);
  return Buffer.concat([header, payload]);
}

function stripUndefined(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function encodeMessage(message: Message): Buffer {
  const tag = messageTag(message.type);
  if (message.type === "command_output") {
    const header = Buffer.alloc(1);
    header.writeUInt8(message.stream === "stdout" ? 1 : 2, 0);
    return encodeFrame(tag, Buffer.concat([header, message.data]));
  }
  const { type: _type, ...fields } = message;
  return encodeFrame(tag, cbor.encode(stripUndefined(fields)));
}

export function normalize(value: unknown): unknown {
  if (value instanceof Map) {
    const obj: Record<string, unknown> = {};
    for (const [key, entry] of value.entries()) {
      obj[String(key)] = normalize(entry);
    }
    return obj;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => normalize(entry));
  }
  if (value instanceof Uint8Array && !Buffer.isBuffer(value)) {
    return Buffer.from(value);
  }
  if (isRecord(value)) {
    const obj: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      obj[key] = normalize(entry);
    }
    return obj;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Map)
  );
}

function includes<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((entry) => entry === value);
}

/** typed field access over a decoded payload */
class PayloadReader {
  constructor(
    private readonly kind: MessageKind,
    private readonly fields: Record<string, unknown>,
  ) {}

  private fail(name: string, expected: string): never {
    throw violation(`${this.kind}.${name} must be ${expected}`);
  }

  string(name: string): string {
    const value = this.fields[name];
    if (typeof value !== "string") this.fail(name, "a string");
    return value;
  }

  optionalString(name: string): string | undefined {
    return this.fields[name] === undefined ? undefined : this.string(name);
  }

  number(name: string): number {
    const value = this.fields[name];
    if (typeof value !== "number" || !Number.isFinite(value)) this.fail(name, "a number");
    return value;
  }

  optionalNumber(name: string): number | undefined {
    return this.fields[name] === undefined ? undefined : this.number(name);
  }

  boolean(name: string): boolean {
    const value = this.fields[name];
    if (typeof value !== "boolean") this.fail(name, "a boolean");
    return value;
  }

  optionalBoolean(name: string): boolean | undefined {
    return this.fields[name] === undefined ? undefined : this.boolean(name);
  }

  buffer(name: string): Buffer {
    const value = this.fields[name];
    if (!Buffer.isBuffer(value)) this.fail(name, "a byte string");
    return value;
  }

  stringArray(name: string): string[] {
    const value = this.fields[name];
    if (!Array.isArray(value)) this.fail(name, "an array of strings");
    const out: string[] = [];
    for (const entry of value) {
      if (typeof entry !== "string") this.fail(name, "an array of strings");
      out.push(entry);
    }
    return out;
  }

  stringRecord(name: string): Record<string, string> {
    const value = this.fields[name];
    if (!isRecord(value)) this.fail(name, "a map of strings");
    const out: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== "string") this.fail(name, "a map of strings");
      out[key] = entry;
    }
    return out;
  }

  optionalStringRecord(name: string): Record<string, string> | undefined {
    return this.fields[name] === undefined ? undefined : this.stringRecord(name);
  }

  oneOf<T extends string>(name: string, values: readonly T[]): T {
    const value = this.fields[name];
    if (!includes(values, value)) this.fail(name, `one of ${values.join(", ")}`);
    return value;
  }

  optionalOneOf<T extends string>(name: string, values: readonly T[]): T | undefined {
    return this.fields[name] === undefined ? undefined : this.oneOf(name, values);
  }

  record(name: string): PayloadReader {
    const value = this.fields[name];
    if (!isRecord(value)) this.fail(name, "a map");
    return new PayloadReader(this.kind, value);
  }

  optionalRecord(name: string): PayloadReader | undefined {
    return this.fields[name] === undefined ? undefined : this.record(name);
  }

  records(name: string): PayloadReader[] {
    const value = this.fields[name];
    if (!Array.isArray(value)) this.fail(name, "an array of maps");
    return value.map((entry) => {
      if (!isRecord(entry)) this.fail(name, "an array of maps");
      return new PayloadReader(this.kind, entry);
    });
  }
}

const FILE_ENTRY_TYPES: readonly FileEntryType[] = ["file", "directory", "symlink", "other"];

function decodeFields(kind: MessageKind, r: PayloadReader): Message {
  switch (kind) {
    case "connect": {
      const client = r.record("client");
      return {
        type: kind,
        version: r.string("version"),
        client: {
          platform: client.string("platform"),
          name: client.string("name"),
          version: client.string("version"),
        },
        features: r.stringArray("features"),
      };
    }
    case "connect_response":
      return {
        type: kind,
        success: r.boolean("success"),
        server_version: r.string("server_version"),
        features: r.stringArray("features"),
        folders: r.stringArray("folders"),
        message: r.optionalString("message"),
      };
    case "authenticate":
      return {
        type: kind,
        method: r.string("method"),
        credentials: r.stringRecord("credentials"),
      };
    case "auth_response":
      return {
        type: kind,
        success: r.boolean("success"),
        identity: r.optionalString("identity"),
        message: r.optionalString("message"),
      };
    case "folder_bind":
      return {
        type: kind,
        folder: r.string("folder"),
        shell: r.optionalOneOf("shell", SHELL_TYPES),
      };
    case "folder_bound": {
      const folder = r.optionalRecord("folder");
      return {
        type: kind,
        success: r.boolean("success"),
        folder: folder && {
          name: folder.string("name"),
          working_directory: folder.string("working_directory"),
          permissions: folder
            .stringArray("permissions")
            .filter((entry): entry is Permission => includes(PERMISSIONS, entry)),
          shell: folder.oneOf("shell", SHELL_TYPES),
          description: folder.optionalString("description"),
        },
        message: r.optionalString("message"),
      };
    }
    case "session_start":
      return {
        type: kind,
        env: r.optionalStringRecord("env"),
        oneshot: r.optionalBoolean("oneshot"),
      };
    case "session_ready":
      return {
        type: kind,
        session_id: r.string("session_id"),
        prompt: r.string("prompt"),
        working_directory: r.string("working_directory"),
      };
    case "command":
      return {
        type: kind,
        command: r.string("command"),
        args: r.stringArray("args"),
        env: r.optionalStringRecord("env"),
      };
    case "command_complete":
      return {
        type: kind,
        exit_code: r.number("exit_code"),
        duration_ms: r.number("duration_ms"),
        working_directory: r.string("working_directory"),
        signal: r.optionalString("signal"),
        error: r.optionalString("error"),
      };
    case "cancel":
      return { type: kind };
    case "file_list":
      return { type: kind, path: r.string("path") };
    case "file_list_response":
      return {
        type: kind,
        path: r.string("path"),
        entries: r.records("entries").map((entry) => ({
          name: entry.string("name"),
          type: entry.oneOf("type", FILE_ENTRY_TYPES),
          size: entry.number("size"),
          modified: entry.number("modified"),
        })),
      };
    case "file_read":
      return {
        type: kind,
        path: r.string("path"),
        offset: r.optionalNumber("offset"),
        length: r.optionalNumber("length"),
      };
    case "file_read_response":
      return {
        type: kind,
        path: r.string("path"),
        data: r.buffer("data"),
        eof: r.boolean("eof"),
      };
    case "file_write":
      return {
        type: kind,
        path: r.string("path"),
        data: r.buffer("data"),
        append: r.optionalBoolean("append"),
      };
    case "file_write_response":
      return {
        type: kind,
        path: r.string("path"),
        bytes_written: r.number("bytes_written"),
      };
    case "ping":
    case "pong":
      return { type: kind, nonce: r.number("nonce") };
    case "disconnect":
      return { type: kind, reason: r.string("reason") };
    case "error":
      return {
        type: kind,
        code: r.oneOf("code", ERROR_CODES),
        message: r.string("message"),
      };
    case "command_output":
      throw violation("command_output carries a binary payload");
  }
}

function decodeCommandOutput(payload: Buffer): CommandOutputMessage {
  if (payload.length < 1) {
    throw violation("command_output frame too short");
  }
  const flag = payload.readUInt8(0);
  if (flag !== 1 && flag !== 2) {
    throw violation(`unknown output stream ${flag}`);
  }
  return {
    type: "command_output",
    stream: flag === 1 ? "stdout" : "stderr",
    data: payload.subarray(1),
  };
}

export function decodeMessage(frame: Frame): Message {
  const kind = messageKind(frame.tag);
  if (!kind) {
    throw violation(`unknown message tag ${frame.tag}`);
  }
  if (kind === "command_output") {
    return decodeCommandOutput(frame.payload);
  }

  let raw: unknown;
  try {
    raw = cbor.decodeFirstSync(frame.payload);
  } catch (err) {
    throw new FolderShellError("protocol_violation", `malformed ${kind} payload`, {
      cause: err,
    });
  }

  const fields = normalize(raw);
  if (!isRecord(fields)) {
    throw violation(`${kind} payload must be a map`);
  }
  return decodeFields(kind, new PayloadReader(kind, fields));
}

export function decodeClientMessage(frame: Frame): ClientMessage {
  const message = decodeMessage(frame);
  if (!isClientMessage(message)) {
    throw violation(`unexpected ${message.type} from client`);
  }
  return message;
}

export function decodeServerMessage(frame: Frame): ServerMessage {
  const message = decodeMessage(frame);
  if (!isServerMessage(message)) {
    throw violation(`unexpected ${message.type} from server`);
  }
  return message;
}
