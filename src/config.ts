import fs from "fs";
import path from "path";

import {
  debugFlagsToArray,
  parseDebugEnv,
  resolveDebugFlags,
  isDebugFlag,
  type DebugConfig,
  type DebugFlag,
} from "./debug";
import { ConfigError, errorMessage } from "./errors";
import { PERMISSIONS, SHELL_TYPES, type Permission, type ShellType } from "./protocol";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 2222;
export const DEFAULT_MAX_CONNECTIONS = 10;
export const DEFAULT_CONNECTION_TIMEOUT_SECONDS = 30;
export const DEFAULT_SESSION_TIMEOUT_MINUTES = 60;
export const DEFAULT_MAX_FAILED_ATTEMPTS = 3;
export const DEFAULT_RATE_LIMIT_REQUESTS = 100;
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60_000;
export const DEFAULT_KILL_GRACE_MS = 3000;
export const DEFAULT_MAX_BUFFERED_OUTPUT_BYTES = 1024 * 1024;
export const DEFAULT_MAX_FILE_READ_BYTES = 4 * 1024 * 1024;
export const DEFAULT_MAX_QUEUED_AUDIT_EVENTS = 10_000;

export type AuthMethod = "token" | "password";
export const AUTH_METHODS: readonly AuthMethod[] = ["token", "password"];

/** folder exposed by the server */
export type FolderConfig = {
  /** unique folder name used by `folder_bind` */
  name: string;
  /** host directory */
  path: string;
  /** granted permissions (default: read, write, execute) */
  permissions?: Permission[];
  /** shell used to run commands (default: bash) */
  shell?: ShellType;
  /** command names that may run (empty = everything not blocked) */
  allowedCommands?: string[];
  /** command names that never run */
  blockedCommands?: string[];
  /** environment variables for every command in this folder */
  env?: Record<string, string>;
  /** drop the write permission */
  readonly?: boolean;
  description?: string;
};

export type TokenConfig = {
  /** plaintext token (hashed at load time) */
  token?: string;
  /** hex SHA-256 digest of the token */
  sha256?: string;
  /** identity reported for this token (default: token) */
  identity?: string;
  /** permissions granted to the identity (default: all) */
  permissions?: Permission[];
  /** expiry as an ISO 8601 timestamp */
  expiresAt?: string;
};

export type UserConfig = {
  username: string;
  /** `scrypt$<salt-hex>$<hash-hex>` */
  passwordHash: string;
  /** permissions granted to the user (default: all) */
  permissions?: Permission[];
};

export type RateLimitOptions = {
  /** requests accepted per window */
  maxRequests?: number;
  /** window length in `ms` */
  windowMs?: number;
};

export type WebSocketOptions = {
  /** bind address (default: server host) */
  host?: string;
  /** listen port (0 picks a free port) */
  port: number;
  /** upgrade path (default: any) */
  path?: string;
};

export type ServerOptions = {
  /** bind address */
  host?: string;
  /** listen port (0 picks a free port) */
  port?: number;
  /** maximum simultaneous connections */
  maxConnections?: number;
  /** maximum simultaneous sessions (default: maxConnections) */
  maxSessions?: number;
  /** handshake deadline in `seconds` (accept → session ready) */
  connectionTimeoutSeconds?: number;
  /** idle session lifetime in `minutes` */
  sessionTimeoutMinutes?: number;
  /** idle sweep interval in `ms` (default: min(60s, session timeout)) */
  sessionSweepIntervalMs?: number;
  /** whether clients must authenticate */
  requireAuthentication?: boolean;
  /** enabled authentication methods */
  authMethods?: AuthMethod[];
  /** consecutive failures before lockout */
  maxFailedAttempts?: number;
  tokens?: TokenConfig[];
  users?: UserConfig[];
  rateLimit?: RateLimitOptions;
  /** grace period between SIGTERM and SIGKILL in `ms` */
  killGraceMs?: number;
  /** output buffered per command before the process is paused in `bytes` */
  maxBufferedOutputBytes?: number;
  /** maximum `file_read` chunk in `bytes` */
  maxFileReadBytes?: number;
  /** JSON-lines audit log path */
  auditLogFile?: string;
  /** audit events queued before the oldest is dropped */
  maxQueuedAuditEvents?: number;
  folders?: FolderConfig[];
  /** optional WebSocket listener carrying the same frames */
  websocket?: WebSocketOptions;
  /**
   * Debug configuration
   *
   * - `true`: enable all debug components
   * - `false`: disable all debug components
   * - list: enable only the named components (merged with FOLDERSHELL_DEBUG)
   */
  debug?: DebugConfig;
};

export type ResolvedServerOptions = {
  host: string;
  port: number;
  maxConnections: number;
  maxSessions: number;
  connectionTimeoutSeconds: number;
  sessionTimeoutMinutes: number;
  sessionSweepIntervalMs: number;
  requireAuthentication: boolean;
  authMethods: AuthMethod[];
  maxFailedAttempts: number;
  tokens: TokenConfig[];
  users: UserConfig[];
  rateLimit: Required<RateLimitOptions>;
  killGraceMs: number;
  maxBufferedOutputBytes: number;
  maxFileReadBytes: number;
  auditLogFile: string | null;
  maxQueuedAuditEvents: number;
  folders: FolderConfig[];
  websocket: WebSocketOptions | null;
  /** enabled debug components */
  debug: DebugFlag[];
};

function resolveEnvPort(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) return undefined;
  return parsed;
}

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer`);
  }
  return value;
}

function portNumber(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new ConfigError(`${name} must be a port number`);
  }
  return value;
}

export function resolveServerOptions(options: ServerOptions = {}): ResolvedServerOptions {
  const host = options.host ?? process.env.FOLDERSHELL_HOST ?? DEFAULT_HOST;
  const port = portNumber("port", options.port ?? resolveEnvPort("FOLDERSHELL_PORT") ?? DEFAULT_PORT);
  const maxConnections = positiveInteger(
    "maxConnections",
    options.maxConnections,
    DEFAULT_MAX_CONNECTIONS,
  );
  const sessionTimeoutMinutes = positiveInteger(
    "sessionTimeoutMinutes",
    options.sessionTimeoutMinutes,
    DEFAULT_SESSION_TIMEOUT_MINUTES,
  );

  const authMethods = options.authMethods ?? ["token"];
  for (const method of authMethods) {
    if (!AUTH_METHODS.includes(method)) {
      throw new ConfigError(`unknown auth method '${method}'`);
    }
  }

  const requireAuthentication = options.requireAuthentication ?? true;
  if (requireAuthentication && authMethods.length === 0) {
    throw new ConfigError("authentication is required but no auth method is enabled");
  }

  const websocket = options.websocket
    ? {
        host: options.websocket.host ?? host,
        port: portNumber("websocket.port", options.websocket.port),
        path: options.websocket.path,
      }
    : null;

  const debug = debugFlagsToArray(resolveDebugFlags(options.debug, parseDebugEnv()));

  return {
    host,
    port,
    maxConnections,
    maxSessions: positiveInteger("maxSessions", options.maxSessions, maxConnections),
    connectionTimeoutSeconds: positiveInteger(
      "connectionTimeoutSeconds",
      options.connectionTimeoutSeconds,
      DEFAULT_CONNECTION_TIMEOUT_SECONDS,
    ),
    sessionTimeoutMinutes,
    sessionSweepIntervalMs: positiveInteger(
      "sessionSweepIntervalMs",
      options.sessionSweepIntervalMs,
      Math.min(60_000, sessionTimeoutMinutes * 60_000),
    ),
    requireAuthentication,
    authMethods: [...authMethods],
    maxFailedAttempts: positiveInteger(
      "maxFailedAttempts",
      options.maxFailedAttempts,
      DEFAULT_MAX_FAILED_ATTEMPTS,
    ),
    tokens: options.tokens ?? [],
    users: options.users ?? [],
    rateLimit: {
      maxRequests: positiveInteger(
        "rateLimit.maxRequests",
        options.rateLimit?.maxRequests,
        DEFAULT_RATE_LIMIT_REQUESTS,
      ),
      windowMs: positiveInteger(
        "rateLimit.windowMs",
        options.rateLimit?.windowMs,
        DEFAULT_RATE_LIMIT_WINDOW_MS,
      ),
    },
    killGraceMs: positiveInteger("killGraceMs", options.killGraceMs, DEFAULT_KILL_GRACE_MS),
    maxBufferedOutputBytes: positiveInteger(
      "maxBufferedOutputBytes",
      options.maxBufferedOutputBytes,
      DEFAULT_MAX_BUFFERED_OUTPUT_BYTES,
    ),
    maxFileReadBytes: positiveInteger(
      "maxFileReadBytes",
      options.maxFileReadBytes,
      DEFAULT_MAX_FILE_READ_BYTES,
    ),
    auditLogFile: options.auditLogFile ?? null,
    maxQueuedAuditEvents: positiveInteger(
      "maxQueuedAuditEvents",
      options.maxQueuedAuditEvents,
      DEFAULT_MAX_QUEUED_AUDIT_EVENTS,
    ),
    folders: options.folders ?? [],
    websocket,
    debug,
  };
}

// ---------------------------------------------------------------------------
// Config file

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** validated access to one JSON object of the config file */
class ConfigSection {
  constructor(
    private readonly where: string,
    private readonly fields: Record<string, unknown>,
  ) {}

  static from(where: string, value: unknown): ConfigSection {
    if (!isObject(value)) {
      throw new ConfigError(`${where} must be an object`);
    }
    return new ConfigSection(where, value);
  }

  private fail(key: string, expected: string): never {
    throw new ConfigError(`${this.where}.${key} must be ${expected}`);
  }

  has(key: string) {
    return this.fields[key] !== undefined && this.fields[key] !== null;
  }

  section(key: string): ConfigSection | undefined {
    if (!this.has(key)) return undefined;
    return ConfigSection.from(`${this.where}.${key}`, this.fields[key]);
  }

  sections(key: string): ConfigSection[] {
    if (!this.has(key)) return [];
    const value = this.fields[key];
    if (!Array.isArray(value)) this.fail(key, "an array");
    return value.map((entry, index) => ConfigSection.from(`${this.where}.${key}[${index}]`, entry));
  }

  string(key: string): string {
    const value = this.fields[key];
    if (typeof value !== "string") this.fail(key, "a string");
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.has(key) ? this.string(key) : undefined;
  }

  optionalNumber(key: string): number | undefined {
    if (!this.has(key)) return undefined;
    const value = this.fields[key];
    if (typeof value !== "number" || !Number.isFinite(value)) this.fail(key, "a number");
    return value;
  }

  optionalBoolean(key: string): boolean | undefined {
    if (!this.has(key)) return undefined;
    const value = this.fields[key];
    if (typeof value !== "boolean") this.fail(key, "a boolean");
    return value;
  }

  optionalStrings(key: string): string[] | undefined {
    if (!this.has(key)) return undefined;
    const value = this.fields[key];
    if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string")) {
      this.fail(key, "an array of strings");
    }
    return value.map(String);
  }

  optionalOneOfList<T extends string>(key: string, values: readonly T[]): T[] | undefined {
    const list = this.optionalStrings(key);
    if (!list) return undefined;
    return list.map((entry) => {
      const match = values.find((value) => value === entry.toLowerCase());
      if (!match) this.fail(key, `a list of ${values.join(", ")}`);
      return match;
    });
  }

  optionalOneOf<T extends string>(key: string, values: readonly T[]): T | undefined {
    const value = this.optionalString(key);
    if (value === undefined) return undefined;
    const match = values.find((entry) => entry === value.toLowerCase());
    if (!match) this.fail(key, `one of ${values.join(", ")}`);
    return match;
  }

  optionalStringMap(key: string): Record<string, string> | undefined {
    if (!this.has(key)) return undefined;
    const value = this.fields[key];
    if (!isObject(value)) this.fail(key, "an object of strings");
    const out: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
      if (typeof entry !== "string") this.fail(key, "an object of strings");
      out[name] = entry;
    }
    return out;
  }
}

function parseFolder(section: ConfigSection, baseDir: string): FolderConfig {
  return {
    name: section.string("name"),
    path: path.resolve(baseDir, section.string("path")),
    permissions: section.optionalOneOfList("permissions", PERMISSIONS),
    shell: section.optionalOneOf("shell", SHELL_TYPES),
    allowedCommands: section.optionalStrings("allowed_commands"),
    blockedCommands: section.optionalStrings("blocked_commands"),
    env: section.optionalStringMap("env"),
    readonly: section.optionalBoolean("readonly"),
    description: section.optionalString("description"),
  };
}

function parseToken(section: ConfigSection): TokenConfig {
  const token = section.optionalString("token");
  const sha256 = section.optionalString("sha256");
  if (!token && !sha256) {
    throw new ConfigError("tokens need either 'token' or 'sha256'");
  }
  return {
    token,
    sha256,
    identity: section.optionalString("identity"),
    permissions: section.optionalOneOfList("permissions", PERMISSIONS),
    expiresAt: section.optionalString("expires_at"),
  };
}

function parseUser(section: ConfigSection): UserConfig {
  return {
    username: section.string("username"),
    passwordHash: section.string("password_hash"),
    permissions: section.optionalOneOfList("permissions", PERMISSIONS),
  };
}

/**
 * Parse a decoded config document.
 *
 * Relative folder and audit log paths resolve against `baseDir`.
 */
export function parseConfig(document: unknown, baseDir: string): ServerOptions {
  const root = ConfigSection.from("config", document);
  const server = root.section("server");
  const security = root.section("security");
  const rateLimit = security?.section("rate_limit");
  const windowSeconds = rateLimit?.optionalNumber("window_seconds");
  const auditLog = security?.optionalString("audit_log");
  const websocketPort = server?.optionalNumber("websocket_port");
  const debug = root.optionalStrings("debug");

  const options: ServerOptions = {
    host: server?.optionalString("host"),
    port: server?.optionalNumber("port"),
    maxConnections: server?.optionalNumber("max_connections"),
    maxSessions: server?.optionalNumber("max_sessions"),
    connectionTimeoutSeconds: server?.optionalNumber("connection_timeout_seconds"),
    sessionTimeoutMinutes: server?.optionalNumber("session_timeout_minutes"),
    requireAuthentication: security?.optionalBoolean("require_authentication"),
    authMethods: security?.optionalOneOfList("auth_methods", AUTH_METHODS),
    maxFailedAttempts: security?.optionalNumber("max_failed_attempts"),
    tokens: security?.sections("tokens").map(parseToken),
    users: security?.sections("users").map(parseUser),
    rateLimit: rateLimit && {
      maxRequests: rateLimit.optionalNumber("max_requests"),
      windowMs: windowSeconds === undefined ? undefined : windowSeconds * 1000,
    },
    auditLogFile: auditLog === undefined ? undefined : path.resolve(baseDir, auditLog),
    folders: root.sections("folders").map((section) => parseFolder(section, baseDir)),
    websocket:
      websocketPort === undefined
        ? undefined
        : { port: websocketPort, host: server?.optionalString("websocket_host") },
    debug: debug?.filter(isDebugFlag),
  };

  return options;
}

/** read and validate a JSON config file */
export function loadConfigFile(filePath: string): ServerOptions {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`failed to read config file ${filePath}: ${errorMessage(err)}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`invalid JSON in ${filePath}: ${errorMessage(err)}`);
  }

  return parseConfig(document, path.dirname(path.resolve(filePath)));
}
