/**
 * foldershell
 *
 * Folder-scoped remote shell server: clients bind one configured folder and
 * run commands and file operations confined to it.
 */

// Server
export { FolderShellServer, type FolderShellServerDeps } from "./server";
export {
  Connection,
  SERVER_FEATURES,
  type ConnectionContext,
  type ConnectionState,
} from "./connection";
export {
  SocketTransport,
  WebSocketTransport,
  type Transport,
  type TransportHandlers,
} from "./transport";

// Client
export {
  FolderShellClient,
  type FolderShellClientOptions,
  type CommandResult,
  type ExecuteOptions,
  type ServerHello,
  type SessionInfo,
} from "./client";

// Configuration
export {
  resolveServerOptions,
  loadConfigFile,
  parseConfig,
  type ServerOptions,
  type ResolvedServerOptions,
  type FolderConfig,
  type TokenConfig,
  type UserConfig,
  type AuthMethod,
} from "./config";
export { FolderRegistry, createFolderDescriptor, type FolderDescriptor } from "./folder-registry";

// Security
export {
  CredentialStore,
  Authenticator,
  hashPassword,
  ANONYMOUS_IDENTITY,
  DEFAULT_DEV_TOKEN,
  type Identity,
  type AuthResult,
} from "./auth";
export {
  bindFolder,
  checkCommand,
  checkArgumentPaths,
  resolveWithinRoot,
  requirePermission,
} from "./security";
export { RateLimiter, type RateLimiterOptions } from "./rate-limiter";

// Sessions and execution
export { Session, type SessionMode, type TerminationReason } from "./session";
export { SessionManager, type SessionManagerOptions } from "./session-manager";
export {
  ProcessShellExecutor,
  buildProcessEnv,
  type ShellExecutor,
  type ShellProcess,
  type ExecRequest,
  type ExitStatus,
} from "./shell-executor";
export { OutputMultiplexer, type OutputTarget, type OutputChunk } from "./output-multiplexer";

// Audit
export {
  AuditEmitter,
  JsonLinesAuditSink,
  NullAuditSink,
  type AuditEvent,
  type AuditEventType,
  type AuditSink,
} from "./audit";

// Protocol
export * from "./protocol";
export {
  FolderShellError,
  ConfigError,
  ERROR_CODES,
  isFolderShellError,
  type ErrorCode,
} from "./errors";
export {
  parseDebugEnv,
  resolveDebugFlags,
  type DebugConfig,
  type DebugFlag,
  type DebugComponent,
} from "./debug";
