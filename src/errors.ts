export const ERROR_CODES = [
  "protocol_violation",
  "auth_failure",
  "auth_lockout",
  "folder_not_found",
  "path_escape",
  "command_blocked",
  "command_not_allowed",
  "permission_denied",
  "rate_limited",
  "session_timeout",
  "spawn_failure",
  "transport_error",
  "config_invalid",
  "resource_exhausted",
  "command_in_progress",
  "not_found",
  "handshake_timeout",
  "io_error",
] as const;

/** stable error codes carried by `error` frames and audit events */
export type ErrorCode = (typeof ERROR_CODES)[number];

export class FolderShellError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FolderShellError";
    this.code = code;
  }
}

/** raised while loading or validating configuration */
export class ConfigError extends FolderShellError {
  constructor(message: string) {
    super("config_invalid", message);
    this.name = "ConfigError";
  }
}

export function isFolderShellError(err: unknown): err is FolderShellError {
  return err instanceof FolderShellError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** errno code of a node system error, if any */
export function errnoCode(err: unknown): string | undefined {
  if (!(err instanceof Error) || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}

/**
 * Wrap any thrown value in a `FolderShellError`.
 *
 * Filesystem errors keep only a generic message so host paths never reach
 * the client.
 */
export function toFolderShellError(err: unknown): FolderShellError {
  if (isFolderShellError(err)) return err;
  const code = errnoCode(err);
  switch (code) {
    case "ENOENT":
    case "ENOTDIR":
      return new FolderShellError("not_found", "no such file or directory", { cause: err });
    case "EACCES":
    case "EPERM":
      return new FolderShellError("permission_denied", "access denied", { cause: err });
    default:
      return new FolderShellError("io_error", code ? `operation failed (${code})` : errorMessage(err), {
        cause: err,
      });
  }
}
