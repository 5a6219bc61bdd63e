import { createHash, randomBytes, scryptSync, timingSafeEqual } from "crypto";

import type { AuthMethod, TokenConfig, UserConfig } from "./config";
import { ConfigError } from "./errors";
import { PERMISSIONS, type Permission } from "./protocol";

/** token accepted when token auth is enabled and no token is configured */
export const DEFAULT_DEV_TOKEN = "default";

/** failure text shared by every kind of mismatch */
export const AUTH_FAILURE_MESSAGE = "authentication failed";

const SCRYPT_KEY_BYTES = 32;

export type Identity = {
  /** identity name reported to the client and in audit events */
  name: string;
  /** `none` when authentication is disabled */
  method: AuthMethod | "none";
  permissions: ReadonlySet<Permission>;
};

/** identity of every connection when authentication is disabled */
export const ANONYMOUS_IDENTITY: Identity = {
  name: "anonymous",
  method: "none",
  permissions: new Set(PERMISSIONS),
};

export type AuthResult =
  | { ok: true; identity: Identity }
  | {
      ok: false;
      /** `mismatch` for a rejected credential, `locked` once the counter tripped */
      reason: "mismatch" | "locked";
      /** whether this failure tripped the lockout */
      lockedOut: boolean;
      /** consecutive failures so far */
      failures: number;
    };

type TokenEntry = {
  digest: Buffer;
  identity: string;
  permissions: ReadonlySet<Permission>;
  expiresAt: number | null;
};

type UserEntry = {
  salt: Buffer;
  hash: Buffer;
  permissions: ReadonlySet<Permission>;
};

export type CredentialStoreOptions = {
  methods: AuthMethod[];
  tokens: TokenConfig[];
  users: UserConfig[];
  /** clock used for token expiry */
  now?: () => number;
};

function sha256(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

function permissionSet(permissions: Permission[] | undefined): ReadonlySet<Permission> {
  return new Set(permissions ?? PERMISSIONS);
}

/** produce a `scrypt$<salt>$<hash>` password hash */
export function hashPassword(password: string, salt: Buffer = randomBytes(16)): string {
  const hash = scryptSync(password, salt, SCRYPT_KEY_BYTES);
  return `scrypt$${salt.toString("hex")}$${hash.toString("hex")}`;
}

function parsePasswordHash(username: string, encoded: string): { salt: Buffer; hash: Buffer } {
  const parts = encoded.split("$");
  if (parts.length !== 3 || parts[0] !== "scrypt" || !parts[1] || !parts[2]) {
    throw new ConfigError(`user '${username}': password hash must look like scrypt$<salt>$<hash>`);
  }
  const salt = Buffer.from(parts[1], "hex");
  const hash = Buffer.from(parts[2], "hex");
  if (salt.length === 0 || hash.length !== SCRYPT_KEY_BYTES) {
    throw new ConfigError(`user '${username}': malformed password hash`);
  }
  return { salt, hash };
}

/**
 * Server-wide credential store.
 *
 * Verification is constant-time on digests; it never reports which part of
 * a credential was wrong.
 */
export class CredentialStore {
  private readonly methods: ReadonlySet<AuthMethod>;
  private readonly tokens: TokenEntry[];
  private readonly users = new Map<string, UserEntry>();
  private readonly now: () => number;
  /** whether the built-in development token is in use */
  readonly usesDevToken: boolean;

  constructor(options: CredentialStoreOptions) {
    this.methods = new Set(options.methods);
    this.now = options.now ?? Date.now;

    const tokens = options.tokens;
    this.usesDevToken = this.methods.has("token") && tokens.length === 0;
    const configured: TokenConfig[] = this.usesDevToken ? [{ token: DEFAULT_DEV_TOKEN }] : tokens;

    this.tokens = configured.map((entry, index) => {
      const digest = entry.sha256 ? Buffer.from(entry.sha256, "hex") : sha256(entry.token ?? "");
      if (digest.length !== 32) {
        throw new ConfigError(`token #${index + 1}: sha256 must be 64 hex characters`);
      }
      let expiresAt: number | null = null;
      if (entry.expiresAt !== undefined) {
        expiresAt = Date.parse(entry.expiresAt);
        if (Number.isNaN(expiresAt)) {
          throw new ConfigError(`token #${index + 1}: invalid expiry '${entry.expiresAt}'`);
        }
      }
      return {
        digest,
        identity: entry.identity ?? (entry.token === DEFAULT_DEV_TOKEN ? "default" : `token-${index + 1}`),
        permissions: permissionSet(entry.permissions),
        expiresAt,
      };
    });

    for (const user of options.users) {
      if (this.users.has(user.username)) {
        throw new ConfigError(`duplicate user '${user.username}'`);
      }
      const { salt, hash } = parsePasswordHash(user.username, user.passwordHash);
      this.users.set(user.username, {
        salt,
        hash,
        permissions: permissionSet(user.permissions),
      });
    }
  }

  isEnabled(method: string): method is AuthMethod {
    return (method === "token" || method === "password") && this.methods.has(method);
  }

  /** verify credentials, returning the identity or null */
  verify(method: string, credentials: Record<string, string>): Identity | null {
    if (!this.isEnabled(method)) return null;
    return method === "token"
      ? this.verifyToken(credentials.token)
      : this.verifyPassword(credentials.username, credentials.password);
  }

  private verifyToken(token: string | undefined): Identity | null {
    if (typeof token !== "string") return null;
    const digest = sha256(token);
    const now = this.now();
    let match: TokenEntry | null = null;
    for (const entry of this.tokens) {
      // compare against every entry so timing does not depend on position
      if (timingSafeEqual(entry.digest, digest) && match === null) {
        match = entry;
      }
    }
    if (!match) return null;
    if (match.expiresAt !== null && match.expiresAt <= now) return null;
    return { name: match.identity, method: "token", permissions: match.permissions };
  }

  private verifyPassword(
    username: string | undefined,
    password: string | undefined,
  ): Identity | null {
    if (typeof username !== "string" || typeof password !== "string") return null;
    const user = this.users.get(username);
    const salt = user?.salt ?? Buffer.alloc(16);
    const candidate = scryptSync(password, salt, SCRYPT_KEY_BYTES);
    if (!user || !timingSafeEqual(user.hash, candidate)) return null;
    return { name: username, method: "password", permissions: user.permissions };
  }
}

/**
 * Per-connection authenticator with a consecutive-failure counter.
 *
 * Once `maxFailedAttempts` consecutive failures are reached the counter
 * locks and every later attempt fails without touching the credentials.
 */
export class Authenticator {
  private failures = 0;
  private locked = false;

  constructor(
    private readonly store: CredentialStore,
    private readonly maxFailedAttempts: number,
  ) {}

  get failureCount() {
    return this.failures;
  }

  get isLocked() {
    return this.locked;
  }

  authenticate(method: string, credentials: Record<string, string>): AuthResult {
    if (this.locked) {
      return { ok: false, reason: "locked", lockedOut: false, failures: this.failures };
    }

    const identity = this.store.verify(method, credentials);
    if (identity) {
      this.failures = 0;
      return { ok: true, identity };
    }

    this.failures += 1;
    if (this.failures >= this.maxFailedAttempts) {
      this.locked = true;
    }
    return { ok: false, reason: "mismatch", lockedOut: this.locked, failures: this.failures };
  }
}
