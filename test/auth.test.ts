import assert from "node:assert/strict";
import { createHash } from "node:crypto";
import test from "node:test";

import { Authenticator, CredentialStore, hashPassword, type Identity } from "../src/auth";
import { ConfigError } from "../src/errors";

class CountingStore extends CredentialStore {
  calls = 0;

  verify(method: string, credentials: Record<string, string>): Identity | null {
    this.calls += 1;
    return super.verify(method, credentials);
  }
}

test("hashPassword encodes salt and scrypt hash as hex", () => {
  const encoded = hashPassword("test-password", Buffer.alloc(16, 1));
  const [scheme, salt, hash] = encoded.split("$");
  assert.equal(scheme, "scrypt");
  assert.equal(salt, "01".repeat(16));
  assert.match(hash, /^[0-9a-f]{64}$/);
  assert.equal(hashPassword("test-password", Buffer.alloc(16, 1)), encoded);
});

test("token verification returns the configured identity and permissions", () => {
  const store = new CredentialStore({
    methods: ["token"],
    tokens: [{ token: "test-token", identity: "ci", permissions: ["read"] }],
    users: [],
  });
  const identity = store.verify("token", { token: "test-token" });
  assert.equal(identity?.name, "ci");
  assert.equal(identity?.method, "token");
  assert.deepEqual([...(identity?.permissions ?? [])], ["read"]);
  assert.equal(store.verify("token", { token: "wrong" }), null);
  assert.equal(store.verify("token", {}), null);
  assert.equal(store.usesDevToken, false);
});

test("tokens may be configured by digest", () => {
  const digest = createHash("sha256").update("test-token").digest("hex");
  const store = new CredentialStore({ methods: ["token"], tokens: [{ sha256: digest }], users: [] });
  assert.equal(store.verify("token", { token: "test-token" })?.name, "token-1");
});

test("expired tokens are refused", () => {
  const store = new CredentialStore({
    methods: ["token"],
    tokens: [{ token: "test-token", identity: "ci", expiresAt: "2021-01-01T00:00:00Z" }],
    users: [],
    now: () => Date.parse("2022-06-01T00:00:00Z"),
  });
  assert.equal(store.verify("token", { token: "test-token" }), null);
});

test("the development token is accepted only when no token is configured", () => {
  const store = new CredentialStore({ methods: ["token"], tokens: [], users: [] });
  assert.equal(store.usesDevToken, true);
  assert.equal(store.verify("token", { token: "default" })?.name, "default");

  const configured = new CredentialStore({ methods: ["token"], tokens: [{ token: "test-token" }], users: [] });
  assert.equal(configured.verify("token", { token: "default" }), null);
});

test("password verification checks the scrypt hash", () => {
  const store = new CredentialStore({
    methods: ["password"],
    tokens: [],
    users: [{ username: "bob", passwordHash: hashPassword("test-password"), permissions: ["read", "write"] }],
  });
  const identity = store.verify("password", { username: "bob", password: "test-password" });
  assert.equal(identity?.name, "bob");
  assert.equal(identity?.method, "password");
  assert.deepEqual([...(identity?.permissions ?? [])], ["read", "write"]);
  assert.equal(store.verify("password", { username: "bob", password: "wrong" }), null);
  assert.equal(store.verify("password", { username: "alice", password: "test-password" }), null);
  assert.equal(store.usesDevToken, false);
});

test("disabled methods never verify", () => {
  const store = new CredentialStore({ methods: ["token"], tokens: [{ token: "test-token" }], users: [] });
  assert.equal(store.verify("password", { username: "bob", password: "test-password" }), null);
  assert.equal(store.verify("kerberos", { token: "test-token" }), null);
});

test("malformed credential configuration is rejected", () => {
  assert.throws(
    () => new CredentialStore({ methods: ["password"], tokens: [], users: [{ username: "bob", passwordHash: "plain" }] }),
    (err: unknown) =>
      err instanceof ConfigError && err.message === "user 'bob': password hash must look like scrypt$<salt>$<hash>",
  );
  assert.throws(
    () => new CredentialStore({ methods: ["token"], tokens: [{ sha256: "abcd" }], users: [] }),
    (err: unknown) => err instanceof ConfigError && err.message === "token #1: sha256 must be 64 hex characters",
  );
});

test("Authenticator locks after the configured number of failures", () => {
  const store = new CountingStore({ methods: ["token"], tokens: [{ token: "test-token" }], users: [] });
  const auth = new Authenticator(store, 3);

  assert.deepEqual(auth.authenticate("token", { token: "a" }), {
    ok: false,
    reason: "mismatch",
    lockedOut: false,
    failures: 1,
  });
  assert.deepEqual(auth.authenticate("token", { token: "b" }), {
    ok: false,
    reason: "mismatch",
    lockedOut: false,
    failures: 2,
  });
  assert.deepEqual(auth.authenticate("token", { token: "c" }), {
    ok: false,
    reason: "mismatch",
    lockedOut: true,
    failures: 3,
  });
  assert.equal(auth.isLocked, true);

  const fourth = auth.authenticate("token", { token: "test-token" });
  assert.deepEqual(fourth, { ok: false, reason: "locked", lockedOut: false, failures: 3 });
  assert.equal(store.calls, 3);
});

test("a success resets the failure counter", () => {
  const store = new CredentialStore({ methods: ["token"], tokens: [{ token: "test-token" }], users: [] });
  const auth = new Authenticator(store, 3);
  auth.authenticate("token", { token: "a" });
  auth.authenticate("token", { token: "b" });
  const result = auth.authenticate("token", { token: "test-token" });
  assert.equal(result.ok, true);
  assert.equal(auth.failureCount, 0);

  const next = auth.authenticate("token", { token: "c" });
  assert.equal(next.ok, false);
  assert.equal(auth.failureCount, 1);
  assert.equal(auth.isLocked, false);
});
