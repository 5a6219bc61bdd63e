import assert from "node:assert/strict";
import { once } from "node:events";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import { WebSocket } from "ws";

import { FolderShellClient } from "../src/client";
import type { ServerOptions } from "../src/config";
import { FolderShellError } from "../src/errors";
import { FrameReader, decodeServerMessage, encodeMessage, type ServerMessage } from "../src/protocol";
import { FolderShellServer, type FolderShellServerDeps } from "../src/server";
import { ProcessShellExecutor } from "../src/shell-executor";
import { TEST_TOKEN, connectMessage, makeTempDir, waitFor } from "./helpers/fixtures";

const posixOnly = { skip: process.platform === "win32" };

async function startServer(options: ServerOptions, deps: FolderShellServerDeps = {}) {
  const server = new FolderShellServer({ host: "127.0.0.1", port: 0, debug: false, ...options }, deps);
  const address = await server.listen();
  return { server, port: address.port };
}

function newClient(port: number) {
  return new FolderShellClient({ host: "127.0.0.1", port, name: "test-client", requestTimeoutMs: 5000 });
}

async function openSession(client: FolderShellClient, folder = "project") {
  await client.connect();
  await client.authenticate("token", { token: TEST_TOKEN });
  await client.bindFolder(folder);
  return client.startSession();
}

function withRoot(fn: (root: string, base: string) => Promise<void>) {
  return async () => {
    const base = makeTempDir();
    const root = path.join(base, "root");
    fs.mkdirSync(root);
    try {
      await fn(root, base);
    } finally {
      fs.rmSync(base, { recursive: true, force: true });
    }
  };
}

function projectOptions(root: string, extra: ServerOptions = {}): ServerOptions {
  return {
    tokens: [{ token: TEST_TOKEN, identity: "tester" }],
    folders: [{ name: "project", path: root, shell: "sh" }],
    ...extra,
  };
}

function isCode(code: string) {
  return (err: unknown) => err instanceof FolderShellError && err.code === code;
}

// ---------------------------------------------------------------------------

test(
  "the development token opens a session and runs a real command",
  posixOnly,
  withRoot(async (root) => {
    fs.writeFileSync(path.join(root, "hello.txt"), "hi");
    const { server, port } = await startServer({
      folders: [{ name: "My Project", path: root, shell: "sh", description: "demo" }],
    });
    const client = newClient(port);
    try {
      const hello = await client.connect();
      assert.deepEqual(hello, { serverVersion: "1.0", features: [], folders: ["My Project"] });
      assert.equal(await client.authenticate("token", { token: "default" }), "default");

      const folder = await client.bindFolder("My Project");
      assert.deepEqual(folder, {
        name: "My Project",
        working_directory: ".",
        permissions: ["read", "write", "execute"],
        shell: "sh",
        description: "demo",
      });
      const session = await client.startSession();
      assert.equal(session.workingDirectory, ".");
      assert.equal(session.prompt, ".$ ");

      const result = await client.execute("ls");
      assert.equal(result.exitCode, 0);
      assert.equal(result.stdout.toString(), "hello.txt\n");
      assert.equal(result.workingDirectory, ".");
      assert.ok((await client.ping()) >= 0);
      await client.disconnect();
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "exit codes, stderr and per-command environment reach the client",
  posixOnly,
  withRoot(async (root) => {
    const { server, port } = await startServer(projectOptions(root));
    const client = newClient(port);
    try {
      await openSession(client);
      const failed = await client.execute("echo out; echo err 1>&2; exit 4");
      assert.equal(failed.exitCode, 4);
      assert.equal(failed.stdout.toString(), "out\n");
      assert.equal(failed.stderr.toString(), "err\n");

      const greeting = await client.execute(`printf %s "$GREETING"`, [], { env: { GREETING: "hello" } });
      assert.equal(greeting.stdout.toString(), "hello");
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "each client keeps its own working directory",
  posixOnly,
  withRoot(async (root) => {
    fs.mkdirSync(path.join(root, "a"));
    fs.mkdirSync(path.join(root, "b"));
    fs.writeFileSync(path.join(root, "a", "x.txt"), "");
    fs.writeFileSync(path.join(root, "b", "y.txt"), "");
    const { server, port } = await startServer(projectOptions(root));
    const first = newClient(port);
    const second = newClient(port);
    try {
      await openSession(first);
      await openSession(second);
      assert.equal((await first.execute("cd a")).workingDirectory, "a");
      assert.equal((await second.execute("cd b")).workingDirectory, "b");

      assert.equal((await first.execute("ls")).stdout.toString(), "x.txt\n");
      assert.equal((await second.execute("ls")).stdout.toString(), "y.txt\n");
      assert.equal((await first.execute("pwd")).stdout.toString(), "a\n");
      assert.equal(server.sessions.size, 2);
    } finally {
      first.close();
      second.close();
      await server.close();
    }
  }),
);

test(
  "denials reject with the server's error code and keep the session",
  withRoot(async (root) => {
    const { server, port } = await startServer({
      ...projectOptions(root),
      folders: [{ name: "project", path: root, shell: "sh", blockedCommands: ["sudo"] }],
    });
    const client = newClient(port);
    try {
      await openSession(client);
      await assert.rejects(
        client.execute("sudo", ["ls"]),
        (err: unknown) =>
          err instanceof FolderShellError &&
          err.code === "command_blocked" &&
          err.message === "command 'sudo' is blocked",
      );
      await assert.rejects(client.execute("cd /etc"), isCode("path_escape"));
      assert.equal((await client.execute("pwd")).stdout.toString(), ".\n");
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "redirections and chained cd cannot reach files beside the folder",
  posixOnly,
  withRoot(async (root, base) => {
    fs.writeFileSync(path.join(base, "secret.txt"), "TOP-SECRET\n");
    fs.mkdirSync(path.join(root, "src"));
    const { server, port } = await startServer(projectOptions(root));
    const client = newClient(port);
    try {
      await openSession(client);
      await assert.rejects(client.execute(`cat <${base}/secret.txt`), isCode("path_escape"));
      await assert.rejects(client.execute(`echo escaped >${base}/written.txt`), isCode("path_escape"));
      assert.equal(fs.existsSync(path.join(base, "written.txt")), false);

      assert.equal((await client.execute("cd src")).workingDirectory, "src");
      await assert.rejects(client.execute("cd .. && cd .. && cat secret.txt"), isCode("command_not_allowed"));

      const kept = await client.execute("echo kept >notes.txt && cat <notes.txt");
      assert.equal(kept.stdout.toString(), "kept\n");
      assert.equal(fs.readFileSync(path.join(root, "src", "notes.txt"), "utf8"), "kept\n");
      assert.equal((await client.execute("printenv HOME")).stdout.toString(), ".\n");
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "repeated authentication failures lock the connection out",
  withRoot(async (root) => {
    const { server, port } = await startServer(projectOptions(root, { maxFailedAttempts: 3 }));
    const client = newClient(port);
    try {
      await client.connect();
      await assert.rejects(client.authenticate("token", { token: "wrong-1" }), isCode("auth_failure"));
      await assert.rejects(client.authenticate("token", { token: "wrong-2" }), isCode("auth_failure"));

      const serverError = once(client, "server_error");
      const closed = once(client, "close");
      await assert.rejects(
        client.authenticate("token", { token: "wrong-3" }),
        (err: unknown) => err instanceof FolderShellError && err.message === "authentication failed",
      );
      const [lockout] = await serverError;
      assert.ok(lockout instanceof FolderShellError);
      assert.equal(lockout.code, "auth_lockout");
      await closed;

      await assert.rejects(client.authenticate("token", { token: TEST_TOKEN }), isCode("transport_error"));
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "cancel terminates a long running command",
  posixOnly,
  withRoot(async (root) => {
    const { server, port } = await startServer(projectOptions(root, { killGraceMs: 2000 }));
    const client = newClient(port);
    try {
      await openSession(client);
      const result = await client.execute("echo ready; sleep 30", [], {
        onOutput: (_stream, data) => {
          if (data.toString().includes("ready")) client.cancel();
        },
      });
      assert.equal(result.exitCode, 143);
      assert.equal(result.signal, "SIGTERM");
      assert.equal(result.stdout.toString(), "ready\n");
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "a shell that cannot start completes with exit code 127",
  posixOnly,
  withRoot(async (root) => {
    const { server, port } = await startServer(projectOptions(root), {
      executor: new ProcessShellExecutor({ shellPaths: { sh: "/nonexistent/foldershell-sh" } }),
    });
    const client = newClient(port);
    try {
      await openSession(client);
      const result = await client.execute("ls");
      assert.equal(result.exitCode, 127);
      assert.ok(result.error?.startsWith("failed to start /nonexistent/foldershell-sh"));
      assert.equal(result.stdout.length, 0);
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "connections beyond the limit are refused",
  withRoot(async (root) => {
    const { server, port } = await startServer(projectOptions(root, { maxConnections: 1 }));
    const first = newClient(port);
    const second = newClient(port);
    try {
      await first.connect();
      await assert.rejects(
        second.connect(),
        (err: unknown) =>
          err instanceof FolderShellError &&
          err.code === "resource_exhausted" &&
          err.message === "connection limit reached (1)",
      );
      assert.equal(server.connectionCount, 1);
    } finally {
      first.close();
      second.close();
      await server.close();
    }
  }),
);

test(
  "shutdown notifies connected clients",
  withRoot(async (root) => {
    const { server, port } = await startServer(projectOptions(root));
    const client = newClient(port);
    try {
      await openSession(client);
      const disconnected = once(client, "disconnect");
      await server.close();
      const [reason] = await disconnected;
      assert.equal(reason, "server_shutdown");
      assert.equal(server.sessions.size, 0);
    } finally {
      client.close();
      await server.close();
    }
  }),
);

test(
  "the WebSocket listener speaks the same frames",
  withRoot(async (root) => {
    const { server } = await startServer(projectOptions(root, { websocket: { port: 0 } }));
    const wsAddress = server.websocketAddress;
    assert.ok(wsAddress);
    const ws = new WebSocket(`ws://127.0.0.1:${wsAddress.port}`);
    const received: ServerMessage[] = [];
    const reader = new FrameReader();
    ws.on("message", (data) => {
      if (Buffer.isBuffer(data)) {
        reader.push(data, (frame) => received.push(decodeServerMessage(frame)));
      }
    });
    try {
      await once(ws, "open");
      ws.send(encodeMessage(connectMessage()));
      ws.send(encodeMessage({ type: "ping", nonce: 7 }));
      await waitFor(() => received.length === 2);

      const [response, pong] = received;
      assert.equal(response.type, "connect_response");
      assert.deepEqual(response.type === "connect_response" ? response.folders : [], ["project"]);
      assert.deepEqual(pong, { type: "pong", nonce: 7 });
    } finally {
      ws.terminate();
      await server.close();
    }
  }),
);

function eventType(line: string): unknown {
  const parsed: unknown = JSON.parse(line);
  return typeof parsed === "object" && parsed !== null && "type" in parsed ? parsed.type : undefined;
}

test(
  "audit events are written to the configured log",
  withRoot(async (root, base) => {
    const logFile = path.join(base, "logs", "audit.jsonl");
    const { server, port } = await startServer(projectOptions(root, { auditLogFile: logFile }));
    const client = newClient(port);
    try {
      await client.connect();
      await client.authenticate("token", { token: TEST_TOKEN });
      await client.disconnect();
      await waitFor(() => server.connectionCount === 0);
    } finally {
      client.close();
      await server.close();
    }

    const lines = fs.readFileSync(logFile, "utf8").trim().split("\n");
    assert.deepEqual(lines.map(eventType), ["connection_opened", "auth_success", "connection_closed"]);
  }),
);
