import assert from "node:assert/strict";
import { once } from "node:events";
import net from "node:net";
import test from "node:test";

import { FolderShellClient } from "../src/client";
import { FolderShellError } from "../src/errors";
import {
  FrameReader,
  decodeClientMessage,
  encodeMessage,
  type ClientMessage,
  type ServerMessage,
} from "../src/protocol";
import { waitFor } from "./helpers/fixtures";

type Reply = (message: ServerMessage) => void;
type Script = (message: ClientMessage, reply: Reply) => void;

/** loopback server that answers client frames from a script */
async function scriptedServer(script: Script) {
  const received: ClientMessage[] = [];
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    const reader = new FrameReader();
    const reply: Reply = (message) => {
      socket.write(encodeMessage(message));
    };
    socket.on("data", (chunk: Buffer) => {
      reader.push(chunk, (frame) => {
        const message = decodeClientMessage(frame);
        received.push(message);
        if (message.type === "connect") {
          reply({
            type: "connect_response",
            success: true,
            server_version: "1.0",
            features: message.features,
            folders: ["project"],
          });
          return;
        }
        script(message, reply);
      });
    });
    socket.on("error", () => socket.destroy());
    socket.on("close", () => sockets.delete(socket));
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("scripted server has no port");
  }

  return {
    port: address.port,
    received,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

function newClient(port: number, features: string[] = []) {
  return new FolderShellClient({ host: "127.0.0.1", port, features, requestTimeoutMs: 2000 });
}

// ---------------------------------------------------------------------------

test("connect reports the server hello and requested features", async () => {
  const server = await scriptedServer(() => {});
  const client = newClient(server.port, ["oneshot"]);
  try {
    assert.deepEqual(await client.connect(), {
      serverVersion: "1.0",
      features: ["oneshot"],
      folders: ["project"],
    });
    assert.equal(client.connected, true);
    const [connect] = server.received;
    assert.equal(connect.type, "connect");
    assert.equal(connect.type === "connect" ? connect.version : "", "1.0");
  } finally {
    client.close();
    await server.close();
  }
});

test("ping matches the nonce and server pings are answered", async () => {
  const server = await scriptedServer((message, reply) => {
    if (message.type === "ping") {
      reply({ type: "ping", nonce: 99 });
      reply({ type: "pong", nonce: message.nonce });
    }
  });
  const client = newClient(server.port);
  try {
    await client.connect();
    assert.ok((await client.ping()) >= 0);
    await waitFor(() => server.received.some((message) => message.type === "pong"));
    assert.deepEqual(server.received[server.received.length - 1], { type: "pong", nonce: 99 });
  } finally {
    client.close();
    await server.close();
  }
});

test("execute collects output until command_complete", async () => {
  const server = await scriptedServer((message, reply) => {
    if (message.type !== "command") return;
    reply({ type: "command_output", stream: "stdout", data: Buffer.from("one ") });
    reply({ type: "command_output", stream: "stderr", data: Buffer.from("warn") });
    reply({ type: "command_output", stream: "stdout", data: Buffer.from("two") });
    reply({ type: "command_complete", exit_code: 2, duration_ms: 15, working_directory: "src" });
  });
  const client = newClient(server.port);
  const seen: string[] = [];
  try {
    await client.connect();
    const result = await client.execute("make", ["all"], {
      env: { CI: "1" },
      onOutput: (stream, data) => seen.push(`${stream}:${data.toString()}`),
    });
    assert.deepEqual(result, {
      exitCode: 2,
      durationMs: 15,
      workingDirectory: "src",
      signal: undefined,
      error: undefined,
      stdout: Buffer.from("one two"),
      stderr: Buffer.from("warn"),
    });
    assert.deepEqual(seen, ["stdout:one ", "stderr:warn", "stdout:two"]);
    assert.deepEqual(server.received[1], { type: "command", command: "make", args: ["all"], env: { CI: "1" } });
  } finally {
    client.close();
    await server.close();
  }
});

test("an error frame rejects the oldest outstanding request", async () => {
  const server = await scriptedServer((message, reply) => {
    if (message.type === "file_read") {
      reply({ type: "error", code: "not_found", message: `no such file or directory: ${message.path}` });
    }
  });
  const client = newClient(server.port);
  try {
    await client.connect();
    await assert.rejects(
      client.readFile("missing.txt"),
      (err: unknown) =>
        err instanceof FolderShellError &&
        err.code === "not_found" &&
        err.message === "no such file or directory: missing.txt",
    );
    assert.equal(client.connected, true);
  } finally {
    client.close();
    await server.close();
  }
});

test("errors with nothing waiting are emitted as server_error", async () => {
  const server = await scriptedServer((message, reply) => {
    if (message.type === "cancel") {
      reply({ type: "error", code: "rate_limited", message: "rate limit exceeded" });
    }
  });
  const client = newClient(server.port);
  try {
    await client.connect();
    const emitted = once(client, "server_error");
    client.cancel();
    const [error] = await emitted;
    assert.ok(error instanceof FolderShellError);
    assert.equal(error.code, "rate_limited");
  } finally {
    client.close();
    await server.close();
  }
});

test("a session timeout disconnect fails the running command", async () => {
  const server = await scriptedServer((message, reply) => {
    if (message.type === "command") {
      reply({ type: "disconnect", reason: "session_timeout" });
    }
  });
  const client = newClient(server.port);
  try {
    await client.connect();
    const disconnected = once(client, "disconnect");
    await assert.rejects(
      client.execute("sleep", ["100"]),
      (err: unknown) =>
        err instanceof FolderShellError &&
        err.code === "session_timeout" &&
        err.message === "server disconnected: session_timeout",
    );
    const [reason] = await disconnected;
    assert.equal(reason, "session_timeout");
    assert.equal(client.connected, false);
  } finally {
    client.close();
    await server.close();
  }
});

test("a refused hello rejects connect", async () => {
  const server = net.createServer((socket) => {
    socket.end(
      encodeMessage({
        type: "connect_response",
        success: false,
        server_version: "1.0",
        features: [],
        folders: [],
        message: "unsupported protocol version 1.0",
      }),
    );
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  assert.ok(address && typeof address !== "string");
  const client = newClient(address.port);
  try {
    await assert.rejects(
      client.connect(),
      (err: unknown) =>
        err instanceof FolderShellError &&
        err.code === "protocol_violation" &&
        err.message === "unsupported protocol version 1.0",
    );
  } finally {
    client.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

test("connecting to a closed port is a transport error", async () => {
  const probe = net.createServer();
  await new Promise<void>((resolve) => probe.listen(0, "127.0.0.1", () => resolve()));
  const address = probe.address();
  assert.ok(address && typeof address !== "string");
  const port = address.port;
  await new Promise<void>((resolve) => probe.close(() => resolve()));

  const client = newClient(port);
  await assert.rejects(
    client.connect(),
    (err: unknown) =>
      err instanceof FolderShellError &&
      err.code === "transport_error" &&
      err.message.startsWith(`failed to connect to 127.0.0.1:${port}: `),
  );
  client.close();
});
