#!/usr/bin/env node
import { DEFAULT_DEV_TOKEN, hashPassword } from "../src/auth";
import {
  CliUsageError,
  parseCli,
  type CliCommand,
  type ExecArgs,
  type HashPasswordArgs,
  type ServeArgs,
} from "../src/cli";
import { FolderShellClient } from "../src/client";
import { loadConfigFile } from "../src/config";
import { defaultDebugLog, type DebugComponent } from "../src/debug";
import { isFolderShellError } from "../src/errors";
import { FolderShellServer } from "../src/server";

function renderCliError(err: unknown) {
  if (isFolderShellError(err)) {
    console.error(`Error (${err.code}): ${err.message}`);
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
}

function usage() {
  console.log("Usage: foldershell <command> [options]");
  console.log("Commands:");
  console.log("  serve          Serve the folders of a config file");
  console.log("  exec           Run one command in a folder of a running server");
  console.log("  hash-password  Print a password hash for the users section of the config");
  console.log("  help           Show this help");
  console.log();
  console.log("serve options:");
  console.log("  --config PATH          JSON config file (required)");
  console.log("  --host HOST            Override the listen address");
  console.log("  --port PORT            Override the listen port");
  console.log("  --debug                Enable every debug component");
  console.log();
  console.log("exec options:");
  console.log("  --host HOST            Server address (default: 127.0.0.1 or $FOLDERSHELL_HOST)");
  console.log("  --port PORT            Server port (default: 2222 or $FOLDERSHELL_PORT)");
  console.log("  --token TOKEN          Token credential (default: $FOLDERSHELL_TOKEN)");
  console.log("  --user NAME            Authenticate with a password instead of a token");
  console.log("  --password PASSWORD    Password for --user");
  console.log("  --no-auth              Skip authentication");
  console.log("  --folder NAME          Folder to bind (required)");
  console.log("  --shell SHELL          Preferred shell (the folder's configured shell wins)");
  console.log("  --env KEY=VALUE        Set environment variable (can repeat)");
  console.log("  -- COMMAND [ARGS...]   Command to run");
  console.log();
  console.log("Set FOLDERSHELL_DEBUG=1 (or a comma list) to enable debug logging.");
}

async function runServe(args: ServeArgs) {
  const config = loadConfigFile(args.configPath);
  const server = new FolderShellServer({
    ...config,
    host: args.host ?? config.host,
    port: args.port ?? config.port,
    debug: args.debug ? true : config.debug,
  });
  server.on("debug", (component: DebugComponent, message: string) => {
    defaultDebugLog(component, message);
  });

  const address = await server.listen();
  console.log(`foldershell listening on ${address.address}:${address.port}`);
  const ws = server.websocketAddress;
  if (ws) {
    console.log(`WebSocket transport on ws://${ws.address}:${ws.port}`);
  }

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });
}

async function runExec(args: ExecArgs) {
  const client = new FolderShellClient({ host: args.host, port: args.port });
  let exitCode = 1;

  try {
    await client.connect();
    if (args.username !== undefined && args.password !== undefined) {
      await client.authenticate("password", { username: args.username, password: args.password });
    } else if (!args.noAuth) {
      await client.authenticate("token", { token: args.token ?? DEFAULT_DEV_TOKEN });
    }
    await client.bindFolder(args.folder, args.shell);
    await client.startSession({ oneshot: true });

    const result = await client.execute(args.command, args.args, {
      env: Object.keys(args.env).length > 0 ? args.env : undefined,
      onOutput: (stream, data) => {
        (stream === "stdout" ? process.stdout : process.stderr).write(data);
      },
    });

    if (result.error) {
      process.stderr.write(`${result.error}\n`);
    }
    if (result.signal !== undefined) {
      process.stderr.write(`process exited due to signal ${result.signal}\n`);
    }
    exitCode = result.exitCode;
  } catch (err) {
    renderCliError(err);
    exitCode = 1;
  } finally {
    client.close();
  }

  process.exit(exitCode);
}

async function readStdinLine(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8").split(/\r?\n/)[0] ?? "";
}

async function runHashPassword(args: HashPasswordArgs) {
  const password = args.password ?? (await readStdinLine());
  if (!password) {
    console.error("password must not be empty");
    process.exit(1);
  }
  console.log(hashPassword(password));
}

async function main() {
  let parsed: CliCommand;
  try {
    parsed = parseCli(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      usage();
      process.exit(1);
    }
    throw err;
  }

  switch (parsed.command) {
    case "help":
      usage();
      process.exit(process.argv.length > 2 ? 0 : 1);
    case "serve":
      await runServe(parsed.args);
      return;
    case "exec":
      await runExec(parsed.args);
      return;
    case "hash-password":
      await runHashPassword(parsed.args);
      return;
  }
}

main().catch((err) => {
  renderCliError(err);
  process.exit(1);
});
