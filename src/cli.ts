import { DEFAULT_HOST, DEFAULT_PORT } from "./config";
import { SHELL_TYPES, type ShellType } from "./protocol";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type ServeArgs = {
  configPath: string;
  host?: string;
  port?: number;
  /** enable every debug component */
  debug: boolean;
};

export type ExecArgs = {
  host: string;
  port: number;
  /** token credential (default: $FOLDERSHELL_TOKEN, then the dev token) */
  token?: string;
  username?: string;
  password?: string;
  /** skip authentication (server runs without it) */
  noAuth: boolean;
  folder: string;
  shell?: ShellType;
  env: Record<string, string>;
  command: string;
  args: string[];
};

export type HashPasswordArgs = {
  /** read from stdin when omitted */
  password?: string;
};

export type CliCommand =
  | { command: "serve"; args: ServeArgs }
  | { command: "exec"; args: ExecArgs }
  | { command: "hash-password"; args: HashPasswordArgs }
  | { command: "help"; topic?: string };

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

export function parsePort(value: string, flag = "--port"): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(port) || port > 65535) {
    throw new CliUsageError(`${flag} must be a port number`);
  }
  return port;
}

export function parseEnvAssignment(value: string): [string, string] {
  const eq = value.indexOf("=");
  if (eq <= 0) {
    throw new CliUsageError(`--env expects KEY=VALUE, got '${value}'`);
  }
  return [value.slice(0, eq), value.slice(eq + 1)];
}

function parseShell(value: string): ShellType {
  const shell = SHELL_TYPES.find((entry) => entry === value.toLowerCase());
  if (!shell) {
    throw new CliUsageError(`--shell must be one of ${SHELL_TYPES.join(", ")}`);
  }
  return shell;
}

export function parseServeArgs(argv: string[]): ServeArgs {
  let configPath: string | undefined;
  const args: Omit<ServeArgs, "configPath"> = { debug: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--config":
        configPath = takeValue(argv, i++, arg);
        break;
      case "--host":
        args.host = takeValue(argv, i++, arg);
        break;
      case "--port":
        args.port = parsePort(takeValue(argv, i++, arg));
        break;
      case "--debug":
        args.debug = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!configPath) {
    throw new CliUsageError("serve requires --config PATH");
  }
  return { configPath, ...args };
}

export function parseExecArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ExecArgs {
  const separator = argv.indexOf("--");
  const optionArgs = separator === -1 ? argv : argv.slice(0, separator);
  const commandArgs = separator === -1 ? [] : argv.slice(separator + 1);

  let folder: string | undefined;
  const args: Omit<ExecArgs, "folder" | "command" | "args"> = {
    host: env.FOLDERSHELL_HOST ?? DEFAULT_HOST,
    port: env.FOLDERSHELL_PORT ? parsePort(env.FOLDERSHELL_PORT, "FOLDERSHELL_PORT") : DEFAULT_PORT,
    token: env.FOLDERSHELL_TOKEN,
    noAuth: false,
    env: {},
  };

  for (let i = 0; i < optionArgs.length; i += 1) {
    const arg = optionArgs[i];
    switch (arg) {
      case "--host":
        args.host = takeValue(optionArgs, i++, arg);
        break;
      case "--port":
        args.port = parsePort(takeValue(optionArgs, i++, arg));
        break;
      case "--token":
        args.token = takeValue(optionArgs, i++, arg);
        break;
      case "--user":
        args.username = takeValue(optionArgs, i++, arg);
        break;
      case "--password":
        args.password = takeValue(optionArgs, i++, arg);
        break;
      case "--no-auth":
        args.noAuth = true;
        break;
      case "--folder":
        folder = takeValue(optionArgs, i++, arg);
        break;
      case "--shell":
        args.shell = parseShell(takeValue(optionArgs, i++, arg));
        break;
      case "--env": {
        const [name, value] = parseEnvAssignment(takeValue(optionArgs, i++, arg));
        args.env[name] = value;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!folder) {
    throw new CliUsageError("exec requires --folder NAME");
  }
  if (commandArgs.length === 0) {
    throw new CliUsageError("exec requires a command after --");
  }
  if (args.username !== undefined && args.password === undefined) {
    throw new CliUsageError("--user requires --password");
  }

  const [command, ...rest] = commandArgs;
  return { ...args, folder, command, args: rest };
}

export function parseCli(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { command: "help", topic: rest[0] };
    case "serve":
      return { command: "serve", args: parseServeArgs(rest) };
    case "exec":
      return { command: "exec", args: parseExecArgs(rest) };
    case "hash-password":
      if (rest.length > 1) {
        throw new CliUsageError("hash-password takes at most one argument");
      }
      return { command: "hash-password", args: { password: rest[0] } };
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}
