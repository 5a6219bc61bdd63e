import { spawn, type ChildProcess } from "child_process";
import os from "os";
import type { Readable } from "stream";

import { errorMessage, FolderShellError } from "./errors";
import type { ShellType } from "./protocol";

export const SPAWN_FAILURE_EXIT_CODE = 127;

const DEFAULT_PATH = "/usr/local/bin:/usr/bin:/bin";
const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const BLOCKED_ENV = /^(LD_|DYLD_)|^(NODE_OPTIONS|BASH_ENV|ENV|PROMPT_COMMAND|IFS|SHELLOPTS|BASHOPTS|PS4)$/;
// Variables a client may not override.
const RESERVED_ENV = new Set(["PATH", "HOME", "PWD", "FOLDERSHELL_ROOT", "FOLDERSHELL_MODE"]);
const WINDOWS_ENV = ["SYSTEMROOT", "COMSPEC", "PATHEXT", "WINDIR", "TEMP", "TMP"];

export type ExecRequest = {
  /** command line (or command name when `args` is non-empty) */
  command: string;
  args: string[];
  shell: ShellType;
  /** absolute working directory */
  cwd: string;
  /** complete process environment */
  env: Record<string, string>;
};

export type ExitStatus = {
  exitCode: number;
  signal: NodeJS.Signals | null;
};

/** handle to one running command */
export interface ShellProcess {
  readonly pid: number | undefined;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** resolves when the process exits */
  readonly exited: Promise<ExitStatus>;
  /**
   * Terminate the process and its process group.
   *
   * Sends SIGTERM, then SIGKILL after `graceMs`. Calling it again returns the
   * same exit promise without signalling twice.
   */
  terminate(graceMs?: number): Promise<ExitStatus>;
}

export interface ShellExecutor {
  /** spawn a command; rejects with `spawn_failure` when it cannot start */
  execute(request: ExecRequest): Promise<ShellProcess>;
}

function quotePosix(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

function quotePowerShell(arg: string): string {
  return `'${arg.replace(/'/g, "''")}'`;
}

function quoteCmd(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./\\-]+$/.test(arg)) return arg;
  return `"${arg.replace(/"/g, '""')}"`;
}

/** join a command and its arguments into one line for `shell` */
export function buildCommandLine(shell: ShellType, command: string, args: string[]): string {
  if (args.length === 0) return command;
  const quote =
    shell === "powershell" ? quotePowerShell : shell === "cmd" ? quoteCmd : quotePosix;
  return [command, ...args.map(quote)].join(" ");
}

export function shellInvocation(
  shell: ShellType,
  line: string,
  shellPaths: Partial<Record<ShellType, string>> = {},
): { file: string; args: string[] } {
  switch (shell) {
    case "bash":
      return { file: shellPaths.bash ?? "bash", args: ["-c", line] };
    case "sh":
      return { file: shellPaths.sh ?? "sh", args: ["-c", line] };
    case "powershell":
      return {
        file: shellPaths.powershell ?? (process.platform === "win32" ? "powershell.exe" : "pwsh"),
        args: ["-NoProfile", "-NonInteractive", "-Command", line],
      };
    case "cmd":
      return { file: shellPaths.cmd ?? "cmd.exe", args: ["/d", "/s", "/c", line] };
  }
}

function copyEnv(
  target: Record<string, string>,
  source: Readonly<Record<string, string>> | undefined,
  allowReserved: boolean,
) {
  if (!source) return;
  for (const [name, value] of Object.entries(source)) {
    if (!ENV_NAME.test(name) || BLOCKED_ENV.test(name)) continue;
    if (!allowReserved && RESERVED_ENV.has(name)) continue;
    target[name] = value;
  }
}

export type ProcessEnvOptions = {
  /** canonical folder root */
  root: string;
  /** absolute working directory */
  cwd: string;
  /** environment configured on the folder */
  folderEnv?: Readonly<Record<string, string>>;
  /** client supplied layers, later entries win */
  clientEnv?: Array<Record<string, string> | undefined>;
};

/**
 * Build a command environment from scratch.
 *
 * Nothing of the server's own environment leaks except PATH, LANG and the
 * variables Windows needs to start a process.
 */
export function buildProcessEnv(options: ProcessEnvOptions): Record<string, string> {
  const env: Record<string, string> = {
    PATH: process.env.PATH ?? DEFAULT_PATH,
    HOME: options.root,
    PWD: options.cwd,
    LANG: process.env.LANG ?? "C.UTF-8",
    TERM: "dumb",
    FOLDERSHELL_ROOT: options.root,
    FOLDERSHELL_MODE: "restricted",
  };
  if (process.platform === "win32") {
    for (const name of WINDOWS_ENV) {
      const value = process.env[name];
      if (value !== undefined) env[name] = value;
    }
  }
  copyEnv(env, options.folderEnv, true);
  for (const layer of options.clientEnv ?? []) {
    copyEnv(env, layer, false);
  }
  return env;
}

function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) return 128 + (os.constants.signals[signal] ?? 0);
  return 1;
}

class ChildShellProcess implements ShellProcess {
  readonly exited: Promise<ExitStatus>;
  /** last asynchronous child error (for example a failed signal) */
  lastError: Error | null = null;
  private hasExited = false;
  private terminating = false;

  constructor(
    private readonly child: ChildProcess,
    readonly stdout: Readable,
    readonly stderr: Readable,
    private readonly killGraceMs: number,
  ) {
    child.on("error", (err) => {
      this.lastError = err;
    });
    this.exited = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        this.hasExited = true;
        // orphaned background jobs would keep the output pipes open
        this.signalGroup("SIGKILL");
        resolve({ exitCode: exitCodeFor(code, signal), signal });
      });
    });
  }

  get pid() {
    return this.child.pid;
  }

  terminate(graceMs = this.killGraceMs): Promise<ExitStatus> {
    if (this.terminating || this.hasExited) return this.exited;
    this.terminating = true;

    this.signalGroup("SIGTERM");
    const timer = setTimeout(() => {
      this.signalGroup("SIGKILL");
    }, graceMs);
    void this.exited.then(() => clearTimeout(timer));
    return this.exited;
  }

  private signalGroup(signal: NodeJS.Signals) {
    const pid = this.child.pid;
    if (pid === undefined) return;
    try {
      if (process.platform === "win32") {
        if (!this.hasExited) this.child.kill(signal);
      } else {
        process.kill(-pid, signal);
      }
    } catch {
      // group already gone
    }
  }
}

export type ProcessShellExecutorOptions = {
  /** grace period between SIGTERM and SIGKILL in `ms` */
  killGraceMs?: number;
  /** override shell binaries */
  shellPaths?: Partial<Record<ShellType, string>>;
};

/** runs commands through the folder's shell as child processes */
export class ProcessShellExecutor implements ShellExecutor {
  private readonly killGraceMs: number;

  constructor(private readonly options: ProcessShellExecutorOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? 3000;
  }

  async execute(request: ExecRequest): Promise<ShellProcess> {
    const line = buildCommandLine(request.shell, request.command, request.args);
    const { file, args } = shellInvocation(request.shell, line, this.options.shellPaths);

    const child = spawn(file, args, {
      cwd: request.cwd,
      env: request.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
      windowsHide: true,
      windowsVerbatimArguments: request.shell === "cmd",
    });

    await new Promise<void>((resolve, reject) => {
      const handleSpawn = () => {
        cleanup();
        resolve();
      };
      const handleError = (err: Error) => {
        cleanup();
        reject(
          new FolderShellError("spawn_failure", `failed to start ${file}: ${errorMessage(err)}`, {
            cause: err,
          }),
        );
      };
      const cleanup = () => {
        child.off("spawn", handleSpawn);
        child.off("error", handleError);
      };
      child.once("spawn", handleSpawn);
      child.once("error", handleError);
    });

    const { stdout, stderr } = child;
    if (!stdout || !stderr) {
      throw new FolderShellError("spawn_failure", "child process has no output pipes");
    }
    return new ChildShellProcess(child, stdout, stderr, this.killGraceMs);
  }
}
