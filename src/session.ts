import fs from "fs";

import type { Identity } from "./auth";
import { FolderShellError } from "./errors";
import type { FolderDescriptor } from "./folder-registry";
import type { Permission, ShellType } from "./protocol";
import { relativeToRoot, resolveWithinRoot } from "./security";
import type { ShellProcess } from "./shell-executor";

export type SessionMode = "interactive" | "oneshot";

export type TerminationReason = "closed" | "timeout" | "connection_lost" | "shutdown";

export type SessionInit = {
  id: string;
  connectionId: string;
  /** remote address of the owning connection */
  source: string;
  folder: FolderDescriptor;
  identity: Identity;
  /** folder permissions intersected with the identity's */
  permissions: ReadonlySet<Permission>;
  shell: ShellType;
  mode: SessionMode;
  /** client environment applied to every command */
  env: Record<string, string>;
  now: number;
};

export function promptFor(shell: ShellType, cwd: string): string {
  switch (shell) {
    case "powershell":
      return `PS ${cwd}> `;
    case "cmd":
      return `${cwd}> `;
    case "bash":
    case "sh":
      return `${cwd}$ `;
  }
}

/**
 * Live binding of one connection to one folder.
 *
 * The session exclusively owns the process of its in-flight command; at most
 * one exists at a time and it is terminated exactly once.
 */
export class Session {
  readonly id: string;
  readonly connectionId: string;
  readonly source: string;
  readonly folder: FolderDescriptor;
  readonly identity: Identity;
  readonly permissions: ReadonlySet<Permission>;
  readonly shell: ShellType;
  readonly mode: SessionMode;
  readonly env: Record<string, string>;
  readonly createdAt: number;
  lastActivity: number;

  private cwd: string;
  private running = false;
  private process: ShellProcess | null = null;
  private cancelRequested = false;
  private terminatedWith: TerminationReason | null = null;

  constructor(init: SessionInit) {
    this.id = init.id;
    this.connectionId = init.connectionId;
    this.source = init.source;
    this.folder = init.folder;
    this.identity = init.identity;
    this.permissions = init.permissions;
    this.shell = init.shell;
    this.mode = init.mode;
    this.env = init.env;
    this.createdAt = init.now;
    this.lastActivity = init.now;
    this.cwd = init.folder.root;
  }

  /** absolute working directory */
  get workingDirectory() {
    return this.cwd;
  }

  /** folder-relative working directory (`.` is the root) */
  get relativeWorkingDirectory() {
    return relativeToRoot(this.folder.root, this.cwd);
  }

  get prompt() {
    return promptFor(this.shell, this.relativeWorkingDirectory);
  }

  get busy() {
    return this.running;
  }

  get terminated() {
    return this.terminatedWith !== null;
  }

  get terminationReason() {
    return this.terminatedWith;
  }

  touch(now: number) {
    this.lastActivity = now;
  }

  /**
   * Change the working directory.
   *
   * On any failure the previous working directory is kept.
   */
  async changeDirectory(target: string): Promise<string> {
    const resolved = await resolveWithinRoot(this.folder.root, this.cwd, target);
    const stat = await fs.promises.stat(resolved);
    if (!stat.isDirectory()) {
      throw new FolderShellError("not_found", `not a directory: ${target}`);
    }
    this.cwd = resolved;
    return this.relativeWorkingDirectory;
  }

  /** reserve the session for one command */
  beginCommand() {
    if (this.terminatedWith) {
      throw new FolderShellError("session_timeout", "session is closed");
    }
    if (this.running) {
      throw new FolderShellError("command_in_progress", "a command is already running in this session");
    }
    this.running = true;
  }

  /** take ownership of the spawned process */
  attachProcess(child: ShellProcess) {
    this.process = child;
    if (this.terminatedWith || this.cancelRequested) {
      void child.terminate();
    }
  }

  endCommand() {
    this.running = false;
    this.process = null;
    this.cancelRequested = false;
  }

  /**
   * Terminate the in-flight command.
   *
   * A cancel that arrives while the process is still starting takes effect
   * once it is attached. Returns false when no command is running.
   */
  cancel(): boolean {
    if (!this.running) return false;
    if (this.process) {
      void this.process.terminate();
    } else {
      this.cancelRequested = true;
    }
    return true;
  }

  /**
   * Terminate the session and its process.
   *
   * Returns false when the session was already terminated.
   */
  terminate(reason: TerminationReason): boolean {
    if (this.terminatedWith) return false;
    this.terminatedWith = reason;
    if (this.process) {
      void this.process.terminate();
    }
    return true;
  }

  /** resolves when the owned process (if any) has exited */
  async settled(): Promise<void> {
    if (this.process) await this.process.exited;
  }
}
