import fs from "fs";
import path from "path";

import type { FolderConfig } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { PERMISSIONS, type Permission, type ShellType } from "./protocol";

const INVALID_NAME_CHARS = /[/\\:*?"<>|]/;

/** immutable description of one exposed folder */
export type FolderDescriptor = {
  readonly name: string;
  /** canonical absolute path of the folder root */
  readonly root: string;
  /** effective permissions (`readonly` already applied) */
  readonly permissions: ReadonlySet<Permission>;
  readonly shell: ShellType;
  /** normalized command names; empty allows everything not blocked */
  readonly allowedCommands: ReadonlySet<string>;
  /** normalized command names that never run */
  readonly blockedCommands: ReadonlySet<string>;
  readonly env: Readonly<Record<string, string>>;
  readonly readonly: boolean;
  readonly description?: string;
};

/**
 * Normalize a command name for filtering.
 *
 * Names compare case-insensitively and without a trailing `.exe`.
 */
export function normalizeCommandName(name: string): string {
  const base = name.split(/[/\\]/).pop() ?? name;
  return base.toLowerCase().replace(/\.exe$/, "");
}

function compileCommandSet(names: string[] | undefined): ReadonlySet<string> {
  const set = new Set<string>();
  for (const name of names ?? []) {
    const normalized = normalizeCommandName(name.trim());
    if (normalized) set.add(normalized);
  }
  return set;
}

export function validateFolderName(name: string) {
  if (!name.trim()) {
    throw new ConfigError("folder name cannot be empty");
  }
  if (INVALID_NAME_CHARS.test(name)) {
    throw new ConfigError(`folder name '${name}' contains invalid characters`);
  }
}

export function createFolderDescriptor(config: FolderConfig): FolderDescriptor {
  validateFolderName(config.name);

  let root: string;
  try {
    root = fs.realpathSync(path.resolve(config.path));
  } catch (err) {
    throw new ConfigError(`folder '${config.name}': path ${config.path} is not accessible: ${errorMessage(err)}`);
  }
  if (!fs.statSync(root).isDirectory()) {
    throw new ConfigError(`folder '${config.name}': path ${config.path} is not a directory`);
  }

  const requested = config.permissions ?? [...PERMISSIONS];
  if (requested.length === 0) {
    throw new ConfigError(`folder '${config.name}': at least one permission is required`);
  }
  const readonly = config.readonly ?? false;
  const permissions = new Set<Permission>(
    requested.filter((permission) => !(readonly && permission === "write")),
  );

  const descriptor: FolderDescriptor = {
    name: config.name,
    root,
    permissions,
    shell: config.shell ?? "bash",
    allowedCommands: compileCommandSet(config.allowedCommands),
    blockedCommands: compileCommandSet(config.blockedCommands),
    env: Object.freeze({ ...(config.env ?? {}) }),
    readonly,
    description: config.description,
  };
  return Object.freeze(descriptor);
}

/** loaded-once mapping of folder name to descriptor */
export class FolderRegistry {
  private readonly folders: ReadonlyMap<string, FolderDescriptor>;

  constructor(descriptors: Iterable<FolderDescriptor>) {
    const folders = new Map<string, FolderDescriptor>();
    for (const descriptor of descriptors) {
      if (folders.has(descriptor.name)) {
        throw new ConfigError(`duplicate folder name '${descriptor.name}'`);
      }
      folders.set(descriptor.name, descriptor);
    }
    this.folders = folders;
  }

  static fromConfig(configs: FolderConfig[]): FolderRegistry {
    return new FolderRegistry(configs.map(createFolderDescriptor));
  }

  get size() {
    return this.folders.size;
  }

  get(name: string): FolderDescriptor | undefined {
    return this.folders.get(name);
  }

  names(): string[] {
    return [...this.folders.keys()].sort();
  }
}
