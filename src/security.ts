import fs from "fs";
import path from "path";

import { errnoCode, FolderShellError } from "./errors";
import { normalizeCommandName, type FolderDescriptor, type FolderRegistry } from "./folder-registry";
import type { Permission } from "./protocol";

// ---------------------------------------------------------------------------
// Folder binding and permissions

export function bindFolder(registry: FolderRegistry, name: string): FolderDescriptor {
  const folder = registry.get(name);
  if (!folder) {
    throw new FolderShellError("folder_not_found", `folder '${name}' not found`);
  }
  return folder;
}

export function requirePermission(
  permissions: ReadonlySet<Permission>,
  permission: Permission,
  action: string,
) {
  if (!permissions.has(permission)) {
    throw new FolderShellError("permission_denied", `${action} requires ${permission} permission`);
  }
}

// ---------------------------------------------------------------------------
// Path containment

export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
}

/** folder-relative display form of an absolute path inside `root` */
export function relativeToRoot(root: string, absolute: string): string {
  const relative = path.relative(root, absolute);
  if (!relative) return ".";
  return relative.split(path.sep).join("/");
}

function escape(target: string): FolderShellError {
  return new FolderShellError("path_escape", `path '${target}' is outside the folder`);
}

/**
 * Resolve `target` lexically against `cwd` without touching the filesystem.
 *
 * `~` refers to the folder root. Throws `path_escape` when the result leaves
 * the root.
 */
export function resolveLexical(root: string, cwd: string, target: string): string {
  if (target.includes("\0")) {
    throw escape(target.replace(/\0/g, "\\0"));
  }
  let resolved: string;
  if (target === "~") {
    resolved = root;
  } else if (target.startsWith("~/")) {
    resolved = path.resolve(root, target.slice(2));
  } else {
    resolved = path.resolve(cwd, target);
  }
  if (!isWithinRoot(root, resolved)) {
    throw escape(target);
  }
  return resolved;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.lstat(target);
    return true;
  } catch {
    return false;
  }
}

export type ResolveOptions = {
  /** accept a missing final component (for files about to be created) */
  allowMissing?: boolean;
};

/**
 * Canonicalize `target` and verify it stays inside `root`.
 *
 * Rejects with `path_escape` before any filesystem access when the lexical
 * path leaves the root, and again when symlinks lead outside it.
 */
export async function resolveWithinRoot(
  root: string,
  cwd: string,
  target: string,
  options: ResolveOptions = {},
): Promise<string> {
  const lexical = resolveLexical(root, cwd, target);

  let canonical: string;
  try {
    canonical = await fs.promises.realpath(lexical);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") throw err;
    if (!options.allowMissing) {
      throw new FolderShellError("not_found", `no such file or directory: ${target}`);
    }
    if (await pathExists(lexical)) {
      // dangling symlink: writing would follow it wherever it points
      throw escape(target);
    }
    let parent: string;
    try {
      parent = await fs.promises.realpath(path.dirname(lexical));
    } catch (parentErr) {
      if (errnoCode(parentErr) !== "ENOENT") throw parentErr;
      throw new FolderShellError("not_found", `no such directory: ${path.dirname(target)}`);
    }
    canonical = path.join(parent, path.basename(lexical));
  }

  if (!isWithinRoot(root, canonical)) {
    throw escape(target);
  }
  return canonical;
}

// ---------------------------------------------------------------------------
// Command line analysis

export type CommandSegment = {
  /** unquoted words of one simple command */
  words: string[];
  /** targets of `<`, `>`, `>>`, `2>`, `&>` and similar redirections */
  redirections: string[];
};

export type ParsedCommandLine = {
  segments: CommandSegment[];
  /** bodies of `$(...)`, `<(...)` and backtick substitutions */
  substitutions: string[];
};

const SEGMENT_BREAKS = new Set([";", "&", "|", "\n", "(", ")"]);

// Words that run the following word as a command.
const COMMAND_PREFIXES = new Set([
  "!",
  "{",
  "}",
  "if",
  "then",
  "else",
  "elif",
  "do",
  "while",
  "until",
  "time",
  "exec",
  "command",
  "builtin",
  "nohup",
  "env",
  "nice",
  "xargs",
  "timeout",
  "setsid",
  "stdbuf",
  "busybox",
]);

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;
const WRAPPER_ARGUMENT = /^(-.*|\d+(\.\d+)?[smhd]?)$/;

/** read a `$(`/`<(` body starting after the opening paren */
function readParenBody(line: string, start: number): { body: string; end: number } {
  let depth = 1;
  let index = start;
  let quote: "'" | '"' | null = null;
  while (index < line.length) {
    const ch = line[index];
    if (quote) {
      if (ch === quote) quote = null;
      else if (ch === "\\" && quote === '"') index += 1;
    } else if (ch === "'" || ch === '"') {
      quote = ch === "'" ? "'" : '"';
    } else if (ch === "\\") {
      index += 1;
    } else if (ch === "(") {
      depth += 1;
    } else if (ch === ")") {
      depth -= 1;
      if (depth === 0) {
        return { body: line.slice(start, index), end: index + 1 };
      }
    }
    index += 1;
  }
  return { body: line.slice(start), end: line.length };
}

function readBacktickBody(line: string, start: number): { body: string; end: number } {
  const close = line.indexOf("`", start);
  if (close === -1) return { body: line.slice(start), end: line.length };
  return { body: line.slice(start, close), end: close + 1 };
}

/**
 * Split a POSIX shell command line into simple commands.
 *
 * Quotes are removed from words. Substitution bodies are reported
 * separately so their commands can be checked as well.
 */
export function parseCommandLine(line: string): ParsedCommandLine {
  const segments: CommandSegment[] = [];
  const substitutions: string[] = [];
  let words: string[] = [];
  let redirections: string[] = [];
  let word = "";
  let inWord = false;
  let redirectPending = false;
  let quote: "'" | '"' | null = null;

  const endWord = () => {
    if (inWord) {
      if (redirectPending) redirections.push(word);
      else words.push(word);
      redirectPending = false;
    }
    word = "";
    inWord = false;
  };
  const endSegment = () => {
    endWord();
    if (words.length > 0 || redirections.length > 0) segments.push({ words, redirections });
    words = [];
    redirections = [];
    redirectPending = false;
  };

  let index = 0;
  while (index < line.length) {
    const ch = line[index];
    const next = line[index + 1];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      index += 1;
      continue;
    }

    if (ch === "\\") {
      if (next !== undefined && next !== "\n") word += next;
      inWord = true;
      index += 2;
      continue;
    }

    if ((ch === "$" || (!quote && (ch === "<" || ch === ">"))) && next === "(") {
      const { body, end } = readParenBody(line, index + 2);
      substitutions.push(body);
      word += line.slice(index, end);
      inWord = true;
      index = end;
      continue;
    }

    if (ch === "`") {
      const { body, end } = readBacktickBody(line, index + 1);
      substitutions.push(body);
      word += line.slice(index, end);
      inWord = true;
      index = end;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') quote = null;
      else word += ch;
      index += 1;
      continue;
    }

    if (ch === "<" || ch === ">" || (ch === "&" && next === ">")) {
      // a bare number directly before the operator names a file descriptor
      if (inWord && /^\d+$/.test(word)) {
        word = "";
        inWord = false;
      } else {
        endWord();
      }
      let end = index + 1;
      while (line[end] === "<" || line[end] === ">") end += 1;
      if (line[end] === "&" || line[end] === "|") end += 1;
      redirectPending = true;
      index = end;
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch === "'" ? "'" : '"';
      inWord = true;
      index += 1;
      continue;
    }

    if (SEGMENT_BREAKS.has(ch)) {
      endSegment();
      index += 1;
      continue;
    }

    if (ch === " " || ch === "\t" || ch === "\r") {
      endWord();
      index += 1;
      continue;
    }

    word += ch;
    inWord = true;
    index += 1;
  }
  endSegment();

  return { segments, substitutions };
}

const SHELL_NAMES = new Set(["sh", "bash", "dash", "zsh", "ksh", "ash"]);

const MAX_NESTING = 8;

// Command words the shell would still expand before choosing what to run.
const EXPANDING_NAME = /[$`*?[\]{}]/;
const LITERAL_NAMES = new Set(["[", "[[", "{", "}"]);

function assertLiteralName(word: string) {
  if (EXPANDING_NAME.test(word) && !LITERAL_NAMES.has(word)) {
    throw new FolderShellError("command_not_allowed", `command name '${word}' depends on shell expansion`);
  }
}

function tooDeep(): FolderShellError {
  return new FolderShellError("command_not_allowed", "command nesting is too deep");
}

/** command text that `eval` or a shell's `-c` option would run */
function inlineScript(name: string, rest: string[]): string | undefined {
  if (name === "eval") {
    return rest.length > 0 ? rest.join(" ") : undefined;
  }
  if (!SHELL_NAMES.has(name)) return undefined;
  let inline = false;
  for (let index = 0; index < rest.length; index++) {
    const word = rest[index];
    if (word === "-o" || word === "+o") {
      index += 1;
    } else if (/^[-+][A-Za-z]+$/.test(word)) {
      if (word.startsWith("-") && word.includes("c")) inline = true;
    } else if (word !== "--") {
      return inline ? word : undefined;
    }
  }
  return undefined;
}

type SegmentCommands = {
  /** command names in order, wrappers included */
  names: string[];
  script?: string;
};

function segmentCommands(segment: CommandSegment): SegmentCommands {
  const names: string[] = [];
  const { words } = segment;
  let afterWrapper = false;
  for (let index = 0; index < words.length; index++) {
    const word = words[index];
    if (ASSIGNMENT.test(word)) continue;
    if (afterWrapper && WRAPPER_ARGUMENT.test(word)) continue;
    assertLiteralName(word);
    const name = normalizeCommandName(word);
    if (!name) continue;
    names.push(name);
    if (!COMMAND_PREFIXES.has(name)) {
      return { names, script: inlineScript(name, words.slice(index + 1)) };
    }
    afterWrapper = true;
  }
  return { names };
}

/**
 * Every command name a command line would run.
 *
 * Substitutions, `eval` arguments and `sh -c` scripts are followed. Throws
 * `command_not_allowed` when a command name is itself an expansion.
 */
export function commandNames(line: string, depth = 0): string[] {
  if (depth > MAX_NESTING) throw tooDeep();
  const parsed = parseCommandLine(line);
  const names: string[] = [];
  for (const segment of parsed.segments) {
    const { names: direct, script } = segmentCommands(segment);
    names.push(...direct);
    if (script !== undefined) names.push(...commandNames(script, depth + 1));
  }
  for (const body of parsed.substitutions) {
    names.push(...commandNames(body, depth + 1));
  }
  return names;
}

/**
 * Apply the folder's command filter.
 *
 * The block-list is evaluated first, so a blocked name is rejected even when
 * it is also allow-listed. Returns the checked command names.
 */
export function checkCommand(folder: FolderDescriptor, line: string): string[] {
  const names = commandNames(line);
  if (names.length === 0) {
    throw new FolderShellError("command_not_allowed", "empty command");
  }

  for (const name of names) {
    if (folder.blockedCommands.has(name)) {
      throw new FolderShellError("command_blocked", `command '${name}' is blocked`);
    }
  }

  if (folder.allowedCommands.size > 0) {
    for (const name of names) {
      if (!folder.allowedCommands.has(name)) {
        throw new FolderShellError("command_not_allowed", `command '${name}' is not allowed`);
      }
    }
  }

  return names;
}

const DIRECTORY_CHANGERS = new Set(["cd", "pushd", "popd"]);

function looksLikePath(word: string): boolean {
  return word === ".." || word.startsWith("~") || word.includes("/");
}

/** `word` with substitution bodies blanked to `$()` */
function withoutSubstitutions(word: string): string {
  let visible = "";
  let index = 0;
  while (index < word.length) {
    const ch = word[index];
    if ((ch === "$" || ch === "<" || ch === ">") && word[index + 1] === "(") {
      index = readParenBody(word, index + 2).end;
      visible += "$()";
    } else if (ch === "`") {
      index = readBacktickBody(word, index + 1).end;
      visible += "$()";
    } else {
      visible += ch;
      index += 1;
    }
  }
  return visible;
}

function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (let index = 0; index < pattern.length; index++) {
    const ch = pattern[index];
    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "[" && pattern.indexOf("]", index + 2) !== -1) {
      const close = pattern.indexOf("]", index + 2);
      const body = pattern.slice(index + 1, close).replace(/^!/, "^").replace(/\\/g, "\\\\");
      source += `[${body}]`;
      index = close;
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`);
}

/** whether a glob component could expand to `..` */
function globMatchesParent(word: string): boolean {
  return word.split("/").some((component) => {
    if (!/[*?[]/.test(component)) return false;
    // `*` and `?` never match a leading dot
    if (component.startsWith("*") || component.startsWith("?")) return false;
    try {
      return globToRegExp(component).test("..");
    } catch {
      // an invalid class such as `[z-a]`: assume it may match
      return true;
    }
  });
}

/** the word, an `=value` suffix and the value glued to short options (`-cf/x`) */
function pathCandidates(word: string): string[] {
  const candidates = [word];
  const eq = word.indexOf("=");
  if (eq > 0) candidates.push(word.slice(eq + 1));
  const options = /^-[A-Za-z0-9]+/.exec(word);
  if (options && !word.startsWith("--")) {
    for (let end = 2; end <= options[0].length; end++) {
      candidates.push(word.slice(end));
    }
  }
  return candidates;
}

function checkPathWord(root: string, cwd: string, candidate: string) {
  const visible = withoutSubstitutions(candidate);
  if (globMatchesParent(visible)) {
    throw new FolderShellError("path_escape", `pattern '${candidate}' can match the parent directory`);
  }
  if (!looksLikePath(visible)) return;
  if (/[$`]/.test(visible)) {
    throw new FolderShellError("path_escape", `path '${candidate}' depends on shell expansion`);
  }
  if (/^~[^/]/.test(visible)) {
    throw escape(candidate);
  }
  resolveLexical(root, cwd, candidate);
}

/**
 * Check that path-like arguments stay inside the folder.
 *
 * Absolute command names (`/bin/ls`) are accepted. Relative command paths,
 * redirection targets and every path-like argument must resolve inside the
 * root, including `--flag=value` values and values glued to short options.
 * `cd`, `pushd` and `popd` may only run alone, since later words would be
 * resolved against a directory the check never sees. Purely lexical; no
 * filesystem access.
 */
export function checkArgumentPaths(root: string, cwd: string, line: string, depth = 0) {
  if (depth > MAX_NESTING) throw tooDeep();
  if (depth === 0) {
    const names = commandNames(line);
    const changer = names.find((name) => DIRECTORY_CHANGERS.has(name));
    if (changer && names.length > 1) {
      throw new FolderShellError("command_not_allowed", `'${changer}' cannot be combined with other commands`);
    }
  }

  const { segments, substitutions } = parseCommandLine(line);
  for (const segment of segments) {
    let commandSeen = false;
    for (const word of segment.words) {
      if (!commandSeen && !ASSIGNMENT.test(word)) {
        commandSeen = true;
        if (path.isAbsolute(word)) continue;
      }
      for (const candidate of pathCandidates(word)) {
        checkPathWord(root, cwd, candidate);
      }
    }
    for (const target of segment.redirections) {
      checkPathWord(root, cwd, target);
    }
    const { script } = segmentCommands(segment);
    if (script !== undefined) checkArgumentPaths(root, cwd, script, depth + 1);
  }
  for (const body of substitutions) {
    checkArgumentPaths(root, cwd, body, depth + 1);
  }
}
