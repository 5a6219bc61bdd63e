export type DebugFlag = "protocol" | "auth" | "session" | "exec" | "audit" | "server";

export type DebugComponent = DebugFlag | "error";

/**
 * Debug configuration
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - list: enable only the named components
 */
export type DebugConfig = boolean | DebugFlag[];

export type DebugLogFn = (component: DebugComponent, message: string) => void;

export const DEBUG_FLAGS: readonly DebugFlag[] = [
  "protocol",
  "auth",
  "session",
  "exec",
  "audit",
  "server",
];

export function isDebugFlag(value: string): value is DebugFlag {
  return DEBUG_FLAGS.some((flag) => flag === value);
}

/** parse `FOLDERSHELL_DEBUG` (`1`, `all`, `*` or a comma separated list) */
export function parseDebugEnv(
  value: string | undefined = process.env.FOLDERSHELL_DEBUG,
): Set<DebugFlag> {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;

  for (const raw of value.split(",")) {
    const entry = raw.trim().toLowerCase();
    if (!entry) continue;
    if (entry === "1" || entry === "all" || entry === "*" || entry === "true") {
      for (const flag of DEBUG_FLAGS) flags.add(flag);
      continue;
    }
    if (isDebugFlag(entry)) {
      flags.add(entry);
    }
  }

  return flags;
}

export function resolveDebugFlags(
  config: DebugConfig | undefined,
  envFlags: ReadonlySet<DebugFlag> = new Set(),
): Set<DebugFlag> {
  if (config === true) return new Set(DEBUG_FLAGS);
  if (config === false) return new Set();
  const flags = new Set(envFlags);
  if (Array.isArray(config)) {
    for (const flag of config) flags.add(flag);
  }
  return flags;
}

export function debugFlagsToArray(flags: ReadonlySet<DebugFlag>): DebugFlag[] {
  return DEBUG_FLAGS.filter((flag) => flags.has(flag));
}

export function stripTrailingNewline(message: string): string {
  return message.endsWith("\n") ? message.slice(0, -1) : message;
}

export const defaultDebugLog: DebugLogFn = (component, message) => {
  console.log(`[${component}] ${stripTrailingNewline(message)}`);
};
