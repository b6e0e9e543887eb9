export type DebugFlag = "http" | "session" | "relay";

export const ALL_DEBUG_FLAGS: ReadonlyArray<DebugFlag> = ["http", "session", "relay"];

/**
 * `true` enables every component, `false` none, a list just those.
 * Left undefined, `WSBRIDGE_DEBUG` decides.
 */
export type DebugConfig = boolean | ReadonlyArray<DebugFlag>;

export type DebugLogFn = (component: DebugFlag, message: string) => void;

const ENV_TOKENS = new Map<string, DebugFlag>([
  ["http", "http"],
  ["session", "session"],
  ["relay", "relay"],
  ["ws", "relay"],
  ["tcp", "relay"],
]);

const ALL_TOKENS = new Set(["*", "all", "1", "true"]);

export function stripTrailingNewline(value: string) {
  return value.replace(/\r?\n$/, "");
}

/** `[component] message`, one prefix per line */
export function formatDebugLine(component: DebugFlag, message: string) {
  return stripTrailingNewline(message)
    .split("\n")
    .map((line) => `[${component}] ${line}`)
    .join("\n");
}

export function defaultDebugLog(component: DebugFlag, message: string) {
  // stdout, like the rest of the CLI output
  console.log(formatDebugLine(component, message));
}

/**
 * Parse a comma separated component list such as `http,relay`.
 * `ws` and `tcp` name the relay; unknown names are ignored.
 */
export function parseDebugEnv(value: string | undefined = process.env.WSBRIDGE_DEBUG): Set<DebugFlag> {
  const flags = new Set<DebugFlag>();
  const tokens = (value ?? "")
    .split(",")
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token.length > 0);

  for (const token of tokens) {
    if (ALL_TOKENS.has(token)) return new Set(ALL_DEBUG_FLAGS);
    const flag = ENV_TOKENS.get(token);
    if (flag) flags.add(flag);
  }
  return flags;
}

export function resolveDebugFlags(
  config: DebugConfig | undefined,
  envFlags: ReadonlySet<DebugFlag> = parseDebugEnv()
): ReadonlySet<DebugFlag> {
  if (config === undefined) return envFlags;
  if (typeof config === "boolean") return new Set(config ? ALL_DEBUG_FLAGS : []);
  return new Set(config.filter((flag) => ALL_DEBUG_FLAGS.includes(flag)));
}

/** Wrap `sink` so only enabled components reach it */
export function createDebugLog(flags: ReadonlySet<DebugFlag>, sink: DebugLogFn = defaultDebugLog): DebugLogFn {
  if (flags.size === 0) {
    return () => {};
  }
  return (component, message) => {
    if (flags.has(component)) sink(component, message);
  };
}

export function debugFlagsToArray(flags: ReadonlySet<DebugFlag>): DebugFlag[] {
  return ALL_DEBUG_FLAGS.filter((flag) => flags.has(flag));
}
