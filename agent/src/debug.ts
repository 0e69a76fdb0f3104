export type DebugFlag = "route" | "http" | "tcp" | "tunnel" | "peer" | "api";

/**
 * Debug configuration value
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - `string[]`: enable selected components
 */
export type DebugConfig = boolean | ReadonlyArray<DebugFlag>;

export const ALL_DEBUG_FLAGS: ReadonlyArray<DebugFlag> = [
  "route",
  "http",
  "tcp",
  "tunnel",
  "peer",
  "api",
];

/**
 * Component identifier passed to debug log callbacks
 */
export type DebugComponent = DebugFlag | "agent" | "error";

/**
 * Debug log callback invoked with component + message
 */
export type DebugLogFn = (component: DebugComponent, message: string) => void;

export function defaultDebugLog(component: DebugComponent, message: string) {
  console.log(formatDebugLine(component, message));
}

export function formatDebugLine(component: DebugComponent, message: string) {
  const trimmed = stripTrailingNewline(message);
  return `[${component}] ${trimmed}`;
}

export function stripTrailingNewline(value: string) {
  if (value.endsWith("\r\n")) return value.slice(0, -2);
  if (value.endsWith("\n")) return value.slice(0, -1);
  return value;
}

function isDebugFlag(value: string): value is DebugFlag {
  return (ALL_DEBUG_FLAGS as ReadonlyArray<string>).includes(value);
}

export function parseDebugEnv(value: string | undefined = process.env.TUNNELGATE_DEBUG) {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;

  // Allow: "http,tcp" as well as "all" / "*".
  for (const entry of value.split(",")) {
    const raw = entry.trim().toLowerCase();
    if (!raw) continue;

    if (raw === "*" || raw === "all" || raw === "1" || raw === "true") {
      for (const f of ALL_DEBUG_FLAGS) flags.add(f);
      continue;
    }

    if (raw === "proxy") {
      flags.add("http");
      flags.add("tcp");
      continue;
    }

    if (isDebugFlag(raw)) flags.add(raw);
  }

  return flags;
}

export function resolveDebugFlags(config: DebugConfig | undefined, envFlags = parseDebugEnv()) {
  if (config === undefined) {
    return envFlags;
  }
  if (config === true) {
    return new Set<DebugFlag>(ALL_DEBUG_FLAGS);
  }
  if (config === false) {
    return new Set<DebugFlag>();
  }

  const out = new Set<DebugFlag>();
  for (const flag of config) {
    if (isDebugFlag(flag)) out.add(flag);
  }
  return out;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Components enabled at a log level. `warn` and `error` leave only the
 * always-on `agent` and `error` lines.
 */
export function debugFlagsForLogLevel(level: LogLevel): Set<DebugFlag> {
  switch (level) {
    case "debug":
      return new Set<DebugFlag>(ALL_DEBUG_FLAGS);
    case "info":
      return new Set<DebugFlag>(["route", "http", "tcp", "tunnel"]);
    case "warn":
    case "error":
      return new Set<DebugFlag>();
  }
}

export function debugFlagsToArray(flags: Set<DebugFlag>): DebugFlag[] {
  return Array.from(flags).sort();
}

/**
 * Wrap a sink so that only enabled components reach it.
 *
 * `agent` and `error` lines always pass.
 */
export function createDebugLogger(flags: Set<DebugFlag>, sink: DebugLogFn = defaultDebugLog): DebugLogFn {
  return (component, message) => {
    if (component !== "agent" && component !== "error" && !flags.has(component)) return;
    sink(component, message);
  };
}

/** Debug sink that drops everything */
export const noopDebugLog: DebugLogFn = () => {};
