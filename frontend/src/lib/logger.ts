/**
 * Scoped console logger.
 *
 * One process-wide level; every scope shares it. Output is prefixed with the
 * level tag and `[scope]` so interleaved controller/dataset messages stay
 * readable in the devtools console.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let activeLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(...args) {
      if (enabled("debug")) console.debug("[DEBUG]", prefix, ...args);
    },
    info(...args) {
      if (enabled("info")) console.info("[INFO]", prefix, ...args);
    },
    warn(...args) {
      if (enabled("warn")) console.warn("[WARN]", prefix, ...args);
    },
    error(...args) {
      if (enabled("error")) console.error("[ERROR]", prefix, ...args);
    },
  };
}
