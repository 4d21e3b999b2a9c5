/**
 * Component logger
 *
 * Writes `[component] message` lines to the console, filtered by a
 * process-wide level. Components take a Logger in their options so tests can
 * pass a capturing one instead.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug(message, ...args) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...args);
    },
  };
}

/**
 * Logger that discards everything
 */
export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
