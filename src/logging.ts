/**
 * Console logging with a `[subsystem]` prefix.
 *
 * Level is read from OPS_HUB_LOG_LEVEL (debug | info | warn | error).
 *
 * @module logging
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(raw: string | undefined = process.env.OPS_HUB_LOG_LEVEL): LogLevel {
  const value = raw?.toLowerCase();
  return value && isLogLevel(value) ? value : "info";
}

export function createLogger(subsystem: string, level: LogLevel = resolveLogLevel()): Logger {
  const prefix = `[${subsystem}]`;
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    debug(message, ...meta) {
      if (enabled("debug")) console.log(`${prefix} ${message}`, ...meta);
    },
    info(message, ...meta) {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...meta);
    },
    warn(message, ...meta) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...meta);
    },
    error(message, ...meta) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...meta);
    },
  };
}

/**
 * Logger that drops everything (tests, embedding).
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
