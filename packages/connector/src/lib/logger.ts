/**
 * Logger utility
 *
 * Console-based logging with timestamp and log levels.
 *
 * Log levels:
 * - debug: Detailed internal state (lane transitions, API requests, token cache hits)
 * - info: Normal operation progress (run start/end, per-lane counts)
 * - warn: Recoverable issues (rate limits, rejected or failed records)
 * - error: Failures that end a lane or a run
 *
 * Timestamps are rendered in the configured time zone (TZ). They are for
 * humans only; nothing compares them.
 *
 * Usage:
 * - CLI: --log-level debug|info|warn|error (or LOG_LEVEL)
 * - Library: setLogLevel("warn") before triggering a run
 */

import { formatLocalTimestamp } from "./time.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";
let currentTimeZone = "UTC";

function log(level: LogLevel, name: string, message: string): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const timestamp = formatLocalTimestamp(new Date(), currentTimeZone);
  const levelStr = level.toUpperCase().padEnd(5);
  console.log(`[${timestamp}] ${levelStr} [${name}] ${message}`);
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Set global log level.
 * Call this early in your application (e.g., in CLI before the first run).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Set the IANA time zone used for log timestamps.
 */
export function setLogTimeZone(timeZone: string): void {
  currentTimeZone = timeZone;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Create a logger instance for a specific module.
 */
export function setupLogger(name: string): Logger {
  return {
    debug: (message: string) => log("debug", name, message),
    info: (message: string) => log("info", name, message),
    warn: (message: string) => log("warn", name, message),
    error: (message: string) => log("error", name, message),
  };
}
