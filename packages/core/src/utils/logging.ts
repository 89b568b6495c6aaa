/**
 * Centralized logging utility with configurable log levels
 */

// Log levels in order of verbosity
export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value ? parseInt(value, 10) : NaN;
  if (isNaN(level) || level < LogLevel.NONE || level > LogLevel.DEBUG) {
    return LogLevel.WARN;
  }
  return level;
}

// Default log level - can be overridden via environment variable
let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

/**
 * Set the current log level
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
  debug(`Log level set to: ${LogLevel[level]}`);
}

export function error(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.ERROR) {
    console.error("[ERROR]", ...args);
  }
}

export function warn(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.WARN) {
    console.warn("[WARN]", ...args);
  }
}

export function info(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.INFO) {
    console.log(...args);
  }
}

export function debug(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.DEBUG) {
    console.log("[DEBUG]", ...args);
  }
}
