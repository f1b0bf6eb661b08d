/**
 * Leveled stderr logger.
 *
 * The level is process-wide state, so it is set by one explicit
 * `initLogger` call in the entry point. Logging before init is a no-op
 * (level "off"); a second init throws.
 */

export type LogLevel = "off" | "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let current: LogLevel = "off";
let initialized = false;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || "off").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "off";
}

/**
 * Set the process log level. Must be called at most once.
 */
export function initLogger(level: LogLevel): void {
  if (initialized) {
    throw new Error("Logger already initialized");
  }
  initialized = true;
  current = level;
}

/** Only for tests: forget the previous init. */
export function resetLogger(): void {
  initialized = false;
  current = "off";
}

function write(level: Exclude<LogLevel, "off">, message: string): void {
  if (LEVELS[level] > LEVELS[current]) return;
  process.stderr.write(
    `[tern] ${new Date().toISOString()} ${level.toUpperCase()} ${message}\n`
  );
}

export const log = {
  error: (message: string) => write("error", message),
  warn: (message: string) => write("warn", message),
  info: (message: string) => write("info", message),
  debug: (message: string) => write("debug", message),
};
