/**
 * Tagged console logging for the daemon.
 *
 *   log("Engine", "Started watching /tmp")
 *   → 2026-01-01T00:00:00.000Z [Engine] Started watching /tmp
 *
 * The threshold comes from VIBESTATUS_LOG_LEVEL (debug | info | warn | error).
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

let threshold: LogLevel = readLevel(process.env.VIBESTATUS_LOG_LEVEL);

function readLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(value) ? value : "info";
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: LogLevel, tag: string, message: string): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold]) return;
  const line = `${new Date().toISOString()} [${tag}] ${message}`;
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function log(tag: string, message: string): void {
  write("info", tag, message);
}

export function logDebug(tag: string, message: string): void {
  write("debug", tag, message);
}

export function logWarn(tag: string, message: string): void {
  write("warn", tag, message);
}

export function logError(tag: string, message: string, error?: unknown): void {
  const detail = error === undefined ? "" : `: ${describeError(error)}`;
  write("error", tag, `${message}${detail}`);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
