// logger.ts — Levelled logger writing to stderr (stdout carries command output)

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export function formatLine(
  level: LogLevel,
  component: string,
  message: string,
  meta?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const prefix = `[${now.toISOString()}] [${level.toUpperCase()}] [${component}]`;
  const metaStr = meta && Object.keys(meta).length > 0 ? " " + JSON.stringify(meta) : "";
  return `${prefix} ${message}${metaStr}`;
}

function log(level: LogLevel, component: string, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  process.stderr.write(formatLine(level, component, message, meta) + "\n");
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, meta) => log("debug", component, message, meta),
    info: (message, meta) => log("info", component, message, meta),
    warn: (message, meta) => log("warn", component, message, meta),
    error: (message, meta) => log("error", component, message, meta),
  };
}

/** Logger that drops everything; used where a caller wants silence. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
