/**
 * Component loggers.
 *
 * Every level goes to stderr so stdout carries only command output (build
 * lines, listings). One line per entry: timestamp, level, component, bound
 * fields, message, then the data as compact JSON.
 */

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, string | number | boolean | null>;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Same component, with `fields` stamped on every line */
  with(fields: LogFields): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Read per call so KWB_LOG_LEVEL can change at run time (tests stub it)
function threshold(): number {
  const envLevel = process.env.KWB_LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.indexOf(envLevel && isLogLevel(envLevel) ? envLevel : "info");
}

function serialize(data: unknown): string {
  return JSON.stringify(data, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

export function formatEntry(
  level: LogLevel,
  component: string,
  fields: LogFields,
  message: string,
  data?: unknown
): string {
  const parts = [`[${new Date().toISOString()}]`, level.toUpperCase().padEnd(5), `[${component}]`];
  for (const [key, value] of Object.entries(fields)) {
    parts.push(`${key}=${String(value)}`);
  }
  parts.push(message);
  if (data !== undefined) {
    parts.push(serialize(data));
  }
  return parts.join(" ");
}

export function createLogger(component: string, fields: LogFields = {}): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (LOG_LEVELS.indexOf(level) < threshold()) return;
    console.error(formatEntry(level, component, fields, message, data));
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
    with: (extra) => createLogger(component, { ...fields, ...extra }),
  };
}

export const registryLogger = createLogger("registry");
export const dispatchLogger = createLogger("dispatch");
export const transportLogger = createLogger("transport");
export const sessionLogger = createLogger("session");
export const buildLogger = createLogger("build");
