export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (...args: unknown[]) => void;

export interface Logger {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const PREFIX = "[mcp-bridge]";

/**
 * stdout carries the protocol, so every level goes to stderr.
 */
export function createLogger(level: LogLevel, sink: LogSink = console.error): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const at = (l: Exclude<LogLevel, "silent">) => (...args: unknown[]) => {
    if (LOG_LEVELS.indexOf(l) < threshold) return;
    sink(PREFIX, l.toUpperCase(), ...args);
  };

  return {
    trace: at("trace"),
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}

export function truncate(s: string, max = 200) {
  return s.length > max ? `${s.slice(0, max)}…` : s;
}
