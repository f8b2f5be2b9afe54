/**
 * Console logging with a level threshold.
 *
 * Messages carry their component in brackets, e.g. "[TaskQueue] Queue drained".
 */

export const LOG_LEVELS = ["silent", "error", "warn", "info"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/** Where log lines end up; console by default */
export type LogSink = Pick<Console, "log" | "warn" | "error">;

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createConsoleLogger(level: LogLevel = "warn", sink: LogSink = console): Logger {
  const enabled = (messageLevel: Exclude<LogLevel, "silent">) =>
    LEVEL_ORDER[messageLevel] <= LEVEL_ORDER[level];

  return {
    info: (message, ...args) => {
      if (enabled("info")) sink.log(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled("warn")) sink.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled("error")) sink.error(message, ...args);
    },
  };
}
