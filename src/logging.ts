export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (namespace: string) => Logger;
}

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

const LEVEL_TO_NUM: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export const parseLogLevel = (value: unknown): LogLevel | null => {
  if (typeof value !== "string") return null;
  const lowered = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === lowered) ?? null;
};

const runtimeLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL) ?? "info";

const callConsole = (level: Exclude<LogLevel, "silent">, args: unknown[]) => {
  switch (level) {
    case "debug":
      console.debug(...args);
      return;
    case "info":
      console.log(...args);
      return;
    case "warn":
      console.warn(...args);
      return;
    case "error":
      console.error(...args);
  }
};

/**
 * Console logger prefixed with `[forecast-bot] [namespace]`.
 * Without an explicit level, `LOG_LEVEL` is read on every call.
 */
export const createLogger = (namespace: string, level?: LogLevel): Logger => {
  const emit = (requested: Exclude<LogLevel, "silent">, args: unknown[]) => {
    const threshold = LEVEL_TO_NUM[level ?? runtimeLogLevel()];
    if (LEVEL_TO_NUM[requested] > threshold) return;
    callConsole(requested, [`[forecast-bot] [${namespace}]`, ...args]);
  };

  return {
    debug: (...args: unknown[]) => emit("debug", args),
    info: (...args: unknown[]) => emit("info", args),
    warn: (...args: unknown[]) => emit("warn", args),
    error: (...args: unknown[]) => emit("error", args),
    child: (next: string) => createLogger(`${namespace}:${next}`, level),
  };
};
