export type LogLevel = "debug" | "info" | "warn" | "silent";

export interface BattleLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, silent: 3 };

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const value = raw?.trim().toLowerCase();
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "silent":
      return value;
    default:
      return fallback;
  }
}

export function resolveLogLevel(): LogLevel {
  return parseLogLevel(process.env.EMBERFALL_LOG_LEVEL);
}

export function createConsoleLogger(tag = "battle", level: LogLevel = resolveLogLevel()): BattleLogger {
  const prefix = `[${tag}]`;
  const enabled = (wanted: LogLevel) => LEVEL_RANK[wanted] >= LEVEL_RANK[level];

  return {
    debug: (message, context) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, context ?? {});
    },
    info: (message, context) => {
      if (enabled("info")) console.log(`${prefix} ${message}`, context ?? {});
    },
    warn: (message, context) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, context ?? {});
    },
  };
}

export const silentLogger: BattleLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
