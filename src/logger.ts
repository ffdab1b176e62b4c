// ---------- Logger interface ----------

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARNING", "ERROR"];

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/** Accepts the usual spellings (`warn`, `Warning`, `WARNING`...). */
export function parseLogLevel(value: string): LogLevel | undefined {
  const upper = value.trim().toUpperCase();
  if (upper === "WARN") return "WARNING";
  return LOG_LEVELS.find((level) => level === upper);
}

export function createConsoleLogger(level: LogLevel = "INFO", prefix = "[pi30]"): Logger {
  const enabled = (wanted: LogLevel) => LEVEL_RANK[wanted] >= LEVEL_RANK[level];
  return {
    debug: (...args: unknown[]) => {
      if (enabled("DEBUG")) console.debug(prefix, ...args);
    },
    info: (...args: unknown[]) => {
      if (enabled("INFO")) console.info(prefix, ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled("WARNING")) console.warn(prefix, ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled("ERROR")) console.error(prefix, ...args);
    },
  };
}

/** Prefix every message with a context tag, e.g. the device name. */
export function childLogger(parent: Logger, context: string): Logger {
  const tag = `[${context}]`;
  return {
    debug: (message, ...args) => parent.debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => parent.info(`${tag} ${message}`, ...args),
    warn: (message, ...args) => parent.warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => parent.error(`${tag} ${message}`, ...args),
  };
}
