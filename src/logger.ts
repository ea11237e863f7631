import { LOG_LEVEL } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function createLogger(scope: string, level: string = LOG_LEVEL): Logger {
  const min = LEVELS[isLogLevel(level) ? level : "info"];
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (min <= LEVELS.debug) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (min <= LEVELS.info) console.info(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (min <= LEVELS.warn) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (min <= LEVELS.error) console.error(prefix, message, ...details);
    }
  };
}
