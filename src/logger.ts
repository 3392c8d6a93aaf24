// Interview Assistant Bot - Logging
// Component-tagged console logger. Every component takes a Logger so tests
// can inject a silent one.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Creates a console-backed logger whose lines read
 * `[INFO] [SessionRouter] message`. Messages below `minLevel` are dropped.
 */
export function createLogger(component: string, minLevel: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;
  const prefix = (level: LogLevel) => `[${level.toUpperCase()}] [${component}]`;

  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(`${prefix("debug")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("info")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("warn")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("error")} ${msg}`, ...args);
    },
  };
}
