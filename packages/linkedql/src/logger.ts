export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LinkedQlLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /** Tag printed before each message (default: "LinkedQL") */
  prefix?: string;
  /** Lowest level written (default: "info") */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const noop = (): void => undefined;

export const NOOP_LOGGER: LinkedQlLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): LinkedQlLogger {
  const prefix = options.prefix ?? "LinkedQL";
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  const write =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] >= threshold) {
        console[level](`[${prefix}] ${message}`, meta ?? "");
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
