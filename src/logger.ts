/**
 * Leveled logger for the consumer stores.
 *
 * The core primitives never log; stores take a Logger through their options.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogHandler = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

export interface LoggerConfig {
  /** Default: on outside production */
  enabled?: boolean;
  level?: LogLevel;
  /** Replaces console output (tests, structured sinks). */
  handler?: LogHandler;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PREFIX = "[relevance]";

export class Logger {
  private readonly enabled: boolean;
  private readonly level: LogLevel;
  private readonly handler?: LogHandler;

  constructor(config: LoggerConfig = {}) {
    this.enabled = config.enabled ?? process.env.NODE_ENV !== "production";
    this.level = config.level ?? "info";
    this.handler = config.handler;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.enabled) return;
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    if (this.handler) {
      this.handler(level, message, meta);
      return;
    }

    const line = `${PREFIX} ${message}${meta ? ` ${JSON.stringify(meta)}` : ""}`;
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }
}

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/** Logger that drops everything; the default for stores built without one. */
export const silentLogger = new Logger({ enabled: false });
