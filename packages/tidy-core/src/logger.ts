/**
 * Pino Logger Factory
 *
 * Structured logging for tidy sessions, wrapped so callers never touch pino's
 * argument order directly.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type TidyLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface TidyLoggerConfig {
  level?: TidyLogLevel;
  /** Route output through pino-pretty */
  pretty?: boolean;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
  /** Bound as `module` on the returned logger */
  module?: string;
}

const LOG_LEVELS: readonly TidyLogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function levelFromEnv(): TidyLogLevel {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw) ?? "info";
}

const DEFAULT_CONFIG: TidyLoggerConfig = {
  level: levelFromEnv(),
  pretty: process.env.TIDY_LOG_PRETTY === "1",
  base: {
    service: "tidyfold",
  },
};

export interface TidyLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): TidyLogger;
}

function createPinoLogger(config: TidyLoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: config.base,
  };

  if (config.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

function wrapLogger(logger: Logger): TidyLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export function createTidyLogger(config?: TidyLoggerConfig): TidyLogger {
  const merged = { ...DEFAULT_CONFIG, ...config };
  const base = createPinoLogger(merged);
  return wrapLogger(merged.module ? base.child({ module: merged.module }) : base);
}

let defaultLogger: TidyLogger | null = null;

/** Shared logger for sessions created without one */
export function getLogger(): TidyLogger {
  if (!defaultLogger) {
    defaultLogger = createTidyLogger();
  }
  return defaultLogger;
}
