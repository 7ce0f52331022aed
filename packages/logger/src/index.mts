import { pino } from "pino";

import type { DestinationStream, LevelWithSilent, Logger } from "pino";

export { loggerConfigSchema, resolveLoggerConfig } from "./config.mjs";
export type { LoggerConfig } from "./config.mjs";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export interface LoggerFactoryOptions {
  level?: LevelWithSilent;
  name?: string;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

export const LOGGER_LEVELS: readonly LoggerLevels[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

/**
 * Builds a leveled logger. Every level method funnels through
 * `logMessage`, which hands the line to pino.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoOptions = {
    level: options.level ?? "info",
    name: options.name,
  };
  const pinoLogger: Logger = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      if (meta) {
        pinoLogger[level](meta, message);
        return;
      }
      pinoLogger[level](message);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, pinoLogger };
};

const discard = (): void => undefined;

/**
 * Logger that drops everything.
 */
export const silentLogger: BaseLogger = {
  trace: discard,
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
  fatal: discard,
};

/**
 * Checks that a value offers every level method.
 */
export const isBaseLogger = (value: unknown): value is BaseLogger => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const target: object = value;
  return LOGGER_LEVELS.every(
    (level) => typeof Reflect.get(target, level) === "function",
  );
};
