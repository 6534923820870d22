import { pino } from "pino";
import { isMainThread, parentPort } from "node:worker_threads";

import type { DestinationStream, LevelWithSilent, Logger } from "pino";

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
export interface WorkerLoggerPostMessageType {
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
  type: "message";
}

export interface LoggerFactoryOptions {
  /** Added to every line as `name` */
  name?: string;
  /** @default "info" */
  level?: LevelWithSilent;
  /** Where lines are written; stdout when omitted */
  destination?: DestinationStream;
  /**
   * Post log calls made inside a worker thread to `parentPort`
   * instead of writing them from the worker.
   * @default false
   */
  forwardFromWorkers?: boolean;
}

/**
 * Creates a structured logger. `logger` is the narrow interface the
 * containers depend on, `pinoLogger` the underlying pino instance.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoOptions = {
    name: options.name,
    level: options.level ?? "info",
  };
  const pinoLogger: Logger = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
  const forward = options.forwardFromWorkers ?? false;

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      if (forward && !isMainThread) {
        const postMessage: WorkerLoggerPostMessageType = {
          type: "message",
          level,
          message,
          meta,
        };
        //NOTE: meta must be structured-cloneable, iterators and functions are not
        parentPort?.postMessage(postMessage);

        return;
      }
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      pinoLogger[level](meta ?? {}, message);
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

const discard = () => undefined;

/**
 * Logger that drops every call.
 */
export const noopLogger: BaseLogger = {
  trace: discard,
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
  fatal: discard,
};

export default loggerFactory;
