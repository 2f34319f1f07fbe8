/**
 * Logger setup.
 *
 * Settings come from the caller (usually the parsed app config); nothing here
 * reads the environment. Redacted fields go through `redactValue`, so chunk
 * text keeps its length in the output and credentials disappear.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactValue } from "./redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Minimum level. Defaults to "info". */
  level?: string;
  /** Component name attached to every line as `name`. */
  service?: string;
  /** Pipe through pino-pretty (development). Ignored when `destination` is set. */
  pretty?: boolean;
  /** Where JSON lines are written. Defaults to stdout. */
  destination?: DestinationStream;
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { level = "info", service = "chunkwise", pretty = false, destination } = options;

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: (value: unknown, path: string[]) => redactValue(path[path.length - 1] ?? "", value),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (destination) {
    return pino(loggerOptions, destination);
  }
  return pino(pretty ? { ...loggerOptions, transport: PRETTY_TRANSPORT } : loggerOptions);
}

/**
 * Child logger with job-scoped bindings such as `documentId` or `job`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
