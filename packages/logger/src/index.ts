/**
 * @chunkwise/logger
 *
 * Structured logging with credential and document-content redaction.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, REDACT_PATHS } from "./redactor.js";
