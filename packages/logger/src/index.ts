/**
 * @recall-rerank/logger
 *
 * Structured logging with credential redaction.
 */

export { createLogger, createChildLogger, getDefaultLogger } from "./logger.js";
export type { Logger, LogLevel, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, REDACTED } from "./redact-paths.js";
