/**
 * @docquery/logger
 *
 * Structured logging with secret and PII redaction.
 */

export { createLogger, createChildLogger, silentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactText, previewText, REDACT_PATHS } from "./pii-redactor.js";
