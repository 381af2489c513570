/**
 * Keeps secrets and personal data out of log output. Structured fields are
 * covered by Pino's `redact` paths; free text (user questions) goes through
 * {@link redactText}.
 */

const REDACTED = "[REDACTED]";

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

const PREVIEW_LENGTH = 120;

/**
 * Replace e-mail addresses inside free text with "[REDACTED]".
 */
export function redactText(text: string): string {
  return text.replace(EMAIL_REGEX, REDACTED);
}

/**
 * Redacted, single-line, length-capped form of a user question for logging.
 */
export function previewText(text: string, maxLength = PREVIEW_LENGTH): string {
  const flat = redactText(text).replace(/\s+/g, " ").trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength)}…` : flat;
}

/**
 * JSON paths for Pino's `redact` option. Provider credentials travel in config
 * objects that are sometimes logged whole.
 */
export const REDACT_PATHS: string[] = [
  "apiKey",
  "qdrantApiKey",
  "authorization",
  "headers.authorization",
  "*.apiKey",
  "*.qdrantApiKey",
  "*.authorization",
  "*.headers.authorization",
];
