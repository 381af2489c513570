/**
 * Creates structured Pino logger instances with secret redaction, pretty-printing
 * in development, and JSON output elsewhere.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Write to stderr so stdout stays free for command output. */
  stderr?: boolean;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - Otherwise we emit structured JSON (no transport needed).
 */
function buildTransport(stderr: boolean): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: stderr ? 2 : 1,
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "docquery";
  const stderr = options?.stderr ?? false;

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const transport = buildTransport(stderr);
  if (transport) {
    return pino({ ...pinoOptions, transport });
  }

  return stderr ? pino(pinoOptions, pino.destination(2)) : pino(pinoOptions);
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * component-scoped bindings (e.g. `component`, `collection`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * Logger that drops everything. Used as the default when a component is built
 * without one, and in tests.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
