import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Invalid chunking parameters, environment values, or embedding dimensions.
 * Fatal at startup.
 */
export class ConfigurationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Invalid configuration", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class IngestionError extends AppError {
  public readonly source: string;

  constructor(message = "Ingestion failed", source: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 422,
      code: "INGESTION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.source = source;
  }
}

export class IndexCorruptionError extends AppError {
  public readonly collection: string;

  constructor(message = "Index is corrupt", collection: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "INDEX_CORRUPTION",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.collection = collection;
  }
}

export class InvalidArgumentError extends AppError {
  public readonly argument: string;

  constructor(message = "Invalid argument", argument: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "INVALID_ARGUMENT",
      details: options?.details,
      cause: options?.cause,
    });
    this.argument = argument;
  }
}

/**
 * The generative call that produces query variants failed or returned nothing
 * usable. Always recovered by the query expander.
 */
export class ExpansionFailure extends AppError {
  constructor(message = "Query expansion failed", options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXPANSION_FAILURE",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/**
 * The generative call that produces the final answer failed. Rendered as text
 * by the answer synthesizer, never thrown past it.
 */
export class SynthesisFailure extends AppError {
  constructor(message = "Answer synthesis failed", options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "SYNTHESIS_FAILURE",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class EmptyQuestionError extends AppError {
  constructor(message = "Question is empty") {
    super({ message, statusCode: 400, code: "EMPTY_QUESTION" });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(
    message = "External service error",
    service: string,
    options?: ErrorExtras & { statusCode?: number },
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 502,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

/**
 * The provider refused the request for now (HTTP 429). Retried only where a
 * caller lists RATE_LIMITED in `retryableErrors`.
 */
export class RateLimitedError extends AppError {
  public readonly service: string;

  constructor(message = "Rate limited", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 429,
      code: "RATE_LIMITED",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}
