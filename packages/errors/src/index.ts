export { AppError, describeError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ConfigurationError,
  IngestionError,
  IndexCorruptionError,
  InvalidArgumentError,
  ExpansionFailure,
  SynthesisFailure,
  EmptyQuestionError,
  ExternalServiceError,
  RateLimitedError,
} from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, BreakerEventSink } from "./circuit-breaker.js";

export { withRetry, isRetryable } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";

export { ok, err } from "./result.js";
export type { Result } from "./result.js";
