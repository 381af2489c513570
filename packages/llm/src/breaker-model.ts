import type CircuitBreaker from "opossum";
import { AppError, ExternalServiceError, createCircuitBreaker } from "@docquery/errors";
import type { BreakerEventSink, CircuitBreakerOptions } from "@docquery/errors";
import type { IGenerativeModel } from "./generative-model.interface.js";

function breakerCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Puts a circuit breaker with a per-call timeout in front of another model.
 * Short-circuited and timed-out calls surface as ExternalServiceError.
 */
export class BreakerModel implements IGenerativeModel {
  readonly name: string;
  private breaker: CircuitBreaker<[string], string>;

  constructor(inner: IGenerativeModel, options?: CircuitBreakerOptions, events?: BreakerEventSink) {
    this.name = inner.name;
    this.breaker = createCircuitBreaker(
      `llm:${inner.name}`,
      (prompt: string) => inner.generate(prompt),
      options,
      events,
    );
  }

  async generate(prompt: string): Promise<string> {
    try {
      return await this.breaker.fire(prompt);
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;

      switch (breakerCode(error)) {
        case "EOPENBREAKER":
          throw new ExternalServiceError("Generative model is unavailable (circuit open)", this.name, {
            statusCode: 503,
            cause: error,
          });
        case "ETIMEDOUT":
          throw new ExternalServiceError("Generative model timed out", this.name, {
            statusCode: 504,
            cause: error,
          });
        default:
          throw error;
      }
    }
  }

  get opened(): boolean {
    return this.breaker.opened;
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
