import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import { ExternalServiceError, RateLimitedError, withRetry } from "@docquery/errors";
import type { RetryOptions } from "@docquery/errors";
import type { Logger } from "@docquery/logger";
import type { IGenerativeModel } from "./generative-model.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";

export interface CohereChatModelConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

function toServiceError(error: unknown): ExternalServiceError | RateLimitedError {
  if (error instanceof CohereTimeoutError) {
    return new ExternalServiceError("Cohere chat timed out", "cohere", { statusCode: 504, cause: error });
  }
  if (error instanceof CohereError && error.statusCode === 429) {
    return new RateLimitedError(`Cohere rate limit reached: ${error.message}`, "cohere", { cause: error });
  }
  if (error instanceof CohereError) {
    return new ExternalServiceError(`Cohere chat failed: ${error.message}`, "cohere", {
      statusCode: error.statusCode ?? 502,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(`Cohere chat failed: ${message}`, "cohere", { cause: error });
}

/**
 * Cohere chat (v2 API) as a single user turn.
 */
export class CohereChatModel implements IGenerativeModel {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;
  private temperature: number;
  private retry: RetryOptions;
  private logger?: Logger;

  constructor(config: CohereChatModelConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? 0;
    this.retry = config.retry ?? {};
    this.logger = config.logger;
  }

  async generate(prompt: string): Promise<string> {
    const response = await withRetry(async () => {
      try {
        return await this.client.v2.chat({
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: this.temperature,
        });
      } catch (error: unknown) {
        throw toServiceError(error);
      }
    }, {
      ...this.retry,
      retryableErrors: ["RATE_LIMITED", ...(this.retry.retryableErrors ?? [])],
      onRetry: (info) => {
        this.logger?.warn(
          { model: this.model, attempt: info.attempt, delayMs: info.delayMs, err: info.error },
          "retrying chat request",
        );
        this.retry.onRetry?.(info);
      },
    });

    const text = (response.message.content ?? [])
      .map((item) => (item.type === "text" ? item.text : ""))
      .join("");

    if (text.trim().length === 0) {
      throw new ExternalServiceError("Cohere returned an empty response", "cohere");
    }
    return text;
  }
}
