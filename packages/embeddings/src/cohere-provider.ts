import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import type { EmbeddingResult } from "@docquery/types";
import { ExternalServiceError, RateLimitedError, withRetry } from "@docquery/errors";
import type { RetryOptions } from "@docquery/errors";
import type { Logger } from "@docquery/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

type InputType = "search_query" | "search_document";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

/**
 * Map SDK failures onto ExternalServiceError so the retry policy can tell
 * rejected requests (4xx) from upstream trouble. A 429 becomes RateLimitedError,
 * which the provider retries.
 */
export function toCohereServiceError(error: unknown): ExternalServiceError | RateLimitedError {
  if (error instanceof CohereTimeoutError) {
    return new ExternalServiceError("Cohere request timed out", "cohere", { statusCode: 504, cause: error });
  }
  if (error instanceof CohereError && error.statusCode === 429) {
    return new RateLimitedError(`Cohere rate limit reached: ${error.message}`, "cohere", { cause: error });
  }
  if (error instanceof CohereError) {
    return new ExternalServiceError(`Cohere request failed: ${error.message}`, "cohere", {
      statusCode: error.statusCode ?? 502,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(`Cohere request failed: ${message}`, "cohere", { cause: error });
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;
  private retry: RetryOptions;
  private logger?: Logger;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.retry = config.retry ?? {};
    this.logger = config.logger;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedAll([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedAll(texts, "search_document");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch (error: unknown) {
      this.logger?.warn({ err: error, provider: this.name }, "embedding health check failed");
      return false;
    }
  }

  private async embedAll(texts: string[], inputType: InputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await withRetry(async () => {
        try {
          return await this.client.v2.embed({
            texts: batch,
            model: this.model,
            inputType,
            embeddingTypes: ["float"],
            outputDimension: this.dimensions,
          });
        } catch (error: unknown) {
          throw toCohereServiceError(error);
        }
      }, {
        ...this.retry,
        retryableErrors: ["RATE_LIMITED", ...(this.retry.retryableErrors ?? [])],
        onRetry: (info) => {
          this.logger?.warn(
            { provider: this.name, attempt: info.attempt, delayMs: info.delayMs, err: info.error },
            "retrying embedding request",
          );
          this.retry.onRetry?.(info);
        },
      });

      const floats = response.embeddings.float;
      if (!floats || floats.length !== batch.length) {
        throw new ExternalServiceError(
          `Cohere returned ${floats?.length ?? 0} embeddings for ${batch.length} texts`,
          "cohere",
        );
      }
      allEmbeddings.push(...floats);

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
