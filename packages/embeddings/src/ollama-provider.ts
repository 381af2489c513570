import { z } from "zod";
import type { EmbeddingResult } from "@docquery/types";
import { ExternalServiceError, withRetry } from "@docquery/errors";
import type { RetryOptions } from "@docquery/errors";
import type { Logger } from "@docquery/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "nomic-embed-text";
const DEFAULT_DIMENSIONS = 768;
const BATCH_SIZE = 64;

export interface OllamaProviderConfig {
  baseUrl: string;
  model?: string;
  dimensions?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

const embedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
  prompt_eval_count: z.number().int().nonnegative().optional(),
});

/**
 * Embeddings from a local Ollama server (`POST /api/embed`).
 * Ollama has no query/document distinction, so both calls share one request shape.
 */
export class OllamaEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "ollama";
  readonly dimensions: number;
  private baseUrl: string;
  private model: string;
  private retry: RetryOptions;
  private logger?: Logger;

  constructor(config: OllamaProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.retry = config.retry ?? {};
    this.logger = config.logger;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const data = await withRetry(() => this.request(batch), {
        ...this.retry,
        onRetry: (info) => {
          this.logger?.warn(
            { provider: this.name, attempt: info.attempt, delayMs: info.delayMs, err: info.error },
            "retrying embedding request",
          );
          this.retry.onRetry?.(info);
        },
      });

      if (data.embeddings.length !== batch.length) {
        throw new ExternalServiceError(
          `Ollama returned ${data.embeddings.length} embeddings for ${batch.length} texts`,
          "ollama",
        );
      }
      allEmbeddings.push(...data.embeddings);
      totalTokens += data.prompt_eval_count ?? 0;
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/version`);
      return response.ok;
    } catch (error: unknown) {
      this.logger?.warn({ err: error, provider: this.name }, "embedding health check failed");
      return false;
    }
  }

  private async request(texts: string[]): Promise<z.infer<typeof embedResponseSchema>> {
    const response = await fetch(`${this.baseUrl}/api/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: this.model, input: texts }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `Ollama embedding failed: ${response.status} ${response.statusText}`,
        "ollama",
        { statusCode: response.status },
      );
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("Ollama returned a malformed embedding response", "ollama", {
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    return parsed.data;
  }
}
