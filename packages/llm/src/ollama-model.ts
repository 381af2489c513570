import { z } from "zod";
import { ExternalServiceError, withRetry } from "@docquery/errors";
import type { RetryOptions } from "@docquery/errors";
import type { Logger } from "@docquery/logger";
import type { IGenerativeModel } from "./generative-model.interface.js";

const DEFAULT_MODEL = "llama3.1";

export interface OllamaModelConfig {
  baseUrl: string;
  model?: string;
  temperature?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

const generateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

/**
 * Local Ollama server, `POST /api/generate` with streaming off.
 */
export class OllamaModel implements IGenerativeModel {
  readonly name = "ollama";
  private baseUrl: string;
  private model: string;
  private temperature: number;
  private retry: RetryOptions;
  private logger?: Logger;

  constructor(config: OllamaModelConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? 0;
    this.retry = config.retry ?? {};
    this.logger = config.logger;
  }

  async generate(prompt: string): Promise<string> {
    return withRetry(() => this.request(prompt), {
      ...this.retry,
      onRetry: (info) => {
        this.logger?.warn(
          { model: this.model, attempt: info.attempt, delayMs: info.delayMs, err: info.error },
          "retrying generate request",
        );
        this.retry.onRetry?.(info);
      },
    });
  }

  private async request(prompt: string): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        prompt,
        stream: false,
        options: { temperature: this.temperature },
      }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `Ollama generate failed: ${response.status} ${response.statusText}`,
        "ollama",
        { statusCode: response.status },
      );
    }

    const parsed = generateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("Ollama returned a malformed generate response", "ollama", {
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    return parsed.data.response;
  }
}
