import type { ModelProviderType } from "@docquery/types";
import { ConfigurationError } from "@docquery/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { OllamaEmbeddingProvider } from "./ollama-provider.js";
import type { OllamaProviderConfig } from "./ollama-provider.js";

export interface EmbeddingFactoryConfig {
  provider: ModelProviderType;
  cohere?: CohereProviderConfig;
  ollama?: OllamaProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'", {
          EMBEDDING_PROVIDER: "cohere settings missing",
        });
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "ollama":
      if (!config.ollama) {
        throw new ConfigurationError("Ollama config is required when provider is 'ollama'", {
          EMBEDDING_PROVIDER: "ollama settings missing",
        });
      }
      return new OllamaEmbeddingProvider(config.ollama);
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
