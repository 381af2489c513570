import type { ModelProviderType } from "@docquery/types";
import { ConfigurationError } from "@docquery/errors";
import type { IGenerativeModel } from "./generative-model.interface.js";
import { CohereChatModel } from "./cohere-model.js";
import type { CohereChatModelConfig } from "./cohere-model.js";
import { OllamaModel } from "./ollama-model.js";
import type { OllamaModelConfig } from "./ollama-model.js";

export interface GenerativeModelFactoryConfig {
  provider: ModelProviderType;
  cohere?: CohereChatModelConfig;
  ollama?: OllamaModelConfig;
}

export function createGenerativeModel(config: GenerativeModelFactoryConfig): IGenerativeModel {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'", {
          LLM_PROVIDER: "cohere settings missing",
        });
      }
      return new CohereChatModel(config.cohere);
    case "ollama":
      if (!config.ollama) {
        throw new ConfigurationError("Ollama config is required when provider is 'ollama'", {
          LLM_PROVIDER: "ollama settings missing",
        });
      }
      return new OllamaModel(config.ollama);
    default:
      throw new ConfigurationError(`Unknown generative model provider: ${String(config.provider)}`);
  }
}
