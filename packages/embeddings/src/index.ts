export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider, toCohereServiceError } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { OllamaEmbeddingProvider } from "./ollama-provider.js";
export type { OllamaProviderConfig } from "./ollama-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
