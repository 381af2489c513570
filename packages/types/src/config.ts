export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error" | "silent";
  index: IndexConfig;
  embedding: EmbeddingConfig;
  llm: LlmConfig;
  cohere: CohereConfig;
  ollama: OllamaConfig;
  chunking: ChunkingSettings;
  retrieval: RetrievalSettings;
  resilience: ResilienceConfig;
}

export type VectorStoreType = "file" | "qdrant";

export type ModelProviderType = "cohere" | "ollama";

export interface IndexConfig {
  root: string;
  collection: string;
  store: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  rebuildOnStale: boolean;
}

export interface EmbeddingConfig {
  provider: ModelProviderType;
  model: string;
  dimensions: number;
}

export interface LlmConfig {
  provider: ModelProviderType;
  model: string;
  temperature: number;
}

export interface CohereConfig {
  apiKey: string;
}

export interface OllamaConfig {
  baseUrl: string;
}

export interface ChunkingSettings {
  chunkSize: number;
  chunkOverlap: number;
}

export interface RetrievalSettings {
  queryVariants: number;
  topKPerQuery: number;
  maxCandidates: number;
  maxContextChars: number;
}

export interface ResilienceConfig {
  modelTimeoutMs: number;
  maxRetries: number;
}
