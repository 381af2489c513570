export type { Document, SourceFormat } from "./document.js";
export type { Chunk, ChunkMetadata, ChunkingConfig } from "./chunk.js";
export type {
  EmbeddingResult,
  VectorRecord,
  IngestionResult,
  CollectionManifest,
} from "./pipeline.js";
export type { ScoredChunk, AnswerResult } from "./query.js";
export type {
  AppConfig,
  VectorStoreType,
  ModelProviderType,
  IndexConfig,
  EmbeddingConfig,
  LlmConfig,
  CohereConfig,
  OllamaConfig,
  ChunkingSettings,
  RetrievalSettings,
  ResilienceConfig,
} from "./config.js";
