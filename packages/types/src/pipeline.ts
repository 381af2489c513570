export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

/**
 * Index Record: everything the vector index stores for one chunk.
 */
export interface VectorRecord {
  id: string;
  sourceId: string;
  vector: number[];
  content: string;
  metadata: Record<string, unknown>;
}

export interface IngestionResult {
  collection: string;
  skipped: boolean;
  rebuilt: boolean;
  documentCount: number;
  chunkCount: number;
  tokensUsed: number;
  embeddingDimensions: number;
  staleSources: string[];
  emptySources: string[];
}

export interface CollectionManifest {
  version: 1;
  collection: string;
  embeddingModel: string;
  dimensions: number;
  chunkSize: number;
  chunkOverlap: number;
  builtAt: string;
  sources: Record<string, string>;
}
