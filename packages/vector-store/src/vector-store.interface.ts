import type { VectorRecord } from "@docquery/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
  /** Results scoring below this cosine similarity are dropped. */
  scoreThreshold?: number;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  sourceId: string;
  content: string;
  metadata: Record<string, unknown>;
}

/**
 * A named set of collections holding chunk vectors with their payload.
 * Record ids are stable, so upserting the same id twice leaves one record.
 */
export interface IVectorStore {
  collectionExists(collectionName: string): Promise<boolean>;
  /** Load or create. Existing state with other dimensions is an IndexCorruptionError. */
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  /** Sorted by descending score, ties by id. A missing collection yields []. */
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  /** Returns how many records were removed. */
  deleteBySource(collectionName: string, sourceId: string): Promise<number>;
  count(collectionName: string): Promise<number>;
  dropCollection(collectionName: string): Promise<void>;
  healthCheck(): Promise<boolean>;
}
