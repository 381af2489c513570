export interface Chunk {
  id: string;
  sourceId: string;
  content: string;
  index: number;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  pageNumber?: number;
  startChar: number;
  endChar: number;
  overlap: number;
  [key: string]: unknown;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}
