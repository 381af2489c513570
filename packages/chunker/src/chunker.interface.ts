import type { Chunk, ChunkingConfig, Document } from "@docquery/types";

export interface IChunker {
  chunk(document: Document, config: ChunkingConfig): Chunk[];
}
