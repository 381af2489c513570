import type { EmbeddingResult } from "@docquery/types";

export interface IEmbeddingProvider {
  readonly name: string;
  /** Declared vector length. Every returned vector must match it. */
  readonly dimensions: number;

  /** Embed a search query. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Embed document chunks for indexing. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
