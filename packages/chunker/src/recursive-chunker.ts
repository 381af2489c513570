import type { Chunk, ChunkingConfig, Document } from "@docquery/types";
import { ConfigurationError } from "@docquery/errors";
import type { IChunker } from "./chunker.interface.js";
import { chunkId } from "./chunk-id.js";

/** Paragraph, line, sentence, word. A hard cut is the implicit last resort. */
export const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", "! ", "? ", " "];

const MIN_FILL_RATIO = 0.5;

export function validateChunkingConfig(config: ChunkingConfig): void {
  const { chunkSize, chunkOverlap } = config;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${String(chunkSize)}`, {
      chunkSize: "must be a positive integer",
    });
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap must be an integer in [0, chunkSize), got ${String(chunkOverlap)}`,
      { chunkOverlap: "must be >= 0 and smaller than chunkSize" },
    );
  }
}

/**
 * Recursive splitting with separator hierarchy.
 *
 * Each window of `chunkSize` characters is cut at the last separator it
 * contains, trying larger separators first. The next chunk starts exactly
 * `chunkOverlap` characters before the cut. Chunk text is the verbatim slice of
 * the document, so offsets and overlaps are exact.
 */
export class RecursiveChunker implements IChunker {
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = (separators ?? DEFAULT_SEPARATORS).filter((s) => s.length > 0);
  }

  chunk(document: Document, config: ChunkingConfig): Chunk[] {
    validateChunkingConfig(config);

    const { chunkSize, chunkOverlap } = config;
    const separators = config.separators?.filter((s) => s.length > 0) ?? this.separators;
    const text = document.text;
    const results: Chunk[] = [];

    let start = 0;
    while (start < text.length) {
      const end =
        text.length - start <= chunkSize
          ? text.length
          : this.findBreak(text, start, chunkSize, chunkOverlap, separators);

      const content = text.slice(start, end);
      results.push({
        id: chunkId(document.sourceId, document.pageNumber, start),
        sourceId: document.sourceId,
        content,
        index: results.length,
        tokenCount: this.estimateTokens(content),
        metadata: {
          ...document.metadata,
          ...(document.pageNumber !== undefined ? { pageNumber: document.pageNumber } : {}),
          startChar: start,
          endChar: end,
          overlap: results.length === 0 ? 0 : chunkOverlap,
        },
      });

      if (end >= text.length) break;
      start = end - chunkOverlap;
    }

    return results;
  }

  /**
   * End offset for the chunk starting at `start`. A break must lie past
   * `start + overlap` so the following chunk still advances. Breaks that would
   * leave the chunk less than half full are only taken when nothing else but a
   * hard cut is left.
   */
  private findBreak(
    text: string,
    start: number,
    chunkSize: number,
    overlap: number,
    separators: string[],
  ): number {
    const windowEnd = start + chunkSize;
    const progressEnd = start + overlap + 1;
    const filledEnd = Math.max(progressEnd, start + Math.ceil(chunkSize * MIN_FILL_RATIO));

    for (const minEnd of [filledEnd, progressEnd]) {
      for (const separator of separators) {
        const index = text.lastIndexOf(separator, windowEnd - separator.length);
        if (index < start) continue;

        const end = index + separator.length;
        if (end >= minEnd) return end;
      }
    }

    // Hard cut at chunkSize chars
    return windowEnd;
  }

  private estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
  }
}
