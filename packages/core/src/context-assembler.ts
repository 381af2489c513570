import type { ScoredChunk } from "@docquery/types";

/**
 * "a.txt" or "manual.pdf, page 3".
 */
export function sourceLabel(chunk: ScoredChunk): string {
  const page = chunk.metadata["pageNumber"];
  return typeof page === "number" ? `${chunk.sourceId}, page ${String(page)}` : chunk.sourceId;
}

/**
 * Numbered context blocks in retrieval order:
 *
 *   [1] (Source: a.txt)
 *   chunk text
 */
export function assembleContext(chunks: ScoredChunk[]): string {
  if (chunks.length === 0) return "";

  const parts = chunks.map(
    (chunk, i) => `[${String(i + 1)}] (Source: ${sourceLabel(chunk)})\n${chunk.content}`,
  );

  return parts.join("\n\n");
}
