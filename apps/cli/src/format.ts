import type { AnswerResult, IngestionResult } from "@docquery/types";
import type { CollectionStatus } from "@docquery/core";
import { sourceLabel } from "@docquery/core";

export function formatIngestion(result: IngestionResult): string[] {
  if (result.skipped) {
    const lines = [`Collection "${result.collection}" is already built, nothing to do.`];
    if (result.staleSources.length > 0) {
      lines.push(`Changed since the last build: ${result.staleSources.join(", ")}`);
      lines.push(`Run "docquery rebuild" to re-index them.`);
    }
    return lines;
  }

  const verb = result.rebuilt ? "Rebuilt" : "Indexed";
  const lines = [
    `${verb} "${result.collection}": ${String(result.chunkCount)} chunks from ${String(result.documentCount)} documents (${String(result.tokensUsed)} tokens).`,
  ];
  if (result.emptySources.length > 0) {
    lines.push(`Skipped empty sources: ${result.emptySources.join(", ")}`);
  }
  return lines;
}

export function formatAnswer(result: AnswerResult, withSources: boolean): string[] {
  const lines = [result.answer];
  if (withSources && result.context.length > 0) {
    lines.push("", "Sources:");
    result.context.forEach((chunk, i) => {
      lines.push(`[${String(i + 1)}] ${sourceLabel(chunk)} (score ${chunk.score.toFixed(3)})`);
    });
  }
  return lines;
}

export function formatStatus(status: CollectionStatus): string[] {
  if (!status.exists) {
    return [`Collection "${status.collection}" does not exist yet.`];
  }

  const lines = [`Collection "${status.collection}": ${String(status.records)} records`];
  const { manifest } = status;
  if (manifest) {
    lines.push(
      `Built ${manifest.builtAt} with ${manifest.embeddingModel} (${String(manifest.dimensions)} dimensions)`,
      `Chunking: size ${String(manifest.chunkSize)}, overlap ${String(manifest.chunkOverlap)}`,
      `Sources: ${String(Object.keys(manifest.sources).length)}`,
    );
  } else {
    lines.push("No manifest found; staleness cannot be checked.");
  }
  return lines;
}
