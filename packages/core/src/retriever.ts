import type { RetrievalSettings, ScoredChunk } from "@docquery/types";
import type { IEmbeddingProvider } from "@docquery/embeddings";
import type { IVectorStore, VectorSearchResult } from "@docquery/vector-store";
import { ExternalServiceError } from "@docquery/errors";
import { previewText, silentLogger } from "@docquery/logger";
import type { Logger } from "@docquery/logger";
import type { QueryExpander } from "./query-expander.js";

export interface RetrieverDependencies {
  expander: QueryExpander;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  settings: RetrievalSettings;
  logger?: Logger;
}

export interface Retrieval {
  queries: string[];
  chunks: ScoredChunk[];
}

function toScoredChunk(result: VectorSearchResult): ScoredChunk {
  return {
    chunkId: result.id,
    sourceId: result.sourceId,
    content: result.content,
    score: result.score,
    metadata: result.metadata,
  };
}

/**
 * Union of per-query hits, one entry per chunk at its best score, ordered by
 * descending score then chunk id.
 */
export function mergeResults(lists: VectorSearchResult[][]): ScoredChunk[] {
  const best = new Map<string, ScoredChunk>();
  for (const list of lists) {
    for (const result of list) {
      const current = best.get(result.id);
      if (!current || result.score > current.score) {
        best.set(result.id, toScoredChunk(result));
      }
    }
  }

  return [...best.values()].sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
  });
}

/**
 * Keep at most `maxCandidates` chunks, then stop at the first chunk whose
 * content would push the running total past `maxContextChars`.
 */
export function applyBudget(chunks: ScoredChunk[], maxCandidates: number, maxContextChars: number): ScoredChunk[] {
  const kept: ScoredChunk[] = [];
  let used = 0;
  for (const chunk of chunks.slice(0, maxCandidates)) {
    if (used + chunk.content.length > maxContextChars) break;
    used += chunk.content.length;
    kept.push(chunk);
  }
  return kept;
}

/**
 * Multi-query retrieval: expand the question, search every variant in
 * parallel, merge once all searches have settled.
 */
export class Retriever {
  private deps: RetrieverDependencies;
  private logger: Logger;

  constructor(deps: RetrieverDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger();
  }

  async retrieve(question: string): Promise<ScoredChunk[]> {
    const { chunks } = await this.retrieveWithQueries(question);
    return chunks;
  }

  async retrieveWithQueries(question: string): Promise<Retrieval> {
    const { settings } = this.deps;
    const queries = await this.deps.expander.expand(question, settings.queryVariants);

    const settled = await Promise.allSettled(queries.map((query) => this.searchOne(query)));

    const lists: VectorSearchResult[][] = [];
    const failures: unknown[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        lists.push(outcome.value);
      } else {
        failures.push(outcome.reason);
        this.logger.warn(
          { err: outcome.reason, query: previewText(queries[i] ?? "") },
          "query variant failed, dropping it",
        );
      }
    });

    if (lists.length === 0 && failures.length > 0) {
      throw failures[0];
    }

    const merged = mergeResults(lists);
    const chunks = applyBudget(merged, settings.maxCandidates, settings.maxContextChars);

    this.logger.debug(
      {
        queries: queries.length,
        failed: failures.length,
        candidates: merged.length,
        kept: chunks.length,
      },
      "retrieval complete",
    );

    return { queries, chunks };
  }

  private async searchOne(query: string): Promise<VectorSearchResult[]> {
    const embedding = await this.deps.embeddingProvider.embed(query);
    const vector = embedding.embeddings[0];
    if (!vector) {
      throw new ExternalServiceError("Embedding provider returned no vector for the query", this.deps.embeddingProvider.name);
    }

    return this.deps.vectorStore.search(this.deps.collectionName, {
      vector,
      topK: this.deps.settings.topKPerQuery,
    });
  }
}
