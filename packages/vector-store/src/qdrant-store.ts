import { QdrantClient } from "@qdrant/js-client-rest";
import type { VectorRecord } from "@docquery/types";
import { IndexCorruptionError } from "@docquery/errors";
import type { Logger } from "@docquery/logger";
import type { IVectorStore, VectorSearchParams, VectorSearchResult } from "./vector-store.interface.js";
import { compareResults } from "./similarity.js";
import { assertDimensions, assertTopK, assertVectorLength } from "./validation.js";

const BATCH_SIZE = 100;

/**
 * Qdrant point ids must be unsigned integers or UUIDs. Chunk ids are SHA-256
 * hex, so the first 128 bits are laid out as a UUID and the chunk id travels
 * in the payload.
 */
export function pointIdFor(chunkId: string): string {
  const hex = chunkId.replace(/[^0-9a-f]/gi, "").toLowerCase().padEnd(32, "0").slice(0, 32);
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function sourceFilter(sourceId: string) {
  return { must: [{ key: "sourceId", match: { value: sourceId } }] };
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;
  private logger?: Logger;
  private dimensionsCache = new Map<string, number>();

  constructor(url: string, apiKey?: string, logger?: Logger) {
    this.client = new QdrantClient({ url, apiKey });
    this.logger = logger;
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    const { exists } = await this.client.collectionExists(collectionName);
    return exists;
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    assertDimensions(dimensions);

    const existing = await this.dimensionsOf(collectionName);
    if (existing !== undefined) {
      if (existing !== dimensions) {
        throw new IndexCorruptionError(
          `Collection "${collectionName}" has ${existing} dimensions but the embedding provider produces ${dimensions}; rebuild the index`,
          collectionName,
          { details: { stored: existing, configured: dimensions } },
        );
      }
      return;
    }

    await this.client.createCollection(collectionName, {
      vectors: {
        size: dimensions,
        distance: "Cosine",
      },
    });

    await this.client.createPayloadIndex(collectionName, {
      field_name: "sourceId",
      field_schema: "keyword",
    });

    this.dimensionsCache.set(collectionName, dimensions);
    this.logger?.info({ collection: collectionName, dimensions }, "collection created");
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const dimensions = await this.dimensionsOf(collectionName);
    if (dimensions === undefined) {
      throw new IndexCorruptionError(`Collection "${collectionName}" does not exist`, collectionName);
    }
    for (const record of records) {
      assertVectorLength(record.vector, dimensions, `Record ${record.id}`);
    }

    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.client.upsert(collectionName, {
        wait: true,
        points: batch.map((r) => ({
          id: pointIdFor(r.id),
          vector: r.vector,
          payload: {
            ...r.metadata,
            chunkId: r.id,
            sourceId: r.sourceId,
            content: r.content,
          },
        })),
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    assertTopK(params.topK);

    const dimensions = await this.dimensionsOf(collectionName);
    if (dimensions === undefined) return [];
    assertVectorLength(params.vector, dimensions, "Query vector");

    const results = await this.client.search(collectionName, {
      vector: params.vector,
      limit: params.topK,
      score_threshold: params.scoreThreshold,
      with_payload: true,
    });

    return results
      .map((r) => {
        const payload: Record<string, unknown> = r.payload ?? {};
        const { chunkId, sourceId, content, ...metadata } = payload;
        return {
          id: typeof chunkId === "string" ? chunkId : String(r.id),
          score: r.score,
          sourceId: typeof sourceId === "string" ? sourceId : "",
          content: typeof content === "string" ? content : "",
          metadata,
        };
      })
      .sort(compareResults);
  }

  async deleteBySource(collectionName: string, sourceId: string): Promise<number> {
    if (!(await this.collectionExists(collectionName))) return 0;

    const filter = sourceFilter(sourceId);
    const { count } = await this.client.count(collectionName, { filter, exact: true });
    if (count === 0) return 0;

    await this.client.delete(collectionName, { wait: true, filter });
    return count;
  }

  async count(collectionName: string): Promise<number> {
    if (!(await this.collectionExists(collectionName))) return 0;
    const { count } = await this.client.count(collectionName, { exact: true });
    return count;
  }

  async dropCollection(collectionName: string): Promise<void> {
    if (await this.collectionExists(collectionName)) {
      await this.client.deleteCollection(collectionName);
    }
    this.dimensionsCache.delete(collectionName);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error: unknown) {
      this.logger?.warn({ err: error }, "qdrant health check failed");
      return false;
    }
  }

  private async dimensionsOf(collectionName: string): Promise<number | undefined> {
    const cached = this.dimensionsCache.get(collectionName);
    if (cached !== undefined) return cached;

    if (!(await this.collectionExists(collectionName))) return undefined;

    const info = await this.client.getCollection(collectionName);
    const vectors = info.config.params.vectors;
    if (vectors && "size" in vectors && typeof vectors.size === "number") {
      this.dimensionsCache.set(collectionName, vectors.size);
      return vectors.size;
    }
    throw new IndexCorruptionError(
      `Collection "${collectionName}" does not use a single unnamed vector`,
      collectionName,
    );
  }
}
