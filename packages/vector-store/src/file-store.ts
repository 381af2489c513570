import { access, constants, mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { VectorRecord } from "@docquery/types";
import { IndexCorruptionError, InvalidArgumentError, describeError } from "@docquery/errors";
import type { Logger } from "@docquery/logger";
import type { IVectorStore, VectorSearchParams, VectorSearchResult } from "./vector-store.interface.js";
import { compareResults, cosineSimilarity } from "./similarity.js";
import { assertDimensions, assertTopK, assertVectorLength } from "./validation.js";
import { readJsonFile, writeJsonAtomic } from "./json-file.js";

const FORMAT_VERSION = 1;
const COLLECTION_FILE = "collection.json";
const RECORDS_FILE = "records.json";

const collectionFileSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  name: z.string(),
  dimensions: z.number().int().positive(),
  createdAt: z.string(),
});

const recordSchema = z.object({
  id: z.string().min(1),
  sourceId: z.string(),
  vector: z.array(z.number()),
  content: z.string(),
  metadata: z.record(z.unknown()),
});

const recordsFileSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  records: z.array(recordSchema),
});

interface CollectionState {
  dimensions: number;
  createdAt: string;
  /** Replaced wholesale on every write, never mutated. */
  records: ReadonlyMap<string, VectorRecord>;
}

/**
 * Vector index kept as JSON files, one directory per collection:
 *
 *   <root>/<collection>/collection.json   format version and dimensions
 *   <root>/<collection>/records.json      every record with its vector
 *
 * Collections are read once into memory; search is an exact cosine scan.
 * Writes go through a single promise chain and land atomically.
 */
export class FileVectorStore implements IVectorStore {
  private readonly root: string;
  private readonly logger?: Logger;
  private readonly cache = new Map<string, CollectionState>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(root: string, logger?: Logger) {
    this.root = root;
    this.logger = logger;
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    if (this.cache.has(collectionName)) return true;
    try {
      await access(this.collectionFile(collectionName));
      return true;
    } catch {
      return false;
    }
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    assertDimensions(dimensions);

    await this.serialize(async () => {
      const state = await this.load(collectionName);
      if (state) {
        if (state.dimensions !== dimensions) {
          throw new IndexCorruptionError(
            `Collection "${collectionName}" has ${state.dimensions} dimensions but the embedding provider produces ${dimensions}; rebuild the index`,
            collectionName,
            { details: { stored: state.dimensions, configured: dimensions } },
          );
        }
        return;
      }

      const created: CollectionState = {
        dimensions,
        createdAt: new Date().toISOString(),
        records: new Map(),
      };
      await this.persist(collectionName, created);
      await writeJsonAtomic(this.collectionFile(collectionName), {
        version: FORMAT_VERSION,
        name: collectionName,
        dimensions,
        createdAt: created.createdAt,
      });
      this.cache.set(collectionName, created);
      this.logger?.info({ collection: collectionName, dimensions }, "collection created");
    });
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    await this.serialize(async () => {
      const state = await this.requireCollection(collectionName);
      for (const record of records) {
        assertVectorLength(record.vector, state.dimensions, `Record ${record.id}`);
      }

      const next = new Map(state.records);
      for (const record of records) {
        next.set(record.id, { ...record, vector: [...record.vector], metadata: { ...record.metadata } });
      }
      await this.commit(collectionName, { ...state, records: next });
    });
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    assertTopK(params.topK);

    const state = await this.load(collectionName);
    if (!state) return [];
    assertVectorLength(params.vector, state.dimensions, "Query vector");

    const results: VectorSearchResult[] = [];
    for (const record of state.records.values()) {
      const score = cosineSimilarity(params.vector, record.vector);
      if (params.scoreThreshold !== undefined && score < params.scoreThreshold) continue;
      results.push({
        id: record.id,
        score,
        sourceId: record.sourceId,
        content: record.content,
        metadata: { ...record.metadata },
      });
    }

    return results.sort(compareResults).slice(0, params.topK);
  }

  async deleteBySource(collectionName: string, sourceId: string): Promise<number> {
    return this.serialize(async () => {
      const state = await this.load(collectionName);
      if (!state) return 0;

      const next = new Map<string, VectorRecord>();
      for (const [id, record] of state.records) {
        if (record.sourceId !== sourceId) next.set(id, record);
      }
      const removed = state.records.size - next.size;
      if (removed > 0) {
        await this.commit(collectionName, { ...state, records: next });
      }
      return removed;
    });
  }

  async count(collectionName: string): Promise<number> {
    const state = await this.load(collectionName);
    return state?.records.size ?? 0;
  }

  async dropCollection(collectionName: string): Promise<void> {
    await this.serialize(async () => {
      await rm(this.collectionDir(collectionName), { recursive: true, force: true });
      this.cache.delete(collectionName);
      this.logger?.info({ collection: collectionName }, "collection dropped");
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await mkdir(this.root, { recursive: true });
      await access(this.root, constants.W_OK);
      return true;
    } catch (error: unknown) {
      this.logger?.warn({ err: error, root: this.root }, "index root is not writable");
      return false;
    }
  }

  private collectionDir(collectionName: string): string {
    return path.join(this.root, collectionName);
  }

  private collectionFile(collectionName: string): string {
    return path.join(this.collectionDir(collectionName), COLLECTION_FILE);
  }

  private recordsFile(collectionName: string): string {
    return path.join(this.collectionDir(collectionName), RECORDS_FILE);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(task);
    // Failures reach the caller through `run`; the chain itself keeps going.
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async requireCollection(collectionName: string): Promise<CollectionState> {
    const state = await this.load(collectionName);
    if (!state) {
      throw new InvalidArgumentError(
        `Collection "${collectionName}" does not exist; call ensureCollection first`,
        "collectionName",
      );
    }
    return state;
  }

  private async commit(collectionName: string, state: CollectionState): Promise<void> {
    await this.persist(collectionName, state);
    this.cache.set(collectionName, state);
  }

  private async persist(collectionName: string, state: CollectionState): Promise<void> {
    await writeJsonAtomic(this.recordsFile(collectionName), {
      version: FORMAT_VERSION,
      records: [...state.records.values()],
    });
  }

  private async load(collectionName: string): Promise<CollectionState | undefined> {
    const cached = this.cache.get(collectionName);
    if (cached) return cached;

    const meta = await this.readValidated(collectionName, this.collectionFile(collectionName), collectionFileSchema);
    if (!meta) return undefined;

    const stored = await this.readValidated(collectionName, this.recordsFile(collectionName), recordsFileSchema);
    if (!stored) {
      throw new IndexCorruptionError(`Collection "${collectionName}" is missing ${RECORDS_FILE}`, collectionName);
    }

    const records = new Map<string, VectorRecord>();
    for (const record of stored.records) {
      if (record.vector.length !== meta.dimensions) {
        throw new IndexCorruptionError(
          `Record ${record.id} in "${collectionName}" has ${record.vector.length} dimensions, expected ${meta.dimensions}`,
          collectionName,
        );
      }
      records.set(record.id, record);
    }

    // A write may have landed while we were reading; it wins.
    const raced = this.cache.get(collectionName);
    if (raced) return raced;

    const state: CollectionState = { dimensions: meta.dimensions, createdAt: meta.createdAt, records };
    this.cache.set(collectionName, state);
    this.logger?.debug({ collection: collectionName, records: records.size }, "collection loaded");
    return state;
  }

  private async readValidated<T>(
    collectionName: string,
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | undefined> {
    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error: unknown) {
      throw new IndexCorruptionError(
        `Cannot read ${filePath}: ${describeError(error)}`,
        collectionName,
        { cause: error },
      );
    }
    if (raw === undefined) return undefined;

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexCorruptionError(
        `Unexpected content in ${filePath}: ${parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ")}`,
        collectionName,
      );
    }
    return parsed.data;
  }
}
