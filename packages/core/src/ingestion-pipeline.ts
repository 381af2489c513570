import type {
  Chunk,
  ChunkingConfig,
  CollectionManifest,
  Document,
  IngestionResult,
  VectorRecord,
} from "@docquery/types";
import type { ILoader } from "@docquery/loader";
import type { IChunker } from "@docquery/chunker";
import type { IEmbeddingProvider } from "@docquery/embeddings";
import type { IVectorStore, ManifestStore } from "@docquery/vector-store";
import { checksumFile, diffSources } from "@docquery/vector-store";
import { ConfigurationError, IngestionError, describeError } from "@docquery/errors";
import { silentLogger } from "@docquery/logger";
import type { Logger } from "@docquery/logger";

export interface IngestionDependencies {
  loader: ILoader;
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  manifestStore: ManifestStore;
  collectionName: string;
  chunking: ChunkingConfig;
  /** Recorded in the manifest; a different model marks every source stale. */
  embeddingModel: string;
  rebuildOnStale?: boolean;
  /** Content fingerprint of a source. Defaults to the SHA-256 of the file. */
  fingerprint?: (sourceId: string) => Promise<string>;
  logger?: Logger;
}

export interface BuildOptions {
  rebuild?: boolean;
}

export interface CollectionStatus {
  collection: string;
  exists: boolean;
  records: number;
  manifest?: CollectionManifest;
}

interface PreparedSources {
  documentCount: number;
  chunks: Chunk[];
  emptySources: string[];
}

/**
 * Build path: Load -> Chunk -> Embed -> Store, once per collection.
 *
 * An existing collection is left alone unless a rebuild is requested, or it
 * is stale and `rebuildOnStale` is set.
 */
export class IngestionPipeline {
  private deps: IngestionDependencies;
  private logger: Logger;
  private fingerprint: (sourceId: string) => Promise<string>;

  constructor(deps: IngestionDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger();
    this.fingerprint = deps.fingerprint ?? checksumFile;
  }

  async build(sources: string[], options: BuildOptions = {}): Promise<IngestionResult> {
    const { vectorStore, manifestStore, collectionName } = this.deps;
    const ids = this.sourceIds(sources);
    let rebuild = options.rebuild ?? false;

    const exists = await vectorStore.collectionExists(collectionName);
    if (exists && !rebuild) {
      const manifest = await manifestStore.read(collectionName);
      if (!manifest) {
        this.logger.warn(
          { collection: collectionName },
          "collection has no manifest, an earlier build did not finish; rebuilding",
        );
        rebuild = true;
      } else {
        const staleSources = await this.findStaleSources(manifest, ids);
        if (staleSources.length === 0) {
          this.logger.info({ collection: collectionName }, "collection already built, skipping ingestion");
          return this.skipped([]);
        }
        if (!this.deps.rebuildOnStale) {
          this.logger.warn(
            { collection: collectionName, staleSources },
            "collection is out of date with its sources; rebuild to pick up changes",
          );
          return this.skipped(staleSources);
        }
        this.logger.info({ collection: collectionName, staleSources }, "collection is stale, rebuilding");
        rebuild = true;
      }
    }

    if (exists && rebuild) {
      await vectorStore.dropCollection(collectionName);
      await manifestStore.remove(collectionName);
    }

    const startTime = Date.now();
    const prepared = await this.prepare(ids);
    let tokensUsed: number;
    try {
      tokensUsed = await this.store(prepared.chunks);
      await this.writeManifest(ids, {});
    } catch (error: unknown) {
      await this.discardUnfinished();
      throw error;
    }

    this.logger.info(
      {
        collection: collectionName,
        documents: prepared.documentCount,
        chunks: prepared.chunks.length,
        emptySources: prepared.emptySources,
        durationMs: Date.now() - startTime,
      },
      "ingestion complete",
    );

    return {
      collection: collectionName,
      skipped: false,
      rebuilt: exists && rebuild,
      documentCount: prepared.documentCount,
      chunkCount: prepared.chunks.length,
      tokensUsed,
      embeddingDimensions: this.deps.embeddingProvider.dimensions,
      staleSources: [],
      emptySources: prepared.emptySources,
    };
  }

  /**
   * Replace every record of one source with freshly embedded chunks.
   */
  async refreshSource(input: string): Promise<IngestionResult> {
    const { collectionName } = this.deps;
    const source = this.deps.loader.sourceId(input);

    const prepared = await this.prepare([source]);
    const tokensUsed = await this.store(prepared.chunks, source);

    const previous = await this.deps.manifestStore.read(collectionName);
    await this.writeManifest([source], previous?.sources ?? {});

    this.logger.info(
      { collection: collectionName, source, chunks: prepared.chunks.length },
      "source refreshed",
    );

    return {
      collection: collectionName,
      skipped: false,
      rebuilt: false,
      documentCount: prepared.documentCount,
      chunkCount: prepared.chunks.length,
      tokensUsed,
      embeddingDimensions: this.deps.embeddingProvider.dimensions,
      staleSources: [],
      emptySources: prepared.emptySources,
    };
  }

  async status(): Promise<CollectionStatus> {
    const { vectorStore, manifestStore, collectionName } = this.deps;
    const exists = await vectorStore.collectionExists(collectionName);
    if (!exists) {
      return { collection: collectionName, exists, records: 0 };
    }
    return {
      collection: collectionName,
      exists,
      records: await vectorStore.count(collectionName),
      manifest: await manifestStore.read(collectionName),
    };
  }

  private skipped(staleSources: string[]): IngestionResult {
    return {
      collection: this.deps.collectionName,
      skipped: true,
      rebuilt: false,
      documentCount: 0,
      chunkCount: 0,
      tokensUsed: 0,
      embeddingDimensions: this.deps.embeddingProvider.dimensions,
      staleSources,
      emptySources: [],
    };
  }

  private sourceIds(sources: string[]): string[] {
    return [...new Set(sources.map((source) => this.deps.loader.sourceId(source)))];
  }

  private async findStaleSources(manifest: CollectionManifest, sources: string[]): Promise<string[]> {
    const current = await this.checksums(sources);
    if (manifest.embeddingModel !== this.deps.embeddingModel) {
      return Object.keys({ ...manifest.sources, ...current }).sort();
    }
    return diffSources(manifest.sources, current);
  }

  /**
   * The manifest is written last and marks a finished build, so a build that
   * fails after creating the collection removes it again.
   */
  private async discardUnfinished(): Promise<void> {
    const { vectorStore, manifestStore, collectionName } = this.deps;
    try {
      await vectorStore.dropCollection(collectionName);
      await manifestStore.remove(collectionName);
    } catch (error: unknown) {
      this.logger.error({ err: error, collection: collectionName }, "could not remove unfinished collection");
    }
  }

  private async checksums(sources: string[]): Promise<Record<string, string>> {
    const result: Record<string, string> = {};
    for (const source of sources) {
      try {
        result[source] = await this.fingerprint(source);
      } catch (error: unknown) {
        throw new IngestionError(`Cannot fingerprint ${source}: ${describeError(error)}`, source, {
          cause: error,
        });
      }
    }
    return result;
  }

  private async prepare(sources: string[]): Promise<PreparedSources> {
    const chunks: Chunk[] = [];
    const emptySources: string[] = [];
    let documentCount = 0;

    for (const source of sources) {
      let documents: Document[];
      try {
        documents = await this.deps.loader.load(source);
      } catch (error: unknown) {
        if (error instanceof IngestionError) throw error;
        throw new IngestionError(`Cannot load ${source}: ${describeError(error)}`, source, { cause: error });
      }
      documentCount += documents.length;

      let produced = 0;
      for (const document of documents) {
        for (const chunk of this.deps.chunker.chunk(document, this.deps.chunking)) {
          if (chunk.content.trim().length === 0) continue;
          chunks.push(chunk);
          produced++;
        }
      }

      if (produced === 0) {
        emptySources.push(source);
        this.logger.warn({ source }, "source has no text, nothing to index");
      } else {
        this.logger.debug({ source, chunks: produced }, "source chunked");
      }
    }

    return { documentCount, chunks, emptySources };
  }

  /**
   * Embed, validate and write chunks. With `replaceSource`, that source's old
   * records are deleted just before the upsert. Returns tokens used.
   */
  private async store(chunks: Chunk[], replaceSource?: string): Promise<number> {
    const { embeddingProvider, vectorStore, collectionName } = this.deps;

    let vectors: number[][] = [];
    let tokensUsed = 0;
    if (chunks.length > 0) {
      const embedded = await embeddingProvider.batchEmbed(chunks.map((c) => c.content));
      this.checkEmbeddings(embedded.embeddings, chunks.length);
      vectors = embedded.embeddings;
      tokensUsed = embedded.tokensUsed;
    }

    await vectorStore.ensureCollection(collectionName, embeddingProvider.dimensions);

    if (replaceSource !== undefined) {
      const removed = await vectorStore.deleteBySource(collectionName, replaceSource);
      this.logger.debug({ source: replaceSource, removed }, "old records removed");
    }

    const records: VectorRecord[] = [];
    chunks.forEach((chunk, i) => {
      const vector = vectors[i];
      if (vector) {
        records.push({
          id: chunk.id,
          sourceId: chunk.sourceId,
          vector,
          content: chunk.content,
          metadata: { ...chunk.metadata, index: chunk.index, tokenCount: chunk.tokenCount },
        });
      }
    });

    if (records.length > 0) {
      await vectorStore.upsert(collectionName, records);
    }
    return tokensUsed;
  }

  private checkEmbeddings(embeddings: number[][], expected: number): void {
    const { dimensions, name } = this.deps.embeddingProvider;

    if (embeddings.length !== expected) {
      throw new ConfigurationError(
        `Embedding provider "${name}" returned ${embeddings.length} vectors for ${expected} chunks`,
        { embeddings: `expected ${expected}, got ${embeddings.length}` },
      );
    }
    for (const vector of embeddings) {
      if (vector.length !== dimensions) {
        throw new ConfigurationError(
          `Embedding provider "${name}" produced ${vector.length}-dimensional vectors but declares ${dimensions}; check EMBEDDING_DIMENSIONS`,
          { EMBEDDING_DIMENSIONS: `provider produced ${vector.length}` },
        );
      }
    }
  }

  private async writeManifest(sources: string[], previous: Record<string, string>): Promise<void> {
    const { collectionName, chunking, embeddingModel, embeddingProvider, manifestStore } = this.deps;
    const current = await this.checksums(sources);

    await manifestStore.write({
      version: 1,
      collection: collectionName,
      embeddingModel,
      dimensions: embeddingProvider.dimensions,
      chunkSize: chunking.chunkSize,
      chunkOverlap: chunking.chunkOverlap,
      builtAt: new Date().toISOString(),
      sources: { ...previous, ...current },
    });
  }
}
