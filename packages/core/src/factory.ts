import type { AppConfig } from "@docquery/types";
import { RecursiveChunker } from "@docquery/chunker";
import type { IChunker } from "@docquery/chunker";
import { createEmbeddingProvider } from "@docquery/embeddings";
import type { IEmbeddingProvider } from "@docquery/embeddings";
import { BreakerModel, createGenerativeModel } from "@docquery/llm";
import type { IGenerativeModel } from "@docquery/llm";
import { FileLoader } from "@docquery/loader";
import type { ILoader } from "@docquery/loader";
import { ManifestStore, createVectorStore } from "@docquery/vector-store";
import type { IVectorStore } from "@docquery/vector-store";
import { createChildLogger, createLogger } from "@docquery/logger";
import type { Logger } from "@docquery/logger";
import { QueryExpander } from "./query-expander.js";
import { Retriever } from "./retriever.js";
import { AnswerSynthesizer } from "./answer-synthesizer.js";
import { RagPipeline } from "./rag-pipeline.js";
import { IngestionPipeline } from "./ingestion-pipeline.js";

/** Collaborators a caller (usually a test) supplies instead of the configured ones. */
export interface PipelineOverrides {
  logger?: Logger;
  vectorStore?: IVectorStore;
  manifestStore?: ManifestStore;
  embeddingProvider?: IEmbeddingProvider;
  model?: IGenerativeModel;
  loader?: ILoader;
  chunker?: IChunker;
  fingerprint?: (sourceId: string) => Promise<string>;
}

export interface Pipeline {
  rag: RagPipeline;
  ingestion: IngestionPipeline;
  retriever: Retriever;
  vectorStore: IVectorStore;
  logger: Logger;
  /** Stops the model circuit breaker, if one was created. */
  close(): void;
}

/**
 * Wire every component from an AppConfig. A configured model is put behind a
 * circuit breaker; an injected one is used as is.
 */
export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Pipeline {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel, stderr: true });
  const retry = { maxRetries: config.resilience.maxRetries };

  const vectorStore =
    overrides.vectorStore ??
    createVectorStore({
      type: config.index.store,
      root: config.index.root,
      qdrantUrl: config.index.qdrantUrl,
      qdrantApiKey: config.index.qdrantApiKey,
      logger: createChildLogger(logger, { component: "vector-store" }),
    });

  const embeddingLogger = createChildLogger(logger, { component: "embeddings" });
  const embeddingProvider =
    overrides.embeddingProvider ??
    createEmbeddingProvider({
      provider: config.embedding.provider,
      cohere: {
        apiKey: config.cohere.apiKey,
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
        retry,
        logger: embeddingLogger,
      },
      ollama: {
        baseUrl: config.ollama.baseUrl,
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
        retry,
        logger: embeddingLogger,
      },
    });

  let breaker: BreakerModel | undefined;
  let model = overrides.model;
  if (!model) {
    const llmLogger = createChildLogger(logger, { component: "llm" });
    const configured = createGenerativeModel({
      provider: config.llm.provider,
      cohere: {
        apiKey: config.cohere.apiKey,
        model: config.llm.model,
        temperature: config.llm.temperature,
        retry,
        logger: llmLogger,
      },
      ollama: {
        baseUrl: config.ollama.baseUrl,
        model: config.llm.model,
        temperature: config.llm.temperature,
        retry,
        logger: llmLogger,
      },
    });
    breaker = new BreakerModel(
      configured,
      { timeout: config.resilience.modelTimeoutMs },
      createChildLogger(logger, { component: "circuit-breaker" }),
    );
    model = breaker;
  }

  const expander = new QueryExpander({
    model,
    defaultCount: config.retrieval.queryVariants,
    logger: createChildLogger(logger, { component: "query-expander" }),
  });

  const retriever = new Retriever({
    expander,
    embeddingProvider,
    vectorStore,
    collectionName: config.index.collection,
    settings: config.retrieval,
    logger: createChildLogger(logger, { component: "retriever" }),
  });

  const synthesizer = new AnswerSynthesizer({
    model,
    logger: createChildLogger(logger, { component: "answer-synthesizer" }),
  });

  const rag = new RagPipeline({
    retriever,
    synthesizer,
    logger: createChildLogger(logger, { component: "pipeline", collection: config.index.collection }),
  });

  const ingestion = new IngestionPipeline({
    loader: overrides.loader ?? new FileLoader(),
    chunker: overrides.chunker ?? new RecursiveChunker(),
    embeddingProvider,
    vectorStore,
    manifestStore: overrides.manifestStore ?? new ManifestStore(config.index.root),
    collectionName: config.index.collection,
    chunking: config.chunking,
    embeddingModel: config.embedding.model,
    rebuildOnStale: config.index.rebuildOnStale,
    fingerprint: overrides.fingerprint,
    logger: createChildLogger(logger, { component: "ingestion", collection: config.index.collection }),
  });

  return {
    rag,
    ingestion,
    retriever,
    vectorStore,
    logger,
    close: () => breaker?.shutdown(),
  };
}
