export { IngestionPipeline } from "./ingestion-pipeline.js";
export type { IngestionDependencies, BuildOptions, CollectionStatus } from "./ingestion-pipeline.js";

export {
  QueryExpander,
  parseVariants,
  buildExpansionPrompt,
  DEFAULT_VARIANT_COUNT,
} from "./query-expander.js";
export type { QueryExpanderDependencies } from "./query-expander.js";

export { Retriever, mergeResults, applyBudget } from "./retriever.js";
export type { RetrieverDependencies, Retrieval } from "./retriever.js";

export {
  AnswerSynthesizer,
  buildAnswerPrompt,
  renderFailure,
  NO_CONTEXT_NOTICE,
} from "./answer-synthesizer.js";
export type { AnswerSynthesizerDependencies } from "./answer-synthesizer.js";

export { RagPipeline, EMPTY_QUESTION_MESSAGE } from "./rag-pipeline.js";
export type { RagPipelineDependencies } from "./rag-pipeline.js";

export { assembleContext, sourceLabel } from "./context-assembler.js";

export { createPipeline } from "./factory.js";
export type { Pipeline, PipelineOverrides } from "./factory.js";
