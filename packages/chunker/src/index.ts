export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS, validateChunkingConfig } from "./recursive-chunker.js";
export { chunkId } from "./chunk-id.js";
