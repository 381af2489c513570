export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { FileVectorStore } from "./file-store.js";
export { QdrantVectorStore, pointIdFor } from "./qdrant-store.js";
export { ManifestStore, checksumFile, diffSources } from "./manifest-store.js";
export { cosineSimilarity } from "./similarity.js";
export { createVectorStore } from "./factory.js";
export type { VectorStoreConfig } from "./factory.js";
