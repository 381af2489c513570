import type { VectorStoreType } from "@docquery/types";
import { ConfigurationError } from "@docquery/errors";
import type { Logger } from "@docquery/logger";
import type { IVectorStore } from "./vector-store.interface.js";
import { FileVectorStore } from "./file-store.js";
import { QdrantVectorStore } from "./qdrant-store.js";

export interface VectorStoreConfig {
  type: VectorStoreType;
  /** Index root directory, used by the file store. */
  root: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  logger?: Logger;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "file":
      return new FileVectorStore(config.root, config.logger);
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ConfigurationError("qdrantUrl is required for Qdrant vector store", {
          QDRANT_URL: "required when VECTOR_STORE is 'qdrant'",
        });
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey, config.logger);
    default:
      throw new ConfigurationError(`Unknown vector store type: ${String(config.type)}`);
  }
}
