import type { VectorStoreType } from "@recall-rerank/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./memory-adapter.js";

export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { QdrantVectorStore, physicalCollectionName } from "./qdrant-adapter.js";
export { InMemoryVectorStore } from "./memory-adapter.js";

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
