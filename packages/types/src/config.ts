import type { SearchDepth } from "./search.js";

export type VectorStoreType = "qdrant" | "memory";
export type EmbeddingProviderType = "cohere" | "bge-m3";
export type RerankerType = "cohere" | "bge";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  rag: RagConfig;
  vectorStore: VectorStoreSettings;
  embedding: EmbeddingSettings;
  reranker: RerankerSettings;
  cohere: CohereConfig;
  search: SearchConfig;
}

export interface RagConfig {
  collectionName: string;
  retrieveCount: number;
  rerankTopK: number;
  noResultsSentinel: string;
}

export interface VectorStoreSettings {
  type: VectorStoreType;
  qdrantUrl: string;
  qdrantApiKey?: string;
}

export interface EmbeddingSettings {
  provider: EmbeddingProviderType;
  dimensions: number;
  bgeM3Url?: string;
}

export interface RerankerSettings {
  provider: RerankerType;
  bgeUrl?: string;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
  rerankModel: string;
}

export interface SearchConfig {
  tavilyApiKey?: string;
  searchDepth: SearchDepth;
  maxResults: number;
  maxRetries: number;
}
