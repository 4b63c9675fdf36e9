export type EmbeddingPurpose = "document" | "query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface RerankResult {
  /** Position of the passage in the list handed to the reranker. */
  index: number;
  text: string;
  score: number;
}
