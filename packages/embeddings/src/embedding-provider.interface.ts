import type { EmbeddingPurpose, EmbeddingResult } from "@recall-rerank/types";

/**
 * Text to fixed-length vector. Identical text under the same model must map to
 * the same vector, and every vector has `dimensions` entries.
 */
export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, purpose?: EmbeddingPurpose): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], purpose?: EmbeddingPurpose): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
