import type { VectorRecord } from "@recall-rerank/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

/**
 * Physical vector index behind a passage collection. Collection names are
 * logical: adapters may map them onto versioned physical collections.
 */
export interface IVectorStore {
  /**
   * Create the collection if missing. An existing collection must hold vectors
   * of `dimensions` entries, otherwise this rejects.
   */
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  /** Insert or overwrite by id. */
  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  /** Best matches first; ties are ordered deterministically. */
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  count(collectionName: string): Promise<number>;
  /**
   * Replace the collection with an empty one. Readers observe either the old
   * contents or the new empty collection, never a missing collection.
   */
  resetCollection(collectionName: string, dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
