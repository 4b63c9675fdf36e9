import type { VectorRecord } from "@recall-rerank/types";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

interface MemoryCollection {
  dimensions: number;
  records: Map<string, VectorRecord>;
}

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Exact cosine search over process memory. Nothing survives a restart.
 * Equal scores are ordered by ascending id so results are reproducible.
 */
export class InMemoryVectorStore implements IVectorStore {
  private collections = new Map<string, MemoryCollection>();

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const existing = this.collections.get(collectionName);
    if (!existing) {
      this.collections.set(collectionName, { dimensions, records: new Map() });
      return;
    }
    if (existing.dimensions !== dimensions) {
      throw new Error(
        `Collection "${collectionName}" holds ${String(existing.dimensions)}-dimension vectors, embedding provider produces ${String(dimensions)}`,
      );
    }
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const collection = this.getCollection(collectionName);

    // Validate the whole batch before writing any of it
    for (const record of records) {
      this.assertDimensions(collection, record.vector, collectionName);
    }

    for (const record of records) {
      collection.records.set(record.id, {
        id: record.id,
        vector: [...record.vector],
        payload: { ...record.payload },
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = this.getCollection(collectionName);
    this.assertDimensions(collection, params.vector, collectionName);

    if (params.topK <= 0) {
      return [];
    }

    const scored = [...collection.records.values()].map((record) => ({
      id: record.id,
      score: cosineSimilarity(params.vector, record.vector),
      payload: { ...record.payload },
    }));

    scored.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    return scored.slice(0, params.topK);
  }

  async count(collectionName: string): Promise<number> {
    return this.getCollection(collectionName).records.size;
  }

  async resetCollection(collectionName: string, dimensions: number): Promise<void> {
    this.collections.set(collectionName, { dimensions, records: new Map() });
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private getCollection(collectionName: string): MemoryCollection {
    const collection = this.collections.get(collectionName);
    if (!collection) {
      throw new Error(`Collection "${collectionName}" does not exist`);
    }
    return collection;
  }

  private assertDimensions(
    collection: MemoryCollection,
    vector: number[],
    collectionName: string,
  ): void {
    if (vector.length !== collection.dimensions) {
      throw new Error(
        `Vector has ${String(vector.length)} dimensions but collection "${collectionName}" expects ${String(collection.dimensions)}`,
      );
    }
  }
}
