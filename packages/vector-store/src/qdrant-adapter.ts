import { randomUUID } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { VectorRecord } from "@recall-rerank/types";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

const BATCH_SIZE = 100;

/**
 * Physical collections are named `<alias>__<suffix>`; the logical collection
 * name is a Qdrant alias pointing at the current one.
 */
export function physicalCollectionName(alias: string): string {
  return `${alias}__${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const current = await this.resolveAlias(collectionName);
    if (current !== undefined) {
      const existing = await this.vectorSize(current);
      if (existing !== dimensions) {
        throw new Error(
          `Collection "${collectionName}" holds ${String(existing)}-dimension vectors, embedding provider produces ${String(dimensions)}`,
        );
      }
      return;
    }

    const physical = physicalCollectionName(collectionName);
    await this.createPhysicalCollection(physical, dimensions);
    await this.client.updateCollectionAliases({
      actions: [{ create_alias: { collection_name: physical, alias_name: collectionName } }],
    });
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.client.upsert(collectionName, {
        wait: true,
        points: batch.map((r) => ({
          id: r.id,
          vector: r.vector,
          payload: r.payload,
        })),
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const results = await this.client.search(collectionName, {
      vector: params.vector,
      limit: params.topK,
      with_payload: true,
    });

    return results.map((r) => ({
      id: typeof r.id === "string" ? r.id : String(r.id),
      score: r.score,
      payload: r.payload ?? {},
    }));
  }

  async count(collectionName: string): Promise<number> {
    const result = await this.client.count(collectionName, { exact: true });
    return result.count;
  }

  /**
   * Build the new empty collection first, then repoint the alias in a single
   * alias update, then drop the old physical collection.
   */
  async resetCollection(collectionName: string, dimensions: number): Promise<void> {
    const previous = await this.resolveAlias(collectionName);
    const next = physicalCollectionName(collectionName);

    await this.createPhysicalCollection(next, dimensions);

    const createAlias = { create_alias: { collection_name: next, alias_name: collectionName } };
    await this.client.updateCollectionAliases({
      actions:
        previous === undefined
          ? [createAlias]
          : [{ delete_alias: { alias_name: collectionName } }, createAlias],
    });

    if (previous !== undefined) {
      await this.client.deleteCollection(previous);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async resolveAlias(alias: string): Promise<string | undefined> {
    const { aliases } = await this.client.getAliases();
    return aliases.find((a) => a.alias_name === alias)?.collection_name;
  }

  /** Size of the collection's unnamed vector, undefined for named-vector layouts. */
  private async vectorSize(physical: string): Promise<number | undefined> {
    const info = await this.client.getCollection(physical);
    const vectors = info.config.params.vectors;
    if (vectors && "size" in vectors && typeof vectors.size === "number") {
      return vectors.size;
    }
    return undefined;
  }

  private async createPhysicalCollection(name: string, dimensions: number): Promise<void> {
    await this.client.createCollection(name, {
      vectors: {
        size: dimensions,
        distance: "Cosine",
      },
    });
  }
}
