import type {
  CollectionState,
  Passage,
  PassageInput,
  RetrievalCandidate,
  VectorRecord,
} from "@recall-rerank/types";
import { DEFAULT_PASSAGE_SOURCE } from "@recall-rerank/types";
import type { IEmbeddingProvider } from "@recall-rerank/embeddings";
import type { IVectorStore, VectorSearchResult } from "@recall-rerank/vector-store";
import {
  InitializationError,
  IngestionError,
  ResetError,
  RetrievalError,
  describeError,
} from "@recall-rerank/errors";
import { createChildLogger, getDefaultLogger, type Logger } from "@recall-rerank/logger";
import { fingerprint } from "./fingerprint.js";

export interface PassageStoreDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  logger?: Logger;
}

/**
 * Drop blank texts and collapse repeated fingerprints. A repeated text keeps
 * its first position but takes the latest source.
 */
function uniquePassages(documents: readonly PassageInput[]): Passage[] {
  const byId = new Map<string, Passage>();

  for (const doc of documents) {
    if (doc.text.trim() === "") continue;
    const id = fingerprint(doc.text);
    byId.set(id, { id, text: doc.text, source: doc.source });
  }

  return [...byId.values()];
}

function toRecord(passage: Passage, vector: number[] | undefined): VectorRecord {
  if (!vector) {
    throw new Error(`Embedding backend returned no vector for passage ${passage.id}`);
  }
  return {
    id: passage.id,
    vector,
    payload: { text: passage.text, source: passage.source },
  };
}

function toPassage(result: VectorSearchResult): Passage {
  const { text, source } = result.payload;
  if (typeof text !== "string") {
    throw new Error(`Stored passage ${result.id} has no text payload`);
  }
  return {
    id: result.id,
    text,
    source: typeof source === "string" ? source : DEFAULT_PASSAGE_SOURCE,
  };
}

/**
 * Content-addressed passage collection bound to one embedding provider.
 *
 * Lifecycle: `open` moves the store from uninitialized to ready; `reset` goes
 * through resetting back to ready, or to inconsistent when the swap fails.
 * An inconsistent store refuses inserts and queries until a reset succeeds.
 */
export class PassageStore {
  private readonly embeddingProvider: IEmbeddingProvider;
  private readonly vectorStore: IVectorStore;
  private readonly collectionName: string;
  private readonly logger: Logger;
  private currentState: CollectionState = "uninitialized";

  private constructor(deps: PassageStoreDependencies) {
    this.embeddingProvider = deps.embeddingProvider;
    this.vectorStore = deps.vectorStore;
    this.collectionName = deps.collectionName;
    this.logger = createChildLogger(deps.logger ?? getDefaultLogger(), {
      component: "passage-store",
      collection: deps.collectionName,
    });
  }

  static async open(deps: PassageStoreDependencies): Promise<PassageStore> {
    const store = new PassageStore(deps);
    const dimensions = deps.embeddingProvider.dimensions;

    try {
      await deps.vectorStore.ensureCollection(deps.collectionName, dimensions);
    } catch (error: unknown) {
      store.logger.error({ err: error }, "Failed to bind collection");
      throw new InitializationError(
        `Failed to open collection "${deps.collectionName}": ${describeError(error)}`,
        { cause: error },
      );
    }

    store.currentState = "ready";
    store.logger.info(
      { dimensions, embeddingProvider: deps.embeddingProvider.name },
      "Collection ready",
    );
    return store;
  }

  get state(): CollectionState {
    return this.currentState;
  }

  get name(): string {
    return this.collectionName;
  }

  /**
   * Embed and store passages keyed by fingerprint.
   *
   * @returns the number of distinct non-blank passages written by this call
   */
  async insert(documents: readonly PassageInput[]): Promise<number> {
    if (this.currentState === "inconsistent") {
      throw new IngestionError(this.inconsistentMessage());
    }

    const passages = uniquePassages(documents);
    if (passages.length === 0) {
      this.logger.warn({ received: documents.length }, "No non-empty passages to insert");
      return 0;
    }

    const startTime = Date.now();

    try {
      const embeddingResult = await this.embeddingProvider.batchEmbed(
        passages.map((p) => p.text),
        "document",
      );
      const records = passages.map((p, i) => toRecord(p, embeddingResult.embeddings[i]));

      await this.vectorStore.upsert(this.collectionName, records);
    } catch (error: unknown) {
      this.logger.error({ err: error, passages: passages.length }, "Failed to insert passages");
      throw new IngestionError(
        `Failed to store ${String(passages.length)} passages: ${describeError(error)}`,
        { cause: error, details: { passages: passages.length } },
      );
    }

    this.logger.info(
      {
        received: documents.length,
        inserted: passages.length,
        durationMs: Date.now() - startTime,
      },
      "Inserted passages",
    );
    return passages.length;
  }

  /**
   * Up to `n` passages, most similar first. Deterministic for fixed contents.
   */
  async query(queryText: string, n: number): Promise<RetrievalCandidate[]> {
    if (this.currentState === "inconsistent") {
      throw new RetrievalError(this.inconsistentMessage(), "recall");
    }
    if (n <= 0) {
      return [];
    }

    const startTime = Date.now();

    try {
      const embeddingResult = await this.embeddingProvider.embed(queryText, "query");
      const queryVector = embeddingResult.embeddings[0];
      if (!queryVector) {
        throw new Error("Embedding backend returned no vector for the query");
      }

      const results = await this.vectorStore.search(this.collectionName, {
        vector: queryVector,
        topK: n,
      });

      const candidates = results.map((result, i) => ({
        passage: toPassage(result),
        similarityRank: i + 1,
        similarity: result.score,
      }));

      this.logger.info(
        { requested: n, recalled: candidates.length, durationMs: Date.now() - startTime },
        "Similarity recall complete",
      );
      return candidates;
    } catch (error: unknown) {
      this.logger.error({ err: error }, "Similarity recall failed");
      throw new RetrievalError(`Similarity recall failed: ${describeError(error)}`, "recall", {
        cause: error,
      });
    }
  }

  async count(): Promise<number> {
    try {
      return await this.vectorStore.count(this.collectionName);
    } catch (error: unknown) {
      throw new RetrievalError(`Failed to count passages: ${describeError(error)}`, "recall", {
        cause: error,
      });
    }
  }

  /**
   * Replace the collection with an empty one bound to the same embedding
   * dimensions.
   */
  async reset(): Promise<void> {
    this.currentState = "resetting";
    this.logger.info("Resetting collection");

    try {
      await this.vectorStore.resetCollection(
        this.collectionName,
        this.embeddingProvider.dimensions,
      );
    } catch (error: unknown) {
      this.currentState = "inconsistent";
      this.logger.error({ err: error }, "Collection reset failed");
      throw new ResetError(
        `Failed to reset collection "${this.collectionName}": ${describeError(error)}`,
        { cause: error },
      );
    }

    this.currentState = "ready";
    this.logger.info("Collection reset complete");
  }

  private inconsistentMessage(): string {
    return `Collection "${this.collectionName}" is inconsistent after a failed reset; reset it again before use`;
  }
}
