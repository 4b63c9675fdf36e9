import type { IngestDocument, PassageInput } from "@recall-rerank/types";
import { DEFAULT_PASSAGE_SOURCE } from "@recall-rerank/types";
import type { IEmbeddingProvider } from "@recall-rerank/embeddings";
import type { IVectorStore } from "@recall-rerank/vector-store";
import type { IReranker } from "@recall-rerank/reranker";
import { ValidationError } from "@recall-rerank/errors";
import { createChildLogger, getDefaultLogger, type Logger } from "@recall-rerank/logger";
import { PassageStore } from "./passage-store.js";
import { retrieve } from "./retrieval-pipeline.js";
import { buildContext } from "./context-assembler.js";

export interface RetrievalEngineDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  reranker: IReranker;
  logger?: Logger;
}

export interface RetrievalEngineOptions {
  collectionName: string;
  retrieveCount: number;
  rerankTopK: number;
  noResultsSentinel: string;
}

/** The three operations callers of the engine depend on. */
export interface RetrievalEngineContract {
  ingest(documents: readonly IngestDocument[]): Promise<number>;
  retrieveContext(query: string, topK?: number): Promise<string>;
  reset(): Promise<void>;
}

function assertCount(value: number, field: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${field} must be an integer >= ${String(min)}`, {
      [field]: `expected an integer >= ${String(min)}, received ${String(value)}`,
    });
  }
}

function toPassageInput(doc: IngestDocument): PassageInput {
  return { text: doc.content, source: doc.url ?? DEFAULT_PASSAGE_SOURCE };
}

/**
 * Two-stage retrieval over one passage collection: wide similarity recall,
 * then precise reranking, assembled into a bounded background block.
 */
export class RetrievalEngine implements RetrievalEngineContract {
  private readonly store: PassageStore;
  private readonly reranker: IReranker;
  private readonly options: RetrievalEngineOptions;
  private readonly logger: Logger;

  private constructor(
    store: PassageStore,
    reranker: IReranker,
    options: RetrievalEngineOptions,
    logger: Logger,
  ) {
    this.store = store;
    this.reranker = reranker;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Open the collection and build the engine. Fails with InitializationError
   * when the collection cannot be bound.
   */
  static async create(
    deps: RetrievalEngineDependencies,
    options: RetrievalEngineOptions,
  ): Promise<RetrievalEngine> {
    assertCount(options.retrieveCount, "retrieveCount", 1);
    assertCount(options.rerankTopK, "rerankTopK", 0);

    const logger = deps.logger ?? getDefaultLogger();
    const store = await PassageStore.open({
      embeddingProvider: deps.embeddingProvider,
      vectorStore: deps.vectorStore,
      collectionName: options.collectionName,
      logger,
    });

    return new RetrievalEngine(
      store,
      deps.reranker,
      options,
      createChildLogger(logger, { component: "retrieval-engine" }),
    );
  }

  /**
   * Store search results as passages. `url` becomes the source, "local" when
   * missing. Returns the number of distinct non-empty passages written.
   */
  async ingest(documents: readonly IngestDocument[]): Promise<number> {
    return this.store.insert(documents.map(toPassageInput));
  }

  async retrieveContext(query: string, topK: number = this.options.rerankTopK): Promise<string> {
    assertCount(topK, "topK", 0);

    const ranked = await retrieve(query, {
      store: this.store,
      reranker: this.reranker,
      retrieveCount: this.options.retrieveCount,
      logger: this.logger,
    });

    const context = buildContext(
      ranked.map((r) => r.passage),
      topK,
      this.options.noResultsSentinel,
    );
    this.logger.info(
      { topK, segments: Math.min(topK, ranked.length) },
      "Context assembled",
    );
    return context;
  }

  async reset(): Promise<void> {
    await this.store.reset();
  }
}
