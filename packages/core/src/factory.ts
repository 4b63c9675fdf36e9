import type { AppConfig } from "@recall-rerank/types";
import { createEmbeddingProvider } from "@recall-rerank/embeddings";
import { createVectorStore } from "@recall-rerank/vector-store";
import { createReranker } from "@recall-rerank/reranker";
import { InitializationError, describeError } from "@recall-rerank/errors";
import { createLogger, type Logger } from "@recall-rerank/logger";
import { RetrievalEngine, type RetrievalEngineDependencies } from "./retrieval-engine.js";

/**
 * Build the backends named in `config` and open the engine over them.
 */
export async function createRetrievalEngine(
  config: AppConfig,
  logger: Logger = createLogger({ level: config.logLevel }),
): Promise<RetrievalEngine> {
  let deps: RetrievalEngineDependencies;
  try {
    deps = {
      embeddingProvider: createEmbeddingProvider({
        ...config.embedding,
        cohere: { apiKey: config.cohere.apiKey, model: config.cohere.embedModel },
      }),
      vectorStore: createVectorStore(config.vectorStore),
      reranker: createReranker({
        provider: config.reranker.provider,
        cohere: { apiKey: config.cohere.apiKey, model: config.cohere.rerankModel },
        bge: config.reranker.bgeUrl ? { baseUrl: config.reranker.bgeUrl } : undefined,
      }),
      logger,
    };
  } catch (error: unknown) {
    throw new InitializationError(`Failed to build backends: ${describeError(error)}`, {
      cause: error,
    });
  }

  return RetrievalEngine.create(deps, config.rag);
}
