import type { RerankResult, RerankedCandidate } from "@recall-rerank/types";
import type { IReranker } from "@recall-rerank/reranker";
import { RetrievalError, describeError } from "@recall-rerank/errors";
import { createChildLogger, type Logger } from "@recall-rerank/logger";
import type { PassageStore } from "./passage-store.js";

export interface RetrievalDependencies {
  store: PassageStore;
  reranker: IReranker;
  /** Recall width handed to the passage store. */
  retrieveCount: number;
  logger: Logger;
}

/**
 * Retrieval pipeline: Query -> Recall (vector similarity) -> Rerank
 *
 * Returns every recalled passage with its relevance score, best first.
 */
export async function retrieve(
  query: string,
  deps: RetrievalDependencies,
): Promise<RerankedCandidate[]> {
  const logger = createChildLogger(deps.logger, {
    component: "retrieval-pipeline",
  });

  const candidates = await deps.store.query(query, deps.retrieveCount);
  if (candidates.length === 0) {
    logger.warn({ retrieveCount: deps.retrieveCount }, "Recall returned no passages");
    return [];
  }

  const startTime = Date.now();
  let reranked: RerankResult[];
  try {
    reranked = await deps.reranker.rerank(
      query,
      candidates.map((c) => c.passage.text),
    );
  } catch (error: unknown) {
    logger.error({ err: error, reranker: deps.reranker.name }, "Rerank failed");
    throw new RetrievalError(`Rerank failed: ${describeError(error)}`, "rerank", {
      cause: error,
    });
  }

  const ranked: RerankedCandidate[] = [];
  for (const result of reranked) {
    const candidate = candidates[result.index];
    if (!candidate) {
      throw new RetrievalError(
        `Reranker returned unknown passage index ${String(result.index)}`,
        "rerank",
      );
    }
    ranked.push({
      passage: candidate.passage,
      relevanceScore: result.score,
      similarityRank: candidate.similarityRank,
    });
  }

  logger.info(
    {
      recalled: candidates.length,
      reranked: ranked.length,
      reranker: deps.reranker.name,
      durationMs: Date.now() - startTime,
    },
    "Rerank complete",
  );
  return ranked;
}
