import type { IngestDocument } from "@recall-rerank/types";
import type { ISearchProvider } from "@recall-rerank/search";
import type { RetrievalEngineContract } from "@recall-rerank/core";
import { createChildLogger, getDefaultLogger, type Logger } from "@recall-rerank/logger";

export interface ResearchDependencies {
  searchProvider: ISearchProvider;
  engine: RetrievalEngineContract;
  /** Segments in the returned context; the engine's rerankTopK when omitted. */
  topK?: number;
  logger?: Logger;
}

export interface ResearchResult {
  context: string;
  searched: number;
  inserted: number;
}

/**
 * Search the web for `query`, store the hits as passages and return the
 * background block assembled from the best of them.
 */
export async function runResearch(
  query: string,
  deps: ResearchDependencies,
): Promise<ResearchResult> {
  const logger = createChildLogger(deps.logger ?? getDefaultLogger(), { component: "researcher" });

  const results = await deps.searchProvider.search(query);
  const documents: IngestDocument[] = results.map((r) => ({ content: r.content, url: r.url }));
  logger.info({ provider: deps.searchProvider.name, results: results.length }, "Search complete");

  const inserted = await deps.engine.ingest(documents);
  const context = await deps.engine.retrieveContext(query, deps.topK);

  return { context, searched: results.length, inserted };
}
