import { CohereClient } from "cohere-ai";
import type { RerankResult } from "@recall-rerank/types";
import type { IReranker } from "./reranker.interface.js";
import { collectScores, rankByScore } from "./ranking.js";

const DEFAULT_MODEL = "rerank-v3.5";

export interface CohereRerankerConfig {
  apiKey: string;
  model?: string;
}

export class CohereReranker implements IReranker {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;

  constructor(config: CohereRerankerConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async rerank(query: string, passages: string[]): Promise<RerankResult[]> {
    if (passages.length === 0) {
      return [];
    }

    const response = await this.client.v2.rerank({
      model: this.model,
      query,
      documents: passages,
      topN: passages.length,
    });

    const scores = collectScores(
      response.results.map((r) => ({ index: r.index, score: r.relevanceScore })),
      passages.length,
      this.name,
    );

    return rankByScore(passages, scores);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.rerank("health check", ["health check"]);
      return true;
    } catch {
      return false;
    }
  }
}
