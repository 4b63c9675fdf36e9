import { z } from "zod";
import type { RerankResult } from "@recall-rerank/types";
import { ExternalServiceError } from "@recall-rerank/errors";
import type { IReranker } from "./reranker.interface.js";
import { collectScores, rankByScore } from "./ranking.js";

export interface BgeRerankerConfig {
  baseUrl: string;
}

const rerankResponseSchema = z.array(
  z.object({
    index: z.number().int(),
    score: z.number(),
  }),
);

/**
 * Self-hosted BGE cross-encoder behind a text-embeddings-inference style
 * `/rerank` endpoint.
 */
export class BgeReranker implements IReranker {
  readonly name = "bge";
  private baseUrl: string;

  constructor(config: BgeRerankerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
  }

  async rerank(query: string, passages: string[]): Promise<RerankResult[]> {
    if (passages.length === 0) {
      return [];
    }

    const response = await fetch(`${this.baseUrl}/rerank`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query, texts: passages, raw_scores: false }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `BGE rerank failed: ${String(response.status)} ${response.statusText}`,
        this.name,
      );
    }

    const parsed = rerankResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("BGE returned a malformed rerank response", this.name, {
        cause: parsed.error,
      });
    }

    return rankByScore(passages, collectScores(parsed.data, passages.length, this.name));
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
