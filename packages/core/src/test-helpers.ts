import type { EmbeddingPurpose, EmbeddingResult, RerankResult } from "@recall-rerank/types";
import type { IEmbeddingProvider } from "@recall-rerank/embeddings";
import { rankByScore, type IReranker } from "@recall-rerank/reranker";
import { createLogger } from "@recall-rerank/logger";

export const silentLogger = createLogger({ level: "silent" });

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token !== "");
}

function bucket(token: string, dimensions: number): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash % dimensions;
}

/** Hashed bag-of-words vectors. Same text, same vector. */
export class KeywordEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "keyword";
  readonly dimensions: number;
  readonly calls: { texts: string[]; purpose: EmbeddingPurpose }[] = [];

  constructor(dimensions = 64) {
    this.dimensions = dimensions;
  }

  async embed(text: string, purpose: EmbeddingPurpose = "query"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], purpose);
  }

  async batchEmbed(
    texts: string[],
    purpose: EmbeddingPurpose = "document",
  ): Promise<EmbeddingResult> {
    this.calls.push({ texts: [...texts], purpose });
    const embeddings = texts.map((text) => {
      const vector = new Array<number>(this.dimensions).fill(0);
      for (const token of tokenize(text)) {
        const i = bucket(token, this.dimensions);
        vector[i] = (vector[i] ?? 0) + 1;
      }
      return vector;
    });
    return { embeddings, model: "keyword", tokensUsed: 0, dimensions: this.dimensions };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/** Scores a passage by how many distinct query tokens it contains. */
export class KeywordOverlapReranker implements IReranker {
  readonly name = "keyword-overlap";
  readonly calls: { query: string; passages: string[] }[] = [];

  async rerank(query: string, passages: string[]): Promise<RerankResult[]> {
    this.calls.push({ query, passages: [...passages] });
    if (passages.length === 0) return [];

    const queryTokens = new Set(tokenize(query));
    const scores = passages.map((passage) => {
      const passageTokens = new Set(tokenize(passage));
      let overlap = 0;
      for (const token of queryTokens) {
        if (passageTokens.has(token)) overlap++;
      }
      return overlap;
    });
    return rankByScore(passages, scores);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
