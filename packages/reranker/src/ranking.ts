import type { RerankResult } from "@recall-rerank/types";
import { ExternalServiceError } from "@recall-rerank/errors";

export interface IndexedScore {
  index: number;
  score: number;
}

/**
 * Turn a backend's `(index, score)` pairs into one score per passage.
 * Every passage must be scored exactly once with a finite number.
 */
export function collectScores(
  scored: readonly IndexedScore[],
  passageCount: number,
  service: string,
): number[] {
  const scores = new Array<number | undefined>(passageCount).fill(undefined);

  for (const { index, score } of scored) {
    if (!Number.isInteger(index) || index < 0 || index >= passageCount) {
      throw new ExternalServiceError(
        `${service} returned a score for unknown passage index ${String(index)}`,
        service,
      );
    }
    if (!Number.isFinite(score)) {
      throw new ExternalServiceError(
        `${service} returned a non-finite score for passage ${String(index)}`,
        service,
      );
    }
    if (scores[index] !== undefined) {
      throw new ExternalServiceError(
        `${service} scored passage ${String(index)} more than once`,
        service,
      );
    }
    scores[index] = score;
  }

  return scores.map((score, index) => {
    if (score === undefined) {
      throw new ExternalServiceError(
        `${service} returned no score for passage ${String(index)}`,
        service,
        { details: { scored: scored.length, passages: passageCount } },
      );
    }
    return score;
  });
}

/**
 * Sort passages by descending score. Ties keep input order.
 */
export function rankByScore(passages: readonly string[], scores: readonly number[]): RerankResult[] {
  if (passages.length !== scores.length) {
    throw new Error(
      `Expected ${String(passages.length)} scores, received ${String(scores.length)}`,
    );
  }

  return passages
    .map((text, index) => ({ index, text, score: scores[index] ?? 0 }))
    .sort((a, b) => b.score - a.score || a.index - b.index);
}
