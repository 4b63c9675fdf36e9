import type { RerankResult } from "@recall-rerank/types";

export interface IReranker {
  readonly name: string;

  /**
   * Score every passage against the query. Results are sorted by descending
   * score; equal scores keep their input order. An empty passage list yields
   * an empty result without contacting the backend.
   */
  rerank(query: string, passages: string[]): Promise<RerankResult[]>;
  healthCheck(): Promise<boolean>;
}
