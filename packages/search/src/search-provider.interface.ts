import type { SearchResult } from "@recall-rerank/types";

export interface ISearchProvider {
  readonly name: string;
  search(query: string): Promise<SearchResult[]>;
}
