export interface SearchResult {
  title?: string;
  content: string;
  url: string;
  score?: number;
}

export type SearchDepth = "basic" | "advanced";
