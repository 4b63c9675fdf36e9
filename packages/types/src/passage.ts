export interface Passage {
  /** Fingerprint of `text`; identical text always maps to the same id. */
  id: string;
  text: string;
  source: string;
}

export interface PassageInput {
  text: string;
  source: string;
}

/** A search hit as handed to ingestion; `url` becomes the passage source. */
export interface IngestDocument {
  content: string;
  url?: string;
}

export const DEFAULT_PASSAGE_SOURCE = "local";

export interface RetrievalCandidate {
  passage: Passage;
  /** 1-based position in the recall result. */
  similarityRank: number;
  similarity: number;
}

export interface RerankedCandidate {
  passage: Passage;
  relevanceScore: number;
  similarityRank: number;
}

export type CollectionState = "uninitialized" | "ready" | "resetting" | "inconsistent";
