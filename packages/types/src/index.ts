export type {
  Passage,
  PassageInput,
  IngestDocument,
  RetrievalCandidate,
  RerankedCandidate,
  CollectionState,
} from "./passage.js";
export { DEFAULT_PASSAGE_SOURCE } from "./passage.js";

export type { EmbeddingPurpose, EmbeddingResult, VectorRecord, RerankResult } from "./pipeline.js";

export type { SearchResult, SearchDepth } from "./search.js";

export type {
  AppConfig,
  RagConfig,
  VectorStoreSettings,
  EmbeddingSettings,
  RerankerSettings,
  CohereConfig,
  SearchConfig,
  VectorStoreType,
  EmbeddingProviderType,
  RerankerType,
} from "./config.js";
