import { describe, it, expect } from "vitest";
import { parseEnv, DEFAULT_NO_RESULTS_SENTINEL } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    RAG_COLLECTION_NAME: "market_notes",
    RAG_RETRIEVE_COUNT: "12",
    RAG_RERANK_TOP_K: "4",
    VECTOR_STORE: "qdrant",
    QDRANT_URL: "http://localhost:6333",
    EMBEDDING_PROVIDER: "cohere",
    EMBEDDING_DIMENSIONS: "1024",
    RERANK_PROVIDER: "cohere",
    COHERE_API_KEY: "test-cohere-key",
    COHERE_EMBED_MODEL: "embed-v4.0",
    COHERE_RERANK_MODEL: "rerank-v3.5",
    TAVILY_API_KEY: "test-tavily-key",
    TAVILY_SEARCH_DEPTH: "basic",
    TAVILY_MAX_RESULTS: "8",
    SEARCH_MAX_RETRIES: "2",
    ...overrides,
  };
}

function without(env: Record<string, string>, ...keys: string[]): Record<string, string> {
  const copy = { ...env };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.logLevel).toBe("info");
    expect(config.rag).toEqual({
      collectionName: "market_notes",
      retrieveCount: 12,
      rerankTopK: 4,
      noResultsSentinel: DEFAULT_NO_RESULTS_SENTINEL,
    });
    expect(config.vectorStore).toEqual({
      type: "qdrant",
      qdrantUrl: "http://localhost:6333",
      qdrantApiKey: undefined,
    });
    expect(config.embedding).toEqual({ provider: "cohere", dimensions: 1024, bgeM3Url: undefined });
    expect(config.reranker).toEqual({ provider: "cohere", bgeUrl: undefined });
    expect(config.cohere).toEqual({
      apiKey: "test-cohere-key",
      embedModel: "embed-v4.0",
      rerankModel: "rerank-v3.5",
    });
    expect(config.search).toEqual({
      tavilyApiKey: "test-tavily-key",
      searchDepth: "basic",
      maxResults: 8,
      maxRetries: 2,
    });
  });

  it("uses defaults for retrieval settings", () => {
    const env = without(
      makeValidEnv(),
      "NODE_ENV",
      "LOG_LEVEL",
      "RAG_COLLECTION_NAME",
      "RAG_RETRIEVE_COUNT",
      "RAG_RERANK_TOP_K",
      "TAVILY_SEARCH_DEPTH",
      "TAVILY_MAX_RESULTS",
      "SEARCH_MAX_RETRIES",
    );

    const config = parseEnv(env);

    expect(config.nodeEnv).toBe("development");
    expect(config.logLevel).toBe("info");
    expect(config.rag.collectionName).toBe("industry_reports");
    expect(config.rag.retrieveCount).toBe(10);
    expect(config.rag.rerankTopK).toBe(3);
    expect(config.search.searchDepth).toBe("advanced");
    expect(config.search.maxResults).toBe(5);
    expect(config.search.maxRetries).toBe(3);
  });

  it("treats blank optional values as unset", () => {
    const config = parseEnv(makeValidEnv({ QDRANT_API_KEY: "", TAVILY_API_KEY: "  " }));

    expect(config.vectorStore.qdrantApiKey).toBeUndefined();
    expect(config.search.tavilyApiKey).toBeUndefined();
  });

  it("accepts a custom no-results sentinel", () => {
    const config = parseEnv(makeValidEnv({ RAG_NO_RESULTS_SENTINEL: "nothing found" }));

    expect(config.rag.noResultsSentinel).toBe("nothing found");
  });

  it("rejects a rerank width larger than the recall width", () => {
    expect(() =>
      parseEnv(makeValidEnv({ RAG_RETRIEVE_COUNT: "5", RAG_RERANK_TOP_K: "6" })),
    ).toThrow(/RAG_RERANK_TOP_K must not exceed RAG_RETRIEVE_COUNT/);
  });

  it("rejects non-numeric or zero widths", () => {
    expect(() => parseEnv(makeValidEnv({ RAG_RETRIEVE_COUNT: "ten" }))).toThrow();
    expect(() => parseEnv(makeValidEnv({ RAG_RERANK_TOP_K: "0" }))).toThrow();
  });

  it("rejects collection names with unsupported characters", () => {
    expect(() => parseEnv(makeValidEnv({ RAG_COLLECTION_NAME: "my reports" }))).toThrow(
      /RAG_COLLECTION_NAME/,
    );
  });

  it("requires COHERE_API_KEY while a Cohere provider is selected", () => {
    expect(() => parseEnv(without(makeValidEnv(), "COHERE_API_KEY"))).toThrow(
      /COHERE_API_KEY is required/,
    );
  });

  it("does not require COHERE_API_KEY for self-hosted providers", () => {
    const env = without(makeValidEnv(), "COHERE_API_KEY");
    const config = parseEnv({
      ...env,
      EMBEDDING_PROVIDER: "bge-m3",
      BGE_M3_URL: "http://localhost:8080",
      RERANK_PROVIDER: "bge",
      BGE_RERANKER_URL: "http://localhost:8081",
    });

    expect(config.cohere.apiKey).toBe("");
    expect(config.embedding.bgeM3Url).toBe("http://localhost:8080");
    expect(config.reranker.bgeUrl).toBe("http://localhost:8081");
  });

  it("requires BGE_M3_URL for the bge-m3 embedding provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3" }))).toThrow(
      /BGE_M3_URL is required/,
    );
  });

  it("requires BGE_RERANKER_URL for the bge reranker", () => {
    expect(() => parseEnv(makeValidEnv({ RERANK_PROVIDER: "bge" }))).toThrow(
      /BGE_RERANKER_URL is required/,
    );
  });

  it("rejects unknown vector store types", () => {
    expect(() => parseEnv(makeValidEnv({ VECTOR_STORE: "pgvector" }))).toThrow();
  });
});
