import { z } from "zod";
import type { AppConfig } from "@recall-rerank/types";

export const DEFAULT_NO_RESULTS_SENTINEL = "no relevant background material found";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/** Unset and blank (`KEY=` in a .env file) both mean "not configured". */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value));

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Retrieval ----------
    RAG_COLLECTION_NAME: z
      .string()
      .default("industry_reports")
      .pipe(
        z.string().regex(/^[A-Za-z0-9_-]+$/, {
          message: "RAG_COLLECTION_NAME may only contain letters, digits, '_' and '-'",
        }),
      ),
    RAG_RETRIEVE_COUNT: positiveInt("10"),
    RAG_RERANK_TOP_K: positiveInt("3"),
    RAG_NO_RESULTS_SENTINEL: z.string().min(1).default(DEFAULT_NO_RESULTS_SENTINEL),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url().default("http://localhost:6333"),
    QDRANT_API_KEY: optionalString,

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    BGE_M3_URL: optionalString,

    // ---------- Reranker ----------
    RERANK_PROVIDER: z.enum(["cohere", "bge"]).default("cohere"),
    BGE_RERANKER_URL: optionalString,

    // ---------- Cohere ----------
    COHERE_API_KEY: optionalString,
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    COHERE_RERANK_MODEL: z.string().default("rerank-v3.5"),

    // ---------- Search ----------
    TAVILY_API_KEY: optionalString,
    TAVILY_SEARCH_DEPTH: z.enum(["basic", "advanced"]).default("advanced"),
    TAVILY_MAX_RESULTS: positiveInt("5"),
    SEARCH_MAX_RETRIES: z
      .string()
      .default("3")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),
  })
  .superRefine((env, ctx) => {
    if (env.RAG_RERANK_TOP_K > env.RAG_RETRIEVE_COUNT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RAG_RERANK_TOP_K"],
        message: "RAG_RERANK_TOP_K must not exceed RAG_RETRIEVE_COUNT",
      });
    }

    const usesCohere = env.EMBEDDING_PROVIDER === "cohere" || env.RERANK_PROVIDER === "cohere";
    if (usesCohere && env.COHERE_API_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when a Cohere provider is selected",
      });
    }

    if (env.EMBEDDING_PROVIDER === "bge-m3" && env.BGE_M3_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }

    if (env.RERANK_PROVIDER === "bge" && env.BGE_RERANKER_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_RERANKER_URL"],
        message: "BGE_RERANKER_URL is required when RERANK_PROVIDER is bge",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    rag: {
      collectionName: parsed.RAG_COLLECTION_NAME,
      retrieveCount: parsed.RAG_RETRIEVE_COUNT,
      rerankTopK: parsed.RAG_RERANK_TOP_K,
      noResultsSentinel: parsed.RAG_NO_RESULTS_SENTINEL,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      bgeM3Url: parsed.BGE_M3_URL,
    },

    reranker: {
      provider: parsed.RERANK_PROVIDER,
      bgeUrl: parsed.BGE_RERANKER_URL,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      embedModel: parsed.COHERE_EMBED_MODEL,
      rerankModel: parsed.COHERE_RERANK_MODEL,
    },

    search: {
      tavilyApiKey: parsed.TAVILY_API_KEY,
      searchDepth: parsed.TAVILY_SEARCH_DEPTH,
      maxResults: parsed.TAVILY_MAX_RESULTS,
      maxRetries: parsed.SEARCH_MAX_RETRIES,
    },
  };
}
