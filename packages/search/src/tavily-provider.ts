import { z } from "zod";
import type { SearchDepth, SearchResult } from "@recall-rerank/types";
import { AppError, ExternalServiceError, ValidationError, withRetry } from "@recall-rerank/errors";
import { createChildLogger, createLogger, type Logger } from "@recall-rerank/logger";
import type { ISearchProvider } from "./search-provider.interface.js";

const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

export interface TavilyProviderConfig {
  apiKey: string;
  searchDepth?: SearchDepth;
  maxResults?: number;
  /** Retries after the first attempt for 429, 5xx and network failures. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  endpoint?: string;
  logger?: Logger;
}

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().optional(),
        url: z.string(),
        content: z.string(),
        score: z.number().optional(),
      }),
    )
    .default([]),
});

export class TavilySearchProvider implements ISearchProvider {
  readonly name = "tavily";
  private apiKey: string;
  private searchDepth: SearchDepth;
  private maxResults: number;
  private maxRetries: number;
  private retryBaseDelayMs: number;
  private endpoint: string;
  private logger: Logger;

  constructor(config: TavilyProviderConfig) {
    this.apiKey = config.apiKey;
    this.searchDepth = config.searchDepth ?? "advanced";
    this.maxResults = config.maxResults ?? 5;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1_000;
    this.endpoint = config.endpoint ?? TAVILY_SEARCH_URL;
    this.logger = createChildLogger(config.logger ?? createLogger({ service: "search" }), {
      component: "tavily",
    });
  }

  async search(query: string): Promise<SearchResult[]> {
    if (query.trim() === "") {
      throw new ValidationError("Search query must not be empty", { query: "empty" });
    }

    this.logger.info({ query: query.slice(0, 50) }, "Running web search");

    const results = await withRetry(() => this.request(query), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.retryBaseDelayMs,
      onRetry: (attempt, delayMs, error) => {
        this.logger.warn({ attempt, delayMs, err: error }, "Search attempt failed, retrying");
      },
    });

    this.logger.info({ results: results.length }, "Web search complete");
    return results;
  }

  private async request(query: string): Promise<SearchResult[]> {
    const response = await fetch(this.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        query,
        search_depth: this.searchDepth,
        max_results: this.maxResults,
      }),
    });

    if (!response.ok) {
      const message = `Tavily search failed: ${String(response.status)} ${response.statusText}`;
      // Rate limits are worth another attempt; other client errors are not
      if (response.status >= 400 && response.status < 500 && response.status !== 429) {
        throw new AppError({ message, statusCode: response.status, code: "SEARCH_REJECTED" });
      }
      throw new ExternalServiceError(message, this.name, {
        details: { status: response.status },
      });
    }

    const parsed = tavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("Tavily returned a malformed search response", this.name, {
        cause: parsed.error,
      });
    }

    return parsed.data.results.map((r) => ({
      title: r.title,
      content: r.content,
      url: r.url,
      score: r.score,
    }));
  }
}
