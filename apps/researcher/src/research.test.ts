import { describe, it, expect, vi } from "vitest";
import type { SearchResult } from "@recall-rerank/types";
import type { ISearchProvider } from "@recall-rerank/search";
import type { RetrievalEngineContract } from "@recall-rerank/core";
import { ExternalServiceError } from "@recall-rerank/errors";
import { createLogger } from "@recall-rerank/logger";
import { runResearch } from "./research.js";

const logger = createLogger({ level: "silent" });

function searchProvider(results: SearchResult[]): ISearchProvider {
  return { name: "fake", search: vi.fn().mockResolvedValue(results) };
}

function engine(context = "ctx"): RetrievalEngineContract {
  return {
    ingest: vi.fn((docs: readonly unknown[]) => Promise.resolve(docs.length)),
    retrieveContext: vi.fn().mockResolvedValue(context),
    reset: vi.fn().mockResolvedValue(undefined),
  };
}

describe("runResearch", () => {
  it("ingests search hits with their urls and returns the assembled context", async () => {
    const provider = searchProvider([
      { title: "Robots", content: "Warehouse robots", url: "https://example.com/robots", score: 0.9 },
      { content: "Cobots on the line", url: "https://example.com/cobots" },
    ]);
    const fakeEngine = engine("Warehouse robots");

    const result = await runResearch("robotics trends", {
      searchProvider: provider,
      engine: fakeEngine,
      topK: 2,
      logger,
    });

    expect(result).toEqual({ context: "Warehouse robots", searched: 2, inserted: 2 });
    expect(provider.search).toHaveBeenCalledWith("robotics trends");
    expect(fakeEngine.ingest).toHaveBeenCalledWith([
      { content: "Warehouse robots", url: "https://example.com/robots" },
      { content: "Cobots on the line", url: "https://example.com/cobots" },
    ]);
    expect(fakeEngine.retrieveContext).toHaveBeenCalledWith("robotics trends", 2);
  });

  it("leaves topK to the engine when omitted", async () => {
    const fakeEngine = engine();

    await runResearch("robotics", { searchProvider: searchProvider([]), engine: fakeEngine, logger });

    expect(fakeEngine.retrieveContext).toHaveBeenCalledWith("robotics", undefined);
  });

  it("still retrieves when the search finds nothing", async () => {
    const fakeEngine = engine("no relevant background material found");

    const result = await runResearch("robotics", {
      searchProvider: searchProvider([]),
      engine: fakeEngine,
      logger,
    });

    expect(result).toEqual({
      context: "no relevant background material found",
      searched: 0,
      inserted: 0,
    });
  });

  it("propagates search failures without touching the engine", async () => {
    const fakeEngine = engine();
    const provider: ISearchProvider = {
      name: "fake",
      search: vi.fn().mockRejectedValue(new ExternalServiceError("Tavily returned 503", "tavily")),
    };

    await expect(
      runResearch("robotics", { searchProvider: provider, engine: fakeEngine, logger }),
    ).rejects.toBeInstanceOf(ExternalServiceError);
    expect(fakeEngine.ingest).not.toHaveBeenCalled();
  });
});
