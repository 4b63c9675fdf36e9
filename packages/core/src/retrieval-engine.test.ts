import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryVectorStore } from "@recall-rerank/vector-store";
import { InitializationError, RetrievalError, ValidationError } from "@recall-rerank/errors";
import { RetrievalEngine, type RetrievalEngineOptions } from "./retrieval-engine.js";
import { PassageStore } from "./passage-store.js";
import { CONTEXT_DELIMITER } from "./context-assembler.js";
import { KeywordEmbeddingProvider, KeywordOverlapReranker, silentLogger } from "./test-helpers.js";

const SENTINEL = "no relevant background material found";

const OPTIONS: RetrievalEngineOptions = {
  collectionName: "industry_reports",
  retrieveCount: 10,
  rerankTopK: 3,
  noResultsSentinel: SENTINEL,
};

const ROBOTICS =
  "Robotics adoption in logistics keeps rising, and the latest trends point to collaborative robots on warehouse floors.";
const FRIED_RICE = "Fried rice tastes best with day-old rice and a very hot wok.";

function segments(context: string): string[] {
  return context.split(CONTEXT_DELIMITER);
}

describe("RetrievalEngine", () => {
  let vectorStore: InMemoryVectorStore;
  let reranker: KeywordOverlapReranker;
  let engine: RetrievalEngine;

  beforeEach(async () => {
    vectorStore = new InMemoryVectorStore();
    reranker = new KeywordOverlapReranker();
    engine = await RetrievalEngine.create(
      {
        embeddingProvider: new KeywordEmbeddingProvider(),
        vectorStore,
        reranker,
        logger: silentLogger,
      },
      OPTIONS,
    );
  });

  describe("create", () => {
    it("raises InitializationError when the collection cannot be bound", async () => {
      const failing = new InMemoryVectorStore();
      vi.spyOn(failing, "ensureCollection").mockRejectedValueOnce(new Error("unreachable"));

      await expect(
        RetrievalEngine.create(
          {
            embeddingProvider: new KeywordEmbeddingProvider(),
            vectorStore: failing,
            reranker,
            logger: silentLogger,
          },
          OPTIONS,
        ),
      ).rejects.toBeInstanceOf(InitializationError);
    });

    it("rejects a recall width below one", async () => {
      await expect(
        RetrievalEngine.create(
          { embeddingProvider: new KeywordEmbeddingProvider(), vectorStore, reranker, logger: silentLogger },
          { ...OPTIONS, retrieveCount: 0 },
        ),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("ingest", () => {
    it("is idempotent for repeated documents", async () => {
      const docs = [
        { content: ROBOTICS, url: "https://example.com/robotics" },
        { content: FRIED_RICE, url: "https://example.com/rice" },
      ];

      expect(await engine.ingest(docs)).toBe(2);
      expect(await engine.ingest(docs)).toBe(2);
      expect(await vectorStore.count(OPTIONS.collectionName)).toBe(2);
    });

    it("skips empty content and reports zero", async () => {
      expect(await engine.ingest([{ content: "" }, { content: "  " }])).toBe(0);
      expect(await vectorStore.count(OPTIONS.collectionName)).toBe(0);
    });

    it("uses the url as source and falls back to local", async () => {
      await engine.ingest([{ content: ROBOTICS, url: "https://example.com/robotics" }, { content: FRIED_RICE }]);

      const store = await PassageStore.open({
        embeddingProvider: new KeywordEmbeddingProvider(),
        vectorStore,
        collectionName: OPTIONS.collectionName,
        logger: silentLogger,
      });
      const hits = await store.query("fried rice wok", 2);
      const sources = Object.fromEntries(hits.map((h) => [h.passage.text, h.passage.source]));
      expect(sources).toEqual({
        [ROBOTICS]: "https://example.com/robotics",
        [FRIED_RICE]: "local",
      });
    });
  });

  describe("retrieveContext", () => {
    it("returns the sentinel for an empty collection", async () => {
      expect(await engine.retrieveContext("anything")).toBe(SENTINEL);
    });

    it("returns the sentinel after ingesting nothing", async () => {
      expect(await engine.ingest([])).toBe(0);
      expect(await engine.retrieveContext("anything", 3)).toBe(SENTINEL);
    });

    it("selects the on-topic passage over an unrelated one", async () => {
      await engine.ingest([{ content: ROBOTICS }, { content: FRIED_RICE }]);

      expect(await engine.retrieveContext("latest trends in robotics", 1)).toBe(ROBOTICS);
    });

    it("returns only the market report for a market size question", async () => {
      await engine.ingest([
        { content: "Robotics market grows 20% in 2024." },
        { content: "A recipe for fried rice." },
      ]);

      expect(await engine.retrieveContext("robotics market size", 1)).toBe(
        "Robotics market grows 20% in 2024.",
      );
    });

    it("orders segments by relevance", async () => {
      await engine.ingest([{ content: FRIED_RICE }, { content: ROBOTICS }]);

      expect(await engine.retrieveContext("latest trends in robotics", 2)).toBe(
        `${ROBOTICS}${CONTEXT_DELIMITER}${FRIED_RICE}`,
      );
    });

    it("never returns more segments than topK", async () => {
      await engine.ingest([
        { content: "battery chemistry report" },
        { content: "battery recycling report" },
        { content: "battery supply report" },
      ]);

      for (const topK of [1, 2, 3, 4, 5]) {
        const context = await engine.retrieveContext("battery report", topK);
        expect(segments(context)).toHaveLength(Math.min(topK, 3));
      }
    });

    it("returns the sentinel when topK is zero", async () => {
      await engine.ingest([{ content: ROBOTICS }]);

      expect(await engine.retrieveContext("robotics", 0)).toBe(SENTINEL);
    });

    it("recalls retrieveCount passages and keeps rerankTopK of them", async () => {
      await engine.ingest(
        Array.from({ length: 15 }, (_, i) => ({
          content: `Robotics market report ${String(i + 1)} covering automation in plant ${String(i + 1)}.`,
        })),
      );
      const search = vi.spyOn(vectorStore, "search");

      const context = await engine.retrieveContext("robotics automation");

      expect(segments(context)).toHaveLength(3);
      expect(search).toHaveBeenCalledTimes(1);
      expect(search.mock.calls[0]?.[1].topK).toBe(10);
      expect(reranker.calls[0]?.passages).toHaveLength(10);
    });

    it.each([-1, 1.5, Number.NaN])("rejects topK %s", async (topK) => {
      await expect(engine.retrieveContext("robotics", topK)).rejects.toBeInstanceOf(ValidationError);
    });

    it("surfaces reranker failures instead of an empty context", async () => {
      await engine.ingest([{ content: ROBOTICS }]);
      vi.spyOn(reranker, "rerank").mockRejectedValueOnce(new Error("timeout"));

      const retrieving = engine.retrieveContext("robotics");

      await expect(retrieving).rejects.toBeInstanceOf(RetrievalError);
      await expect(retrieving).rejects.toMatchObject({ stage: "rerank" });
    });
  });

  describe("reset", () => {
    it("empties the collection and keeps serving", async () => {
      await engine.ingest([{ content: ROBOTICS }, { content: FRIED_RICE }]);

      await engine.reset();

      expect(await vectorStore.count(OPTIONS.collectionName)).toBe(0);
      expect(await engine.retrieveContext("robotics")).toBe(SENTINEL);

      expect(await engine.ingest([{ content: ROBOTICS }])).toBe(1);
      expect(await engine.retrieveContext("robotics", 1)).toBe(ROBOTICS);
    });
  });
});
