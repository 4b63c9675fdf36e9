import { describe, it, expect } from "vitest";
import { buildContext, CONTEXT_DELIMITER } from "./context-assembler.js";

const SENTINEL = "nothing found";
const RANKED = [{ text: "first" }, { text: "second" }, { text: "third" }];

describe("buildContext", () => {
  it("joins the first topK texts with the delimiter", () => {
    expect(buildContext(RANKED, 2, SENTINEL)).toBe("first\n\n---\n\nsecond");
  });

  it("uses every text when topK exceeds the ranking", () => {
    expect(buildContext(RANKED, 10, SENTINEL)).toBe(
      ["first", "second", "third"].join(CONTEXT_DELIMITER),
    );
  });

  it("returns a single text without a delimiter", () => {
    expect(buildContext(RANKED, 1, SENTINEL)).toBe("first");
  });

  it("returns the sentinel for an empty ranking", () => {
    expect(buildContext([], 3, SENTINEL)).toBe(SENTINEL);
  });

  it("returns the sentinel when topK is zero", () => {
    expect(buildContext(RANKED, 0, SENTINEL)).toBe(SENTINEL);
  });

  it("leaves out everything but the text", () => {
    const ranked = [{ text: "alpha", source: "https://example.com/a", score: 0.9 }];
    expect(buildContext(ranked, 1, SENTINEL)).toBe("alpha");
  });
});
