import { describe, expect, it } from "vitest";
import { type SelectionInput, isDetailedQuery, selectTools } from "./selection";
import { CAPABILITY_ORDER } from "./tools/types";
import type { CapabilityTag } from "./types";

const everything = new Set(CAPABILITY_ORDER);

function select(query: string, extra: Partial<SelectionInput> = {}) {
  return selectTools({ query, indexedDocuments: 0, available: everything, ...extra });
}

describe("isDetailedQuery", () => {
  it("treats long or explanatory questions as detailed", () => {
    expect(isDetailedQuery("Capital of France?")).toBe(false);
    expect(isDetailedQuery("Explain the French Revolution")).toBe(true);
    expect(isDetailedQuery("one two three four five six seven eight nine ten eleven twelve thirteen")).toBe(true);
  });
});

describe("selectTools", () => {
  it("falls back to encyclopedia and web for a general question", () => {
    expect(select("What is the capital of France?")).toEqual(["fast-factual", "web"]);
    expect(select("Explain how photosynthesis works")).toEqual(["deep-contextual", "web"]);
  });

  it("uses the document index when documents are indexed", () => {
    expect(select("What does the contract say about termination?", { indexedDocuments: 2 })).toEqual([
      "document-index",
    ]);
  });

  it("skips the document index for an empty scope", () => {
    expect(select("What is the capital of France?", { indexedDocuments: 2, scope: [] })).toEqual([
      "fast-factual",
      "web",
    ]);
  });

  it("routes paper questions to the academic tool", () => {
    expect(select("Summarize 2301.01234v2")).toEqual(["academic"]);
    expect(select("Recent papers on diffusion models")).toEqual(["academic", "web"]);
  });

  it("adds web search for recent years", () => {
    expect(select("preprint results from 2024", { indexedDocuments: 1 })).toEqual([
      "document-index",
      "academic",
      "web",
    ]);
  });

  it("adds the encyclopedia when it is named", () => {
    expect(select("Wikipedia article on Rome", { indexedDocuments: 1 })).toEqual(["document-index", "fast-factual"]);
  });

  it("matches corpus keywords as whole words", () => {
    const corpusKeywords = ["widget"];
    expect(select("How do I configure a Widget?", { corpusKeywords })).toEqual(["fixed-corpus"]);
    expect(select("Where are widgets made", { corpusKeywords })).toEqual(["fast-factual", "web"]);
  });

  it("follows explicit intent in table order", () => {
    expect(select("anything", { intent: ["web", "academic"], indexedDocuments: 3 })).toEqual(["academic", "web"]);
  });

  it("drops tags without a registered tool", () => {
    expect(select("What is the capital of France?", { available: new Set<CapabilityTag>(["fast-factual"]) })).toEqual([
      "fast-factual",
    ]);
  });

  it("returns the same tags for the same input", () => {
    const input: SelectionInput = { query: "latest arxiv news", indexedDocuments: 1, available: everything };
    expect(selectTools(input)).toEqual(selectTools(input));
  });
});
