import { describe, expect, it } from "vitest";
import { DEFAULT_INDEX_OPTIONS, getConfig, validateIndexOptions } from "./config";
import { InvalidConfigError } from "./errors";

describe("getConfig", () => {
  it("applies defaults", () => {
    const config = getConfig({});
    expect(config.INDEX).toEqual(DEFAULT_INDEX_OPTIONS);
    expect(config.QUERY_DEADLINE_MS).toBe(15000);
    expect(config.EMBEDDING_MAX_RETRIES).toBe(2);
    expect(config.EMBEDDING_CACHE_SIZE).toBe(50000);
    expect(config.QUERY_CACHE_SIZE).toBe(2000);
    expect(config.FIXED_CORPUS_NAME).toBe("docs");
    expect(config.FIXED_CORPUS_KEYWORDS).toEqual(["docs"]);
    expect(config.INDEX_FILES).toEqual([]);
    expect(config.VERBOSE).toBe(false);
    expect(config.MCP_TRANSPORT).toBe("");
  });

  it("parses env values", () => {
    const config = getConfig({
      CHUNK_SIZE: "100",
      CHUNK_OVERLAP: "0",
      SIMILARITY_TOP_K: "2",
      EMBEDDING_MAX_RETRIES: "0",
      QUERY_CACHE_SIZE: "50",
      FIXED_CORPUS_NAME: "widgets",
      FIXED_CORPUS_KEYWORDS: "widget, gizmo ,",
      INDEX_FILES: "a.txt,b.md",
      VERBOSE: "yes",
      MCP_TRANSPORT: " HTTP ",
    });
    expect(config.INDEX).toMatchObject({ chunkSize: 100, chunkOverlap: 0, similarityTopK: 2 });
    expect(config.EMBEDDING_MAX_RETRIES).toBe(0);
    expect(config.QUERY_CACHE_SIZE).toBe(50);
    expect(config.FIXED_CORPUS_KEYWORDS).toEqual(["widget", "gizmo"]);
    expect(config.INDEX_FILES).toEqual(["a.txt", "b.md"]);
    expect(config.VERBOSE).toBe(true);
    expect(config.MCP_TRANSPORT).toBe("http");
  });

  it("falls back on unparsable numbers", () => {
    expect(getConfig({ CHUNK_SIZE: "lots", TOOL_TIMEOUT_MS: "-5" }).INDEX).toMatchObject({
      chunkSize: 1200,
      toolTimeoutMs: 8000,
    });
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => getConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(InvalidConfigError);
  });
});

describe("validateIndexOptions", () => {
  it("requires positive integers", () => {
    expect(() => validateIndexOptions({ ...DEFAULT_INDEX_OPTIONS, similarityTopK: 0 })).toThrow(
      "similarityTopK must be a positive integer",
    );
    expect(() => validateIndexOptions({ ...DEFAULT_INDEX_OPTIONS, maxConcurrency: 1.5 })).toThrow(
      InvalidConfigError,
    );
    expect(() => validateIndexOptions({ ...DEFAULT_INDEX_OPTIONS, chunkOverlap: -1 })).toThrow(
      "chunkOverlap must be a non-negative integer",
    );
  });
});
