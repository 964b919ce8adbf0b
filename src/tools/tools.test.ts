import { beforeEach, describe, expect, it } from "vitest";
import { CachingEmbedder } from "../embeddings";
import { SourceUnavailableError } from "../errors";
import { DefaultExtractor } from "../extractor";
import { Indexer } from "../indexer";
import { DocumentRegistry } from "../registry";
import { StatusManager } from "../status";
import { LetterEmbedder, MemoryLoader } from "../test-helpers";
import { DocumentIndexTool } from "./document-index-tool";
import { FetcherTool } from "./fetcher-tool";
import { type FetchedSnippet, type Fetcher, clampSnippet } from "./types";

class ListFetcher implements Fetcher {
  public lastMax = 0;
  public constructor(private readonly items: FetchedSnippet[]) {}
  public async fetch(_query: string, maxResults: number): Promise<FetchedSnippet[]> {
    this.lastMax = maxResults;
    return this.items;
  }
}

const never: Fetcher = {
  fetch: (_query, _max, signal) =>
    new Promise((_resolve, reject) => {
      signal?.addEventListener("abort", () => reject(new Error("aborted")));
    }),
};

describe("clampSnippet", () => {
  it("flattens newlines and bounds the length", () => {
    expect(clampSnippet(" one\n two ", 100)).toBe("one two");
    expect(clampSnippet("abcdefghij", 4)).toBe("abcd ...");
  });
});

describe("FetcherTool", () => {
  const base = { tag: "web" as const, name: "web_search", description: "web", snippetMaxChars: 10, timeoutMs: 200 };

  it("ranks, caps and bounds fetched snippets", async () => {
    const fetcher = new ListFetcher([
      { snippet: "low", score: 0.1, sourceUrl: "https://example.test/low" },
      { snippet: "a very long snippet text", score: 0.9, sourceUrl: "https://example.test/long", title: "Long" },
      { snippet: "   ", score: 1, sourceUrl: "https://example.test/blank" },
      { snippet: "mid", score: 0.5, sourceUrl: "https://example.test/mid" },
    ]);
    const tool = new FetcherTool({ ...base, fetcher, maxResults: 2 });
    const result = await tool.retrieve("q", { maxResults: 5 });
    expect(fetcher.lastMax).toBe(2);
    expect(result).toEqual({
      tag: "web",
      status: "ok",
      evidence: [
        {
          tool: "web",
          text: "a very lon ...",
          score: 0.9,
          provenance: { url: "https://example.test/long", title: "Long" },
        },
        { tool: "web", text: "mid", score: 0.5, provenance: { url: "https://example.test/mid", title: undefined } },
      ],
    });
  });

  it("turns fetch failures into an unavailable result", async () => {
    const tool = new FetcherTool({
      ...base,
      maxResults: 3,
      fetcher: { fetch: () => Promise.reject(new SourceUnavailableError("Brave Search", "HTTP error! status: 500")) },
    });
    expect(await tool.retrieve("q")).toEqual({
      tag: "web",
      status: "unavailable",
      evidence: [],
      error: "Brave Search unavailable: HTTP error! status: 500",
    });
  });

  it("gives up after the per-call timeout", async () => {
    const tool = new FetcherTool({ ...base, maxResults: 3, timeoutMs: 20, fetcher: never });
    const result = await tool.retrieve("q");
    expect(result.status).toBe("unavailable");
    expect(result).toMatchObject({ error: "Timeout after 20ms: web_search fetch" });
  });

  it("does not call the fetcher once the caller cancelled", async () => {
    const fetcher = new ListFetcher([]);
    const controller = new AbortController();
    controller.abort();
    const tool = new FetcherTool({ ...base, maxResults: 3, fetcher });
    expect(await tool.retrieve("q", { signal: controller.signal })).toMatchObject({
      status: "unavailable",
      error: "cancelled",
    });
    expect(fetcher.lastMax).toBe(0);
  });
});

describe("DocumentIndexTool", () => {
  let indexer: Indexer;

  beforeEach(async () => {
    indexer = new Indexer({
      registry: new DocumentRegistry(),
      embedder: new CachingEmbedder(new LetterEmbedder()),
      extractor: new DefaultExtractor(),
      loader: new MemoryLoader({ "/docs/a.txt": "a".repeat(250), "/docs/b.txt": "b".repeat(150) }),
      options: { chunkSize: 100, chunkOverlap: 20, similarityTopK: 2, toolTimeoutMs: 1000, maxConcurrency: 2 },
      status: new StatusManager(),
      root: "/docs",
    });
    await indexer.indexSelection({ files: ["a.txt", "b.txt"] });
  });

  it("returns scoped evidence with document provenance", async () => {
    const tool = new DocumentIndexTool({ indexer, topK: 2, snippetMaxChars: 5, timeoutMs: 1000 });
    const result = await tool.retrieve("bbb", { scope: ["a.txt"] });
    expect(result.status).toBe("ok");
    expect(result.evidence.map((e) => e.provenance)).toEqual([
      { documentId: "/docs/a.txt", chunk: 2 },
      { documentId: "/docs/a.txt", chunk: 0 },
    ]);
    expect(result.evidence[0]?.text).toBe("aaaaa ...");
  });

  it("returns no evidence for an empty scope", async () => {
    const tool = new DocumentIndexTool({ indexer, topK: 2, snippetMaxChars: 5, timeoutMs: 1000 });
    expect(await tool.retrieve("bbb", { scope: [] })).toEqual({ tag: "document-index", status: "ok", evidence: [] });
  });
});
