import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SourceUnavailableError } from "../errors";
import { DefaultExtractor } from "../extractor";
import { LetterEmbedder, PacedEmbedder } from "../test-helpers";
import { ArxivFetcher, findArxivId, parseAtomEntries } from "./arxiv";
import { BraveSearchFetcher } from "./brave";
import { FixedCorpusFetcher } from "./corpus";
import { WikipediaDeepFetcher, WikipediaQuickFetcher, articleUrl } from "./wikipedia";

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Promise<Response> {
  return Promise.resolve(
    new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } }),
  );
}

function calledUrl(call: number): URL {
  return new URL(String(mockFetch.mock.calls[call]?.[0]));
}

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
  mockFetch.mockReset();
});

describe("WikipediaQuickFetcher", () => {
  it("returns lead sections in search order", async () => {
    mockFetch.mockImplementation(() =>
      jsonResponse({
        query: {
          pages: [
            { title: "Ada Lovelace", index: 2, extract: "Second result." },
            { title: "Alan Turing", index: 1, extract: "First result." },
            { title: "Nothing Here", missing: true },
          ],
        },
      }),
    );
    const out = await new WikipediaQuickFetcher().fetch("computing pioneers", 3);
    expect(out).toEqual([
      { snippet: "First result.", score: 1, sourceUrl: "https://en.wikipedia.org/wiki/Alan_Turing", title: "Alan Turing" },
      {
        snippet: "Second result.",
        score: 0.5,
        sourceUrl: "https://en.wikipedia.org/wiki/Ada_Lovelace",
        title: "Ada Lovelace",
      },
    ]);
    expect(calledUrl(0).searchParams.get("gsrsearch")).toBe("computing pioneers");
    expect(calledUrl(0).searchParams.get("gsrlimit")).toBe("3");
  });

  it("reports HTTP errors as SourceUnavailable", async () => {
    mockFetch.mockImplementation(() => Promise.resolve(new Response("busy", { status: 503 })));
    const err = await new WikipediaQuickFetcher().fetch("x", 1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailableError);
    expect(err).toMatchObject({ message: "Wikipedia unavailable: HTTP error! status: 503 - busy" });
  });

  it("rejects unexpected payloads", async () => {
    mockFetch.mockImplementation(() => jsonResponse({ query: { pages: "nope" } }));
    await expect(new WikipediaQuickFetcher().fetch("x", 1)).rejects.toThrow("Unexpected response shape");
  });

  it("returns nothing when the search finds nothing", async () => {
    mockFetch.mockImplementation(() => jsonResponse({ batchcomplete: true }));
    await expect(new WikipediaQuickFetcher().fetch("x", 1)).resolves.toEqual([]);
  });
});

describe("WikipediaDeepFetcher", () => {
  it("ranks passages of the loaded articles against the query", async () => {
    mockFetch.mockImplementation((url: string) => {
      const params = new URL(url).searchParams;
      if (params.get("list") === "search") {
        return jsonResponse({ query: { search: [{ title: "Alpha", snippet: "" }] } });
      }
      return jsonResponse({ query: { pages: [{ title: params.get("titles"), extract: "a".repeat(20) + "b".repeat(20) }] } });
    });
    const fetcher = new WikipediaDeepFetcher({ embedder: new LetterEmbedder(), chunkSize: 20, chunkOverlap: 0 });
    const out = await fetcher.fetch("bb", 1);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatchObject({ snippet: "b".repeat(20), sourceUrl: articleUrl("Alpha"), title: "Alpha" });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("embeds the passages concurrently", async () => {
    mockFetch.mockImplementation((url: string) => {
      const params = new URL(url).searchParams;
      if (params.get("list") === "search") {
        return jsonResponse({ query: { search: [{ title: "Alpha", snippet: "" }] } });
      }
      return jsonResponse({ query: { pages: [{ title: "Alpha", extract: "a".repeat(20) + "b".repeat(20) + "c".repeat(20) }] } });
    });
    const embedder = new PacedEmbedder(new LetterEmbedder());
    const fetcher = new WikipediaDeepFetcher({ embedder, chunkSize: 20, chunkOverlap: 0 });
    const out = await fetcher.fetch("cc", 1);
    expect(out[0]?.snippet).toBe("c".repeat(20));
    expect(embedder.peak).toBe(3);
  });
});

describe("arXiv", () => {
  const feed = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/abs/2301.01234v2</id>
    <title>Sparse  Things &amp; Stuff</title>
    <summary>
  We study things.
</summary>
  </entry>
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format</id>
    <title>Error</title>
    <summary>incorrect id format</summary>
  </entry>
</feed>`;

  it("finds new- and old-style identifiers", () => {
    expect(findArxivId("what does 2301.01234v2 say")).toBe("2301.01234v2");
    expect(findArxivId("see hep-th/9901001 for details")).toBe("hep-th/9901001");
    expect(findArxivId("no identifier here")).toBeUndefined();
  });

  it("parses Atom entries and skips error entries", () => {
    expect(parseAtomEntries(feed)).toEqual([
      { id: "http://arxiv.org/abs/2301.01234v2", title: "Sparse Things & Stuff", summary: "We study things." },
    ]);
  });

  it("looks an identifier up directly", async () => {
    mockFetch.mockImplementation(() => Promise.resolve(new Response(feed, { status: 200 })));
    const out = await new ArxivFetcher().fetch("summarize 2301.01234v2", 3);
    expect(calledUrl(0).searchParams.get("id_list")).toBe("2301.01234v2");
    expect(out).toEqual([
      {
        snippet: "Sparse Things & Stuff. We study things.",
        score: 1,
        sourceUrl: "http://arxiv.org/abs/2301.01234v2",
        title: "Sparse Things & Stuff",
      },
    ]);
  });

  it("searches all fields otherwise", async () => {
    mockFetch.mockImplementation(() => Promise.resolve(new Response(feed, { status: 200 })));
    await new ArxivFetcher().fetch("graph neural networks", 4);
    expect(calledUrl(0).searchParams.get("search_query")).toBe("all:graph neural networks");
    expect(calledUrl(0).searchParams.get("max_results")).toBe("4");
  });
});

describe("BraveSearchFetcher", () => {
  it("is unavailable without an API key", async () => {
    await expect(new BraveSearchFetcher(undefined).fetch("x", 3)).rejects.toThrow(
      "Brave Search unavailable: BRAVE_SEARCH_API_KEY is not set",
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("returns de-duplicated web results", async () => {
    mockFetch.mockImplementation(() =>
      jsonResponse({
        web: {
          results: [
            { title: "<strong>Node</strong> 20", url: "https://example.test/a", description: "Released <strong>2023</strong>" },
            { title: "Again", url: "https://example.test/a", description: "duplicate" },
            { title: "B", url: "https://example.test/b", description: "two" },
          ],
        },
      }),
    );
    const out = await new BraveSearchFetcher("test-key").fetch("node 20", 5);
    expect(out).toEqual([
      { snippet: "Released 2023", score: 1, sourceUrl: "https://example.test/a", title: "Node 20" },
      { snippet: "two", score: 0.5, sourceUrl: "https://example.test/b", title: "B" },
    ]);
    expect(mockFetch).toHaveBeenCalledWith(
      "https://api.search.brave.com/res/v1/web/search?q=node+20&count=5",
      expect.objectContaining({ headers: { Accept: "application/json", "X-Subscription-Token": "test-key" } }),
    );
  });
});

describe("FixedCorpusFetcher", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rag-corpus-"));
    await fs.writeFile(path.join(dir, "guide.md"), "c".repeat(30));
    await fs.mkdir(path.join(dir, "sub"));
    await fs.writeFile(path.join(dir, "sub", "notes.txt"), "a".repeat(30));
    await fs.writeFile(path.join(dir, "data.json"), "{}");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("indexes the directory once and searches it", async () => {
    const embedder = new LetterEmbedder();
    const fetcher = new FixedCorpusFetcher({
      dir,
      name: "widgets",
      embedder,
      extractor: new DefaultExtractor(),
      chunkSize: 100,
      chunkOverlap: 0,
    });
    const first = await fetcher.fetch("ccc", 1);
    expect(first).toEqual([
      {
        snippet: "c".repeat(30),
        score: expect.any(Number),
        sourceUrl: pathToFileURL(path.join(dir, "guide.md")).href,
        title: "guide.md",
      },
    ]);
    const second = await fetcher.fetch("aaa", 2);
    expect(second.map((s) => s.title)).toEqual(["sub/notes.txt", "guide.md"]);
    expect(embedder.calls).toHaveLength(4);
  });

  it("embeds the chunks of a file concurrently", async () => {
    await fs.writeFile(path.join(dir, "guide.md"), "c".repeat(250));
    const embedder = new PacedEmbedder(new LetterEmbedder());
    const fetcher = new FixedCorpusFetcher({
      dir,
      name: "widgets",
      embedder,
      extractor: new DefaultExtractor(),
      chunkSize: 100,
      chunkOverlap: 0,
    });
    const index = await fetcher.load();
    expect(index.size).toBe(4);
    expect(embedder.peak).toBe(3);
  });
});
