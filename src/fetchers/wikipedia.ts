import { z } from "zod";
import { type ChunkSpan, chunkText } from "../chunker";
import type { Embedder } from "../embeddings";
import type { FetchedSnippet, Fetcher } from "../tools/types";
import { VectorIndex } from "../vector-index";
import { getJson } from "./http";

export const WIKIPEDIA_API = "https://en.wikipedia.org/w/api.php";

const SOURCE = "Wikipedia";

const SearchResponseSchema = z.object({
  query: z
    .object({
      search: z.array(z.object({ title: z.string(), snippet: z.string().default("") })),
    })
    .optional(),
});

const ExtractsResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(
        z.object({
          title: z.string(),
          index: z.number().optional(),
          extract: z.string().optional(),
          missing: z.boolean().optional(),
        }),
      ),
    })
    .optional(),
});

/** Canonical article URL for a page title. */
export function articleUrl(title: string): string {
  return `https://en.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, "_"))}`;
}

function apiUrl(params: Record<string, string>): string {
  const qs = new URLSearchParams({ format: "json", formatversion: "2", ...params });
  return `${WIKIPEDIA_API}?${qs.toString()}`;
}

/**
 * Quick encyclopedia lookup: the lead section of the best matching articles, ranked by the
 * search engine's order.
 */
export class WikipediaQuickFetcher implements Fetcher {
  private readonly maxChars: number;

  public constructor(maxChars = 1000) {
    this.maxChars = maxChars;
  }

  public async fetch(query: string, maxResults: number, signal?: AbortSignal): Promise<FetchedSnippet[]> {
    const body = await getJson(
      apiUrl({
        action: "query",
        generator: "search",
        gsrsearch: query,
        gsrlimit: String(maxResults),
        prop: "extracts",
        exintro: "1",
        explaintext: "1",
        exlimit: "max",
      }),
      ExtractsResponseSchema,
      { source: SOURCE, signal },
    );
    const pages = (body.query?.pages ?? [])
      .filter((p) => !p.missing && p.extract)
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return pages.map((p, rank) => ({
      snippet: (p.extract ?? "").slice(0, this.maxChars),
      score: 1 / (rank + 1),
      sourceUrl: articleUrl(p.title),
      title: p.title,
    }));
  }
}

export interface WikipediaDeepFetcherOptions {
  embedder: Embedder;
  /** Articles loaded per query. */
  topDocs?: number;
  chunkSize?: number;
  chunkOverlap?: number;
}

/**
 * Deep encyclopedia lookup: loads the full text of the top articles, chunks and embeds it, and
 * returns the passages most similar to the query.
 */
export class WikipediaDeepFetcher implements Fetcher {
  private readonly embedder: Embedder;
  private readonly topDocs: number;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  public constructor(opts: WikipediaDeepFetcherOptions) {
    this.embedder = opts.embedder;
    this.topDocs = opts.topDocs ?? 3;
    this.chunkSize = opts.chunkSize ?? 1000;
    this.chunkOverlap = opts.chunkOverlap ?? 200;
  }

  public async fetch(query: string, maxResults: number, signal?: AbortSignal): Promise<FetchedSnippet[]> {
    const search = await getJson(
      apiUrl({ action: "query", list: "search", srsearch: query, srlimit: String(this.topDocs) }),
      SearchResponseSchema,
      { source: SOURCE, signal },
    );
    const titles = (search.query?.search ?? []).map((s) => s.title);
    if (titles.length === 0) return [];

    const pages = await Promise.all(titles.map((title) => this.loadPage(title, signal)));
    const titleOf = new Map<string, string>();
    const spans: Array<{ url: string; span: ChunkSpan }> = [];
    for (const page of pages) {
      if (!page.text) continue;
      const url = articleUrl(page.title);
      titleOf.set(url, page.title);
      for (const span of chunkText(page.text, this.chunkSize, this.chunkOverlap)) spans.push({ url, span });
    }
    const embedded = await Promise.all(
      spans.map(async ({ url, span }) => ({ url, span, emb: await this.embedder.embed(span.text, signal) })),
    );
    const index = new VectorIndex();
    for (const { url, span, emb } of embedded) {
      index.ensureDimension(emb);
      index.insert({
        id: `${url}#${span.seq}`,
        documentId: url,
        seq: span.seq,
        start: span.start,
        end: span.end,
        text: span.text,
        emb,
      });
    }
    if (index.size === 0) return [];

    const hits = index.query(await this.embedder.embed(query, signal), maxResults);
    return hits.map(({ chunk, score }) => ({
      snippet: chunk.text,
      score,
      sourceUrl: chunk.documentId,
      title: titleOf.get(chunk.documentId),
    }));
  }

  private async loadPage(title: string, signal?: AbortSignal): Promise<{ title: string; text: string }> {
    const body = await getJson(
      apiUrl({ action: "query", prop: "extracts", explaintext: "1", titles: title }),
      ExtractsResponseSchema,
      { source: SOURCE, signal },
    );
    const page = body.query?.pages.at(0);
    return { title: page?.title ?? title, text: page?.extract?.trim() ?? "" };
  }
}
