import { z } from "zod";
import { SourceUnavailableError } from "../errors";
import { htmlToText } from "../extractor";
import type { FetchedSnippet, Fetcher } from "../tools/types";
import { getJson } from "./http";

export const BRAVE_SEARCH_API = "https://api.search.brave.com/res/v1/web/search";

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z.array(
        z.object({
          title: z.string(),
          url: z.string(),
          description: z.string().default(""),
        }),
      ),
    })
    .optional(),
});

/** Open web search through the Brave Search API. */
export class BraveSearchFetcher implements Fetcher {
  private readonly apiKey: string | undefined;

  public constructor(apiKey: string | undefined) {
    this.apiKey = apiKey;
  }

  public async fetch(query: string, maxResults: number, signal?: AbortSignal): Promise<FetchedSnippet[]> {
    if (!this.apiKey) throw new SourceUnavailableError("Brave Search", "BRAVE_SEARCH_API_KEY is not set");
    const count = Math.max(1, Math.min(maxResults, 20));
    const params = new URLSearchParams({ q: query, count: String(count) });
    const body = await getJson(`${BRAVE_SEARCH_API}?${params.toString()}`, BraveResponseSchema, {
      source: "Brave Search",
      headers: { "X-Subscription-Token": this.apiKey },
      signal,
    });
    const seen = new Set<string>();
    const out: FetchedSnippet[] = [];
    for (const result of body.web?.results ?? []) {
      if (seen.has(result.url)) continue;
      seen.add(result.url);
      out.push({
        snippet: htmlToText(result.description).replace(/\n/g, " "),
        score: 1 / (out.length + 1),
        sourceUrl: result.url,
        title: htmlToText(result.title),
      });
    }
    return out;
  }
}
