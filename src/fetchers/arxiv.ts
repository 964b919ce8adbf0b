import { htmlToText } from "../extractor";
import type { FetchedSnippet, Fetcher } from "../tools/types";
import { getText } from "./http";

export const ARXIV_API = "https://export.arxiv.org/api/query";

// New-style (2301.01234v2) and old-style (hep-th/9901001) identifiers.
const ARXIV_ID = /\b(\d{4}\.\d{4,5}(?:v\d+)?|[a-z-]+(?:\.[A-Z]{2})?\/\d{7}(?:v\d+)?)\b/;

/** First arXiv identifier mentioned in `text`, if any. */
export function findArxivId(text: string): string | undefined {
  return ARXIV_ID.exec(text)?.[1];
}

export interface AtomEntry {
  id: string;
  title: string;
  summary: string;
}

function tag(block: string, name: string): string {
  const match = new RegExp(`<${name}\\b[^>]*>([\\s\\S]*?)</${name}>`).exec(block);
  return match ? htmlToText(match[1] ?? "").replace(/\s+/g, " ").trim() : "";
}

/** Pull id, title and abstract out of every `<entry>` of an Atom feed. */
export function parseAtomEntries(xml: string): AtomEntry[] {
  const entries: AtomEntry[] = [];
  for (const match of xml.matchAll(/<entry\b[^>]*>([\s\S]*?)<\/entry>/g)) {
    const block = match[1] ?? "";
    const id = tag(block, "id");
    // The API reports lookup errors as a single entry titled "Error".
    if (!id || tag(block, "title") === "Error") continue;
    entries.push({ id, title: tag(block, "title"), summary: tag(block, "summary") });
  }
  return entries;
}

/** arXiv paper search; a query carrying an arXiv id is answered by a direct id lookup. */
export class ArxivFetcher implements Fetcher {
  private readonly maxChars: number;

  public constructor(maxChars = 1000) {
    this.maxChars = maxChars;
  }

  public async fetch(query: string, maxResults: number, signal?: AbortSignal): Promise<FetchedSnippet[]> {
    const id = findArxivId(query);
    const params = new URLSearchParams(
      id
        ? { id_list: id, max_results: "1" }
        : { search_query: `all:${query}`, start: "0", max_results: String(maxResults) },
    );
    const xml = await getText(`${ARXIV_API}?${params.toString()}`, { source: "arXiv", signal });
    return parseAtomEntries(xml).map((entry, rank) => ({
      snippet: `${entry.title}. ${entry.summary}`.slice(0, this.maxChars),
      score: 1 / (rank + 1),
      sourceUrl: entry.id,
      title: entry.title,
    }));
  }
}
