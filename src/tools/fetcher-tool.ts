import { withTimeout } from "../async";
import { errorMessage } from "../errors";
import type { CapabilityTag, EvidenceItem } from "../types";
import {
  type Fetcher,
  type RetrievalTool,
  type RetrieveOptions,
  type ToolResult,
  clampSnippet,
  unavailable,
} from "./types";

export interface FetcherToolOptions {
  tag: CapabilityTag;
  name: string;
  description: string;
  fetcher: Fetcher;
  /** Result cap (top-N). */
  maxResults: number;
  /** Snippet length bound in characters. */
  snippetMaxChars: number;
  /** Per-call timeout after which the source counts as unavailable for that call. */
  timeoutMs: number;
  verbose?: boolean;
}

/**
 * Retrieval tool backed by an external {@link Fetcher}. Enforces the result cap, snippet bound
 * and per-call timeout, and turns every failure into an `unavailable` result.
 */
export class FetcherTool implements RetrievalTool {
  public readonly tag: CapabilityTag;
  public readonly name: string;
  public readonly description: string;
  private readonly opts: FetcherToolOptions;

  public constructor(opts: FetcherToolOptions) {
    this.tag = opts.tag;
    this.name = opts.name;
    this.description = opts.description;
    this.opts = opts;
  }

  public async retrieve(query: string, options: RetrieveOptions = {}): Promise<ToolResult> {
    const limit = Math.max(1, Math.min(this.opts.maxResults, options.maxResults ?? this.opts.maxResults));
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) return unavailable(this.tag, "cancelled");
    options.signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const snippets = await withTimeout(
        this.opts.fetcher.fetch(query, limit, controller.signal),
        this.opts.timeoutMs,
        { context: `${this.name} fetch`, onTimeout: () => controller.abort() },
      );
      const evidence: EvidenceItem[] = snippets
        .filter((s) => s.snippet.trim().length > 0)
        .sort((a, b) => b.score - a.score)
        .slice(0, limit)
        .map((s) => ({
          tool: this.tag,
          text: clampSnippet(s.snippet, this.opts.snippetMaxChars),
          score: s.score,
          provenance: { url: s.sourceUrl, title: s.title },
        }));
      return { tag: this.tag, status: "ok", evidence };
    } catch (e) {
      if (this.opts.verbose) console.error(`[RAG][verbose] ${this.name} unavailable: ${errorMessage(e)}`);
      return unavailable(this.tag, errorMessage(e));
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
