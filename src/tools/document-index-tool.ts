import { withTimeout } from "../async";
import { errorMessage } from "../errors";
import type { Indexer } from "../indexer";
import type { EvidenceItem } from "../types";
import {
  type RetrievalTool,
  type RetrieveOptions,
  type ToolResult,
  clampSnippet,
  unavailable,
} from "./types";

export interface DocumentIndexToolOptions {
  indexer: Indexer;
  /** similarity_top_k */
  topK: number;
  snippetMaxChars: number;
  timeoutMs: number;
}

/**
 * Scoped similarity search over the user's selectively indexed documents. The only tool backed
 * by the vector index and document registry.
 */
export class DocumentIndexTool implements RetrievalTool {
  public readonly tag = "document-index" as const;
  public readonly name = "doc_rag_search";
  public readonly description =
    "Query the user's indexed documents. Use for questions that refer to uploaded or added documents.";
  private readonly opts: DocumentIndexToolOptions;

  public constructor(opts: DocumentIndexToolOptions) {
    this.opts = opts;
  }

  public async retrieve(query: string, options: RetrieveOptions = {}): Promise<ToolResult> {
    const k = Math.max(1, Math.min(this.opts.topK, options.maxResults ?? this.opts.topK));
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) return unavailable(this.tag, "cancelled");
    options.signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const hits = await withTimeout(
        this.opts.indexer.search(query, k, options.scope, controller.signal),
        this.opts.timeoutMs,
        { context: "document index query", onTimeout: () => controller.abort() },
      );
      const evidence: EvidenceItem[] = hits.map(({ chunk, score }) => ({
        tool: this.tag,
        text: clampSnippet(chunk.text, this.opts.snippetMaxChars),
        score,
        provenance: { documentId: chunk.documentId, chunk: chunk.seq },
      }));
      return { tag: this.tag, status: "ok", evidence };
    } catch (e) {
      return unavailable(this.tag, errorMessage(e));
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
