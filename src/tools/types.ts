import type { CapabilityTag, EvidenceItem } from "../types";

/** Per-call options every retrieval tool accepts. */
export interface RetrieveOptions {
  /** Upper bound on returned evidence (further capped by the tool's own limit). */
  maxResults?: number;
  /** Cancellation from the orchestrator's global deadline. */
  signal?: AbortSignal;
  /** Document scope, only honoured by the document-index tool. */
  scope?: readonly string[];
}

/**
 * Outcome of one tool call. A failed or timed-out call is not an exception: it yields zero
 * evidence and the `unavailable` marker.
 */
export type ToolResult =
  | { readonly tag: CapabilityTag; readonly status: "ok"; readonly evidence: EvidenceItem[] }
  | {
      readonly tag: CapabilityTag;
      readonly status: "unavailable";
      readonly evidence: [];
      readonly error: string;
    };

/** Uniform `(query) -> ranked evidence` contract shared by every data source. */
export interface RetrievalTool {
  /** Static capability tag, unique within a tool set. */
  readonly tag: CapabilityTag;
  /** Short machine name (as exposed to clients). */
  readonly name: string;
  readonly description: string;
  retrieve(query: string, options?: RetrieveOptions): Promise<ToolResult>;
}

/** One ranked snippet returned by an external fetcher. */
export interface FetchedSnippet {
  snippet: string;
  score: number;
  sourceUrl: string;
  title?: string;
}

/**
 * Opaque external source behind a non-document tool.
 * Implementations throw (typically SourceUnavailableError) on failure.
 */
export interface Fetcher {
  fetch(query: string, maxResults: number, signal?: AbortSignal): Promise<FetchedSnippet[]>;
}

/** Every tag in the fixed selection-table order. */
export const CAPABILITY_ORDER: readonly CapabilityTag[] = [
  "document-index",
  "fixed-corpus",
  "academic",
  "fast-factual",
  "deep-contextual",
  "web",
];

export function unavailable(tag: CapabilityTag, error: string): ToolResult {
  return { tag, status: "unavailable", evidence: [], error };
}

/** Bound a snippet to `maxChars`, marking truncation with a trailing " ...". */
export function clampSnippet(text: string, maxChars: number): string {
  const flat = text.trim().replace(/\s*\n\s*/g, " ");
  return flat.length > maxChars ? `${flat.slice(0, maxChars)} ...` : flat;
}
