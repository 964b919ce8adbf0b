import { findArxivId } from "./fetchers/arxiv";
import { CAPABILITY_ORDER } from "./tools/types";
import type { CapabilityTag } from "./types";

export interface SelectionInput {
  query: string;
  /** Tags the caller asked for explicitly. */
  intent?: readonly CapabilityTag[];
  /** Caller-supplied document scope; an empty list means "no documents". */
  scope?: readonly string[];
  /** Documents in the current generation. */
  indexedDocuments: number;
  /** Tags that have a registered tool. */
  available: ReadonlySet<CapabilityTag>;
  /** Domain keywords of the fixed corpus. */
  corpusKeywords?: readonly string[];
}

const ACADEMIC_WORDS = /\b(arxiv|papers?|preprint)\b/i;
const ENCYCLOPEDIA_WORDS = /\b(wikipedia|encyclopedia)\b/i;
const DETAIL_CUES = /\b(why|how|explain|compare|timeline|role|history|quote)\b/i;
const RECENCY_CUES = /\b(latest|news|today|current|recent|this week)\b/i;
const DETAILED_QUERY_WORDS = 12;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function mentionsKeyword(query: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => k.trim() && new RegExp(`\\b${escapeRegExp(k.trim())}\\b`, "i").test(query));
}

function hasRecentYear(query: string): boolean {
  // a dotted number such as an arXiv id is not a year
  for (const match of query.matchAll(/(?<!\d\.)\b(20\d{2})\b(?!\.\d)/g)) {
    if (Number(match[1]) >= 2020) return true;
  }
  return false;
}

/** True for queries that need more than a short summary. */
export function isDetailedQuery(query: string): boolean {
  const words = query.trim().split(/\s+/).filter(Boolean).length;
  return words > DETAILED_QUERY_WORDS || DETAIL_CUES.test(query);
}

/**
 * Rule-based tool selection. Returns capability tags in the fixed table order, restricted to
 * the registered tools. Identical input always yields identical output.
 */
export function selectTools(input: SelectionInput): CapabilityTag[] {
  const picked = new Set<CapabilityTag>();
  const { query } = input;

  if (input.intent && input.intent.length > 0) {
    for (const tag of input.intent) picked.add(tag);
  } else {
    if (input.indexedDocuments > 0 && !(input.scope && input.scope.length === 0)) {
      picked.add("document-index");
    }
    if (input.corpusKeywords && mentionsKeyword(query, input.corpusKeywords)) {
      picked.add("fixed-corpus");
    }
    if (findArxivId(query) || ACADEMIC_WORDS.test(query)) picked.add("academic");

    const specific = picked.size > 0;
    if (ENCYCLOPEDIA_WORDS.test(query) || !specific) {
      picked.add(isDetailedQuery(query) ? "deep-contextual" : "fast-factual");
    }
    if (RECENCY_CUES.test(query) || hasRecentYear(query) || !specific) picked.add("web");
  }

  return CAPABILITY_ORDER.filter((tag) => picked.has(tag) && input.available.has(tag));
}
