import { type Limiter, createLimiter } from "./async";
import type { Answerer } from "./answerer";
import { normalizeText } from "./cache";
import type { ConversationContext } from "./conversation";
import {
  InvalidConfigError,
  InvalidRequestError,
  NoEvidenceAvailableError,
  type RagErrorCode,
  SynthesisUnavailableError,
  errorMessage,
  isRagError,
} from "./errors";
import { selectTools } from "./selection";
import { CAPABILITY_ORDER, type RetrievalTool, type ToolResult, unavailable } from "./tools/types";
import type { CapabilityTag, EvidenceItem } from "./types";

export interface OrchestratorOptions {
  tools: readonly RetrievalTool[];
  answerer: Answerer;
  /** Documents in the current index generation (drives document-index selection). */
  indexedDocuments: () => number;
  maxConcurrency: number;
  /** Global fan-out deadline per query. */
  deadlineMs: number;
  /** Cap on evidence handed to the answerer. */
  maxEvidence: number;
  /** Recent turns handed to the answerer. */
  historyTurns: number;
  corpusKeywords?: readonly string[];
  verbose?: boolean;
}

export interface AskOptions {
  /** Explicit capability tags; bypasses rule-based selection. */
  intent?: readonly CapabilityTag[];
  /** Document scope for the document-index tool; `[]` selects no documents. */
  scope?: readonly string[];
  /** Per-call override of the global deadline. */
  deadlineMs?: number;
}

export interface ToolOutcome {
  tag: CapabilityTag;
  status: ToolResult["status"];
  evidence: number;
  error?: string;
}

export interface AskResult {
  answer: string;
  evidence: EvidenceItem[];
  selected: CapabilityTag[];
  toolOutcomes: ToolOutcome[];
  /** True when every selected tool came back empty or unavailable. */
  noEvidence: boolean;
  /** Set when the answer was produced without evidence. */
  warning?: { code: RagErrorCode; message: string };
}

function isCapabilityTag(value: string): value is CapabilityTag {
  return CAPABILITY_ORDER.some((tag) => tag === value);
}

function provenanceKey(item: EvidenceItem): string | undefined {
  const p = item.provenance;
  if (!p) return undefined;
  if (p.documentId !== undefined) return `${item.tool}|doc|${p.documentId}#${p.chunk ?? ""}`;
  if (p.url) return `${item.tool}|url|${p.url}`;
  return undefined;
}

/**
 * Merge per-tool evidence in selection order, drop near-duplicates (same tool and provenance,
 * or the same normalized text from any tool) and cap the total.
 */
export function aggregateEvidence(results: readonly ToolResult[], maxEvidence: number): EvidenceItem[] {
  const seen = new Set<string>();
  const out: EvidenceItem[] = [];
  for (const result of results) {
    for (const item of result.evidence) {
      if (out.length >= maxEvidence) return out;
      const textKey = `text|${normalizeText(item.text).toLowerCase()}`;
      const sourceKey = provenanceKey(item);
      if (seen.has(textKey) || (sourceKey && seen.has(sourceKey))) continue;
      seen.add(textKey);
      if (sourceKey) seen.add(sourceKey);
      out.push(item);
    }
  }
  return out;
}

/**
 * Per-query state machine: select tools, fan out under a global deadline, aggregate evidence,
 * delegate synthesis and record the turn in the caller's conversation context.
 */
export class Orchestrator {
  private readonly tools = new Map<CapabilityTag, RetrievalTool>();
  private readonly opts: OrchestratorOptions;
  private readonly limit: Limiter;

  public constructor(opts: OrchestratorOptions) {
    for (const tool of opts.tools) {
      if (this.tools.has(tool.tag)) {
        throw new InvalidConfigError(`Duplicate retrieval tool for tag '${tool.tag}'`);
      }
      this.tools.set(tool.tag, tool);
    }
    if (!Number.isInteger(opts.deadlineMs) || opts.deadlineMs <= 0) {
      throw new InvalidConfigError(`deadlineMs must be a positive integer, got ${opts.deadlineMs}`);
    }
    this.opts = opts;
    this.limit = createLimiter(opts.maxConcurrency);
  }

  /** Registered tools in table order. */
  public listTools(): RetrievalTool[] {
    return CAPABILITY_ORDER.flatMap((tag) => this.tools.get(tag) ?? []);
  }

  /**
   * Answer one query.
   *
   * @throws {InvalidRequestError} for an empty query or an explicit intent naming an unknown or
   *   unregistered tool.
   * @throws {SynthesisUnavailableError} when the answerer fails; the turn is not recorded.
   */
  public async ask(query: string, context: ConversationContext, options: AskOptions = {}): Promise<AskResult> {
    const text = query.trim();
    if (!text) throw new InvalidRequestError("Query must not be empty");
    for (const tag of options.intent ?? []) {
      if (!isCapabilityTag(tag)) throw new InvalidRequestError(`Unknown tool tag: ${String(tag)}`);
      if (!this.tools.has(tag)) throw new InvalidRequestError(`No tool registered for '${tag}'`);
    }

    const selected = selectTools({
      query: text,
      intent: options.intent,
      scope: options.scope,
      indexedDocuments: this.opts.indexedDocuments(),
      available: new Set(this.tools.keys()),
      corpusKeywords: this.opts.corpusKeywords,
    });
    if (this.opts.verbose) console.error(`[RAG][verbose] Selected tools: ${selected.join(", ") || "none"}`);

    const results = await this.fanOut(text, selected, options);
    const evidence = aggregateEvidence(results, this.opts.maxEvidence);
    const noEvidence = evidence.length === 0;
    const warning = noEvidence ? new NoEvidenceAvailableError(selected.length) : undefined;
    if (warning) console.error(`[RAG] ${warning.message}.`);

    let answer: string;
    try {
      answer = await this.opts.answerer.synthesize({
        query: text,
        evidence,
        history: context.recent(this.opts.historyTurns),
        noEvidence,
      });
    } catch (e) {
      throw isRagError(e, "SynthesisUnavailable") ? e : new SynthesisUnavailableError(e);
    }
    context.append({ query: text, response: answer });

    return {
      answer,
      evidence,
      selected,
      toolOutcomes: results.map((r) => ({
        tag: r.tag,
        status: r.status,
        evidence: r.evidence.length,
        error: r.status === "unavailable" ? r.error : undefined,
      })),
      noEvidence,
      warning: warning && { code: warning.code, message: warning.message },
    };
  }

  /**
   * Run the selected tools concurrently (bounded). At the deadline every call still in flight is
   * cancelled and counts as unavailable. Results come back in selection order.
   */
  private async fanOut(query: string, selected: CapabilityTag[], options: AskOptions): Promise<ToolResult[]> {
    if (selected.length === 0) return [];
    const deadlineMs = options.deadlineMs ?? this.opts.deadlineMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), deadlineMs);
    const expired = new Promise<void>((resolve) => {
      controller.signal.addEventListener("abort", () => resolve(), { once: true });
    });

    try {
      return await Promise.all(
        selected.map((tag) => {
          const tool = this.tools.get(tag);
          if (!tool) return Promise.resolve(unavailable(tag, "tool not registered"));
          const call = this.limit(() =>
            tool.retrieve(query, { signal: controller.signal, scope: options.scope }),
          ).catch((e: unknown) => unavailable(tag, errorMessage(e)));
          return Promise.race([
            call,
            expired.then(() => unavailable(tag, `cancelled at the ${deadlineMs}ms query deadline`)),
          ]);
        }),
      );
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }
}
