import type OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { SynthesisUnavailableError } from "./errors";
import type { EvidenceItem, Provenance, Turn } from "./types";

/** Everything the answerer sees for one query. */
export interface SynthesisRequest {
  query: string;
  evidence: readonly EvidenceItem[];
  /** Recent conversation turns, oldest first. */
  history: readonly Turn[];
  /** Set when every selected tool came back empty or unavailable. */
  noEvidence: boolean;
  signal?: AbortSignal;
}

/** External capability turning a query plus evidence into prose. */
export interface Answerer {
  /** @throws {SynthesisUnavailableError} */
  synthesize(request: SynthesisRequest): Promise<string>;
}

/** Human-readable source reference of an evidence item. */
export function describeProvenance(p: Provenance | undefined): string {
  if (!p) return "unknown source";
  if (p.documentId !== undefined) {
    return p.chunk !== undefined ? `${p.documentId} (chunk ${p.chunk})` : p.documentId;
  }
  if (p.url) return p.title ? `${p.title} - ${p.url}` : p.url;
  return p.title ?? "unknown source";
}

/** Numbered evidence block handed to the model. */
export function formatEvidence(evidence: readonly EvidenceItem[]): string {
  return evidence
    .map((e, i) => `[${i + 1}] (${e.tool}) ${e.text}\nSource: ${describeProvenance(e.provenance)}`)
    .join("\n\n");
}

export const SYSTEM_PROMPT =
  "You answer questions using only the numbered evidence provided. Cite evidence as [n] and " +
  "list the sources you used at the end. If the evidence does not answer the question, say so.";

export const NO_EVIDENCE_PROMPT =
  "No evidence could be retrieved for this question: every consulted source was empty or " +
  "unavailable. Tell the user plainly that no supporting evidence was found, and do not invent any.";

/** Chat messages for one synthesis request. */
export function buildMessages(request: SynthesisRequest): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [
    { role: "system", content: request.noEvidence ? NO_EVIDENCE_PROMPT : SYSTEM_PROMPT },
  ];
  for (const turn of request.history) {
    messages.push({ role: "user", content: turn.query }, { role: "assistant", content: turn.response });
  }
  const content = request.noEvidence
    ? request.query
    : `Evidence:\n${formatEvidence(request.evidence)}\n\nQuestion: ${request.query}`;
  messages.push({ role: "user", content });
  return messages;
}

/** Answerer backed by the OpenAI chat completions endpoint. */
export class OpenAIAnswerer implements Answerer {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly verbose: boolean;

  public constructor(client: OpenAI, model = "gpt-4o-mini", verbose = false) {
    this.client = client;
    this.model = model;
    this.verbose = verbose;
  }

  public async synthesize(request: SynthesisRequest): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        { model: this.model, messages: buildMessages(request), temperature: 0 },
        { signal: request.signal },
      );
      const answer = response.choices.at(0)?.message.content ?? "";
      if (this.verbose) console.error(`[RAG][verbose] Synthesized ${answer.length} chars with ${this.model}`);
      return answer;
    } catch (e) {
      console.error("[RAG] Answer synthesis failed:", e);
      throw new SynthesisUnavailableError(e);
    }
  }
}
