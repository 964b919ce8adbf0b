/**
 * In-process stand-ins for the network-backed collaborators, shared by the test files.
 */
import { sleep } from "./async";
import { SourceUnavailableError } from "./errors";
import type { Embedder } from "./embeddings";
import type { SourceLoader } from "./sources";
import type { RetrievalTool, RetrieveOptions, ToolResult } from "./tools/types";
import type { CapabilityTag, DocumentRecord, EvidenceItem } from "./types";

/**
 * Deterministic embedder: counts of the letters a, b and c plus a constant component, so texts
 * made of one letter point in clearly different directions.
 */
export class LetterEmbedder implements Embedder {
  public readonly modelName = "letter-embedder";
  public readonly calls: string[] = [];
  /** Extra trailing zeros, used to provoke dimension mismatches. */
  public padding = 0;
  /** Texts for which every call fails. */
  public failWhen: (text: string) => boolean = () => false;

  public async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    if (this.failWhen(text)) throw new Error("embedding service unavailable");
    const count = (ch: string) => text.split(ch).length - 1;
    return Float32Array.from([count("a"), count("b"), count("c"), 1, ...new Array<number>(this.padding).fill(0)]);
  }
}

/** Delays every call of another embedder and records how many calls overlapped at most. */
export class PacedEmbedder implements Embedder {
  public readonly modelName: string;
  public peak = 0;
  private readonly inner: Embedder;
  private readonly delayMs: number;
  private active = 0;

  public constructor(inner: Embedder, delayMs = 5) {
    this.inner = inner;
    this.modelName = inner.modelName;
    this.delayMs = delayMs;
  }

  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      await sleep(this.delayMs, signal);
      return await this.inner.embed(text, signal);
    } finally {
      this.active--;
    }
  }
}

/** Serves documents from a map of id -> text; unknown ids are unavailable. */
export class MemoryLoader implements SourceLoader {
  private readonly files: Map<string, string>;

  public constructor(files: Record<string, string>) {
    this.files = new Map(Object.entries(files));
  }

  public set(id: string, text: string): void {
    this.files.set(id, text);
  }

  public async load(doc: DocumentRecord): Promise<Uint8Array> {
    const text = this.files.get(doc.id);
    if (text === undefined) throw new SourceUnavailableError(doc.location, "not found");
    return new TextEncoder().encode(text);
  }
}

/** Tool returning fixed evidence, optionally after a delay or never (until aborted). */
export class StaticTool implements RetrievalTool {
  public readonly tag: CapabilityTag;
  public readonly name: string;
  public readonly description = "static test tool";
  public readonly queries: string[] = [];
  private readonly evidence: EvidenceItem[];
  private readonly behaviour: "ok" | "fail" | "hang";

  public constructor(tag: CapabilityTag, texts: string[], behaviour: "ok" | "fail" | "hang" = "ok") {
    this.tag = tag;
    this.name = tag;
    this.behaviour = behaviour;
    this.evidence = texts.map((text, i) => ({
      tool: tag,
      text,
      score: 1 - i / 10,
      provenance: { url: `https://example.test/${tag}/${i}` },
    }));
  }

  public retrieve(query: string, options: RetrieveOptions = {}): Promise<ToolResult> {
    this.queries.push(query);
    if (this.behaviour === "fail") {
      return Promise.resolve({ tag: this.tag, status: "unavailable", evidence: [], error: "source down" });
    }
    if (this.behaviour === "hang") {
      return new Promise((resolve) => {
        options.signal?.addEventListener("abort", () =>
          resolve({ tag: this.tag, status: "unavailable", evidence: [], error: "cancelled" }),
        );
      });
    }
    return Promise.resolve({ tag: this.tag, status: "ok", evidence: this.evidence });
  }
}
