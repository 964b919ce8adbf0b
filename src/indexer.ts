import { contentKey } from "./cache";
import { chunkText } from "./chunker";
import { type IndexOptions, validateIndexOptions } from "./config";
import type { CachingEmbedder, Embedder } from "./embeddings";
import {
  DimensionMismatchError,
  InvalidRequestError,
  type RagErrorCode,
  errorMessage,
  isRagError,
} from "./errors";
import type { Extractor } from "./extractor";
import type { Persistence } from "./persistence";
import type { DocumentRegistry } from "./registry";
import { type SourceLoader, describeFile, describeUrl } from "./sources";
import { type Limiter, createLimiter, throwIfAborted } from "./async";
import { type StatusManager, statusManager } from "./status";
import type { DocumentDescriptor, DocumentRecord, EmbeddedChunk } from "./types";
import { type ScoredChunk, VectorIndex } from "./vector-index";

/**
 * An immutable snapshot of the vector index scoped to an exact set of documents. Readers hold
 * on to the generation they started with; a new one only becomes visible through an atomic
 * pointer swap once it is fully built.
 */
export interface IndexGeneration {
  readonly id: number;
  readonly documentIds: ReadonlySet<string>;
  readonly index: VectorIndex;
  /** Content hash of each document's extracted text. */
  readonly fingerprints: ReadonlyMap<string, string>;
  readonly createdAt: string;
}

/** Selective indexing request: the exact documents the next generation should cover. */
export interface SelectionRequest {
  files?: readonly string[];
  urls?: readonly string[];
}

/** Per-document result of a selective indexing request. */
export interface DocumentOutcome {
  id: string;
  location: string;
  status: "indexed" | "failed";
  chunks: number;
  error?: string;
  errorCode?: RagErrorCode;
}

export interface IngestionReport {
  /** Generation now served to readers. */
  generationId: number;
  /** True when the request matched the current generation and no new one was built. */
  reused: boolean;
  indexed: number;
  failed: number;
  documents: DocumentOutcome[];
}

/**
 * Options required to construct an {@link Indexer}. All collaborators are injected so tests
 * can replace the network-backed ones.
 */
export interface IndexerOptions {
  registry: DocumentRegistry;
  embedder: CachingEmbedder;
  /**
   * Embedder for search queries. Defaults to `embedder`; pass one with its own cache so that
   * one-off queries do not evict document chunks.
   */
  queryEmbedder?: Embedder;
  extractor: Extractor;
  loader: SourceLoader;
  options: IndexOptions;
  persistence?: Persistence;
  status?: StatusManager;
  /** Base directory for relative file paths. */
  root?: string;
  verbose?: boolean;
}

interface Extracted {
  record: DocumentRecord;
  text: string;
  fingerprint: string;
}

type Failure = { error: string; code?: RagErrorCode };

/**
 * Ingestion pipeline and generation manager: load -> extract -> chunk -> embed -> index, one
 * selective request at a time (single writer), with atomic publication of the result.
 */
export class Indexer {
  private readonly registry: DocumentRegistry;
  private readonly embedder: CachingEmbedder;
  private readonly queryEmbedder: Embedder;
  private readonly extractor: Extractor;
  private readonly loader: SourceLoader;
  private readonly options: IndexOptions;
  private readonly persistence?: Persistence;
  private readonly status: StatusManager;
  private readonly root: string;
  private readonly verbose: boolean;
  private readonly docLimit: Limiter;
  private readonly pending = new Map<string, Promise<IngestionReport>>();
  private writeLock: Promise<void> = Promise.resolve();
  private generation: IndexGeneration | undefined;
  private nextGenerationId = 1;

  public constructor(opts: IndexerOptions) {
    this.options = validateIndexOptions(opts.options);
    this.registry = opts.registry;
    this.embedder = opts.embedder;
    this.queryEmbedder = opts.queryEmbedder ?? opts.embedder;
    this.extractor = opts.extractor;
    this.loader = opts.loader;
    this.persistence = opts.persistence;
    this.status = opts.status ?? statusManager;
    this.root = opts.root ?? process.cwd();
    this.verbose = !!opts.verbose;
    this.docLimit = createLimiter(this.options.maxConcurrency);
  }

  /** Generation currently served to readers. */
  public current(): IndexGeneration | undefined {
    return this.generation;
  }

  /** Number of documents in the current generation. */
  public indexedDocumentCount(): number {
    return this.generation?.documentIds.size ?? 0;
  }

  /**
   * Map caller references (document ids, file paths or URLs) to document ids. Unknown
   * references still resolve to the id they would have, so they simply match nothing.
   */
  public resolveDocumentIds(refs: readonly string[]): string[] {
    return refs.map((ref) => {
      if (this.registry.get(ref)) return ref;
      try {
        return /^https?:\/\//i.test(ref) ? describeUrl(ref).id : describeFile(ref, this.root).id;
      } catch {
        return ref;
      }
    });
  }

  /**
   * Similarity search over the current generation.
   *
   * @param scope Allowed document references; `undefined` searches the whole generation, an
   *   empty list searches nothing.
   */
  public async search(
    query: string,
    k: number,
    scope?: readonly string[],
    signal?: AbortSignal,
  ): Promise<ScoredChunk[]> {
    const gen = this.generation;
    if (!gen || gen.index.size === 0) return [];
    if (scope && scope.length === 0) return [];
    const vector = await this.queryEmbedder.embed(query, signal);
    return gen.index.query(vector, k, scope ? this.resolveDocumentIds(scope) : undefined);
  }

  /**
   * Build a new generation covering exactly the requested documents. Documents not named are
   * excluded from it even if previously indexed. Concurrent requests for the same document set
   * share one build.
   *
   * Per-document failures (unreadable source, unsupported or corrupt format, embedding
   * unavailable) mark that document failed and do not abort the batch.
   *
   * @throws {InvalidRequestError} for an empty request or malformed paths/URLs.
   * @throws {DimensionMismatchError} when embeddings disagree in length; the generation is
   *   discarded and every requested document is restored to its previous state.
   */
  public async indexSelection(request: SelectionRequest): Promise<IngestionReport> {
    const descriptors = new Map<string, DocumentDescriptor>();
    for (const f of request.files ?? []) {
      const d = describeFile(f, this.root);
      descriptors.set(d.id, d);
    }
    for (const u of request.urls ?? []) {
      const d = describeUrl(u);
      descriptors.set(d.id, d);
    }
    if (descriptors.size === 0) {
      throw new InvalidRequestError("Select at least one file or URL to index");
    }

    const key = [...descriptors.keys()].sort().join("\n");
    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const run = this.exclusive(() => this.build([...descriptors.values()])).finally(() =>
      this.pending.delete(key),
    );
    this.pending.set(key, run);
    return run;
  }

  /**
   * Publish a generation equal to the current one minus the given documents. No embedding
   * work is done.
   */
  public removeDocuments(refs: readonly string[]): Promise<IndexGeneration | undefined> {
    const ids = this.resolveDocumentIds(refs);
    return this.exclusive(async () => {
      const base = this.generation;
      if (!base || !ids.some((id) => base.documentIds.has(id))) return base;
      const next = base.index.clone();
      const documentIds = new Set(base.documentIds);
      const fingerprints = new Map(base.fingerprints);
      for (const id of ids) {
        next.removeDocument(id);
        documentIds.delete(id);
        fingerprints.delete(id);
      }
      const gen = this.publish(next, documentIds, fingerprints);
      console.error(`[RAG] Removed ${ids.length} document(s); generation ${gen.id} now serves ${documentIds.size}.`);
      await this.saveSnapshot();
      return gen;
    });
  }

  /** Reload the persisted generation, if one is configured and compatible. */
  public async restore(): Promise<boolean> {
    if (!this.persistence) return false;
    const snapshot = await this.persistence.load({
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
      modelName: this.embedder.modelName,
    });
    if (!snapshot) return false;
    return this.exclusive(async () => {
      const index = new VectorIndex();
      for (const chunk of snapshot.chunks) {
        index.insert(chunk);
        this.embedder.cache.prime(chunk.text, chunk.emb);
      }
      const documentIds = new Set(index.documentIds());
      for (const record of snapshot.documents) {
        if (documentIds.has(record.id)) this.registry.restore(record);
      }
      this.nextGenerationId = snapshot.generationId;
      this.publish(index, documentIds, new Map(Object.entries(snapshot.fingerprints)));
      this.status.finishIndexing(snapshot.generationId);
      return true;
    });
  }

  // -------------------- Build pipeline --------------------

  /** Serialize writers: each task starts after the previous one settled. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeLock.then(task);
    this.writeLock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async build(descriptors: DocumentDescriptor[]): Promise<IngestionReport> {
    const previous = new Map<string, DocumentRecord>();
    for (const d of descriptors) {
      const record = this.registry.register(d);
      previous.set(record.id, record);
      this.registry.markIndexing(record.id);
    }
    this.status.beginIndexing(descriptors.length);
    console.error(`[RAG] Indexing ${descriptors.length} selected document(s)...`);

    const failures = new Map<string, Failure>();
    const fail = (id: string, e: unknown) => {
      failures.set(id, { error: errorMessage(e), code: isRagError(e) ? e.code : undefined });
      if (this.verbose) console.error(`[RAG][verbose] ${id} failed: ${errorMessage(e)}`);
    };

    try {
      // Phase 1: load + extract (bounded)
      const extracted: Extracted[] = [];
      await Promise.all(
        descriptors.map((d) =>
          this.docLimit(async () => {
            try {
              extracted.push(await this.extract(d.id));
            } catch (e) {
              fail(d.id, e);
            }
          }),
        ),
      );

      const reused = this.tryReuse(descriptors, extracted, failures);
      if (reused) return reused;

      // Phase 2: chunk + embed into a copy of the current index
      const next = this.generation ? this.generation.index.clone() : new VectorIndex();
      const controller = new AbortController();
      const abort: { fatal?: DimensionMismatchError } = {};
      const staged = new Map<string, EmbeddedChunk[]>();

      await Promise.all(
        extracted.map(async (doc) => {
          try {
            staged.set(doc.record.id, await this.embedDocument(doc, next, controller.signal));
          } catch (e) {
            if (e instanceof DimensionMismatchError) {
              abort.fatal ??= e;
              controller.abort();
            } else if (!abort.fatal) {
              fail(doc.record.id, e);
            }
          }
        }),
      );

      if (abort.fatal) {
        for (const record of previous.values()) this.registry.restore(record);
        console.error(`[RAG] Generation discarded: ${abort.fatal.message}`);
        throw abort.fatal;
      }

      // Phase 3: supersede stale chunks, then publish
      for (const id of next.documentIds()) {
        if (!staged.has(id)) next.removeDocument(id);
      }
      const fingerprints = new Map<string, string>();
      for (const doc of extracted) {
        const chunks = staged.get(doc.record.id);
        if (!chunks) continue;
        next.removeDocument(doc.record.id);
        for (const chunk of chunks) next.insert(chunk);
        fingerprints.set(doc.record.id, doc.fingerprint);
      }
      const gen = this.publish(next, new Set(staged.keys()), fingerprints, failures);
      await this.saveSnapshot();
      return this.report(descriptors, gen.id, false, failures);
    } finally {
      this.status.setCacheHits(this.embedder.cache.stats().hits);
      this.status.finishIndexing(this.generation?.id ?? null);
    }
  }

  private async extract(documentId: string): Promise<Extracted> {
    const record = this.registry.get(documentId);
    if (!record) throw new Error(`Unknown document: ${documentId}`);
    const bytes = await this.loader.load(record);
    const sized = this.registry.setByteLength(documentId, bytes.byteLength);
    const text = await this.extractor.extract(bytes, sized.format);
    return { record: sized, text, fingerprint: contentKey(text) };
  }

  private async embedDocument(
    doc: Extracted,
    target: VectorIndex,
    signal: AbortSignal,
  ): Promise<EmbeddedChunk[]> {
    const spans = [...chunkText(doc.text, this.options.chunkSize, this.options.chunkOverlap)];
    this.status.addChunks(spans.length);
    // the first failing chunk fails the document, so its siblings stop too
    const docController = new AbortController();
    const cancel = () => docController.abort();
    signal.addEventListener("abort", cancel, { once: true });
    if (signal.aborted) cancel();
    try {
      return await Promise.all(
        spans.map(async (span): Promise<EmbeddedChunk> => {
          try {
            throwIfAborted(docController.signal);
            const emb = await this.embedder.embed(span.text, docController.signal);
            target.ensureDimension(emb);
            this.status.incEmbedded();
            return {
              id: `${doc.record.id}#${span.seq}`,
              documentId: doc.record.id,
              seq: span.seq,
              start: span.start,
              end: span.end,
              text: span.text,
              emb,
            };
          } catch (e) {
            docController.abort();
            throw e;
          }
        }),
      );
    } finally {
      signal.removeEventListener("abort", cancel);
    }
  }

  /**
   * The same document set with unchanged extracted text is already served by the current
   * generation: keep it instead of publishing an identical one.
   */
  private tryReuse(
    descriptors: DocumentDescriptor[],
    extracted: Extracted[],
    failures: Map<string, Failure>,
  ): IngestionReport | undefined {
    const gen = this.generation;
    if (!gen || failures.size > 0 || gen.documentIds.size !== descriptors.length) return undefined;
    for (const doc of extracted) {
      if (gen.fingerprints.get(doc.record.id) !== doc.fingerprint) return undefined;
    }
    for (const d of descriptors) {
      this.registry.markIndexed(d.id, gen.id);
      this.status.recordDocument("indexed");
    }
    console.error(`[RAG] Selection unchanged; reusing generation ${gen.id}.`);
    return this.report(descriptors, gen.id, true, failures);
  }

  /** Atomically record outcomes and swap the current-generation pointer. */
  private publish(
    index: VectorIndex,
    documentIds: Set<string>,
    fingerprints: Map<string, string>,
    failures?: Map<string, Failure>,
  ): IndexGeneration {
    const gen: IndexGeneration = {
      id: this.nextGenerationId++,
      documentIds,
      index,
      fingerprints,
      createdAt: new Date().toISOString(),
    };
    for (const [id, failure] of failures ?? []) {
      this.registry.markFailed(id, failure.error);
      this.status.recordDocument("failed");
    }
    for (const id of documentIds) {
      const before = this.registry.status(id);
      if (before !== "indexing" && before !== "indexed") continue;
      this.registry.markIndexed(id, gen.id);
      if (before === "indexing") this.status.recordDocument("indexed");
    }
    this.generation = gen;
    console.error(
      `[RAG] Generation ${gen.id} ready: ${documentIds.size} document(s), ${index.size} chunks.`,
    );
    return gen;
  }

  private report(
    descriptors: DocumentDescriptor[],
    generationId: number,
    reused: boolean,
    failures: Map<string, Failure>,
  ): IngestionReport {
    const gen = this.generation;
    const documents = descriptors.map((d): DocumentOutcome => {
      const failure = failures.get(d.id);
      if (failure) {
        return {
          id: d.id,
          location: d.location,
          status: "failed",
          chunks: 0,
          error: failure.error,
          errorCode: failure.code,
        };
      }
      return {
        id: d.id,
        location: d.location,
        status: "indexed",
        chunks: gen?.index.chunksOf(d.id).length ?? 0,
      };
    });
    const failed = documents.filter((d) => d.status === "failed").length;
    return { generationId, reused, indexed: documents.length - failed, failed, documents };
  }

  private async saveSnapshot(): Promise<void> {
    const gen = this.generation;
    if (!this.persistence || !gen) return;
    const documents: DocumentRecord[] = [];
    for (const id of gen.documentIds) {
      const record = this.registry.get(id);
      if (record) documents.push(record);
    }
    await this.persistence.save(
      {
        generationId: gen.id,
        documents,
        chunks: [...gen.documentIds].flatMap((id) => gen.index.chunksOf(id)),
        fingerprints: Object.fromEntries(gen.fingerprints),
      },
      {
        chunkSize: this.options.chunkSize,
        chunkOverlap: this.options.chunkOverlap,
        modelName: this.embedder.modelName,
      },
    );
  }
}
