import { APP_VERSION } from "./config";

/**
 * Aggregated counters for the ingestion / embedding pipeline. Counters describe the most recent
 * selective indexing request except `embeddingCacheHits`, which accumulates per process.
 */
export interface IndexingStatus {
  /** Documents named by the most recent selective indexing request. */
  documentsRequested: number;
  /** Documents of that request that reached "indexed". */
  documentsIndexed: number;
  /** Documents of that request that ended "failed". */
  documentsFailed: number;
  /** Chunks produced for the request. */
  chunksTotal: number;
  /** Chunks whose embedding is available so far. */
  chunksEmbedded: number;
  /** Embeddings served from the content-addressed cache. */
  embeddingCacheHits: number;
  /** Generation currently served to readers (null before the first swap). */
  currentGeneration: number | null;
}

/**
 * Mutable in-memory snapshot of server lifecycle + indexing progress.
 *
 * ready = true while no indexing request is in flight.
 */
export interface ServerStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  /** Embedding model identifier. */
  modelName: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  indexing: IndexingStatus;
}

/** Owner of the mutable server status; every update goes through a method. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? true,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? {
        documentsRequested: 0,
        documentsIndexed: 0,
        documentsFailed: 0,
        chunksTotal: 0,
        chunksEmbedded: 0,
        embeddingCacheHits: 0,
        currentGeneration: null,
      },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  /** Reset per-request counters at the start of a selective indexing request. */
  public beginIndexing(documents: number) {
    this.data.ready = false;
    Object.assign(this.data.indexing, {
      documentsRequested: documents,
      documentsIndexed: 0,
      documentsFailed: 0,
      chunksTotal: 0,
      chunksEmbedded: 0,
    });
  }

  public addChunks(count: number) {
    this.data.indexing.chunksTotal += count;
  }

  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  public setCacheHits(hits: number) {
    this.data.indexing.embeddingCacheHits = hits;
  }

  public recordDocument(outcome: "indexed" | "failed") {
    if (outcome === "indexed") this.data.indexing.documentsIndexed++;
    else this.data.indexing.documentsFailed++;
  }

  /** Request finished (successfully or not); `generation` is the one now served. */
  public finishIndexing(generation: number | null) {
    this.data.indexing.currentGeneration = generation;
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }
}

// Singleton instance shared by the server entry point and the HTTP health route.
export const statusManager = new StatusManager();
