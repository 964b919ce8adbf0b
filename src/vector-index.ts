import { cosine } from "./embeddings";
import { DimensionMismatchError } from "./errors";
import type { EmbeddedChunk } from "./types";

/** A chunk returned by a similarity query, with its cosine score. */
export interface ScoredChunk {
  readonly chunk: EmbeddedChunk;
  readonly score: number;
}

/**
 * Deterministic ranking: score descending, then lower chunk sequence, then lower document id,
 * then chunk id.
 */
export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.chunk.seq !== b.chunk.seq) return a.chunk.seq - b.chunk.seq;
  if (a.chunk.documentId !== b.chunk.documentId) return a.chunk.documentId < b.chunk.documentId ? -1 : 1;
  if (a.chunk.id === b.chunk.id) return 0;
  return a.chunk.id < b.chunk.id ? -1 : 1;
}

/**
 * In-memory flat (brute-force) cosine index over chunk embeddings. Every entry must share the
 * index dimension, fixed by the constructor or by the first vector seen.
 *
 * Queries are restricted to an allowed set of document ids before ranking, so an out-of-scope
 * near-duplicate never takes a top-k slot.
 */
export class VectorIndex {
  private readonly chunks = new Map<string, EmbeddedChunk>();
  private readonly byDocument = new Map<string, Set<string>>();
  private dim: number | undefined;

  public constructor(dimension?: number) {
    this.dim = dimension;
  }

  /** Vector dimension, undefined until fixed. */
  public get dimension(): number | undefined {
    return this.dim;
  }

  /** Number of chunks held. */
  public get size(): number {
    return this.chunks.size;
  }

  /**
   * Check a vector against the index dimension, fixing the dimension on first use.
   *
   * @throws {DimensionMismatchError}
   */
  public ensureDimension(vector: Float32Array): void {
    if (this.dim === undefined) {
      this.dim = vector.length;
      return;
    }
    if (vector.length !== this.dim) throw new DimensionMismatchError(this.dim, vector.length);
  }

  /**
   * Add or replace a chunk entry, keyed by chunk id.
   *
   * @throws {DimensionMismatchError} when the embedding length differs from the index dimension.
   */
  public insert(chunk: EmbeddedChunk): void {
    this.ensureDimension(chunk.emb);
    const previous = this.chunks.get(chunk.id);
    if (previous && previous.documentId !== chunk.documentId) {
      this.byDocument.get(previous.documentId)?.delete(chunk.id);
    }
    this.chunks.set(chunk.id, chunk);
    let ids = this.byDocument.get(chunk.documentId);
    if (!ids) {
      ids = new Set();
      this.byDocument.set(chunk.documentId, ids);
    }
    ids.add(chunk.id);
  }

  /**
   * Return the `k` most similar chunks owned by an allowed document, best first.
   *
   * @param vector Query embedding.
   * @param k Maximum number of results.
   * @param allowedDocumentIds Document scope; `undefined` means every document, an empty
   *   collection means none.
   */
  public query(
    vector: Float32Array,
    k: number,
    allowedDocumentIds?: Iterable<string>,
  ): ScoredChunk[] {
    if (k <= 0 || this.chunks.size === 0) return [];
    if (this.dim !== undefined && vector.length !== this.dim) {
      throw new DimensionMismatchError(this.dim, vector.length);
    }

    const candidates: EmbeddedChunk[] = [];
    if (allowedDocumentIds === undefined) {
      candidates.push(...this.chunks.values());
    } else {
      for (const docId of new Set(allowedDocumentIds)) {
        const ids = this.byDocument.get(docId);
        if (!ids) continue;
        for (const id of ids) {
          const chunk = this.chunks.get(id);
          if (chunk) candidates.push(chunk);
        }
      }
    }

    return candidates
      .map((chunk) => ({ chunk, score: cosine(chunk.emb, vector) }))
      .sort(compareScored)
      .slice(0, k);
  }

  /** Remove every chunk owned by a document. Returns the number of chunks removed. */
  public removeDocument(documentId: string): number {
    const ids = this.byDocument.get(documentId);
    if (!ids) return 0;
    for (const id of ids) this.chunks.delete(id);
    this.byDocument.delete(documentId);
    return ids.size;
  }

  public hasDocument(documentId: string): boolean {
    return this.byDocument.has(documentId);
  }

  /** Ids of documents with at least one chunk in the index, sorted. */
  public documentIds(): string[] {
    return [...this.byDocument.keys()].sort();
  }

  /** Chunks of one document in sequence order. */
  public chunksOf(documentId: string): EmbeddedChunk[] {
    const ids = this.byDocument.get(documentId);
    if (!ids) return [];
    const out: EmbeddedChunk[] = [];
    for (const id of ids) {
      const chunk = this.chunks.get(id);
      if (chunk) out.push(chunk);
    }
    return out.sort((a, b) => a.seq - b.seq);
  }

  /** Shallow copy sharing the (immutable) chunk objects. */
  public clone(): VectorIndex {
    const copy = new VectorIndex(this.dim);
    for (const chunk of this.chunks.values()) copy.insert(chunk);
    return copy;
  }
}
