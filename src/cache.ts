/**
 * Content-addressed embedding cache.
 *
 * Keys are SHA-256 digests of the normalized chunk text, so an unchanged chunk that is
 * re-indexed (or appears in several documents) is embedded once while it stays cached. The
 * cache holds at most `maxEntries` vectors and evicts the least recently used one first. It can
 * be primed from a persisted snapshot.
 */
import { createHash } from "node:crypto";

/** Unicode NFC, whitespace runs collapsed to one space, trimmed. */
export function normalizeText(text: string): string {
  return text.normalize("NFC").replace(/\s+/g, " ").trim();
}

/** Cache key for a piece of text. */
export function contentKey(text: string): string {
  return createHash("sha256").update(normalizeText(text), "utf8").digest("hex");
}

export interface EmbeddingCacheStats {
  entries: number;
  hits: number;
  misses: number;
  evictions: number;
}

export const DEFAULT_CACHE_ENTRIES = 50_000;

export class EmbeddingCache {
  public readonly maxEntries: number;
  // Map iteration order is insertion order: the first key is the least recently used.
  private readonly entries = new Map<string, Float32Array>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  public constructor(maxEntries = DEFAULT_CACHE_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  /** Look up a cached vector, counting the hit or miss and marking it recently used. */
  public get(text: string): Float32Array | undefined {
    const key = contentKey(text);
    const vec = this.entries.get(key);
    if (vec) {
      this.hits++;
      this.entries.delete(key);
      this.entries.set(key, vec);
    } else {
      this.misses++;
    }
    return vec;
  }

  public has(text: string): boolean {
    return this.entries.has(contentKey(text));
  }

  public set(text: string, vector: Float32Array): void {
    const key = contentKey(text);
    this.entries.delete(key);
    this.entries.set(key, vector);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  /** Seed the cache without touching hit/miss counters (snapshot restore). */
  public prime(text: string, vector: Float32Array): void {
    this.set(text, vector);
  }

  public clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  public stats(): EmbeddingCacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses, evictions: this.evictions };
  }
}
