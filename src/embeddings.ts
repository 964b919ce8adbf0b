import OpenAI from "openai";
import { EmbeddingCache, contentKey } from "./cache";
import { AbortedError, type Limiter, sleep, throwIfAborted } from "./async";
import { EmbeddingUnavailableError } from "./errors";

/**
 * External embedding capability: text in, fixed-length vector out. Implementations may be slow
 * and may fail transiently; callers go through {@link CachingEmbedder}.
 */
export interface Embedder {
  /** Identifier of the underlying model (used for snapshot compatibility checks). */
  readonly modelName: string;
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;
}

/** Embedder backed by the OpenAI embeddings endpoint. */
export class OpenAIEmbedder implements Embedder {
  public readonly modelName: string;
  private readonly client: OpenAI;

  public constructor(client: OpenAI, modelName?: string) {
    this.client = client;
    // Resolution precedence: explicit ctor arg > EMBEDDING_MODEL env var > default model
    this.modelName =
      modelName?.trim() || process.env.EMBEDDING_MODEL?.trim() || "text-embedding-3-small";
  }

  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    // retries belong to CachingEmbedder; the client must not multiply them
    const response = await this.client.embeddings.create(
      { model: this.modelName, input: text.replace(/\n/g, " ") },
      { signal, maxRetries: 0 },
    );
    const first = response.data.at(0);
    if (!first) throw new Error("Embeddings API returned no vectors");
    return Float32Array.from(first.embedding);
  }
}

export interface CachingEmbedderOptions {
  /** Retries after the first failed attempt (default 2, i.e. 3 attempts in total). */
  maxRetries?: number;
  /** Base backoff delay; attempt n waits base * 2^(n-1) ms (default 250). */
  retryBaseMs?: number;
  /** Shared bounded pool for outgoing embed calls. */
  limiter?: Limiter;
  /** Shared cache; a private one is created when omitted. */
  cache?: EmbeddingCache;
  /** Capacity of the private cache. */
  cacheSize?: number;
  verbose?: boolean;
}

/** One embed call shared by every caller asking for the same text at the same time. */
interface SharedEmbed {
  readonly key: string;
  readonly controller: AbortController;
  readonly promise: Promise<Float32Array>;
  waiters: number;
}

/**
 * Wraps an {@link Embedder} with a content-addressed cache, in-flight de-duplication, bounded
 * concurrency and bounded retry with exponential backoff.
 *
 * A shared call runs under its own signal. Each caller's signal only detaches that caller; the
 * call itself is cancelled once every caller holding a signal has left and no caller without
 * one is waiting.
 */
export class CachingEmbedder implements Embedder {
  public readonly cache: EmbeddingCache;
  private readonly inner: Embedder;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly limiter?: Limiter;
  private readonly verbose: boolean;
  private readonly inFlight = new Map<string, SharedEmbed>();

  public constructor(inner: Embedder, opts: CachingEmbedderOptions = {}) {
    this.inner = inner;
    this.cache = opts.cache ?? new EmbeddingCache(opts.cacheSize);
    this.maxRetries = Math.max(0, Math.floor(opts.maxRetries ?? 2));
    this.retryBaseMs = Math.max(0, opts.retryBaseMs ?? 250);
    this.limiter = opts.limiter;
    this.verbose = !!opts.verbose;
  }

  public get modelName(): string {
    return this.inner.modelName;
  }

  /**
   * Embed text, serving unchanged text from the cache.
   *
   * @throws {EmbeddingUnavailableError} once every attempt failed.
   * @throws {AbortedError} when `signal` aborts while waiting.
   */
  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const cached = this.cache.get(text);
    if (cached) return cached;

    throwIfAborted(signal);

    const key = contentKey(text);
    let shared = this.inFlight.get(key);
    if (!shared) {
      const controller = new AbortController();
      const promise = this.embedWithRetry(text, controller.signal)
        .then((vec) => {
          this.cache.set(text, vec);
          return vec;
        })
        .finally(() => {
          if (this.inFlight.get(key) === entry) this.inFlight.delete(key);
        });
      const entry: SharedEmbed = { key, controller, promise, waiters: 0 };
      this.inFlight.set(key, entry);
      shared = entry;
    }
    shared.waiters++;
    if (!signal) return shared.promise;
    return this.detachOnAbort(shared, signal);
  }

  /** Settle with the shared call, or reject as soon as this caller's own signal aborts. */
  private detachOnAbort(shared: SharedEmbed, signal: AbortSignal): Promise<Float32Array> {
    return new Promise<Float32Array>((resolve, reject) => {
      const onAbort = () => {
        this.leave(shared);
        reject(new AbortedError());
      };
      signal.addEventListener("abort", onAbort, { once: true });
      shared.promise.then(
        (vec) => {
          signal.removeEventListener("abort", onAbort);
          resolve(vec);
        },
        (e: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(e);
        },
      );
    });
  }

  private leave(shared: SharedEmbed): void {
    shared.waiters--;
    if (shared.waiters > 0) return;
    // nobody is left to use the result; later callers start a fresh call
    if (this.inFlight.get(shared.key) === shared) this.inFlight.delete(shared.key);
    shared.controller.abort();
  }

  private async embedWithRetry(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const attempts = this.maxRetries + 1;
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (signal?.aborted) throw new AbortedError();
      try {
        const call = () => this.inner.embed(text, signal);
        return this.limiter ? await this.limiter(call) : await call();
      } catch (e) {
        if (e instanceof AbortedError || signal?.aborted) throw e;
        lastError = e;
        if (attempt < attempts) {
          const delay = this.retryBaseMs * 2 ** (attempt - 1);
          if (this.verbose) {
            console.error(
              `[RAG][verbose] Embedding attempt ${attempt}/${attempts} failed, retrying in ${delay}ms`,
            );
          }
          await sleep(delay, signal);
        }
      }
    }
    throw new EmbeddingUnavailableError(attempts, lastError);
  }
}

/**
 * Cosine similarity between two vectors of equal length. Zero vectors score 0.
 *
 * @returns Cosine similarity in range [-1, 1]
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}
