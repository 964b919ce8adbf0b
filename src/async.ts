/**
 * Shared async helpers: bounded concurrency, timeouts and backoff sleeps.
 */

/** Error thrown when a wrapped promise does not settle in time. */
export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(timeoutMs: number, context?: string) {
    super(
      context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`,
    );
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Error used when an operation observes an aborted signal. */
export class AbortedError extends Error {
  public constructor(reason?: string) {
    super(reason ?? "Operation aborted");
    this.name = "AbortedError";
  }
}

export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Invoked when the timeout fires, e.g. to abort the underlying request. */
  onTimeout?: () => void;
}

/**
 * Wrap a promise with a timeout. A non-positive or missing timeout returns the promise as-is.
 *
 * @throws TimeoutError if the promise does not settle within timeoutMs
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions,
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          // settle first so the race reports the timeout, not the abort it triggers
          reject(new TimeoutError(timeoutMs, options?.context));
          options?.onTimeout?.();
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

/**
 * Resolve after `ms` milliseconds, or reject early with {@link AbortedError} once `signal`
 * aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortedError());
  if (ms <= 0) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Reject with {@link AbortedError} when the signal has already fired. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AbortedError();
}

/** A function that runs `task` once a slot in the pool is free. */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Create a bounded-concurrency pool: at most `maxConcurrency` tasks are in flight, the rest
 * wait in FIFO order.
 */
export function createLimiter(maxConcurrency: number): Limiter {
  if (!Number.isInteger(maxConcurrency) || maxConcurrency <= 0) {
    throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
  }
  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    active--;
    const next = queue.shift();
    if (next) next();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const run = () => {
        active++;
        void Promise.resolve().then(task).then(resolve, reject).finally(release);
      };
      if (active < maxConcurrency) run();
      else queue.push(run);
    });
}
