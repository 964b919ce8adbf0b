import { describe, expect, it } from "vitest";
import { AbortedError, TimeoutError, createLimiter, sleep, withTimeout } from "./async";

describe("withTimeout", () => {
  it("resolves when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 50)).resolves.toBe(7);
  });

  it("rejects with TimeoutError and runs the timeout hook", async () => {
    let fired = false;
    const pending = new Promise<number>(() => undefined);
    const err = await withTimeout(pending, 10, { context: "slow call", onTimeout: () => (fired = true) }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: "Timeout after 10ms: slow call", timeoutMs: 10 });
    expect(fired).toBe(true);
  });

  it("passes the promise through without a timeout", async () => {
    await expect(withTimeout(Promise.resolve("x"), 0)).resolves.toBe("x");
  });
});

describe("sleep", () => {
  it("rejects early when aborted", async () => {
    const controller = new AbortController();
    const slept = sleep(10_000, controller.signal);
    controller.abort();
    await expect(slept).rejects.toBeInstanceOf(AbortedError);
  });
});

describe("createLimiter", () => {
  it("never runs more than the configured number of tasks at once", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;
    const order: number[] = [];
    await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        limit(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(5);
          order.push(n);
          active--;
        }),
      ),
    );
    expect(peak).toBe(2);
    expect(order.sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("propagates task failures", async () => {
    const limit = createLimiter(1);
    await expect(limit(() => Promise.reject(new Error("nope")))).rejects.toThrow("nope");
    await expect(limit(() => Promise.resolve(1))).resolves.toBe(1);
  });

  it("rejects a non-positive pool size", () => {
    expect(() => createLimiter(0)).toThrow(RangeError);
  });
});
