import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runPool, TaskTimeoutError } from "./worker-pool.js";

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(signal.reason);
    });
  });
}

const handlers = {
  onTimeout: (item: number) => `timeout:${item}`,
  onError: (item: number, err: unknown) => `error:${item}:${err instanceof Error ? err.message : String(err)}`,
};

describe("runPool", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns results in input order regardless of completion order", async () => {
    const pending = runPool([30, 10, 20], async (ms) => {
      await delay(ms);
      return `done:${ms}`;
    }, { concurrency: 3, timeoutMs: 1_000, ...handlers });

    await vi.advanceTimersByTimeAsync(30);
    await expect(pending).resolves.toEqual(["done:30", "done:10", "done:20"]);
  });

  it("never has more than `concurrency` workers in flight", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const items = Array.from({ length: 10 }, (_, i) => i);

    const pending = runPool<number, number | string>(items, async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(10 + (item % 3) * 5);
      inFlight--;
      return item;
    }, { concurrency: 3, timeoutMs: 1_000, ...handlers });

    await vi.advanceTimersByTimeAsync(200);
    await expect(pending).resolves.toEqual(items);
    expect(maxInFlight).toBe(3);
  });

  it("times out a stalled item without blocking the others", async () => {
    const seenSignals: AbortSignal[] = [];
    const pending = runPool([0, 1, 2, 3], async (item, signal) => {
      seenSignals.push(signal);
      if (item === 0) await new Promise<never>(() => {});
      await delay(10, signal);
      return `done:${item}`;
    }, { concurrency: 2, timeoutMs: 100, ...handlers });

    // Items 1..3 finish on the second lane within 30ms
    await vi.advanceTimersByTimeAsync(30);
    expect(seenSignals).toHaveLength(4);

    await vi.advanceTimersByTimeAsync(70);
    await expect(pending).resolves.toEqual(["timeout:0", "done:1", "done:2", "done:3"]);
    expect(seenSignals[0].aborted).toBe(true);
    expect(seenSignals[0].reason).toBeInstanceOf(TaskTimeoutError);
    expect(seenSignals[1].aborted).toBe(false);
  });

  it("bounds the total time by ceil(n / concurrency) * timeout", async () => {
    const started = Date.now();
    const pending = runPool([1, 2, 3, 4, 5], () => new Promise<string>(() => {}), {
      concurrency: 2,
      timeoutMs: 100,
      ...handlers,
    });

    await vi.advanceTimersByTimeAsync(300);
    await expect(pending).resolves.toEqual(["timeout:1", "timeout:2", "timeout:3", "timeout:4", "timeout:5"]);
    expect(Date.now() - started).toBe(300);
  });

  it("ignores a late completion after the timeout", async () => {
    const pending = runPool([1], async () => {
      await delay(500);
      return "late";
    }, { concurrency: 1, timeoutMs: 100, ...handlers });

    await vi.advanceTimersByTimeAsync(100);
    await expect(pending).resolves.toEqual(["timeout:1"]);
    await vi.advanceTimersByTimeAsync(400);
  });

  it("turns worker failures into results", async () => {
    const pending = runPool([1, 2], async (item) => {
      if (item === 2) throw new Error("boom");
      return `done:${item}`;
    }, { concurrency: 2, timeoutMs: 100, ...handlers });

    await expect(pending).resolves.toEqual(["done:1", "error:2:boom"]);
  });

  it("handles an empty list", async () => {
    await expect(runPool([], async () => "x", { concurrency: 5, timeoutMs: 100, ...handlers })).resolves.toEqual([]);
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(runPool([1], async () => "x", { concurrency: 0, timeoutMs: 100, ...handlers })).rejects.toThrow(
      RangeError,
    );
  });
});
