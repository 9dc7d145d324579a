/**
 * Unit tests for the bounded batch runner
 */

import { settleInBatches } from "../batch";

const noSleep = () => Promise.resolve();

describe("settleInBatches", () => {
  it("should keep going past individual failures and report them per key", async () => {
    const keys = Array.from({ length: 25 }, (_, i) => `T${i + 1}`);
    const failing = new Set(["T10", "T20"]);

    const results = await settleInBatches(
      keys,
      async (key) => {
        if (failing.has(key)) throw new Error(`boom ${key}`);
        return key.toLowerCase();
      },
      { batchSize: 20, pauseMs: 0, sleep: noSleep }
    );

    expect(results.map((r) => r.key)).toEqual(keys);
    expect(results.filter((r) => r.result.ok)).toHaveLength(23);

    const tenth = results[9].result;
    expect(tenth.ok).toBe(false);
    expect(tenth).toEqual({ ok: false, error: new Error("boom T10") });

    const first = results[0].result;
    expect(first).toEqual({ ok: true, value: "t1" });
  });

  it("should never run more than batchSize tasks at once", async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await settleInBatches(
      Array.from({ length: 10 }, (_, i) => i),
      async (key) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await Promise.resolve();
        await Promise.resolve();
        inFlight--;
        return key;
      },
      { batchSize: 4, pauseMs: 0, sleep: noSleep }
    );

    expect(maxInFlight).toBe(4);
  });

  it("should start a batch only after the previous one settled", async () => {
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const run = settleInBatches(
      ["a", "b", "c"],
      async (key) => {
        order.push(`start:${key}`);
        if (key === "a") await gate;
        order.push(`end:${key}`);
        return key;
      },
      { batchSize: 2, pauseMs: 0, sleep: noSleep }
    );

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(["start:a", "start:b", "end:b"]);

    release();
    await run;
    expect(order).toEqual(["start:a", "start:b", "end:b", "end:a", "start:c", "end:c"]);
  });

  it("should pause between batches but not after the last one", async () => {
    const sleep = jest.fn((_ms: number) => Promise.resolve());
    const progress: [number, number][] = [];

    await settleInBatches(
      Array.from({ length: 10 }, (_, i) => i),
      async (key) => key,
      { batchSize: 4, pauseMs: 200, sleep, onProgress: (settled, total) => progress.push([settled, total]) }
    );

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(200);
    expect(progress).toEqual([
      [4, 10],
      [8, 10],
      [10, 10],
    ]);
  });

  it("should capture synchronous throws as failures", async () => {
    const results = await settleInBatches(
      ["x"],
      (): Promise<string> => {
        throw new Error("sync failure");
      },
      { batchSize: 1, pauseMs: 0 }
    );

    expect(results[0].result.ok).toBe(false);
  });

  it("should return nothing for no keys", async () => {
    await expect(settleInBatches([], async (k: string) => k, { batchSize: 5, pauseMs: 100 })).resolves.toEqual([]);
  });

  it("should reject a non-positive batch size", async () => {
    await expect(settleInBatches([1], async (k) => k, { batchSize: 0, pauseMs: 0 })).rejects.toThrow(RangeError);
  });
});
