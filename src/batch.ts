export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface KeyedResult<K, T> {
  key: K;
  result: Settled<T>;
}

export interface BatchOptions {
  batchSize: number;
  pauseMs: number;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (settled: number, total: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `task` for every key, at most `batchSize` at a time. Each batch is
 * awaited in full (failures included) before the next one starts, with a
 * fixed pause in between. Results come back in key order, never thrown.
 */
export async function settleInBatches<K, T>(
  keys: readonly K[],
  task: (key: K) => Promise<T>,
  opts: BatchOptions
): Promise<KeyedResult<K, T>[]> {
  const { batchSize, pauseMs } = opts;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  const wait = opts.sleep ?? sleep;

  const results: KeyedResult<K, T>[] = [];

  for (let i = 0; i < keys.length; i += batchSize) {
    if (i > 0 && pauseMs > 0) await wait(pauseMs);

    const batch = keys.slice(i, i + batchSize);
    // Wrap so a synchronous throw inside task() still lands in allSettled
    const settled = await Promise.allSettled(batch.map((key) => Promise.resolve().then(() => task(key))));

    settled.forEach((outcome, idx) => {
      results.push({
        key: batch[idx],
        result: outcome.status === "fulfilled" ? { ok: true, value: outcome.value } : { ok: false, error: outcome.reason },
      });
    });

    opts.onProgress?.(results.length, keys.length);
  }

  return results;
}
