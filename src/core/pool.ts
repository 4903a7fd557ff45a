export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Results keep
 * input order; a rejected item never stops the others.
 */
export async function runWithConcurrency<I, T>(
  items: readonly I[],
  concurrency: number,
  worker: (item: I, index: number) => Promise<T>,
): Promise<Settled<T>[]> {
  const results: Settled<T>[] = new Array(items.length);
  if (!items.length) return results;

  const workerCount = Math.max(1, Math.min(Math.trunc(concurrency) || 1, items.length));
  let nextIndex = 0;

  const lanes = Array.from({ length: workerCount }, async () => {
    while (nextIndex < items.length) {
      const current = nextIndex;
      nextIndex += 1;
      const item = items[current];
      if (item === undefined) continue;
      try {
        results[current] = { ok: true, value: await worker(item, current) };
      } catch (error) {
        results[current] = { ok: false, error };
      }
    }
  });

  await Promise.all(lanes);
  return results;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
