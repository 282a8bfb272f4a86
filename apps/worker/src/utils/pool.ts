export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Run `worker` over `items` with at most `limit` in flight. Each item is handled by exactly
 * one worker; results come back in input order regardless of completion order.
 */
export async function runPool<I, T>(
  items: readonly I[],
  limit: number,
  worker: (item: I, index: number) => Promise<T>,
): Promise<Settled<T>[]> {
  const results = new Array<Settled<T>>(items.length);
  // One iterator shared by every lane: each item is pulled exactly once.
  const queue = items.entries();
  const size = Math.max(1, Math.min(Math.trunc(limit), items.length));

  async function lane() {
    for (const [i, item] of queue) {
      try {
        results[i] = { ok: true, value: await worker(item, i) };
      } catch (error) {
        results[i] = { ok: false, error };
      }
    }
  }

  await Promise.all(Array.from({ length: size }, () => lane()));
  return results;
}
