/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep the input order. The first rejection rejects the whole batch
 * once in-flight calls have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const size = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  }

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < size; i++) lanes.push(lane());

  const settled = await Promise.allSettled(lanes);
  for (const s of settled) {
    if (s.status === 'rejected') throw s.reason;
  }
  return results;
}
