/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Items sharing a key (as returned by `keyOf`) are processed one after another by
 * the same lane, so per-key read/decide/write sequences never interleave.
 * Results come back in input order.
 */
export async function runPartitioned<T, R>(
  items: readonly T[],
  keyOf: (item: T) => string,
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const groups = new Map<string, number[]>();
  items.forEach((item, index) => {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(index);
    } else {
      groups.set(key, [index]);
    }
  });

  const queue = Array.from(groups.values());
  const results = new Array<R>(items.length);
  const lanes = Math.max(1, Math.min(Math.trunc(concurrency) || 1, queue.length));

  let next = 0;
  const runLane = async (): Promise<void> => {
    while (next < queue.length) {
      const group = queue[next++];
      if (!group) continue;
      for (const index of group) {
        const item = items[index];
        if (item === undefined) continue;
        results[index] = await worker(item, index);
      }
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => runLane()));
  return results;
}
