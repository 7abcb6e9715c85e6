export type PoolOutcome<R> = { index: number; started: true; value: R } | { index: number; started: false };

// FIFO, at most `concurrency` in flight. After abort nothing new starts.
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolOutcome<R>[]> {
  const outcomes: PoolOutcome<R>[] = items.map((_, index) => ({ index, started: false }));
  let next = 0;

  const lane = async () => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      const value = await worker(item, index);
      outcomes[index] = { index, started: true, value };
    }
  };

  const lanes: Promise<void>[] = [];
  const width = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  for (let i = 0; i < width; i++) lanes.push(lane());
  await Promise.all(lanes);
  return outcomes;
}
