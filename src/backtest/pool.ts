/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Once
 * `signal` aborts no new item starts; items already running finish.
 */
export async function runPool<T>(params: {
  items: T[];
  concurrency: number;
  worker: (item: T, index: number) => Promise<void>;
  signal?: AbortSignal;
}): Promise<{ started: number }> {
  const limit = Math.max(1, Math.floor(params.concurrency));
  let next = 0;
  const lanes = Array.from({ length: Math.min(limit, params.items.length) }, async () => {
    while (next < params.items.length && !params.signal?.aborted) {
      const index = next;
      next += 1;
      await params.worker(params.items[index], index);
    }
  });
  await Promise.all(lanes);
  return { started: next };
}
