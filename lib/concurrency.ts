/**
 * Small async helpers shared by the conversion pipeline
 */

/**
 * Race a task against a timer. The task receives a signal that is aborted
 * when the timer fires, so the underlying request can be torn down.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Results keep input order. After the first failure, or once `signal` is
 * aborted, no new item starts; in-flight items are awaited before rejecting.
 * Slots for items that never started stay empty, so callers check `signal`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, workerId: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const failures: unknown[] = [];

  const run = async (workerId: number) => {
    while (failures.length === 0 && !signal?.aborted && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], workerId);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, (_, workerId) => run(workerId)));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
