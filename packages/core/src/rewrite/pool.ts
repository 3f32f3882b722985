/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results keep input order.
 * After the first failure no new item is started and that failure is raised.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && !signal?.aborted && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (e) {
        failed = true;
        throw e;
      }
    }
  };

  const width = Math.min(Math.max(1, Math.floor(limit)), items.length);
  await Promise.all(Array.from({ length: width }, worker));
  return results;
}

/**
 * Runs `run` under an optional deadline. When it passes, the signal handed to `run` is
 * aborted and the error from `onTimeout` is raised; a late result is discarded.
 */
export async function withDeadline<T>(
  timeoutMs: number | undefined,
  run: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined) return run(controller.signal);

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
