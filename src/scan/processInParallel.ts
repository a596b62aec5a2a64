// Runs `processor` over `items` with at most `concurrency` calls in flight.
// Each result lands in the slot of its input, whatever order calls finish in.
// The first failure (or an abort of `signal`) stops handing out work and
// aborts the signal given to the calls still in flight.
export async function processInParallel<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  onProgress?: (completed: number, total: number, result: R) => void,
  signal?: AbortSignal
): Promise<R[]> {
  signal?.throwIfAborted();
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", forwardAbort, { once: true });

  const results: R[] = new Array(items.length);
  let currentIndex = 0;
  let completed = 0;

  async function processNext(): Promise<void> {
    while (currentIndex < items.length) {
      controller.signal.throwIfAborted();
      const index = currentIndex++;
      try {
        const result = await processor(items[index], index, controller.signal);
        results[index] = result;
        completed++;
        onProgress?.(completed, items.length, result);
      } catch (error) {
        controller.abort(error);
        throw error;
      }
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => processNext()
  );

  try {
    await Promise.all(workers);
    return results;
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }
}
