/**
 * Yields items from a newest-first sequence while their timestamp is at or
 * after `since`, and stops at the first older item. The upstream is pulled
 * at most (items in window + 1) times; leaving the loop closes it, so a
 * paginated source stops requesting pages.
 *
 * The sequence must already be sorted newest first. An out-of-order item
 * older than `since` ends the window early. Once `signal` is aborted the next
 * item rejects with its reason, which also closes the upstream.
 */
export async function* takeWithinWindow<T>(
  items: AsyncIterable<T>,
  since: Date,
  timestampOf: (item: T) => Date,
  signal?: AbortSignal
): AsyncGenerator<T> {
  const cutoff = since.getTime();
  signal?.throwIfAborted();
  for await (const item of items) {
    signal?.throwIfAborted();
    if (timestampOf(item).getTime() < cutoff) {
      return;
    }
    yield item;
  }
}

export async function collectWithinWindow<T>(
  items: AsyncIterable<T>,
  since: Date,
  timestampOf: (item: T) => Date,
  signal?: AbortSignal
): Promise<T[]> {
  const collected: T[] = [];
  for await (const item of takeWithinWindow(items, since, timestampOf, signal)) {
    collected.push(item);
  }
  return collected;
}
