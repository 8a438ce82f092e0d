/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep the order of `items`. The worker is expected to turn its
 * own failures into values; a thrown error rejects the whole run.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length)
  let next = 0

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      results[index] = await worker(items[index], index)
    }
  }

  const lanes = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: lanes }, () => lane()))
  return results
}
