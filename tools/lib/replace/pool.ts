/**
 * Map over items with at most `limit` tasks in flight. Results keep input order;
 * the first rejection rejects the call.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  const queue = items.entries() // shared: each worker pulls the next unclaimed item

  async function worker(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await task(item, index)
    }
  }

  const size = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: size }, () => worker()))
  return results
}
