/**
 * Bounded worker pool
 *
 * `width` workers pull items in order. Results keep the input order, not the
 * completion order. Once `signal` is aborted no further item is started;
 * their slots stay `undefined`.
 */

export async function runPool<T, R>(
  items: readonly T[],
  width: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<(R | undefined)[]> {
  const results: (R | undefined)[] = items.map(() => undefined)
  let next = 0

  async function worker(): Promise<void> {
    while (next < items.length && !signal?.aborted) {
      const index = next++
      results[index] = await task(items[index], index)
    }
  }

  const workers = Math.max(1, Math.min(width, items.length))
  await Promise.all(Array.from({ length: workers }, () => worker()))
  return results
}
