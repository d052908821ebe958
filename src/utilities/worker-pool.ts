/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`. Items not yet started when the signal
 * aborts are left `undefined`.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, items.length); i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);
  return results;
}
