/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 *
 * After the first failure no new item is started; items already running are
 * awaited, then the first error is rethrown. Nothing keeps running after the
 * returned promise settles.
 */
export async function runBounded<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  let failure: { error: unknown } | undefined;

  const lane = async (): Promise<void> => {
    while (failure === undefined && next < items.length) {
      const item = items[next];
      next += 1;
      if (item === undefined) continue;
      try {
        await worker(item);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, lane);
  await Promise.all(lanes);

  if (failure !== undefined) {
    throw failure.error;
  }
}
