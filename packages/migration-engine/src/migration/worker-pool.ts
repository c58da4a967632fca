/**
 * Run `task` for every index in [0, count) with at most `concurrency`
 * tasks in flight. Lanes pull the next index from a shared cursor.
 */
export async function runBounded(
  count: number,
  concurrency: number,
  task: (index: number) => Promise<void>
): Promise<void> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be >= 1 (got ${concurrency})`);
  }

  let cursor = 0;
  const lane = async (): Promise<void> => {
    while (cursor < count) {
      const index = cursor++;
      await task(index);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, count) }, lane));
}
