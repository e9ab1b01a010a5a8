type Settled = { index: number; failed: boolean; error: unknown };

/**
 * Runs `worker` over `items` with at most `limit` in flight, starting items in order.
 * After the first rejection no new item starts; in-flight items settle, then the error is rethrown.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  const maxInFlight = Math.max(1, Math.floor(limit));
  const inFlight = new Map<number, Promise<Settled>>();
  let next = 0;
  let failure: { error: unknown } | null = null;

  const launch = (index: number): void => {
    const settled = worker(items[index]).then(
      (): Settled => ({ index, failed: false, error: null }),
      (error: unknown): Settled => ({ index, failed: true, error })
    );
    inFlight.set(index, settled);
  };

  while (next < items.length || inFlight.size > 0) {
    while (!failure && next < items.length && inFlight.size < maxInFlight) {
      launch(next);
      next += 1;
    }
    if (inFlight.size === 0) {
      break;
    }
    const completion = await Promise.race(inFlight.values());
    inFlight.delete(completion.index);
    if (completion.failed && !failure) {
      failure = { error: completion.error };
    }
  }

  if (failure) {
    throw failure.error;
  }
}
