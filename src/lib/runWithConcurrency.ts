export type ConcurrencyResult<R> = {
  results: Array<R | undefined>;
  launched: number;
  aborted: boolean;
};

/**
 * Runs `handler` over `items` with at most `limit` in flight. Once `signal`
 * aborts no new item is started; items already running are awaited.
 */
export function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  handler: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<ConcurrencyResult<R>> {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined);
  const max = Math.max(1, Math.floor(limit));
  let nextIndex = 0;
  let running = 0;

  return new Promise((resolve, reject) => {
    const finish = () => resolve({ results, launched: nextIndex, aborted: nextIndex < items.length });

    const launchNext = () => {
      const stopped = signal?.aborted ?? false;
      if ((nextIndex >= items.length || stopped) && running === 0) {
        finish();
        return;
      }
      while (!stopped && running < max && nextIndex < items.length) {
        const current = nextIndex++;
        running += 1;
        handler(items[current], current)
          .then((result) => {
            results[current] = result;
            running -= 1;
            launchNext();
          })
          .catch((err) => {
            reject(err);
          });
      }
    };
    launchNext();
  });
}
