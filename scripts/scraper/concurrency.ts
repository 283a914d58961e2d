import { logger } from './logger';
import { errorMessage } from './errors';

export type ConcurrencyOptions<T, S> = {
  /** Builds the state one lane owns for its whole life (e.g. its browser session). */
  createLane: (lane: number) => S;
  disposeLane?: (state: S) => Promise<void>;
  /** Errors for which the whole batch stops instead of skipping the item. */
  isFatal?: (err: unknown) => boolean;
  onError?: (err: unknown, item: T, idx: number) => void;
  /** Runs after every item, success or not. */
  pause?: (idx: number) => Promise<void>;
};

/**
 * Runs `worker` over `items` on at most `concurrency` lanes.
 * Results come back in completion order.
 */
export async function processWithConcurrency<T, R, S>(
  items: T[],
  worker: (item: T, idx: number, state: S) => Promise<R | undefined>,
  concurrency: number,
  options: ConcurrencyOptions<T, S>
): Promise<R[]> {
  const results: R[] = [];
  let index = 0;
  let fatal: { error: unknown } | undefined;

  async function next(state: S): Promise<void> {
    if (fatal || index >= items.length) return;
    const i = index++;
    try {
      const res = await worker(items[i], i, state);
      if (res !== undefined) results.push(res);
    } catch (err) {
      if (options.isFatal?.(err)) {
        fatal = { error: err };
        return;
      }
      if (options.onError) {
        options.onError(err, items[i], i);
      } else {
        logger.error(`Error on item ${i}`, { error: errorMessage(err) });
      }
    }
    if (options.pause) await options.pause(i);
    await next(state);
  }

  const laneCount = Math.max(1, Math.min(concurrency, items.length));
  const lanes = Array.from({ length: items.length ? laneCount : 0 }, (_, lane) => options.createLane(lane));
  try {
    await Promise.all(lanes.map(next));
  } finally {
    if (options.disposeLane) {
      await Promise.all(lanes.map((state) => options.disposeLane?.(state)));
    }
  }
  if (fatal) throw fatal.error;
  return results;
}
