// Bounded fan-out with explicit join

import { ChainCancelledError } from './errors.js';

export const DEFAULT_MAX_CONCURRENCY = 8;

export interface FanOutOptions {
  /** Maximum tasks in flight (>= 1) */
  limit?: number;
  signal?: AbortSignal;
  /** Operation name used for the cancellation error */
  operation?: string;
}

/**
 * Run `task` over `items` with at most `limit` tasks in flight and return
 * the results in input order.
 *
 * Every started task is awaited before this settles, so nothing keeps
 * running after it returns. The first failure (or an abort of the caller's
 * signal) stops scheduling new tasks and aborts the signal handed to the
 * running ones; the first error is then rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  task: (item: T, signal: AbortSignal) => Promise<R>,
  options: FanOutOptions = {}
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(options.limit ?? DEFAULT_MAX_CONCURRENCY));
  const operation = options.operation ?? 'fanOut';
  const results = new Array<R>(items.length);
  const controller = new AbortController();
  const state: { failure?: { error: unknown } } = {};
  let next = 0;

  const onAbort = (): void => {
    state.failure ??= { error: new ChainCancelledError(operation, 'caller aborted') };
    controller.abort();
  };
  if (options.signal?.aborted) {
    throw new ChainCancelledError(operation, 'caller aborted');
  }
  options.signal?.addEventListener('abort', onAbort, { once: true });

  const worker = async (): Promise<void> => {
    while (state.failure === undefined && next < items.length) {
      const index = next++;
      try {
        results[index] = await task(items[index], controller.signal);
      } catch (error) {
        state.failure ??= { error };
        controller.abort();
      }
    }
  };

  try {
    const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
    await Promise.all(workers);
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }

  if (state.failure !== undefined) {
    throw state.failure.error;
  }
  return results;
}
