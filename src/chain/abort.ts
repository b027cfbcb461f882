// Cancellation helpers around AbortSignal

import { ChainCancelledError } from './errors.js';

export function throwIfAborted(signal: AbortSignal | undefined, operation: string, key: string): void {
  if (signal?.aborted) {
    throw new ChainCancelledError(operation, key);
  }
}

/**
 * Settle with the promise, or reject with ChainCancelledError as soon as the
 * signal aborts. For clients that take no signal of their own.
 */
export function abortable<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  operation: string,
  key: string
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // the underlying request still settles; keep its rejection handled
    void promise.catch(() => undefined);
    return Promise.reject(new ChainCancelledError(operation, key));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      void promise.catch(() => undefined);
      reject(new ChainCancelledError(operation, key));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/** Timer that rejects with ChainCancelledError when the signal aborts. */
export function sleep(
  ms: number,
  signal: AbortSignal | undefined,
  operation: string,
  key: string
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ChainCancelledError(operation, key));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new ChainCancelledError(operation, key));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
