// Backend-agnostic transaction confirmation poller
//
// waiting -> confirmed | cancelled | failed

import { abortable, sleep, throwIfAborted } from './abort.js';
import { isChainError } from './errors.js';

export type ConfirmationState = 'waiting' | 'confirmed' | 'cancelled' | 'failed';

/** One existence query; "pending" keeps the poller waiting. */
export type ConfirmationCheck = (signal: AbortSignal | undefined) => Promise<'pending' | 'confirmed'>;

export interface AwaitConfirmationOptions {
  txHash: string;
  /** Tick interval in ms; non-positive or absent uses defaultInterval */
  interval?: number;
  defaultInterval: number;
  /** Extra wait after the backend first reports the transaction */
  settleDelay?: number;
  signal?: AbortSignal;
  operation?: string;
  onStateChange?: (state: ConfirmationState) => void;
}

export function resolveInterval(interval: number | undefined, defaultInterval: number): number {
  return interval !== undefined && Number.isFinite(interval) && interval > 0
    ? interval
    : defaultInterval;
}

/**
 * Poll `check` until it reports the transaction confirmed.
 *
 * Resolves true on confirmation. A thrown check error fails the poll and is
 * rethrown; aborting `signal` rejects with ChainCancelledError, whether the
 * poller is asleep or a check is in flight.
 */
export async function awaitConfirmation(
  check: ConfirmationCheck,
  options: AwaitConfirmationOptions
): Promise<boolean> {
  const operation = options.operation ?? 'awaitConfirmation';
  const interval = resolveInterval(options.interval, options.defaultInterval);
  const { signal, txHash } = options;

  options.onStateChange?.('waiting');
  try {
    for (;;) {
      throwIfAborted(signal, operation, txHash);
      const status = await abortable(check(signal), signal, operation, txHash);
      if (status === 'confirmed') {
        if (options.settleDelay && options.settleDelay > 0) {
          await sleep(options.settleDelay, signal, operation, txHash);
        }
        options.onStateChange?.('confirmed');
        return true;
      }
      await sleep(interval, signal, operation, txHash);
    }
  } catch (error) {
    options.onStateChange?.(isChainError(error, 'CHAIN_CANCELLED') ? 'cancelled' : 'failed');
    throw error;
  }
}
