import { describe, it, expect, vi } from 'vitest';

import type { ConfirmationState } from '@/chain/confirmation.js';
import { awaitConfirmation, resolveInterval } from '@/chain/confirmation.js';
import { isChainError } from '@/chain/errors.js';

const TX_HASH = 'cd'.repeat(32);

describe('resolveInterval', () => {
  it('should use the default for absent or non-positive intervals', () => {
    expect(resolveInterval(undefined, 3000)).toBe(3000);
    expect(resolveInterval(0, 3000)).toBe(3000);
    expect(resolveInterval(-5, 3000)).toBe(3000);
    expect(resolveInterval(Number.NaN, 3000)).toBe(3000);
  });

  it('should keep a positive interval', () => {
    expect(resolveInterval(250, 3000)).toBe(250);
  });
});

describe('awaitConfirmation', () => {
  it('should poll until the check reports confirmed', async () => {
    const check = vi
      .fn<(signal: AbortSignal | undefined) => Promise<'pending' | 'confirmed'>>()
      .mockResolvedValueOnce('pending')
      .mockResolvedValueOnce('pending')
      .mockResolvedValueOnce('confirmed');
    const states: ConfirmationState[] = [];

    const confirmed = await awaitConfirmation(check, {
      txHash: TX_HASH,
      interval: 1,
      defaultInterval: 1000,
      onStateChange: (state) => states.push(state),
    });

    expect(confirmed).toBe(true);
    expect(check).toHaveBeenCalledTimes(3);
    expect(states).toEqual(['waiting', 'confirmed']);
  });

  it('should fail with the check error', async () => {
    const states: ConfirmationState[] = [];
    const run = awaitConfirmation(
      async () => {
        throw new Error('backend down');
      },
      { txHash: TX_HASH, defaultInterval: 1, onStateChange: (state) => states.push(state) }
    );

    await expect(run).rejects.toThrow('backend down');
    expect(states).toEqual(['waiting', 'failed']);
  });

  it('should cancel while sleeping between ticks', async () => {
    const controller = new AbortController();
    const states: ConfirmationState[] = [];
    const check = vi.fn(async () => {
      setTimeout(() => controller.abort(), 5);
      return 'pending' as const;
    });

    try {
      await awaitConfirmation(check, {
        txHash: TX_HASH,
        defaultInterval: 60_000,
        signal: controller.signal,
        onStateChange: (state) => states.push(state),
      });
      expect.fail('Expected error to be thrown');
    } catch (error) {
      expect(isChainError(error, 'CHAIN_CANCELLED')).toBe(true);
    }
    expect(check).toHaveBeenCalledTimes(1);
    expect(states).toEqual(['waiting', 'cancelled']);
  });

  it('should cancel a check that is still in flight', async () => {
    const controller = new AbortController();
    const run = awaitConfirmation(() => new Promise<'pending'>(() => undefined), {
      txHash: TX_HASH,
      defaultInterval: 1,
      signal: controller.signal,
    });
    controller.abort();

    await expect(run).rejects.toThrow(`awaitConfirmation: operation cancelled: ${TX_HASH}`);
  });

  it('should wait the settle delay before reporting confirmed', async () => {
    const started = Date.now();
    await awaitConfirmation(async () => 'confirmed', {
      txHash: TX_HASH,
      defaultInterval: 1,
      settleDelay: 20,
    });
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });
});
