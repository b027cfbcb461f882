import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ChainCancelledError, ChainEvaluationError, ChainSubmissionError } from '@/chain/errors.js';
import { createServer } from '@/server.js';

import type { FakeChainProvider } from '../fixtures/ledger.js';
import {
  TX_HASH,
  createFakeChainProvider,
  createTestConfig,
  lovelaceOutput,
  outputCbor,
} from '../fixtures/ledger.js';

const TX_CBOR = '84a400';

describe('Transaction Routes', () => {
  let server: FastifyInstance;
  let provider: FakeChainProvider;

  beforeEach(async () => {
    provider = createFakeChainProvider();
    server = await createServer({ config: createTestConfig(), chainProvider: provider });
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  describe('POST /tx/submit', () => {
    it('should accept a transaction and return its hash', async () => {
      provider.submitTransaction.mockResolvedValue(TX_HASH);

      const response = await server.inject({ method: 'POST', url: '/tx/submit', payload: { cbor: TX_CBOR } });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ txHash: TX_HASH });
      const [bytes] = provider.submitTransaction.mock.calls[0] ?? [];
      expect(Buffer.from(bytes ?? []).toString('hex')).toBe(TX_CBOR);
    });

    it('should reject CBOR that is not hex', async () => {
      const response = await server.inject({ method: 'POST', url: '/tx/submit', payload: { cbor: 'xyz' } });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Invalid request: cbor: must be even-length hex');
      expect(provider.submitTransaction).not.toHaveBeenCalled();
    });

    it('should answer 422 with the ledger rejection', async () => {
      provider.submitTransaction.mockRejectedValue(
        new ChainSubmissionError('submitTransaction', 'BadInputsUTxO')
      );

      const response = await server.inject({ method: 'POST', url: '/tx/submit', payload: { cbor: TX_CBOR } });

      expect(response.statusCode).toBe(422);
      expect(response.json().error).toEqual({
        code: 'CHAIN_SUBMISSION_FAILED',
        message: 'submitTransaction: transaction submission failed: BadInputsUTxO',
        statusCode: 422,
      });
    });
  });

  describe('POST /tx/evaluate', () => {
    it('should decode additional UTxOs and render execution units', async () => {
      provider.evaluateTransaction.mockResolvedValue([
        { tag: 'spend', index: 0, exUnits: { mem: 1700n, steps: 476468n } },
      ]);
      const output = lovelaceOutput(3_000_000n);

      const response = await server.inject({
        method: 'POST',
        url: '/tx/evaluate',
        payload: {
          cbor: TX_CBOR,
          additionalUtxos: [{ txHash: TX_HASH.toUpperCase(), outputIndex: 0, outputCbor: outputCbor(output) }],
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        redeemers: [{ tag: 'spend', index: 0, exUnits: { mem: '1700', steps: '476468' } }],
        exUnits: { 'spend:0': { mem: '1700', steps: '476468' } },
      });
      const [, additionalUtxos] = provider.evaluateTransaction.mock.calls[0] ?? [];
      expect(additionalUtxos).toEqual([{ input: { txHash: TX_HASH, outputIndex: 0 }, output }]);
    });

    it('should default to no additional UTxOs', async () => {
      provider.evaluateTransaction.mockResolvedValue([]);

      const response = await server.inject({ method: 'POST', url: '/tx/evaluate', payload: { cbor: TX_CBOR } });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ redeemers: [], exUnits: {} });
      expect(provider.evaluateTransaction.mock.calls[0]?.[1]).toEqual([]);
    });

    it('should answer 400 when an additional output does not decode', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/tx/evaluate',
        payload: { cbor: TX_CBOR, additionalUtxos: [{ txHash: TX_HASH, outputIndex: 0, outputCbor: '00' }] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('REQUEST_INVALID');
      expect(response.json().error.message).toMatch(new RegExp(`^Invalid request: additionalUtxos ${TX_HASH}#0: `));
      expect(provider.evaluateTransaction).not.toHaveBeenCalled();
    });

    it('should report dropped redeemers as diagnostics', async () => {
      provider.evaluateTransaction.mockImplementation(async (_tx, _utxos, options) => {
        options?.diagnostics?.add({
          operation: 'evaluateTransaction',
          key: 'guard:3',
          message: 'Dropped redeemer with unrecognized purpose',
        });
        return [];
      });

      const response = await server.inject({ method: 'POST', url: '/tx/evaluate', payload: { cbor: TX_CBOR } });

      expect(response.json()).toEqual({
        redeemers: [],
        exUnits: {},
        diagnostics: [
          { operation: 'evaluateTransaction', key: 'guard:3', message: 'Dropped redeemer with unrecognized purpose' },
        ],
      });
    });

    it('should answer 422 when a script fails', async () => {
      provider.evaluateTransaction.mockRejectedValue(
        new ChainEvaluationError('evaluateTransaction', 'Some scripts failed (code 3010)')
      );

      const response = await server.inject({ method: 'POST', url: '/tx/evaluate', payload: { cbor: TX_CBOR } });

      expect(response.statusCode).toBe(422);
      expect(response.json().error.message).toBe(
        'evaluateTransaction: transaction evaluation failed: Some scripts failed (code 3010)'
      );
    });
  });

  describe('POST /tx/:hash/await', () => {
    it('should report confirmation with the given poll interval', async () => {
      provider.awaitConfirmation.mockResolvedValue(true);

      const response = await server.inject({
        method: 'POST',
        url: `/tx/${TX_HASH}/await`,
        payload: { interval: 2000 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ txHash: TX_HASH, confirmed: true });
      expect(provider.awaitConfirmation).toHaveBeenCalledWith(TX_HASH, 2000, expect.anything());
    });

    it('should use the backend default interval without a body', async () => {
      provider.awaitConfirmation.mockResolvedValue(false);

      const response = await server.inject({ method: 'POST', url: `/tx/${TX_HASH}/await` });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ txHash: TX_HASH, confirmed: false });
      expect(provider.awaitConfirmation).toHaveBeenCalledWith(TX_HASH, undefined, expect.anything());
    });

    it('should cancel the wait after timeoutMs', async () => {
      provider.awaitConfirmation.mockImplementation(
        (txHash, _interval, options) =>
          new Promise((_resolve, reject) => {
            options?.signal?.addEventListener('abort', () =>
              reject(new ChainCancelledError('awaitConfirmation', txHash))
            );
          })
      );

      const response = await server.inject({
        method: 'POST',
        url: `/tx/${TX_HASH}/await`,
        payload: { timeoutMs: 50 },
      });

      expect(response.statusCode).toBe(499);
      expect(response.json().error.message).toBe(`awaitConfirmation: operation cancelled: ${TX_HASH}`);
    });

    it('should reject a timeout above ten minutes', async () => {
      const response = await server.inject({
        method: 'POST',
        url: `/tx/${TX_HASH}/await`,
        payload: { timeoutMs: 600_001 },
      });

      expect(response.statusCode).toBe(400);
      expect(provider.awaitConfirmation).not.toHaveBeenCalled();
    });
  });
});
