// Adversarial security test suite for the ledger gateway
//
// Validates security properties across four categories:
// 1. Secret leakage prevention (backend credentials never in responses)
// 2. Malformed input handling (invalid JSON, empty bodies, oversized strings)
// 3. Production error sanitization (no stack traces, generic messages)
// 4. Route surface edge cases

import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';

import { ChainProviderError } from '../../src/chain/errors.js';
import type { Config } from '../../src/config/index.js';
import { createServer } from '../../src/server.js';
import type { FakeChainProvider } from '../fixtures/ledger.js';
import { ADDRESS, TX_HASH, createFakeChainProvider, createTestConfig } from '../fixtures/ledger.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const TEST_PROJECT_ID = 'test-project-id-secret';

function createAdversarialConfig(env: Config['env'] = 'test'): Config {
  return createTestConfig({
    env,
    rateLimit: { global: 1000, windowMs: 60000, sensitive: 100 },
    chain: { backend: { type: 'blockfrost', projectId: TEST_PROJECT_ID } },
  });
}

/** Backend failure whose message carries the credential, as a careless transport might */
function leakyFailure(operation: string): InstanceType<typeof ChainProviderError> {
  return new ChainProviderError(
    operation,
    `blockfrost HTTP 500 from https://cardano-preview.blockfrost.io/api/v0?project_id=${TEST_PROJECT_ID}`
  );
}

// ===========================================================================
// 1. Secret Leakage Prevention
// ===========================================================================

describe('Secret Leakage Prevention', () => {
  let server: FastifyInstance;
  let provider: FakeChainProvider;

  beforeAll(async () => {
    provider = createFakeChainProvider();
    server = await createServer({ config: createAdversarialConfig('production'), chainProvider: provider });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should not include the Blockfrost project id in any error response', async () => {
    provider.getTip.mockRejectedValue(leakyFailure('getTip'));
    provider.getUtxosByAddress.mockRejectedValue(leakyFailure('getUtxosByAddress'));
    provider.submitTransaction.mockRejectedValue(leakyFailure('submitTransaction'));

    const responses = [
      await server.inject({ method: 'GET', url: '/tip' }),
      await server.inject({ method: 'GET', url: `/addresses/${ADDRESS}/utxos` }),
      await server.inject({ method: 'POST', url: '/tx/submit', payload: { cbor: '84a400' } }),
      await server.inject({ method: 'POST', url: '/tx/submit', payload: {} }),
      await server.inject({ method: 'GET', url: '/network' }),
      await server.inject({ method: 'GET', url: '/not-found' }),
    ];

    for (const res of responses) {
      expect(res.body).not.toContain(TEST_PROJECT_ID);
    }
  });

  it('should keep the project id out of the health payload', async () => {
    provider.getTip.mockRejectedValue(new ChainProviderError('getTip', 'blockfrost HTTP 500'));

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.body).not.toContain(TEST_PROJECT_ID);
  });
});

// ===========================================================================
// 2. Malformed Input Handling
// ===========================================================================

describe('Malformed Input Handling', () => {
  let server: FastifyInstance;
  let provider: FakeChainProvider;

  beforeAll(async () => {
    provider = createFakeChainProvider();
    server = await createServer({ config: createAdversarialConfig(), chainProvider: provider });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    provider.submitTransaction.mockReset();
    provider.getUtxosByOutputRef.mockReset();
  });

  it('should reject invalid JSON without reaching the backend', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/tx/submit',
      headers: { 'content-type': 'application/json' },
      payload: 'not-json{{{',
    });

    expect(response.statusCode).toBe(400);
    expect(provider.submitTransaction).not.toHaveBeenCalled();
  });

  it('should answer an empty submit body with a validation error', async () => {
    const response = await server.inject({ method: 'POST', url: '/tx/submit', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toMatchObject({
      code: 'REQUEST_INVALID',
      message: 'Invalid request: cbor: Required',
    });
  });

  it('should reject more than 500 output references', async () => {
    const refs = Array.from({ length: 501 }, (_, outputIndex) => ({ txHash: TX_HASH, outputIndex }));

    const response = await server.inject({ method: 'POST', url: '/utxos/by-ref', payload: { refs } });

    expect(response.statusCode).toBe(400);
    expect(provider.getUtxosByOutputRef).not.toHaveBeenCalled();
  });

  it('should handle extremely long string values without crash', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/tx/evaluate',
      payload: {
        cbor: 'a'.repeat(40001),
        additionalUtxos: [{ txHash: 'x'.repeat(1000), outputIndex: 0, outputCbor: '00' }],
      },
    });

    // odd-length hex never reaches the decoder
    expect(response.statusCode).toBe(400);
  });
});

// ===========================================================================
// 3. Production Error Sanitization
// ===========================================================================

describe('Production Error Sanitization', () => {
  let server: FastifyInstance;
  let provider: FakeChainProvider;

  beforeAll(async () => {
    provider = createFakeChainProvider();
    // Create server in production mode for sanitization tests
    server = await createServer({ config: createAdversarialConfig('production'), chainProvider: provider });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should not include stack traces in production error responses', async () => {
    provider.currentEpoch.mockRejectedValueOnce(new Error('socket hang up'));

    const response = await server.inject({ method: 'GET', url: '/epoch' });

    expect(response.statusCode).toBe(500);
    const body = response.json();
    expect(body.error.stack).toBeUndefined();
    expect(JSON.stringify(body)).not.toContain('.ts:');
    expect(JSON.stringify(body)).not.toContain('.js:');
  });

  it('should sanitize unexpected error messages in production', async () => {
    provider.currentEpoch.mockRejectedValueOnce(new Error('socket hang up'));

    const response = await server.inject({ method: 'GET', url: '/epoch' });

    expect(response.json().error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An internal error occurred',
      statusCode: 500,
    });
  });

  it('should replace backend transport messages with a generic one', async () => {
    provider.getDelegation.mockRejectedValueOnce(leakyFailure('getDelegation'));

    const response = await server.inject({ method: 'GET', url: '/accounts/stake_test1u/delegation' });

    expect(response.statusCode).toBe(502);
    expect(response.json().error.message).toBe('The ledger backend failed to answer');
  });
});

// ===========================================================================
// 4. Additional Edge Cases
// ===========================================================================

describe('Additional Security Edge Cases', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await createServer({ config: createAdversarialConfig(), chainProvider: createFakeChainProvider() });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should reject GET requests on POST-only routes', async () => {
    const response = await server.inject({ method: 'GET', url: '/tx/submit' });
    expect(response.statusCode).toBe(404);
  });

  it('should return proper 404 for unknown routes', async () => {
    const response = await server.inject({ method: 'GET', url: '/admin' });
    expect(response.statusCode).toBe(404);
    const body = response.json();
    expect(body.error.code).toBe('NOT_FOUND');
    // Should not reveal internal paths
    expect(body.error.message).not.toContain('/src/');
    expect(body.error.message).not.toContain('/dist/');
  });
});
