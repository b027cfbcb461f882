import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { BlockfrostProvider } from '@/chain/blockfrost/blockfrost-provider.js';
import { createServer } from '@/server.js';

import type { FakeChainProvider } from '../fixtures/ledger.js';
import { createFakeChainProvider, createTestConfig } from '../fixtures/ledger.js';

describe('Server Integration', () => {
  let server: FastifyInstance;
  let provider: FakeChainProvider;

  beforeAll(async () => {
    provider = createFakeChainProvider();
    server = await createServer({ config: createTestConfig(), chainProvider: provider });
    await server.listen({ port: 0 });
  });

  afterAll(async () => {
    await server.close();
  });

  it('should have security headers from helmet', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
    });

    // Helmet sets these headers
    expect(response.headers['x-dns-prefetch-control']).toBe('off');
    expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('should return request ID in error responses', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
      headers: {
        'x-request-id': 'test-request-123',
      },
    });

    const body = JSON.parse(response.body);
    expect(body.requestId).toBe('test-request-123');
  });

  it('should generate request ID if not provided', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
    });

    const body = JSON.parse(response.body);
    expect(body.requestId).toMatch(/^[0-9a-f-]{36}$/); // UUID format
  });

  it('should return a structured 404 for unknown routes', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/unknown-route',
    });

    expect(response.statusCode).toBe(404);
    expect(response.json().error).toEqual({
      code: 'NOT_FOUND',
      message: 'Route GET:/unknown-route not found',
      statusCode: 404,
    });
  });

  it('should include timestamp in error responses', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
    });

    const body = JSON.parse(response.body);
    expect(new Date(body.timestamp).getTime()).not.toBeNaN();
  });

  it('should serve the OpenAPI document', async () => {
    const response = await server.inject({ method: 'GET', url: '/docs/json' });

    expect(response.statusCode).toBe(200);
    expect(response.json().info.title).toBe('Cardano Ledger Gateway');
  });
});

describe('Server lifecycle', () => {
  it('should close the chain provider with the server', async () => {
    const provider = createFakeChainProvider();
    const server = await createServer({ config: createTestConfig(), chainProvider: provider });
    await server.ready();

    await server.close();

    expect(provider.close).toHaveBeenCalledOnce();
  });

  it('should build the configured backend when none is injected', async () => {
    const server = await createServer({ config: createTestConfig() });
    await server.ready();

    expect(server.chainProvider).toBeInstanceOf(BlockfrostProvider);
    expect(server.chainProvider.network()).toBe(0);

    await server.close();
  });
});
