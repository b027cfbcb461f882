import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import type { ChainProvider } from '../chain/provider.js';

// Read version once at startup (not on every request)
const packageJson: unknown = JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8'));
const APP_VERSION =
  packageJson !== null &&
  typeof packageJson === 'object' &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/** Upper bound on the backend probe */
const BACKEND_CHECK_TIMEOUT_MS = 5_000;

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  backend: string;
  dependencies: Record<string, DependencyStatus>;
}

// Dependency check: the configured backend answers a tip query

async function checkBackend(provider: ChainProvider): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    await provider.getTip({ signal: AbortSignal.timeout(BACKEND_CHECK_TIMEOUT_MS) });
    return { status: 'up', latency: Date.now() - start };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    const backendStatus = await checkBackend(fastify.chainProvider);

    const response: HealthResponse = {
      status: backendStatus.status === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      uptime: process.uptime(),
      backend: fastify.chainProvider.backend,
      dependencies: { [fastify.chainProvider.backend]: backendStatus },
    };

    return reply.status(response.status === 'healthy' ? 200 : 503).send(response);
  });

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
