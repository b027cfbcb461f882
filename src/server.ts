import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import { createChainProvider } from './chain/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { healthRoutesPlugin } from './routes/health.js';
import { ledgerRoutesPlugin } from './routes/ledger.js';
import { transactionRoutesPlugin } from './routes/transactions.js';
import { utxoRoutesPlugin } from './routes/utxos.js';
import type { ServerOptions } from './types/index.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export type CreateServerOptions = ServerOptions;

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    // Request ID handling
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
    // Signed transactions top out at 16KB; evaluation bodies carry extra UTxOs
    bodyLimit: 262144,
  });

  // Zod type provider compilers (enables Zod schemas in route schema declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  // Decorate server with config for access in routes
  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    // CSP can be customized per-route if needed
    contentSecurityPolicy: isDev ? false : undefined,
  });

  // Rate limiting
  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
    // use default in-memory store for now
  });

  // CORS - permissive in dev, restrictive in prod
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
  });

  // Custom plugins
  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Cardano Ledger Gateway',
        description:
          'Provider-agnostic Cardano ledger queries, transaction submission and evaluation.',
        version: '0.1.0',
        license: { name: 'Apache-2.0', url: 'https://www.apache.org/licenses/LICENSE-2.0' },
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health and capabilities' },
        { name: 'Ledger', description: 'Chain state, UTxOs, accounts, datums and scripts' },
        { name: 'Transactions', description: 'Submission, evaluation and confirmation' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Chain layer initialization ----
  try {
    const chainProvider = options.chainProvider ?? createChainProvider(config.chain, server.log);
    server.decorate('chainProvider', chainProvider);

    server.log.info(
      { network: config.chain.network, backend: chainProvider.backend },
      'Chain layer initialized'
    );

    server.addHook('onClose', async () => {
      await chainProvider.close();
      server.log.info('Chain layer shutdown complete');
    });
  } catch (error) {
    server.log.error(
      { err: error instanceof Error ? error.message : 'Unknown error' },
      'Chain layer initialization failed'
    );
    throw error;
  }

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(ledgerRoutesPlugin);
  await server.register(utxoRoutesPlugin);
  await server.register(transactionRoutesPlugin);

  return server;
}
