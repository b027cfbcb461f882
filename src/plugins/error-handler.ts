import type { FastifyPluginCallback, FastifyError } from 'fastify';
import fp from 'fastify-plugin';

import { isChainError } from '../chain/errors.js';
import { Sentry } from '../instrument.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}

/** Upstream conditions that are reported to the client but are not our faults */
const UPSTREAM_CODES = new Set(['CHAIN_RATE_LIMITED', 'CHAIN_CANCELLED']);

/** Seconds a client should wait after the backend rate-limited us */
const RATE_LIMITED_RETRY_AFTER_S = 1;

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';

    if (statusCode >= 500 && !UPSTREAM_CODES.has(code)) {
      request.log.error({ err: error, code, statusCode }, 'Request error');
      Sentry.captureException(error, {
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
        },
      });
    } else {
      request.log.warn({ code, statusCode, msg: error.message }, 'Request rejected');
    }

    if (isChainError(error, 'CHAIN_RATE_LIMITED')) {
      reply.header('retry-after', String(RATE_LIMITED_RETRY_AFTER_S));
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code),
        statusCode,
        ...(isDev && error.stack && { stack: error.stack }),
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    reply.status(statusCode).send(response);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    request.log.warn({ method: request.method, url: request.url }, 'Route not found');

    reply.status(404).send(response);
  });

  done();
};

function sanitizeMessage(message: string, code: string): string {
  if (code === 'INTERNAL_ERROR' || code.startsWith('SERVER_')) {
    return 'An internal error occurred';
  }
  // backend transport failures may echo upstream URLs
  if (code === 'CHAIN_PROVIDER_ERROR') {
    return 'The ledger backend failed to answer';
  }
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
