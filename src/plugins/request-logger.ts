import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

/** Transaction CBOR in request bodies is logged by length only */
const CBOR_FIELDS = new Set(['cbor', 'outputCbor']);

function summarizeBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(summarizeBody);
  }
  if (body === null || typeof body !== 'object') {
    return body;
  }
  const summary: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    summary[key] =
      CBOR_FIELDS.has(key) && typeof value === 'string' ? `<${value.length / 2} bytes>` : summarizeBody(value);
  }
  return summary;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  // preHandler runs after body parsing, so dev logs can include it
  fastify.addHook('preHandler', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      requestId: request.id,
      userAgent: request.headers['user-agent'],
    };

    if (isDev && request.body) {
      logData.body = summarizeBody(request.body);
    }

    request.log.info(logData, 'Incoming request');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
