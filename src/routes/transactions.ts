// Transaction routes: submission, evaluation and confirmation waiting.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { isChainError } from '../chain/errors.js';
import { decodeNativeOutput } from '../chain/native-output.js';
import { redeemersToExUnitsMap } from '../chain/redeemers.js';
import type { Utxo } from '../chain/types.js';
import { InvalidRequestError } from '../errors/index.js';
import { AwaitBodySchema, EvaluateBodySchema, HashParamsSchema, SubmitBodySchema } from './schemas.js';
import { callOptionsFor, toJson, withDiagnostics } from './serializers.js';
import { parseRequest } from './utxos.js';

function toAdditionalUtxo(item: { txHash: string; outputIndex: number; outputCbor: string }): Utxo {
  const context = `${item.txHash}#${item.outputIndex}`;
  try {
    return {
      input: { txHash: item.txHash.toLowerCase(), outputIndex: item.outputIndex },
      output: decodeNativeOutput(item.outputCbor, context),
    };
  } catch (error) {
    if (isChainError(error, 'CHAIN_DECODE_FAILED')) {
      throw new InvalidRequestError(`additionalUtxos ${context}: ${error.message}`);
    }
    throw error;
  }
}

const transactionRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const sensitive = {
    config: {
      rateLimit: {
        max: fastify.config.rateLimit.sensitive,
        timeWindow: fastify.config.rateLimit.windowMs,
      },
    },
  };

  fastify.post('/tx/submit', sensitive, async (request, reply) => {
    const { cbor } = parseRequest(SubmitBodySchema, request.body);
    const options = callOptionsFor(reply);
    const txHash = await fastify.chainProvider.submitTransaction(Buffer.from(cbor, 'hex'), options);
    return reply.status(202).send(withDiagnostics({ txHash }, options.diagnostics));
  });

  fastify.post('/tx/evaluate', sensitive, async (request, reply) => {
    const body = parseRequest(EvaluateBodySchema, request.body);
    const additionalUtxos = body.additionalUtxos.map(toAdditionalUtxo);
    const options = callOptionsFor(reply);
    const redeemers = await fastify.chainProvider.evaluateTransaction(
      Buffer.from(body.cbor, 'hex'),
      additionalUtxos,
      options
    );
    return reply
      .status(200)
      .send(
        withDiagnostics(
          { redeemers: toJson(redeemers), exUnits: toJson(redeemersToExUnitsMap(redeemers)) },
          options.diagnostics
        )
      );
  });

  fastify.post('/tx/:hash/await', async (request, reply) => {
    const { hash } = parseRequest(HashParamsSchema, request.params);
    const { interval, timeoutMs } = parseRequest(AwaitBodySchema, request.body ?? {});
    const confirmed = await fastify.chainProvider.awaitConfirmation(
      hash,
      interval,
      callOptionsFor(reply, timeoutMs)
    );
    return reply.status(200).send({ txHash: hash.toLowerCase(), confirmed });
  });

  done();
};

export const transactionRoutesPlugin = fp(transactionRoutes, {
  name: 'transaction-routes',
  fastify: '5.x',
});
