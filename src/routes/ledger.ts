// Chain-state routes: network, protocol and genesis parameters, epoch, tip.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { callOptionsFor, toJson } from './serializers.js';

const ledgerRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get('/network', async (_request, reply) => {
    const provider = fastify.chainProvider;
    return reply.status(200).send({
      network: fastify.config.chain.network,
      networkId: provider.network(),
      backend: provider.backend,
    });
  });

  fastify.get('/protocol-parameters', async (_request, reply) => {
    const params = await fastify.chainProvider.getProtocolParameters(callOptionsFor(reply));
    return reply.status(200).send(toJson(params));
  });

  fastify.get('/genesis', async (_request, reply) => {
    const genesis = await fastify.chainProvider.getGenesisParameters(callOptionsFor(reply));
    return reply.status(200).send(toJson(genesis));
  });

  fastify.get('/epoch', async (_request, reply) => {
    const epoch = await fastify.chainProvider.currentEpoch(callOptionsFor(reply));
    return reply.status(200).send({ epoch });
  });

  fastify.get('/tip', async (_request, reply) => {
    const tip = await fastify.chainProvider.getTip(callOptionsFor(reply));
    return reply.status(200).send(tip);
  });

  done();
};

export const ledgerRoutesPlugin = fp(ledgerRoutes, {
  name: 'ledger-routes',
  fastify: '5.x',
});
