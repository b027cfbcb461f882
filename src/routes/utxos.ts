// UTxO, account, datum and script routes.

import { Data } from '@lucid-evolution/lucid';
import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { z } from 'zod';

import { InvalidRequestError } from '../errors/index.js';
import {
  AddressParamsSchema,
  HashParamsSchema,
  OutRefsBodySchema,
  StakeAddressParamsSchema,
  UnitParamsSchema,
  UnitQuerySchema,
} from './schemas.js';
import { callOptionsFor, serializeUtxo, toJson, withDiagnostics } from './serializers.js';

/** safeParse or throw a 400 listing the offending fields. */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join(', ')
    );
  }
  return parsed.data;
}

const utxoRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get('/addresses/:address/utxos', async (request, reply) => {
    const { address } = parseRequest(AddressParamsSchema, request.params);
    const { unit } = parseRequest(UnitQuerySchema, request.query);
    const options = callOptionsFor(reply);

    const utxos = unit
      ? await fastify.chainProvider.getUtxosWithUnit(address, unit, options)
      : await fastify.chainProvider.getUtxosByAddress(address, options);

    return reply
      .status(200)
      .send(withDiagnostics({ utxos: utxos.map(serializeUtxo) }, options.diagnostics));
  });

  fastify.get('/assets/:unit/utxo', async (request, reply) => {
    const { unit } = parseRequest(UnitParamsSchema, request.params);
    const options = callOptionsFor(reply);
    const utxo = await fastify.chainProvider.getUtxoByUnit(unit, options);
    return reply.status(200).send(withDiagnostics({ utxo: serializeUtxo(utxo) }, options.diagnostics));
  });

  fastify.post('/utxos/by-ref', async (request, reply) => {
    const { refs } = parseRequest(OutRefsBodySchema, request.body);
    const options = callOptionsFor(reply);
    const utxos = await fastify.chainProvider.getUtxosByOutputRef(refs, options);
    return reply
      .status(200)
      .send(withDiagnostics({ utxos: utxos.map(serializeUtxo) }, options.diagnostics));
  });

  fastify.get('/accounts/:stakeAddress/delegation', async (request, reply) => {
    const { stakeAddress } = parseRequest(StakeAddressParamsSchema, request.params);
    const delegation = await fastify.chainProvider.getDelegation(stakeAddress, callOptionsFor(reply));
    return reply.status(200).send(toJson(delegation));
  });

  fastify.get('/datums/:hash', async (request, reply) => {
    const { hash } = parseRequest(HashParamsSchema, request.params);
    const datum = await fastify.chainProvider.getDatum(hash, callOptionsFor(reply));
    return reply.status(200).send({ hash: hash.toLowerCase(), cbor: Data.to(datum) });
  });

  fastify.get('/scripts/:hash', async (request, reply) => {
    const { hash } = parseRequest(HashParamsSchema, request.params);
    const script = await fastify.chainProvider.getScriptByHash(hash, callOptionsFor(reply));
    return reply.status(200).send({ hash: hash.toLowerCase(), type: script.type, script: script.script });
  });

  done();
};

export const utxoRoutesPlugin = fp(utxoRoutes, {
  name: 'utxo-routes',
  fastify: '5.x',
});
