import { Constr } from '@lucid-evolution/lucid';
import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ChainAmbiguousResultError, ChainInvalidAddressError, ChainNotFoundError } from '@/chain/errors.js';
import { createServer } from '@/server.js';

import type { FakeChainProvider } from '../fixtures/ledger.js';
import {
  ADDRESS,
  ASSET_NAME,
  DATUM_HASH,
  NATIVE_SCRIPT_CBOR,
  OTHER_TX_HASH,
  POLICY_ID,
  SCRIPT_HASH,
  STAKE_ADDRESS,
  TX_HASH,
  UNIT,
  UNIT_DATUM_CBOR,
  createFakeChainProvider,
  createTestConfig,
  lovelaceOutput,
  makeUtxo,
  tokenOutput,
} from '../fixtures/ledger.js';

describe('UTxO Routes', () => {
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

  describe('GET /addresses/:address/utxos', () => {
    it('should list the UTxOs at an address', async () => {
      provider.getUtxosByAddress.mockResolvedValue([makeUtxo(TX_HASH, 0, tokenOutput(2_000_000n, 5n))]);

      const response = await server.inject({ method: 'GET', url: `/addresses/${ADDRESS}/utxos` });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        utxos: [
          {
            txHash: TX_HASH,
            outputIndex: 0,
            output: {
              era: 'preAlonzo',
              address: ADDRESS,
              value: { coin: '2000000', assets: { [POLICY_ID]: { [ASSET_NAME]: '5' } } },
            },
          },
        ],
      });
      expect(provider.getUtxosByAddress).toHaveBeenCalledWith(ADDRESS, expect.anything());
      expect(provider.getUtxosWithUnit).not.toHaveBeenCalled();
    });

    it('should filter by unit when one is given', async () => {
      provider.getUtxosWithUnit.mockResolvedValue([]);

      const response = await server.inject({ method: 'GET', url: `/addresses/${ADDRESS}/utxos?unit=${UNIT}` });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ utxos: [] });
      expect(provider.getUtxosWithUnit).toHaveBeenCalledWith(ADDRESS, UNIT, expect.anything());
    });

    it('should render datum and reference script of post-Alonzo outputs', async () => {
      provider.getUtxosByAddress.mockResolvedValue([
        makeUtxo(TX_HASH, 1, {
          era: 'postAlonzo',
          address: ADDRESS,
          value: lovelaceOutput(1_500_000n).value,
          datum: { type: 'inline', cbor: UNIT_DATUM_CBOR, data: new Constr(0, []) },
          scriptRef: { type: 'Native', script: NATIVE_SCRIPT_CBOR },
        }),
        makeUtxo(TX_HASH, 2, {
          era: 'postAlonzo',
          address: ADDRESS,
          value: lovelaceOutput(1_000_000n).value,
          datum: { type: 'hash', hash: DATUM_HASH },
        }),
      ]);

      const response = await server.inject({ method: 'GET', url: `/addresses/${ADDRESS}/utxos` });

      const [inline, hashed] = response.json().utxos;
      expect(inline.output).toEqual({
        era: 'postAlonzo',
        address: ADDRESS,
        value: { coin: '1500000', assets: {} },
        datum: { type: 'inline', cbor: UNIT_DATUM_CBOR },
        scriptRef: { type: 'Native', script: NATIVE_SCRIPT_CBOR },
      });
      expect(hashed.output.datum).toEqual({ type: 'hash', hash: DATUM_HASH });
      expect(hashed.output.scriptRef).toBeUndefined();
    });

    it('should attach diagnostics collected during the call', async () => {
      provider.getUtxosByAddress.mockImplementation(async (_address, options) => {
        options?.diagnostics?.add({
          operation: 'getUtxosByAddress',
          key: `${TX_HASH}#0`,
          message: 'inline datum unavailable',
        });
        return [];
      });

      const response = await server.inject({ method: 'GET', url: `/addresses/${ADDRESS}/utxos` });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        utxos: [],
        diagnostics: [
          { operation: 'getUtxosByAddress', key: `${TX_HASH}#0`, message: 'inline datum unavailable' },
        ],
      });
    });

    it('should answer 400 for a malformed address', async () => {
      provider.getUtxosByAddress.mockRejectedValue(new ChainInvalidAddressError('getUtxosByAddress', 'addr_bogus'));

      const response = await server.inject({ method: 'GET', url: '/addresses/addr_bogus/utxos' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('CHAIN_INVALID_ADDRESS');
      expect(response.json().error.message).toBe('getUtxosByAddress: invalid address or credential: addr_bogus');
    });
  });

  describe('GET /assets/:unit/utxo', () => {
    it('should return the single holder of a unit', async () => {
      provider.getUtxoByUnit.mockResolvedValue(makeUtxo(TX_HASH, 3, tokenOutput(1_200_000n, 1n)));

      const response = await server.inject({ method: 'GET', url: `/assets/${UNIT}/utxo` });

      expect(response.statusCode).toBe(200);
      expect(response.json().utxo).toMatchObject({ txHash: TX_HASH, outputIndex: 3 });
      expect(provider.getUtxoByUnit).toHaveBeenCalledWith(UNIT, expect.anything());
    });

    it('should answer 409 when the unit is spread over several UTxOs', async () => {
      provider.getUtxoByUnit.mockRejectedValue(
        new ChainAmbiguousResultError('getUtxoByUnit', `${UNIT} is spread over 2 UTxOs`)
      );

      const response = await server.inject({ method: 'GET', url: `/assets/${UNIT}/utxo` });

      expect(response.statusCode).toBe(409);
      expect(response.json().error.code).toBe('CHAIN_AMBIGUOUS_RESULT');
    });

    it('should answer 404 when nothing holds the unit', async () => {
      provider.getUtxoByUnit.mockRejectedValue(new ChainNotFoundError('getUtxoByUnit', UNIT));

      const response = await server.inject({ method: 'GET', url: `/assets/${UNIT}/utxo` });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe(`getUtxoByUnit: resource not found: ${UNIT}`);
    });
  });

  describe('POST /utxos/by-ref', () => {
    it('should resolve output references in request order', async () => {
      provider.getUtxosByOutputRef.mockResolvedValue([makeUtxo(OTHER_TX_HASH, 1), makeUtxo(TX_HASH, 0)]);
      const refs = [
        { txHash: OTHER_TX_HASH, outputIndex: 1 },
        { txHash: TX_HASH, outputIndex: 0 },
      ];

      const response = await server.inject({ method: 'POST', url: '/utxos/by-ref', payload: { refs } });

      expect(response.statusCode).toBe(200);
      expect(
        response.json().utxos.map((utxo: { txHash: string; outputIndex: number }) => [utxo.txHash, utxo.outputIndex])
      ).toEqual([
        [OTHER_TX_HASH, 1],
        [TX_HASH, 0],
      ]);
      expect(provider.getUtxosByOutputRef).toHaveBeenCalledWith(refs, expect.anything());
    });

    it('should reject a negative output index before calling the backend', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/utxos/by-ref',
        payload: { refs: [{ txHash: TX_HASH, outputIndex: -1 }] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({
        code: 'REQUEST_INVALID',
        message: 'Invalid request: refs.0.outputIndex: Number must be greater than or equal to 0',
      });
      expect(provider.getUtxosByOutputRef).not.toHaveBeenCalled();
    });

    it('should reject a body without refs', async () => {
      const response = await server.inject({ method: 'POST', url: '/utxos/by-ref', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Invalid request: refs: Required');
    });
  });

  it('GET /accounts/:stakeAddress/delegation should render the delegation', async () => {
    provider.getDelegation.mockResolvedValue({ active: true, rewards: 1_500_000n, poolId: 'pool1test', epoch: 412 });

    const response = await server.inject({ method: 'GET', url: `/accounts/${STAKE_ADDRESS}/delegation` });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ active: true, rewards: '1500000', poolId: 'pool1test', epoch: 412 });
  });

  it('GET /datums/:hash should return the datum as CBOR', async () => {
    provider.getDatum.mockResolvedValue(42n);

    const response = await server.inject({ method: 'GET', url: `/datums/${DATUM_HASH.toUpperCase()}` });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ hash: DATUM_HASH, cbor: '182a' });
  });

  it('GET /scripts/:hash should return the script and its language', async () => {
    provider.getScriptByHash.mockResolvedValue({ type: 'Native', script: NATIVE_SCRIPT_CBOR });

    const response = await server.inject({ method: 'GET', url: `/scripts/${SCRIPT_HASH}` });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ hash: SCRIPT_HASH, type: 'Native', script: NATIVE_SCRIPT_CBOR });
  });
});
