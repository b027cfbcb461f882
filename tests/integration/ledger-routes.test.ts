import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ChainNotImplementedError } from '@/chain/errors.js';
import type { ProtocolParameters } from '@/chain/types.js';
import { createServer } from '@/server.js';

import type { FakeChainProvider } from '../fixtures/ledger.js';
import { createFakeChainProvider, createTestConfig } from '../fixtures/ledger.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function createProtocolParameters(): ProtocolParameters {
  return {
    minFeeA: 44,
    minFeeB: 155381,
    maxBlockSize: 90112,
    maxTxSize: 16384,
    maxBlockHeaderSize: 1100,
    keyDeposit: 2000000n,
    poolDeposit: 500000000n,
    poolInfluence: 0.3,
    monetaryExpansion: 0.003,
    treasuryExpansion: 0.2,
    decentralisationParam: 0,
    extraEntropy: '',
    protocolMajorVersion: 10,
    protocolMinorVersion: 0,
    minUtxo: 0n,
    minPoolCost: 170000000n,
    priceMem: 0.0577,
    priceStep: 0.0000721,
    maxTxExMem: 14000000n,
    maxTxExSteps: 10000000000n,
    maxBlockExMem: 62000000n,
    maxBlockExSteps: 20000000000n,
    maxValSize: 5000,
    collateralPercentage: 150,
    maxCollateralInputs: 3,
    coinsPerUtxoByte: 4310n,
    costModels: { PlutusV3: [100788, 420] },
    maxReferenceScriptsSize: 204800,
    minFeeReferenceScriptsRange: 25600,
    minFeeReferenceScriptsBase: 15,
    minFeeReferenceScriptsMultiplier: 1.2,
    drepDeposit: 500000000n,
    governanceActionDeposit: 100000000000n,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Ledger Routes', () => {
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

  it('GET /network should describe the configured backend', async () => {
    const response = await server.inject({ method: 'GET', url: '/network' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ network: 'Preview', networkId: 0, backend: 'blockfrost' });
  });

  it('GET /protocol-parameters should render bigints as decimal strings', async () => {
    provider.getProtocolParameters.mockResolvedValue(createProtocolParameters());

    const response = await server.inject({ method: 'GET', url: '/protocol-parameters' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.minFeeA).toBe(44);
    expect(body.keyDeposit).toBe('2000000');
    expect(body.maxTxExSteps).toBe('10000000000');
    expect(body.coinsPerUtxoByte).toBe('4310');
    expect(body.priceMem).toBe(0.0577);
    expect(body.costModels).toEqual({ PlutusV3: [100788, 420] });
  });

  it('GET /genesis should answer 501 when the backend lacks genesis data', async () => {
    provider.getGenesisParameters.mockRejectedValue(
      new ChainNotImplementedError('getGenesisParameters', 'blockfrost')
    );

    const response = await server.inject({ method: 'GET', url: '/genesis' });

    expect(response.statusCode).toBe(501);
    expect(response.json().error).toEqual({
      code: 'CHAIN_NOT_IMPLEMENTED',
      message: 'getGenesisParameters: not implemented by the blockfrost backend',
      statusCode: 501,
    });
  });

  it('GET /genesis should render supply and start time', async () => {
    provider.getGenesisParameters.mockResolvedValue({
      activeSlotsCoefficient: 0.05,
      updateQuorum: 5,
      maxLovelaceSupply: 45000000000000000n,
      networkMagic: 2,
      epochLength: 86400,
      systemStart: 1666656000,
      slotsPerKesPeriod: 129600,
      slotLength: 1,
      maxKesEvolutions: 62,
      securityParam: 432,
    });

    const response = await server.inject({ method: 'GET', url: '/genesis' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      maxLovelaceSupply: '45000000000000000',
      systemStart: 1666656000,
      networkMagic: 2,
    });
  });

  it('GET /epoch should wrap the epoch number', async () => {
    provider.currentEpoch.mockResolvedValue(412);

    const response = await server.inject({ method: 'GET', url: '/epoch' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ epoch: 412 });
  });

  it('GET /tip should pass request-bound call options to the backend', async () => {
    const tip = { slot: 5120, height: 88, hash: 'ee'.repeat(32) };
    provider.getTip.mockResolvedValue(tip);

    const response = await server.inject({ method: 'GET', url: '/tip' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(tip);
    const [options] = provider.getTip.mock.calls[0] ?? [];
    expect(options?.signal).toBeInstanceOf(AbortSignal);
    expect(options?.diagnostics?.size).toBe(0);
  });
});
