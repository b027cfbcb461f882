import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { Diagnostics } from '@/chain/diagnostics.js';
import { ChainProviderError, isChainError } from '@/chain/errors.js';
import type { MaestroTransport } from '@/chain/maestro/maestro-client.js';
import { MaestroProvider } from '@/chain/maestro/maestro-provider.js';

import {
  ADDRESS,
  DATUM_HASH,
  NATIVE_SCRIPT_CBOR,
  OTHER_ADDRESS,
  OTHER_TX_HASH,
  POLICY_ID,
  SCRIPT_HASH,
  STAKE_ADDRESS,
  TX_HASH,
  UNIT,
  createMockLogger,
  lovelaceOutput,
  makeUtxo,
  outputCbor,
  tokenOutput,
} from '../../fixtures/ledger.js';

function createMockClient() {
  return {
    getCurrentEpoch: vi.fn<MaestroTransport['getCurrentEpoch']>(),
    getProtocolParameters: vi.fn<MaestroTransport['getProtocolParameters']>(),
    getChainTip: vi.fn<MaestroTransport['getChainTip']>(),
    getAddressUtxos: vi.fn<MaestroTransport['getAddressUtxos']>(),
    getAssetAddresses: vi.fn<MaestroTransport['getAssetAddresses']>(),
    getTransactionOutput: vi.fn<MaestroTransport['getTransactionOutput']>(),
    getAccount: vi.fn<MaestroTransport['getAccount']>(),
    getBlock: vi.fn<MaestroTransport['getBlock']>(),
    getDatum: vi.fn<MaestroTransport['getDatum']>(),
    getScript: vi.fn<MaestroTransport['getScript']>(),
    getTransactionCbor: vi.fn<MaestroTransport['getTransactionCbor']>(),
    submitTransaction: vi.fn<MaestroTransport['submitTransaction']>(),
    evaluateTransaction: vi.fn<MaestroTransport['evaluateTransaction']>(),
  } satisfies MaestroTransport;
}

function utxoRow(txHash: string, index: number, cbor = outputCbor(lovelaceOutput(2_000_000n))) {
  return { tx_hash: txHash, index, address: ADDRESS, txout_cbor: cbor };
}

const SIGNED_TX = Uint8Array.from([0x84, 0xa4, 0x00]);

describe('MaestroProvider', () => {
  let client: ReturnType<typeof createMockClient>;
  let provider: MaestroProvider;

  beforeEach(() => {
    client = createMockClient();
    provider = new MaestroProvider({
      client,
      logger: createMockLogger(),
      networkId: 0,
      maxConcurrency: 4,
    });
  });

  describe('chain state', () => {
    it('should map the chain tip', async () => {
      client.getChainTip.mockResolvedValue({ data: { block_hash: 'ee'.repeat(32), slot: 5120, height: 88 } });
      expect(await provider.getTip()).toEqual({ slot: 5120, height: 88, hash: 'ee'.repeat(32) });
    });

    it('should read the current epoch', async () => {
      client.getCurrentEpoch.mockResolvedValue({ data: { epoch_no: 412 } });
      expect(await provider.currentEpoch()).toBe(412);
    });

    it('should map protocol parameters in either lovelace shape', async () => {
      client.getProtocolParameters.mockResolvedValue({
        data: {
          min_fee_coefficient: 44,
          min_fee_constant: { ada: { lovelace: 155381 } },
          max_block_body_size: { bytes: 90112 },
          max_block_header_size: { bytes: 1100 },
          max_transaction_size: { bytes: 16384 },
          stake_credential_deposit: { lovelace: 2000000 },
          stake_pool_deposit: 500000000,
          stake_pool_pledge_influence: '3/10',
          monetary_expansion: '3/1000',
          treasury_expansion: '1/5',
          min_stake_pool_cost: { ada: { lovelace: 170000000 } },
          protocol_version: { major: 9, minor: 1 },
          script_execution_prices: { memory: '577/10000', steps: '721/10000000' },
          max_execution_units_per_transaction: { memory: 14000000, cpu: 10000000000 },
          plutus_cost_models: { plutus_v3: [4, 5] },
        },
      });

      const params = await provider.getProtocolParameters();

      expect(params.minFeeB).toBe(155381);
      expect(params.keyDeposit).toBe(2000000n);
      expect(params.poolDeposit).toBe(500000000n);
      expect(params.protocolMajorVersion).toBe(9);
      expect(params.priceMem).toBe(0.0577);
      expect(params.maxTxExSteps).toBe(10000000000n);
      expect(params.minUtxo).toBe(0n);
      expect(params.costModels).toEqual({ PlutusV3: [4, 5] });
    });

    it('should not offer genesis parameters', async () => {
      await expect(provider.getGenesisParameters()).rejects.toThrow(
        'getGenesisParameters: not implemented by the maestro backend'
      );
    });
  });

  describe('getUtxosByAddress', () => {
    it('should follow the cursor and decode each output', async () => {
      client.getAddressUtxos
        .mockResolvedValueOnce({ data: [utxoRow(TX_HASH, 0, outputCbor(tokenOutput(3_000_000n, 5n)))], next_cursor: 'c1' })
        .mockResolvedValueOnce({ data: [utxoRow(OTHER_TX_HASH, 1)], next_cursor: null });

      const utxos = await provider.getUtxosByAddress(ADDRESS);

      expect(utxos).toEqual([makeUtxo(TX_HASH, 0, tokenOutput(3_000_000n, 5n)), makeUtxo(OTHER_TX_HASH, 1)]);
      expect(client.getAddressUtxos.mock.calls.map((call) => call[1])).toEqual([
        { count: 100, cursor: undefined, asset: undefined },
        { count: 100, cursor: 'c1', asset: undefined },
      ]);
    });

    it('should return [] for an unknown address', async () => {
      client.getAddressUtxos.mockResolvedValue(null);
      expect(await provider.getUtxosByAddress(ADDRESS)).toEqual([]);
    });

    it('should reject undecodable output CBOR', async () => {
      client.getAddressUtxos.mockResolvedValue({ data: [utxoRow(TX_HASH, 0, '00')] });
      try {
        await provider.getUtxosByAddress(ADDRESS);
        expect.fail('Expected error to be thrown');
      } catch (error) {
        expect(isChainError(error, 'CHAIN_DECODE_FAILED')).toBe(true);
      }
    });

    it('should pass the fixed-offset unit as the asset filter', async () => {
      client.getAddressUtxos.mockResolvedValue({ data: [] });
      await provider.getUtxosWithUnit(ADDRESS, `${POLICY_ID}.746f6b656e`);
      expect(client.getAddressUtxos.mock.calls[0]?.[1]).toMatchObject({ asset: UNIT });
    });
  });

  describe('getUtxoByUnit', () => {
    it('should find the single UTxO of the single holder', async () => {
      client.getAssetAddresses.mockResolvedValue({ data: [{ address: OTHER_ADDRESS, amount: 1 }] });
      client.getAddressUtxos.mockResolvedValue({
        data: [utxoRow(TX_HASH, 2, outputCbor(tokenOutput(2_000_000n, 1n, OTHER_ADDRESS)))],
      });

      const utxo = await provider.getUtxoByUnit(UNIT);

      expect(utxo).toEqual(makeUtxo(TX_HASH, 2, tokenOutput(2_000_000n, 1n, OTHER_ADDRESS)));
      expect(client.getAssetAddresses).toHaveBeenCalledWith(UNIT, 2, expect.anything());
      expect(client.getAddressUtxos.mock.calls[0]?.[0]).toBe(OTHER_ADDRESS);
    });

    it('should fail with not found when nobody holds the unit', async () => {
      client.getAssetAddresses.mockResolvedValue(null);
      await expect(provider.getUtxoByUnit(UNIT)).rejects.toThrow(`getUtxoByUnit: resource not found: ${UNIT}`);
    });

    it('should fail when several addresses hold the unit', async () => {
      client.getAssetAddresses.mockResolvedValue({ data: [{ address: ADDRESS }, { address: OTHER_ADDRESS }] });
      await expect(provider.getUtxoByUnit(UNIT)).rejects.toThrow(`${UNIT} is held by more than one address`);
    });

    it('should fail when the holder spreads the unit over several UTxOs', async () => {
      client.getAssetAddresses.mockResolvedValue({ data: [{ address: ADDRESS }] });
      client.getAddressUtxos.mockResolvedValue({ data: [utxoRow(TX_HASH, 0), utxoRow(TX_HASH, 1)] });
      await expect(provider.getUtxoByUnit(UNIT)).rejects.toThrow(`${UNIT} is spread over 2 UTxOs`);
    });
  });

  describe('getUtxosByOutputRef', () => {
    it('should fetch each reference once and skip missing outputs', async () => {
      client.getTransactionOutput.mockImplementation(async (txHash, index) =>
        index === 9 ? null : { data: utxoRow(txHash, index) }
      );

      const utxos = await provider.getUtxosByOutputRef([
        { txHash: TX_HASH, outputIndex: 1 },
        { txHash: TX_HASH, outputIndex: 9 },
        { txHash: OTHER_TX_HASH, outputIndex: 0 },
        { txHash: TX_HASH, outputIndex: 1 },
      ]);

      expect(utxos.map((utxo) => `${utxo.input.txHash}#${utxo.input.outputIndex}`)).toEqual([
        `${TX_HASH}#1`,
        `${OTHER_TX_HASH}#0`,
      ]);
      expect(client.getTransactionOutput).toHaveBeenCalledTimes(3);
    });
  });

  describe('getDelegation', () => {
    it('should read the epoch from the block of the last update', async () => {
      client.getAccount.mockResolvedValue({
        data: { delegated_pool: 'pool1test', registered: true, rewards_available: '1500000' },
        last_updated: { block_hash: 'ff'.repeat(32) },
      });
      client.getBlock.mockResolvedValue({ data: { epoch: 410 } });

      expect(await provider.getDelegation(STAKE_ADDRESS)).toEqual({
        active: true,
        rewards: 1500000n,
        poolId: 'pool1test',
        epoch: 410,
      });
      expect(client.getBlock.mock.calls[0]?.[0]).toBe('ff'.repeat(32));
    });

    it('should count a registered account without a pool as active', async () => {
      client.getAccount.mockResolvedValue({ data: { delegated_pool: null, registered: true, rewards_available: 0 } });
      expect(await provider.getDelegation(STAKE_ADDRESS)).toEqual({ active: true, rewards: 0n, poolId: '' });
      expect(client.getBlock).not.toHaveBeenCalled();
    });

    it('should treat an unknown account as undelegated', async () => {
      client.getAccount.mockResolvedValue(null);
      expect(await provider.getDelegation(STAKE_ADDRESS)).toEqual({ active: false, rewards: 0n, poolId: '' });
    });
  });

  describe('datums and scripts', () => {
    it('should decode a datum by hash', async () => {
      client.getDatum.mockResolvedValue({ data: { bytes: '182a' } });
      expect(await provider.getDatum(DATUM_HASH)).toBe(42n);
    });

    it('should fail with not found for an unknown datum', async () => {
      client.getDatum.mockResolvedValue(null);
      await expect(provider.getDatum(DATUM_HASH)).rejects.toThrow(`getDatum: resource not found: ${DATUM_HASH}`);
    });

    it('should map a native script', async () => {
      client.getScript.mockResolvedValue({ data: { type: 'native', bytes: NATIVE_SCRIPT_CBOR } });
      expect(await provider.getScriptByHash(SCRIPT_HASH)).toEqual({ type: 'Native', script: NATIVE_SCRIPT_CBOR });
    });

    it('should reject an unknown script type', async () => {
      client.getScript.mockResolvedValue({ data: { type: 'mystery', bytes: '00' } });
      await expect(provider.getScriptByHash(SCRIPT_HASH)).rejects.toThrow(
        'getScriptByHash: failed to decode backend payload: unknown script type mystery'
      );
    });

    it('should reject a malformed script hash before any request', async () => {
      await expect(provider.getScriptByHash('abc')).rejects.toThrow('getScriptByHash: invalid input: abc');
      expect(client.getScript).not.toHaveBeenCalled();
    });
  });

  describe('awaitConfirmation', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should confirm once the transaction CBOR is served', async () => {
      client.getTransactionCbor.mockResolvedValueOnce(null).mockResolvedValueOnce({ data: '84a400' });

      const run = provider.awaitConfirmation(TX_HASH);
      await vi.advanceTimersByTimeAsync(3_000);

      await expect(run).resolves.toBe(true);
      expect(client.getTransactionCbor).toHaveBeenCalledTimes(2);
    });
  });

  describe('submitTransaction', () => {
    it('should return the reported id', async () => {
      client.submitTransaction.mockResolvedValue(`${TX_HASH}\n`);
      expect(await provider.submitTransaction(SIGNED_TX)).toBe(TX_HASH);
    });

    it('should convert a provider failure into a submission error', async () => {
      client.submitTransaction.mockRejectedValue(new ChainProviderError('submitTransaction', 'maestro HTTP 500'));
      try {
        await provider.submitTransaction(SIGNED_TX);
        expect.fail('Expected error to be thrown');
      } catch (error) {
        expect(isChainError(error, 'CHAIN_SUBMISSION_FAILED')).toBe(true);
      }
    });

    it('should hand the client a rejection mapper', async () => {
      client.submitTransaction.mockResolvedValue(TX_HASH);
      await provider.submitTransaction(SIGNED_TX);

      const rejection = client.submitTransaction.mock.calls[0]?.[1].rejection;
      expect(rejection?.('BadInputsUTxO')).toHaveProperty(
        'message',
        'submitTransaction: transaction submission failed: BadInputsUTxO'
      );
    });

    it('should reject an empty reply', async () => {
      client.submitTransaction.mockResolvedValue(null);
      await expect(provider.submitTransaction(SIGNED_TX)).rejects.toThrow(
        'submitTransaction: transaction submission failed: backend returned an empty transaction hash'
      );
    });
  });

  describe('evaluateTransaction', () => {
    it('should canonicalize tags and report unknown ones', async () => {
      client.evaluateTransaction.mockResolvedValue([
        { redeemer_tag: 'spend', redeemer_index: 0, ex_units: { mem: 1700, steps: 476468 } },
        { redeemer_tag: 'withdraw', redeemer_index: 0, ex_units: { mem: '10', steps: '20' } },
        { redeemer_tag: 'guard', redeemer_index: 3, ex_units: { mem: 1, steps: 1 } },
      ]);
      const diagnostics = new Diagnostics();

      expect(await provider.evaluateTransaction(SIGNED_TX, [], { diagnostics })).toEqual([
        { tag: 'spend', index: 0, exUnits: { mem: 1700n, steps: 476468n } },
        { tag: 'reward', index: 0, exUnits: { mem: 10n, steps: 20n } },
      ]);
      expect(diagnostics.entries.map((entry) => entry.key)).toEqual(['guard:3']);
    });

    it('should send additional UTxOs as output CBOR', async () => {
      client.evaluateTransaction.mockResolvedValue([]);
      const utxo = makeUtxo(TX_HASH, 4, tokenOutput(3_000_000n, 5n));

      await provider.evaluateTransaction(SIGNED_TX, [utxo]);

      expect(client.evaluateTransaction.mock.calls[0]?.slice(0, 2)).toEqual([
        '84a400',
        [{ tx_hash: TX_HASH, index: 4, txout_cbor: outputCbor(utxo.output) }],
      ]);
    });

    it('should fail when the endpoint is missing', async () => {
      client.evaluateTransaction.mockResolvedValue(null);
      await expect(provider.evaluateTransaction(SIGNED_TX)).rejects.toThrow(
        'evaluateTransaction: transaction evaluation failed: evaluation endpoint not available'
      );
    });
  });
});
