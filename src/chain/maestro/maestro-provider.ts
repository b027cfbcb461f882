// Maestro adapter: REST indexer with cursor pagination and CBOR outputs

import type { Data } from '@lucid-evolution/lucid';
import type { FastifyBaseLogger } from 'fastify';

import { decodeDatum, scriptTypeFromLanguage, toScriptRef } from '../cbor.js';
import { mapWithConcurrency } from '../concurrency.js';
import { awaitConfirmation } from '../confirmation.js';
import type { CallOptions } from '../diagnostics.js';
import {
  ChainAmbiguousResultError,
  ChainDecodeError,
  ChainEvaluationError,
  ChainInvalidUnitError,
  ChainNotFoundError,
  ChainNotImplementedError,
  ChainSubmissionError,
  isChainError,
} from '../errors.js';
import type { RequestOptions } from '../http-client.js';
import { normalizeOutRefs } from '../outrefs.js';
import { DEFAULT_PAGE_SIZE, walkCursor } from '../pagination.js';
import { parsePayload } from '../payload.js';
import type { ChainProvider, ProviderDeps } from '../provider.js';
import { normalizeRedeemers } from '../redeemers.js';
import type {
  Delegation,
  EvalRedeemer,
  GenesisParameters,
  NetworkId,
  OutRef,
  ProtocolParameters,
  ScriptRef,
  Tip,
  Utxo,
} from '../types.js';
import { parseUnit } from '../unit.js';
import {
  requireAddress,
  requireHash28,
  requireHash32,
  requireStakeAddress,
  requireTransaction,
} from '../validation.js';
import type { MaestroTransport } from './maestro-client.js';
import {
  mapMaestroDelegation,
  mapMaestroEvaluation,
  mapMaestroProtocolParameters,
  mapMaestroUtxo,
  toMaestroAdditionalUtxo,
} from './maestro-mapper.js';
import {
  MaestroAccountSchema,
  MaestroAssetAddressesSchema,
  MaestroBlockSchema,
  MaestroChainTipSchema,
  MaestroDatumSchema,
  MaestroEpochSchema,
  MaestroEvaluationSchema,
  MaestroProtocolParametersSchema,
  MaestroScriptSchema,
  MaestroTxCborSchema,
  MaestroUtxoPageSchema,
  MaestroUtxoResponseSchema,
} from './maestro-schemas.js';

export const MAESTRO_CONFIRMATION_INTERVAL_MS = 3_000;

export interface MaestroProviderOptions extends ProviderDeps {
  client: MaestroTransport;
}

export class MaestroProvider implements ChainProvider {
  readonly backend = 'maestro' as const;

  private readonly client: MaestroTransport;
  private readonly log: FastifyBaseLogger;
  private readonly networkId: NetworkId;
  private readonly maxConcurrency: number;

  constructor(options: MaestroProviderOptions) {
    this.client = options.client;
    this.log = options.logger;
    this.networkId = options.networkId;
    this.maxConcurrency = options.maxConcurrency;
  }

  network(): NetworkId {
    return this.networkId;
  }

  async close(): Promise<void> {
    // stateless HTTP client
  }

  // ---- Chain state ----

  async getProtocolParameters(options?: CallOptions): Promise<ProtocolParameters> {
    const operation = 'getProtocolParameters';
    const raw = await this.client.getProtocolParameters(req(operation, 'latest', options));
    return mapMaestroProtocolParameters(parsePayload(MaestroProtocolParametersSchema, raw, operation).data);
  }

  async getGenesisParameters(): Promise<GenesisParameters> {
    throw new ChainNotImplementedError('getGenesisParameters', 'maestro');
  }

  async currentEpoch(options?: CallOptions): Promise<number> {
    const operation = 'currentEpoch';
    const raw = await this.client.getCurrentEpoch(req(operation, 'current', options));
    return parsePayload(MaestroEpochSchema, raw, operation).data.epoch_no;
  }

  async getTip(options?: CallOptions): Promise<Tip> {
    const operation = 'getTip';
    const raw = await this.client.getChainTip(req(operation, 'tip', options));
    const tip = parsePayload(MaestroChainTipSchema, raw, operation).data;
    return { slot: tip.slot, height: tip.height, hash: tip.block_hash };
  }

  // ---- UTxO queries ----

  async getUtxosByAddress(address: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByAddress';
    return this.listAddressUtxos(operation, requireAddress(address, operation), undefined, options);
  }

  async getUtxosWithUnit(address: string, unit: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosWithUnit';
    requireAddress(address, operation);
    const { policyId, assetName } = parseUnit(unit);
    const asset = policyId === '' ? undefined : policyId + assetName;
    return this.listAddressUtxos(operation, address, asset, options);
  }

  async getUtxoByUnit(unit: string, options?: CallOptions): Promise<Utxo> {
    const operation = 'getUtxoByUnit';
    const { policyId, assetName } = parseUnit(unit);
    if (policyId === '') {
      throw new ChainInvalidUnitError(operation, unit);
    }
    const asset = policyId + assetName;

    const raw = await this.client.getAssetAddresses(asset, 2, req(operation, asset, options));
    const holders = raw === null ? [] : parsePayload(MaestroAssetAddressesSchema, raw, operation).data;
    if (holders.length === 0) {
      throw new ChainNotFoundError(operation, unit);
    }
    if (holders.length > 1) {
      throw new ChainAmbiguousResultError(operation, `${unit} is held by more than one address`);
    }

    const utxos = await this.listAddressUtxos(operation, holders[0].address, asset, options);
    if (utxos.length === 0) {
      throw new ChainNotFoundError(operation, unit);
    }
    if (utxos.length > 1) {
      throw new ChainAmbiguousResultError(operation, `${unit} is spread over ${utxos.length} UTxOs`);
    }
    return utxos[0];
  }

  /** One request per reference; Maestro serves single outputs by index. */
  async getUtxosByOutputRef(refs: readonly OutRef[], options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByOutputRef';
    const wanted = normalizeOutRefs(refs, operation);

    const found = await mapWithConcurrency(
      wanted,
      async (ref, signal) => {
        const key = `${ref.txHash}#${ref.outputIndex}`;
        const raw = await this.client.getTransactionOutput(ref.txHash, ref.outputIndex, {
          operation,
          key,
          signal,
        });
        if (raw === null) {
          this.log.debug({ operation, ref: key }, 'Output not found; skipping');
          return null;
        }
        return mapMaestroUtxo(parsePayload(MaestroUtxoResponseSchema, raw, operation).data);
      },
      { limit: this.maxConcurrency, signal: options?.signal, operation }
    );

    return found.filter((utxo): utxo is Utxo => utxo !== null);
  }

  // ---- Accounts, datums, scripts ----

  async getDelegation(stakeAddress: string, options?: CallOptions): Promise<Delegation> {
    const operation = 'getDelegation';
    requireStakeAddress(stakeAddress, operation);
    const raw = await this.client.getAccount(stakeAddress, req(operation, stakeAddress, options));
    if (raw === null) {
      return mapMaestroDelegation(null);
    }
    const account = parsePayload(MaestroAccountSchema, raw, operation);
    const blockHash = account.last_updated?.block_hash;
    if (!blockHash) {
      return mapMaestroDelegation(account.data);
    }

    const block = await this.client.getBlock(blockHash, req(operation, blockHash, options));
    const epoch = block === null ? undefined : parsePayload(MaestroBlockSchema, block, operation).data.epoch;
    return mapMaestroDelegation(account.data, epoch);
  }

  async getDatum(datumHash: string, options?: CallOptions): Promise<Data> {
    const operation = 'getDatum';
    const hash = requireHash32(datumHash, operation);
    const raw = await this.client.getDatum(hash, req(operation, hash, options));
    if (raw === null) {
      throw new ChainNotFoundError(operation, hash);
    }
    return decodeDatum(parsePayload(MaestroDatumSchema, raw, operation).data.bytes, `${operation} ${hash}`);
  }

  async getScriptByHash(scriptHash: string, options?: CallOptions): Promise<ScriptRef> {
    const operation = 'getScriptByHash';
    const hash = requireHash28(scriptHash, operation);
    const raw = await this.client.getScript(hash, req(operation, hash, options));
    if (raw === null) {
      throw new ChainNotFoundError(operation, hash);
    }
    const script = parsePayload(MaestroScriptSchema, raw, operation).data;
    const type = scriptTypeFromLanguage(script.type);
    if (!type) {
      throw new ChainDecodeError(operation, `unknown script type ${script.type}`);
    }
    return toScriptRef(type, script.bytes, `${operation} ${hash}`);
  }

  // ---- Transactions ----

  /** Maestro serves a transaction's CBOR only once it is in a block. */
  async awaitConfirmation(txHash: string, interval?: number, options?: CallOptions): Promise<boolean> {
    const operation = 'awaitConfirmation';
    const hash = requireHash32(txHash, operation);
    return awaitConfirmation(
      async (signal) => {
        const raw = await this.client.getTransactionCbor(hash, { operation, key: hash, signal });
        if (raw === null) {
          return 'pending';
        }
        parsePayload(MaestroTxCborSchema, raw, operation);
        return 'confirmed';
      },
      {
        txHash: hash,
        interval,
        defaultInterval: MAESTRO_CONFIRMATION_INTERVAL_MS,
        signal: options?.signal,
        operation,
      }
    );
  }

  async submitTransaction(tx: Uint8Array, options?: CallOptions): Promise<string> {
    const operation = 'submitTransaction';
    requireTransaction(tx, operation);
    let result: unknown;
    try {
      result = await this.client.submitTransaction(tx, {
        ...req(operation, 'maestro', options),
        rejection: (message) => new ChainSubmissionError(operation, message),
      });
    } catch (error) {
      if (isChainError(error, 'CHAIN_PROVIDER_ERROR')) {
        throw new ChainSubmissionError(operation, error.message);
      }
      throw error;
    }
    const txHash = typeof result === 'string' ? result.trim() : '';
    if (txHash === '') {
      throw new ChainSubmissionError(operation, 'backend returned an empty transaction hash');
    }
    return txHash;
  }

  async evaluateTransaction(
    tx: Uint8Array,
    additionalUtxos: readonly Utxo[] = [],
    options?: CallOptions
  ): Promise<EvalRedeemer[]> {
    const operation = 'evaluateTransaction';
    const cborHex = requireTransaction(tx, operation);
    const raw = await this.client.evaluateTransaction(cborHex, additionalUtxos.map(toMaestroAdditionalUtxo), {
      ...req(operation, 'transaction', options),
      rejection: (message) => new ChainEvaluationError(operation, message),
    });
    if (raw === null) {
      throw new ChainEvaluationError(operation, 'evaluation endpoint not available');
    }
    const redeemers = mapMaestroEvaluation(parsePayload(MaestroEvaluationSchema, raw, operation));
    return normalizeRedeemers(redeemers, this.log, operation, options);
  }

  // ---- Internals ----

  private async listAddressUtxos(
    operation: string,
    address: string,
    asset: string | undefined,
    options: CallOptions | undefined
  ): Promise<Utxo[]> {
    const raw = await walkCursor(
      async (cursor, signal) => {
        const body = await this.client.getAddressUtxos(
          address,
          { count: DEFAULT_PAGE_SIZE, cursor, asset },
          { operation, key: address, signal }
        );
        if (body === null) {
          return { items: [] };
        }
        const page = parsePayload(MaestroUtxoPageSchema, body, operation);
        return { items: page.data, next: page.next_cursor };
      },
      { signal: options?.signal, operation, key: address }
    );
    return raw.map(mapMaestroUtxo);
  }
}

function req(operation: string, key: string, options: CallOptions | undefined): RequestOptions {
  return { operation, key, signal: options?.signal };
}
