// Blockfrost adapter: REST indexer with page-number pagination

import type { Data } from '@lucid-evolution/lucid';
import type { FastifyBaseLogger } from 'fastify';

import { decodeDatum, scriptTypeFromLanguage } from '../cbor.js';
import { mapWithConcurrency } from '../concurrency.js';
import { awaitConfirmation } from '../confirmation.js';
import { report } from '../diagnostics.js';
import type { CallOptions } from '../diagnostics.js';
import {
  ChainAmbiguousResultError,
  ChainEvaluationError,
  ChainInvalidUnitError,
  ChainNotFoundError,
  ChainSubmissionError,
  errorMessage,
  isChainError,
} from '../errors.js';
import type { RequestOptions } from '../http-client.js';
import { buildOutputResolvingScript } from '../output-builder.js';
import type { ScriptResolver } from '../output-builder.js';
import { distinctTxHashes, normalizeOutRefs, selectOutputs } from '../outrefs.js';
import { DEFAULT_PAGE_SIZE, walkPages } from '../pagination.js';
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
import { outRefToString } from '../types.js';
import { parseUnit } from '../unit.js';
import {
  requireAddress,
  requireHash28,
  requireHash32,
  requireStakeAddress,
  requireTransaction,
} from '../validation.js';
import type { BlockfrostTransport } from './blockfrost-client.js';
import {
  mapDelegation,
  mapEvaluation,
  mapGenesis,
  mapNativeScript,
  mapProtocolParameters,
  mapScript,
  mapTip,
  toAdditionalUtxo,
  toOutputParts,
} from './blockfrost-mapper.js';
import {
  BlockfrostAccountSchema,
  BlockfrostAddressUtxoSchema,
  BlockfrostAssetAddressesSchema,
  BlockfrostBlockSchema,
  BlockfrostDatumCborSchema,
  BlockfrostEpochSchema,
  BlockfrostEvaluationSchema,
  BlockfrostGenesisSchema,
  BlockfrostParametersSchema,
  BlockfrostScriptCborSchema,
  BlockfrostScriptJsonSchema,
  BlockfrostScriptSchema,
  BlockfrostTransactionSchema,
  BlockfrostTxUtxosSchema,
} from './blockfrost-schemas.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const BLOCKFROST_CONFIRMATION_INTERVAL_MS = 3_000;
/** Grace period after /txs/{hash} first reports a block */
export const BLOCKFROST_CONFIRMATION_SETTLE_MS = 1_000;

export interface BlockfrostProviderOptions extends ProviderDeps {
  client: BlockfrostTransport;
  customSubmitEndpoints?: readonly string[];
}

// ---------------------------------------------------------------------------
// BlockfrostProvider
// ---------------------------------------------------------------------------

export class BlockfrostProvider implements ChainProvider {
  readonly backend = 'blockfrost' as const;

  private readonly client: BlockfrostTransport;
  private readonly log: FastifyBaseLogger;
  private readonly networkId: NetworkId;
  private readonly maxConcurrency: number;
  private readonly customSubmitEndpoints: readonly string[];

  constructor(options: BlockfrostProviderOptions) {
    this.client = options.client;
    this.log = options.logger;
    this.networkId = options.networkId;
    this.maxConcurrency = options.maxConcurrency;
    this.customSubmitEndpoints = options.customSubmitEndpoints ?? [];
  }

  network(): NetworkId {
    return this.networkId;
  }

  async close(): Promise<void> {
    // stateless HTTP client; nothing to release
  }

  // ---- Chain state ----

  async getProtocolParameters(options?: CallOptions): Promise<ProtocolParameters> {
    const operation = 'getProtocolParameters';
    const raw = await this.client.getEpochParameters(req(operation, 'latest', options));
    return mapProtocolParameters(parsePayload(BlockfrostParametersSchema, raw, operation));
  }

  async getGenesisParameters(options?: CallOptions): Promise<GenesisParameters> {
    const operation = 'getGenesisParameters';
    const raw = await this.client.getGenesis(req(operation, 'genesis', options));
    return mapGenesis(parsePayload(BlockfrostGenesisSchema, raw, operation));
  }

  async currentEpoch(options?: CallOptions): Promise<number> {
    const operation = 'currentEpoch';
    const raw = await this.client.getLatestEpoch(req(operation, 'latest', options));
    return parsePayload(BlockfrostEpochSchema, raw, operation).epoch;
  }

  async getTip(options?: CallOptions): Promise<Tip> {
    const operation = 'getTip';
    const raw = await this.client.getLatestBlock(req(operation, 'latest', options));
    return mapTip(parsePayload(BlockfrostBlockSchema, raw, operation));
  }

  // ---- UTxO queries ----

  async getUtxosByAddress(address: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByAddress';
    return this.listAddressUtxos(operation, requireAddress(address, operation), undefined, options);
  }

  async getUtxosWithUnit(address: string, unit: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosWithUnit';
    requireAddress(address, operation);
    const { policyId } = parseUnit(unit);
    // every output holds lovelace; the plain listing is the filtered one
    return this.listAddressUtxos(operation, address, policyId === '' ? undefined : unit, options);
  }

  async getUtxoByUnit(unit: string, options?: CallOptions): Promise<Utxo> {
    const operation = 'getUtxoByUnit';
    const { policyId } = parseUnit(unit);
    if (policyId === '') {
      throw new ChainInvalidUnitError(operation, unit);
    }

    // two candidates are enough to tell "one holder" from "many"
    const raw = await this.client.getAssetAddresses(unit, 2, req(operation, unit, options));
    const holders = raw === null ? [] : parsePayload(BlockfrostAssetAddressesSchema, raw, operation);
    if (holders.length === 0) {
      throw new ChainNotFoundError(operation, unit);
    }
    if (holders.length > 1) {
      throw new ChainAmbiguousResultError(operation, `${unit} is held by more than one address`);
    }

    const utxos = await this.listAddressUtxos(operation, holders[0].address, unit, options);
    if (utxos.length === 0) {
      throw new ChainNotFoundError(operation, unit);
    }
    if (utxos.length > 1) {
      throw new ChainAmbiguousResultError(operation, `${unit} is spread over ${utxos.length} UTxOs`);
    }
    return utxos[0];
  }

  async getUtxosByOutputRef(refs: readonly OutRef[], options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByOutputRef';
    const wanted = normalizeOutRefs(refs, operation);
    const resolveScript = this.scriptResolver(operation, options);

    const perTx = await mapWithConcurrency(
      distinctTxHashes(wanted),
      async (txHash, signal) => {
        const raw = await this.client.getTransactionUtxos(txHash, {
          operation,
          key: txHash,
          signal,
        });
        if (raw === null) {
          this.log.debug({ operation, txHash }, 'Transaction not found; skipping its references');
          return [txHash, []] as const;
        }
        const tx = parsePayload(BlockfrostTxUtxosSchema, raw, operation);
        const indices = new Set(wanted.filter((ref) => ref.txHash === txHash).map((ref) => ref.outputIndex));
        const utxos: Utxo[] = [];
        // outputs nobody asked for never reach the script resolver
        for (const output of tx.outputs.filter((candidate) => indices.has(candidate.output_index))) {
          const input = { txHash, outputIndex: output.output_index };
          utxos.push({
            input,
            output: await buildOutputResolvingScript(
              toOutputParts(output, outRefToString(input)),
              resolveScript,
              outRefToString(input)
            ),
          });
        }
        return [txHash, utxos] as const;
      },
      { limit: this.maxConcurrency, signal: options?.signal, operation }
    );

    return selectOutputs(wanted, new Map<string, readonly Utxo[]>(perTx));
  }

  // ---- Accounts, datums, scripts ----

  async getDelegation(stakeAddress: string, options?: CallOptions): Promise<Delegation> {
    const operation = 'getDelegation';
    requireStakeAddress(stakeAddress, operation);
    const raw = await this.client.getAccount(stakeAddress, req(operation, stakeAddress, options));
    return mapDelegation(raw === null ? null : parsePayload(BlockfrostAccountSchema, raw, operation));
  }

  async getDatum(datumHash: string, options?: CallOptions): Promise<Data> {
    const operation = 'getDatum';
    const hash = requireHash32(datumHash, operation);
    const raw = await this.client.getDatumCbor(hash, req(operation, hash, options));
    if (raw === null) {
      throw new ChainNotFoundError(operation, hash);
    }
    const { cbor } = parsePayload(BlockfrostDatumCborSchema, raw, operation);
    return decodeDatum(cbor, `${operation} ${hash}`);
  }

  async getScriptByHash(scriptHash: string, options?: CallOptions): Promise<ScriptRef> {
    const operation = 'getScriptByHash';
    return this.fetchScript(operation, requireHash28(scriptHash, operation), options);
  }

  // ---- Transactions ----

  async awaitConfirmation(txHash: string, interval?: number, options?: CallOptions): Promise<boolean> {
    const operation = 'awaitConfirmation';
    const hash = requireHash32(txHash, operation);
    return awaitConfirmation(
      async (signal) => {
        const raw = await this.client.getTransaction(hash, { operation, key: hash, signal });
        if (raw === null) {
          return 'pending';
        }
        const tx = parsePayload(BlockfrostTransactionSchema, raw, operation);
        return tx.block ? 'confirmed' : 'pending';
      },
      {
        txHash: hash,
        interval,
        defaultInterval: BLOCKFROST_CONFIRMATION_INTERVAL_MS,
        settleDelay: BLOCKFROST_CONFIRMATION_SETTLE_MS,
        signal: options?.signal,
        operation,
      }
    );
  }

  async submitTransaction(tx: Uint8Array, options?: CallOptions): Promise<string> {
    const operation = 'submitTransaction';
    requireTransaction(tx, operation);

    for (const endpoint of this.customSubmitEndpoints) {
      try {
        const body = await this.client.submitToEndpoint(endpoint, tx, req(operation, endpoint, options));
        const txHash = typeof body === 'string' ? body.trim() : '';
        if (txHash !== '') {
          return txHash;
        }
        report(this.log, options, { operation, key: endpoint, message: 'Submit endpoint returned no hash' });
      } catch (error) {
        if (isChainError(error, 'CHAIN_CANCELLED')) {
          throw error;
        }
        report(this.log, options, { operation, key: endpoint, message: errorMessage(error) });
      }
    }

    let result: unknown;
    try {
      result = await this.client.submitTransaction(tx, req(operation, 'blockfrost', options));
    } catch (error) {
      if (isChainError(error, 'CHAIN_PROVIDER_ERROR')) {
        throw new ChainSubmissionError(operation, error.message);
      }
      throw error;
    }
    if (typeof result !== 'string' || result === '') {
      throw new ChainSubmissionError(operation, 'backend returned an empty transaction hash');
    }
    return result;
  }

  async evaluateTransaction(
    tx: Uint8Array,
    additionalUtxos: readonly Utxo[] = [],
    options?: CallOptions
  ): Promise<EvalRedeemer[]> {
    const operation = 'evaluateTransaction';
    const cborHex = requireTransaction(tx, operation);
    const additional = additionalUtxos.map((utxo) => toAdditionalUtxo(utxo, operation));
    const raw = await this.client.evaluateTransaction(cborHex, additional, {
      ...req(operation, 'transaction', options),
      rejection: (message) => new ChainEvaluationError(operation, message),
    });
    const redeemers = mapEvaluation(parsePayload(BlockfrostEvaluationSchema, raw, operation), operation);
    return normalizeRedeemers(redeemers, this.log, operation, options);
  }

  // ---- Internals ----

  private async listAddressUtxos(
    operation: string,
    address: string,
    unit: string | undefined,
    options: CallOptions | undefined
  ): Promise<Utxo[]> {
    const raw = await walkPages(
      async (page, signal) => {
        const body = await this.client.getAddressUtxos(address, page, DEFAULT_PAGE_SIZE, unit, {
          operation,
          key: address,
          signal,
        });
        // 404 on the first page is an unused address; later it just ends the walk
        return body === null ? [] : parsePayload(BlockfrostAddressUtxoSchema.array(), body, operation);
      },
      { pageSize: DEFAULT_PAGE_SIZE, signal: options?.signal, operation, key: address }
    );

    const resolveScript = this.scriptResolver(operation, options);
    const utxos: Utxo[] = [];
    for (const item of raw) {
      const input = { txHash: item.tx_hash, outputIndex: item.output_index };
      const context = outRefToString(input);
      utxos.push({
        input,
        output: await buildOutputResolvingScript(toOutputParts(item, context), resolveScript, context),
      });
    }
    return utxos;
  }

  /** Script lookups memoized for the span of one call. */
  private scriptResolver(operation: string, options: CallOptions | undefined): ScriptResolver {
    const pending = new Map<string, Promise<ScriptRef>>();
    return (scriptHash) => {
      let lookup = pending.get(scriptHash);
      if (!lookup) {
        lookup = this.fetchScript(operation, scriptHash, options);
        pending.set(scriptHash, lookup);
      }
      return lookup;
    };
  }

  private async fetchScript(
    operation: string,
    scriptHash: string,
    options: CallOptions | undefined
  ): Promise<ScriptRef> {
    const info = await this.client.getScript(scriptHash, req(operation, scriptHash, options));
    if (info === null) {
      throw new ChainNotFoundError(operation, scriptHash);
    }
    const { type } = parsePayload(BlockfrostScriptSchema, info, operation);
    if (scriptTypeFromLanguage(type) === 'Native') {
      const json = await this.client.getScriptJson(scriptHash, req(operation, scriptHash, options));
      if (json === null) {
        throw new ChainNotFoundError(operation, scriptHash);
      }
      return mapNativeScript(scriptHash, parsePayload(BlockfrostScriptJsonSchema, json, operation).json, operation);
    }
    const raw = await this.client.getScriptCbor(scriptHash, req(operation, scriptHash, options));
    if (raw === null) {
      throw new ChainNotFoundError(operation, scriptHash);
    }
    const { cbor } = parsePayload(BlockfrostScriptCborSchema, raw, operation);
    return mapScript(scriptHash, type, cbor, operation);
  }
}

function req(operation: string, key: string, options: CallOptions | undefined): RequestOptions {
  return { operation, key, signal: options?.signal };
}
