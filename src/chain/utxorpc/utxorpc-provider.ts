// UTxORPC adapter: gRPC node proxy with continuation tokens and CBOR outputs

import type { Data } from '@lucid-evolution/lucid';
import type { FastifyBaseLogger } from 'fastify';

import { addressToBytes } from '../cbor.js';
import { awaitConfirmation } from '../confirmation.js';
import type { CallOptions } from '../diagnostics.js';
import {
  ChainAmbiguousResultError,
  ChainDecodeError,
  ChainEvaluationError,
  ChainInvalidInputError,
  ChainInvalidUnitError,
  ChainNotFoundError,
  ChainNotImplementedError,
  ChainSubmissionError,
  isChainError,
} from '../errors.js';
import type { RequestOptions } from '../http-client.js';
import { normalizeOutRefs, selectOutputs } from '../outrefs.js';
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
import { requireAddress, requireHash32, requireTransaction } from '../validation.js';
import { quantityOf } from '../value.js';
import type { UtxoPatternMessage, UtxorpcTransport } from './utxorpc-client.js';
import { mapAnyUtxo, mapPParams, mapTxEval } from './utxorpc-mapper.js';
import {
  EvalTxResponseSchema,
  FetchBlockResponseSchema,
  ReadParamsResponseSchema,
  ReadTipResponseSchema,
  ReadUtxosResponseSchema,
  SearchUtxosResponseSchema,
  SubmitTxResponseSchema,
} from './utxorpc-schemas.js';

/** Pause between WaitForTx streams the server ends without confirming */
export const UTXORPC_CONFIRMATION_INTERVAL_MS = 1_000;

export interface UtxorpcProviderOptions extends ProviderDeps {
  client: UtxorpcTransport;
}

export class UtxorpcProvider implements ChainProvider {
  readonly backend = 'utxorpc' as const;

  private readonly client: UtxorpcTransport;
  private readonly log: FastifyBaseLogger;
  private readonly networkId: NetworkId;

  constructor(options: UtxorpcProviderOptions) {
    this.client = options.client;
    this.log = options.logger;
    this.networkId = options.networkId;
  }

  network(): NetworkId {
    return this.networkId;
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  // ---- Chain state ----

  async getProtocolParameters(options?: CallOptions): Promise<ProtocolParameters> {
    const operation = 'getProtocolParameters';
    const raw = await this.client.readParams(req(operation, 'params', options));
    const params = parsePayload(ReadParamsResponseSchema, raw, operation).values?.cardano;
    if (!params) {
      throw new ChainDecodeError(operation, 'ReadParams returned no Cardano parameters');
    }
    return mapPParams(params);
  }

  async getGenesisParameters(): Promise<GenesisParameters> {
    throw new ChainNotImplementedError('getGenesisParameters', 'utxorpc');
  }

  async currentEpoch(): Promise<number> {
    throw new ChainNotImplementedError('currentEpoch', 'utxorpc');
  }

  /** Older servers leave the tip's height unset; the tip block header carries it. */
  async getTip(options?: CallOptions): Promise<Tip> {
    const operation = 'getTip';
    const raw = await this.client.readTip(req(operation, 'tip', options));
    const tip = parsePayload(ReadTipResponseSchema, raw, operation).tip;
    if (!tip) {
      throw new ChainDecodeError(operation, 'ReadTip returned no tip');
    }
    let height = Number(tip.height);
    if (height === 0) {
      const block = await this.client.fetchBlock(
        { slot: String(tip.slot), hash: Buffer.from(tip.hash, 'hex') },
        req(operation, tip.hash, options)
      );
      const header = parsePayload(FetchBlockResponseSchema, block, operation).block[0]?.cardano?.header;
      if (!header) {
        throw new ChainDecodeError(operation, `no header for tip block ${tip.hash}`);
      }
      height = Number(header.height);
    }
    return { slot: Number(tip.slot), height, hash: tip.hash };
  }

  // ---- UTxO queries ----

  async getUtxosByAddress(address: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByAddress';
    const exact = addressToBytes(requireAddress(address, operation));
    return this.search(operation, address, { address: { exact_address: exact } }, undefined, options);
  }

  async getUtxosWithUnit(address: string, unit: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosWithUnit';
    const exact = addressToBytes(requireAddress(address, operation));
    const { policyId, assetName } = parseUnit(unit);
    if (policyId === '') {
      return this.search(operation, address, { address: { exact_address: exact } }, undefined, options);
    }
    return this.search(
      operation,
      address,
      { address: { exact_address: exact }, asset: assetPattern(policyId, assetName) },
      unit,
      options
    );
  }

  async getUtxoByUnit(unit: string, options?: CallOptions): Promise<Utxo> {
    const operation = 'getUtxoByUnit';
    const { policyId, assetName } = parseUnit(unit);
    if (policyId === '') {
      throw new ChainInvalidUnitError(operation, unit);
    }
    const utxos = await this.search(operation, unit, { asset: assetPattern(policyId, assetName) }, unit, options);
    if (utxos.length === 0) {
      throw new ChainNotFoundError(operation, unit);
    }
    if (utxos.length > 1) {
      throw new ChainAmbiguousResultError(operation, `${unit} is spread over ${utxos.length} UTxOs`);
    }
    return utxos[0];
  }

  /** One ReadUtxos call for the whole batch; unknown references are left out. */
  async getUtxosByOutputRef(refs: readonly OutRef[], options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByOutputRef';
    const wanted = normalizeOutRefs(refs, operation);
    if (wanted.length === 0) {
      return [];
    }
    const keys = wanted.map((ref) => ({ hash: Buffer.from(ref.txHash, 'hex'), index: ref.outputIndex }));
    const raw = await this.client.readUtxos(keys, req(operation, `${wanted.length} refs`, options));
    const fetched = new Map<string, Utxo[]>();
    for (const item of parsePayload(ReadUtxosResponseSchema, raw, operation).items) {
      const utxo = mapAnyUtxo(item, operation);
      const siblings = fetched.get(utxo.input.txHash) ?? [];
      siblings.push(utxo);
      fetched.set(utxo.input.txHash, siblings);
    }
    return selectOutputs(wanted, fetched);
  }

  // ---- Accounts, datums, scripts ----

  async getDelegation(): Promise<Delegation> {
    throw new ChainNotImplementedError('getDelegation', 'utxorpc');
  }

  async getDatum(): Promise<Data> {
    throw new ChainNotImplementedError('getDatum', 'utxorpc');
  }

  async getScriptByHash(): Promise<ScriptRef> {
    throw new ChainNotImplementedError('getScriptByHash', 'utxorpc');
  }

  // ---- Transactions ----

  /**
   * Each tick follows one WaitForTx stream until it reports the confirmed
   * stage; a stream the server closes early is reopened after `interval`.
   */
  async awaitConfirmation(txHash: string, interval?: number, options?: CallOptions): Promise<boolean> {
    const operation = 'awaitConfirmation';
    const hash = requireHash32(txHash, operation);
    return awaitConfirmation(
      async (signal) => {
        const confirmed = await this.client.waitForTx(hash, { operation, key: hash, signal });
        return confirmed ? 'confirmed' : 'pending';
      },
      {
        txHash: hash,
        interval,
        defaultInterval: UTXORPC_CONFIRMATION_INTERVAL_MS,
        signal: options?.signal,
        operation,
      }
    );
  }

  async submitTransaction(tx: Uint8Array, options?: CallOptions): Promise<string> {
    const operation = 'submitTransaction';
    requireTransaction(tx, operation);
    let raw: unknown;
    try {
      raw = await this.client.submitTx(tx, {
        ...req(operation, 'utxorpc', options),
        rejection: (message) => new ChainSubmissionError(operation, message),
      });
    } catch (error) {
      if (isChainError(error, 'CHAIN_PROVIDER_ERROR')) {
        throw new ChainSubmissionError(operation, error.message);
      }
      throw error;
    }
    const txHash = parsePayload(SubmitTxResponseSchema, raw, operation).ref[0] ?? '';
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
    requireTransaction(tx, operation);
    if (additionalUtxos.length > 0) {
      throw new ChainInvalidInputError(operation, 'additional UTxOs are not supported by utxorpc');
    }
    const raw = await this.client.evalTx(tx, {
      ...req(operation, 'transaction', options),
      rejection: (message) => new ChainEvaluationError(operation, message),
    });
    const report = parsePayload(EvalTxResponseSchema, raw, operation).report[0]?.cardano;
    if (!report) {
      throw new ChainDecodeError(operation, 'EvalTx returned no Cardano report');
    }
    if (report.errors.length > 0) {
      throw new ChainEvaluationError(operation, report.errors.map((error) => error.msg).join('; '));
    }
    return normalizeRedeemers(mapTxEval(report), this.log, operation, options);
  }

  // ---- Internals ----

  /**
   * Walk SearchUtxos. When `unit` is given, outputs are also filtered
   * locally since an empty asset name matches a whole policy on the server.
   */
  private async search(
    operation: string,
    key: string,
    pattern: UtxoPatternMessage,
    unit: string | undefined,
    options: CallOptions | undefined
  ): Promise<Utxo[]> {
    const items = await walkCursor(
      async (cursor, signal) => {
        const raw = await this.client.searchUtxos(
          pattern,
          { maxItems: DEFAULT_PAGE_SIZE, startToken: cursor },
          { operation, key, signal }
        );
        const page = parsePayload(SearchUtxosResponseSchema, raw, operation);
        return { items: page.items, next: page.next_token };
      },
      { signal: options?.signal, operation, key }
    );
    const utxos = items.map((item) => mapAnyUtxo(item, operation));
    return unit === undefined ? utxos : utxos.filter((utxo) => quantityOf(utxo.output.value, unit) > 0n);
  }
}

function assetPattern(policyId: string, assetName: string): NonNullable<UtxoPatternMessage['asset']> {
  return { policy_id: Buffer.from(policyId, 'hex'), asset_name: Buffer.from(assetName, 'hex') };
}

function req(operation: string, key: string, options: CallOptions | undefined): RequestOptions {
  return { operation, key, signal: options?.signal };
}
