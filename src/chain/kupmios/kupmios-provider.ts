// Kupmios adapter: Kupo for UTxOs, datums and scripts; Ogmios for the rest

import type { Data } from '@lucid-evolution/lucid';
import type { FastifyBaseLogger } from 'fastify';
import type { z } from 'zod';

import { decodeDatum, scriptTypeFromLanguage, stakeCredentialOf, toScriptRef } from '../cbor.js';
import { mapWithConcurrency } from '../concurrency.js';
import { awaitConfirmation } from '../confirmation.js';
import { report } from '../diagnostics.js';
import type { CallOptions } from '../diagnostics.js';
import {
  ChainAmbiguousResultError,
  ChainDecodeError,
  ChainEvaluationError,
  ChainInvalidUnitError,
  ChainNotFoundError,
  ChainProviderError,
  ChainSubmissionError,
  errorMessage,
  isChainError,
} from '../errors.js';
import type { RequestOptions } from '../http-client.js';
import { buildOutput } from '../output-builder.js';
import { distinctTxHashes, normalizeOutRefs, selectOutputs } from '../outrefs.js';
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
import { parseUnit, toDottedUnit } from '../unit.js';
import {
  requireAddress,
  requireHash28,
  requireHash32,
  requireStakeAddress,
  requireTransaction,
} from '../validation.js';
import { quantityOf } from '../value.js';
import type { KupoMatchFilter, KupoTransport } from './kupo-client.js';
import {
  mapKupoValue,
  mapOgmiosEvaluation,
  mapOgmiosGenesis,
  mapOgmiosProtocolParameters,
  mapOgmiosTip,
  mapRewardSummary,
  toKupoOutputParts,
  toOgmiosUtxo,
} from './kupmios-mapper.js';
import type { KupoMatch } from './kupmios-schemas.js';
import {
  KupoDatumSchema,
  KupoMatchesSchema,
  KupoScriptSchema,
  OgmiosBlockHeightSchema,
  OgmiosEpochSchema,
  OgmiosEvaluationSchema,
  OgmiosProtocolParametersSchema,
  OgmiosRewardSummariesSchema,
  OgmiosShelleyGenesisSchema,
  OgmiosSubmitSchema,
  OgmiosTipSchema,
} from './kupmios-schemas.js';
import type { OgmiosRpcError, OgmiosTransport } from './ogmios-client.js';

export const KUPMIOS_CONFIRMATION_INTERVAL_MS = 5_000;

export interface KupmiosProviderOptions extends ProviderDeps {
  kupo: KupoTransport;
  ogmios: OgmiosTransport;
}

type RpcErrorMapper = (operation: string, error: OgmiosRpcError) => Error;

const providerRpcError: RpcErrorMapper = (operation, error) =>
  new ChainProviderError(operation, `ogmios RPC ${error.code}: ${error.message}`);

function describeRpcError(error: OgmiosRpcError): string {
  return error.data === undefined
    ? `${error.message} (code ${error.code})`
    : `${error.message} (code ${error.code}): ${JSON.stringify(error.data)}`;
}

/**
 * Kupmios provider.
 *
 * Datums and reference scripts of listed outputs are resolved best-effort:
 * a failed lookup is reported to the caller's diagnostics and the output
 * keeps its datum hash, or goes without its script.
 */
export class KupmiosProvider implements ChainProvider {
  readonly backend = 'kupmios' as const;

  private readonly kupo: KupoTransport;
  private readonly ogmios: OgmiosTransport;
  private readonly log: FastifyBaseLogger;
  private readonly networkId: NetworkId;
  private readonly maxConcurrency: number;

  constructor(options: KupmiosProviderOptions) {
    this.kupo = options.kupo;
    this.ogmios = options.ogmios;
    this.log = options.logger;
    this.networkId = options.networkId;
    this.maxConcurrency = options.maxConcurrency;
  }

  network(): NetworkId {
    return this.networkId;
  }

  async close(): Promise<void> {
    await this.ogmios.close();
  }

  // ---- Chain state (Ogmios) ----

  async getProtocolParameters(options?: CallOptions): Promise<ProtocolParameters> {
    const operation = 'getProtocolParameters';
    const raw = await this.query(
      'queryLedgerState/protocolParameters',
      {},
      OgmiosProtocolParametersSchema,
      req(operation, 'latest', options)
    );
    return mapOgmiosProtocolParameters(raw);
  }

  async getGenesisParameters(options?: CallOptions): Promise<GenesisParameters> {
    const operation = 'getGenesisParameters';
    const raw = await this.query(
      'queryNetwork/genesisConfiguration',
      { era: 'shelley' },
      OgmiosShelleyGenesisSchema,
      req(operation, 'shelley', options)
    );
    return mapOgmiosGenesis(raw);
  }

  async currentEpoch(options?: CallOptions): Promise<number> {
    return this.query(
      'queryLedgerState/epoch',
      {},
      OgmiosEpochSchema,
      req('currentEpoch', 'latest', options)
    );
  }

  async getTip(options?: CallOptions): Promise<Tip> {
    const request = req('getTip', 'latest', options);
    const tip = await this.query('queryNetwork/tip', {}, OgmiosTipSchema, request);
    const height = await this.query('queryNetwork/blockHeight', {}, OgmiosBlockHeightSchema, request);
    return mapOgmiosTip(tip, height);
  }

  async getDelegation(stakeAddress: string, options?: CallOptions): Promise<Delegation> {
    const operation = 'getDelegation';
    requireStakeAddress(stakeAddress, operation);
    const credential = stakeCredentialOf(stakeAddress);
    const raw = await this.query(
      'queryLedgerState/rewardAccountSummaries',
      credential.type === 'key' ? { keys: [credential.hash] } : { scripts: [credential.hash] },
      OgmiosRewardSummariesSchema,
      req(operation, stakeAddress, options)
    );
    const summary = Array.isArray(raw)
      ? raw.find((item) => item.credential === undefined || item.credential === credential.hash)
      : raw[credential.hash];
    return mapRewardSummary(summary);
  }

  // ---- UTxO queries (Kupo) ----

  async getUtxosByAddress(address: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByAddress';
    requireAddress(address, operation);
    const matches = await this.matches(operation, address, { unspent: true }, options);
    return this.resolveMatches(operation, matches, options);
  }

  async getUtxosWithUnit(address: string, unit: string, options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosWithUnit';
    requireAddress(address, operation);
    const { policyId, assetName } = parseUnit(unit);
    const matches = await this.matches(
      operation,
      address,
      policyId === '' ? { unspent: true } : { unspent: true, policyId, assetName },
      options
    );
    // Kupo cannot ask for an empty asset name; keep only exact holders
    const holding = matches.filter((match) => holdsUnit(match, unit));
    return this.resolveMatches(operation, holding, options);
  }

  async getUtxoByUnit(unit: string, options?: CallOptions): Promise<Utxo> {
    const operation = 'getUtxoByUnit';
    const { policyId, assetName } = parseUnit(unit);
    if (policyId === '') {
      throw new ChainInvalidUnitError(operation, unit);
    }
    // an empty name has no Kupo pattern of its own
    const pattern = assetName === '' ? `${policyId}.*` : toDottedUnit(unit);
    const matches = (await this.matches(operation, pattern, { unspent: true }, options)).filter(
      (match) => holdsUnit(match, unit)
    );
    if (matches.length === 0) {
      throw new ChainNotFoundError(operation, unit);
    }
    if (matches.length > 1) {
      throw new ChainAmbiguousResultError(operation, `${unit} is spread over ${matches.length} UTxOs`);
    }
    const [utxo] = await this.resolveMatches(operation, matches, options);
    return utxo;
  }

  async getUtxosByOutputRef(refs: readonly OutRef[], options?: CallOptions): Promise<Utxo[]> {
    const operation = 'getUtxosByOutputRef';
    const wanted = normalizeOutRefs(refs, operation);
    const wantedKeys = new Set(wanted.map(outRefToString));

    const perTx = await mapWithConcurrency(
      distinctTxHashes(wanted),
      async (txHash, signal) => {
        const raw = await this.kupo.getMatches(`*@${txHash}`, {}, { operation, key: txHash, signal });
        const matches = raw === null ? [] : parsePayload(KupoMatchesSchema, raw, operation);
        const selected = matches.filter((match) =>
          wantedKeys.has(`${match.transaction_id}#${match.output_index}`)
        );
        const utxos = await this.resolveMatches(operation, selected, {
          diagnostics: options?.diagnostics,
          signal,
        });
        return [txHash, utxos] as const;
      },
      { limit: this.maxConcurrency, signal: options?.signal, operation }
    );

    return selectOutputs(wanted, new Map(perTx));
  }

  // ---- Datums and scripts (Kupo) ----

  async getDatum(datumHash: string, options?: CallOptions): Promise<Data> {
    const operation = 'getDatum';
    const hash = requireHash32(datumHash, operation);
    return decodeDatum(await this.fetchDatumCbor(operation, hash, options), `${operation} ${hash}`);
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
        const raw = await this.kupo.getMatches(`*@${hash}`, {}, { operation, key: hash, signal });
        const matches = raw === null ? [] : parsePayload(KupoMatchesSchema, raw, operation);
        return matches.some((match) => match.created_at.slot_no > 0) ? 'confirmed' : 'pending';
      },
      {
        txHash: hash,
        interval,
        defaultInterval: KUPMIOS_CONFIRMATION_INTERVAL_MS,
        signal: options?.signal,
        operation,
      }
    );
  }

  async submitTransaction(tx: Uint8Array, options?: CallOptions): Promise<string> {
    const operation = 'submitTransaction';
    const cbor = requireTransaction(tx, operation);
    const result = await this.query(
      'submitTransaction',
      { transaction: { cbor } },
      OgmiosSubmitSchema,
      req(operation, 'transaction', options),
      (op, error) => new ChainSubmissionError(op, describeRpcError(error))
    );
    if (result.transaction.id === '') {
      throw new ChainSubmissionError(operation, 'backend returned an empty transaction hash');
    }
    return result.transaction.id;
  }

  async evaluateTransaction(
    tx: Uint8Array,
    additionalUtxos: readonly Utxo[] = [],
    options?: CallOptions
  ): Promise<EvalRedeemer[]> {
    const operation = 'evaluateTransaction';
    const cbor = requireTransaction(tx, operation);
    const additionalUtxo = additionalUtxos.map((utxo) => toOgmiosUtxo(utxo, operation));
    const raw = await this.query(
      'evaluateTransaction',
      additionalUtxo.length > 0 ? { transaction: { cbor }, additionalUtxo } : { transaction: { cbor } },
      OgmiosEvaluationSchema,
      req(operation, 'transaction', options),
      (op, error) => new ChainEvaluationError(op, describeRpcError(error))
    );
    return normalizeRedeemers(mapOgmiosEvaluation(raw, operation), this.log, operation, options);
  }

  // ---- Internals ----

  private async query<S extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    schema: S,
    request: RequestOptions,
    onError: RpcErrorMapper = providerRpcError
  ): Promise<z.output<S>> {
    const outcome = await this.ogmios.call(method, params, request);
    if (!outcome.ok) {
      throw onError(request.operation, outcome.error);
    }
    return parsePayload(schema, outcome.result, request.operation);
  }

  private async matches(
    operation: string,
    pattern: string,
    filter: KupoMatchFilter,
    options: CallOptions | undefined
  ): Promise<KupoMatch[]> {
    const raw = await this.kupo.getMatches(pattern, filter, req(operation, pattern, options));
    return raw === null ? [] : parsePayload(KupoMatchesSchema, raw, operation);
  }

  /** Build canonical UTxOs in match order, resolving side lookups concurrently. */
  private async resolveMatches(
    operation: string,
    matches: readonly KupoMatch[],
    options: CallOptions | undefined
  ): Promise<Utxo[]> {
    return mapWithConcurrency(
      matches,
      (match, signal) => this.toUtxo(operation, match, { diagnostics: options?.diagnostics, signal }),
      { limit: this.maxConcurrency, signal: options?.signal, operation }
    );
  }

  private async toUtxo(operation: string, match: KupoMatch, options: CallOptions): Promise<Utxo> {
    const input = { txHash: match.transaction_id, outputIndex: match.output_index };
    const context = outRefToString(input);
    const parts = toKupoOutputParts(match, context);

    const datumHash = match.datum_hash;
    const inlineDatum =
      match.datum_type === 'inline' && datumHash
        ? await this.bestEffort(operation, context, options, 'inline datum unavailable', async () => {
            const cbor = await this.fetchDatumCbor(operation, datumHash, options);
            decodeDatum(cbor, context);
            return cbor;
          })
        : undefined;

    const scriptHash = match.script_hash;
    const scriptRef = scriptHash
      ? await this.bestEffort(operation, context, options, 'reference script unavailable', () =>
          this.fetchScript(operation, scriptHash, options)
        )
      : undefined;

    return { input, output: buildOutput({ ...parts, inlineDatum, scriptRef }, context) };
  }

  private async bestEffort<T>(
    operation: string,
    key: string,
    options: CallOptions,
    what: string,
    load: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await load();
    } catch (error) {
      if (isChainError(error, 'CHAIN_CANCELLED')) {
        throw error;
      }
      report(this.log, options, { operation, key, message: `${what}: ${errorMessage(error)}` });
      return undefined;
    }
  }

  private async fetchDatumCbor(
    operation: string,
    datumHash: string,
    options: CallOptions | undefined
  ): Promise<string> {
    const raw = await this.kupo.getDatum(datumHash, req(operation, datumHash, options));
    const datum = parsePayload(KupoDatumSchema, raw, operation);
    if (datum === null) {
      throw new ChainNotFoundError(operation, datumHash);
    }
    return datum.datum;
  }

  private async fetchScript(
    operation: string,
    scriptHash: string,
    options: CallOptions | undefined
  ): Promise<ScriptRef> {
    const raw = await this.kupo.getScript(scriptHash, req(operation, scriptHash, options));
    const script = parsePayload(KupoScriptSchema, raw, operation);
    if (script === null) {
      throw new ChainNotFoundError(operation, scriptHash);
    }
    const type = scriptTypeFromLanguage(script.language);
    if (!type) {
      throw new ChainDecodeError(operation, `unknown script language ${script.language}`);
    }
    return toScriptRef(type, script.script, `${operation} ${scriptHash}`);
  }
}

function holdsUnit(match: KupoMatch, unit: string): boolean {
  const context = `${match.transaction_id}#${match.output_index}`;
  return quantityOf(mapKupoValue(match.value, context), unit) > 0n;
}

function req(operation: string, key: string, options: CallOptions | undefined): RequestOptions {
  return { operation, key, signal: options?.signal };
}
