import type { FastifyBaseLogger } from 'fastify';

import type { MaestroBackendConfig } from '../config.js';
import { resolveMaestroUrl } from '../config.js';
import { HttpClient } from '../http-client.js';
import type { FetchFn, RequestOptions } from '../http-client.js';
import type { CardanoNetwork } from '../types.js';
import type { MaestroAdditionalUtxo } from './maestro-mapper.js';

export interface MaestroUtxoQuery {
  count: number;
  cursor?: string;
  /** Fixed-offset unit the outputs must hold */
  asset?: string;
}

/**
 * Raw Maestro access. Lookups resolve null on 404; listings resolve the
 * page envelope including `next_cursor`.
 */
export interface MaestroTransport {
  getCurrentEpoch(options: RequestOptions): Promise<unknown>;
  getProtocolParameters(options: RequestOptions): Promise<unknown>;
  getChainTip(options: RequestOptions): Promise<unknown>;
  getAddressUtxos(address: string, query: MaestroUtxoQuery, options: RequestOptions): Promise<unknown>;
  getAssetAddresses(unit: string, count: number, options: RequestOptions): Promise<unknown>;
  getTransactionOutput(txHash: string, index: number, options: RequestOptions): Promise<unknown>;
  getAccount(stakeAddress: string, options: RequestOptions): Promise<unknown>;
  getBlock(blockHash: string, options: RequestOptions): Promise<unknown>;
  getDatum(datumHash: string, options: RequestOptions): Promise<unknown>;
  getScript(scriptHash: string, options: RequestOptions): Promise<unknown>;
  getTransactionCbor(txHash: string, options: RequestOptions): Promise<unknown>;
  /** Resolves the transaction id Maestro reports */
  submitTransaction(tx: Uint8Array, options: RequestOptions): Promise<unknown>;
  evaluateTransaction(
    cborHex: string,
    additionalUtxos: MaestroAdditionalUtxo[],
    options: RequestOptions
  ): Promise<unknown>;
}

interface MaestroClientOptions {
  network: CardanoNetwork;
  backend: MaestroBackendConfig;
  logger: FastifyBaseLogger;
  fetchImpl?: FetchFn;
}

/**
 * Maestro REST client.
 *
 * SECURITY: the API key travels only in the `api-key` header and is never
 * logged.
 */
export class MaestroClient implements MaestroTransport {
  private readonly http: HttpClient;
  private readonly turboSubmit: boolean;

  constructor(options: MaestroClientOptions) {
    this.turboSubmit = options.backend.turboSubmit;
    this.http = new HttpClient({
      baseUrl: resolveMaestroUrl(options.network, options.backend),
      headers: { 'api-key': options.backend.apiKey },
      logger: options.logger.child({ backend: 'maestro' }),
      backend: 'maestro',
      fetchImpl: options.fetchImpl,
    });
  }

  async getCurrentEpoch(options: RequestOptions): Promise<unknown> {
    return this.http.getJson('/epochs/current', options);
  }

  async getProtocolParameters(options: RequestOptions): Promise<unknown> {
    return this.http.getJson('/protocol-parameters', options);
  }

  async getChainTip(options: RequestOptions): Promise<unknown> {
    return this.http.getJson('/chain-tip', options);
  }

  async getAddressUtxos(
    address: string,
    query: MaestroUtxoQuery,
    options: RequestOptions
  ): Promise<unknown> {
    const params = new URLSearchParams({ with_cbor: 'true', count: String(query.count) });
    if (query.asset) params.set('asset', query.asset);
    if (query.cursor) params.set('cursor', query.cursor);
    return this.http.getJson(`/addresses/${address}/utxos?${params.toString()}`, options);
  }

  async getAssetAddresses(unit: string, count: number, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/assets/${unit}/addresses?count=${count}`, options);
  }

  async getTransactionOutput(txHash: string, index: number, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/transactions/${txHash}/outputs/${index}/txo?with_cbor=true`, options);
  }

  async getAccount(stakeAddress: string, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/accounts/${stakeAddress}`, options);
  }

  async getBlock(blockHash: string, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/blocks/${blockHash}`, options);
  }

  async getDatum(datumHash: string, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/datums/${datumHash}`, options);
  }

  async getScript(scriptHash: string, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/scripts/${scriptHash}`, options);
  }

  async getTransactionCbor(txHash: string, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/transactions/${txHash}/cbor`, options);
  }

  async submitTransaction(tx: Uint8Array, options: RequestOptions): Promise<unknown> {
    const path = this.turboSubmit ? '/txmanager/turbosubmit' : '/txmanager';
    const response = await this.http.postCbor(path, tx, options);
    return response.status === 404 ? null : response.body;
  }

  async evaluateTransaction(
    cborHex: string,
    additionalUtxos: MaestroAdditionalUtxo[],
    options: RequestOptions
  ): Promise<unknown> {
    return this.http.postJson(
      '/transactions/evaluate',
      { cbor: cborHex, additional_utxos: additionalUtxos },
      options
    );
  }
}
