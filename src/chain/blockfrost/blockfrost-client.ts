import { BlockFrostAPI, BlockfrostServerError } from '@blockfrost/blockfrost-js';
import type { FastifyBaseLogger } from 'fastify';

import { abortable } from '../abort.js';
import type { BlockfrostBackendConfig } from '../config.js';
import { resolveBlockfrostUrl } from '../config.js';
import {
  ChainProviderError,
  ChainRateLimitedError,
  isChainError,
  errorMessage,
} from '../errors.js';
import { HttpClient } from '../http-client.js';
import type { FetchFn, RequestOptions } from '../http-client.js';
import type { CardanoNetwork } from '../types.js';

/**
 * Raw Blockfrost access. Every method returns the provider-native payload;
 * endpoints where "not found" is meaningful resolve null on 404.
 */
export interface BlockfrostTransport {
  getLatestBlock(options: RequestOptions): Promise<unknown>;
  getLatestEpoch(options: RequestOptions): Promise<unknown>;
  getEpochParameters(options: RequestOptions): Promise<unknown>;
  getGenesis(options: RequestOptions): Promise<unknown>;
  getAddressUtxos(
    address: string,
    page: number,
    count: number,
    unit: string | undefined,
    options: RequestOptions
  ): Promise<unknown>;
  getAssetAddresses(unit: string, count: number, options: RequestOptions): Promise<unknown>;
  getTransactionUtxos(txHash: string, options: RequestOptions): Promise<unknown>;
  getTransaction(txHash: string, options: RequestOptions): Promise<unknown>;
  getAccount(stakeAddress: string, options: RequestOptions): Promise<unknown>;
  getDatumCbor(datumHash: string, options: RequestOptions): Promise<unknown>;
  getScript(scriptHash: string, options: RequestOptions): Promise<unknown>;
  getScriptCbor(scriptHash: string, options: RequestOptions): Promise<unknown>;
  /** Timelock scripts are served as JSON only */
  getScriptJson(scriptHash: string, options: RequestOptions): Promise<unknown>;
  /** Returns the transaction id reported by the backend */
  submitTransaction(tx: Uint8Array, options: RequestOptions): Promise<unknown>;
  /** POST to a custom submit endpoint; returns the raw response body */
  submitToEndpoint(endpoint: string, tx: Uint8Array, options: RequestOptions): Promise<unknown>;
  evaluateTransaction(
    cborHex: string,
    additionalUtxoSet: unknown[],
    options: RequestOptions
  ): Promise<unknown>;
}

// ---- Error mapping ----

function isNotFound(error: unknown): boolean {
  return error instanceof BlockfrostServerError && error.status_code === 404;
}

/**
 * Map SDK errors onto chain errors. 429 is RateLimited; anything else the
 * SDK throws is ProviderInternal carrying Blockfrost's status and message.
 */
function mapError(error: unknown, options: RequestOptions): Error {
  if (isChainError(error)) {
    return error;
  }
  if (error instanceof BlockfrostServerError) {
    if (error.status_code === 429) {
      return new ChainRateLimitedError(options.operation, 'blockfrost');
    }
    return new ChainProviderError(
      options.operation,
      `blockfrost HTTP ${error.status_code} for ${options.key}: ${error.message}`
    );
  }
  return new ChainProviderError(options.operation, `blockfrost: ${errorMessage(error)}`);
}

// ---- BlockfrostClient ----

interface BlockfrostClientOptions {
  network: CardanoNetwork;
  backend: BlockfrostBackendConfig;
  logger: FastifyBaseLogger;
  /** Injected for tests of the HTTP-only endpoints */
  fetchImpl?: FetchFn;
}

/**
 * Blockfrost API client.
 *
 * Wraps `@blockfrost/blockfrost-js` BlockFrostAPI for the read endpoints and
 * submission. Evaluation and custom submit endpoints go over plain HTTP
 * because they take bodies the SDK does not model. No request is retried.
 *
 * SECURITY: The projectId (API key) is never stored as a public property,
 * never included in error messages, and never logged.
 */
export class BlockfrostClient implements BlockfrostTransport {
  /** @internal */
  private readonly api: BlockFrostAPI;
  /** @internal */
  private readonly http: HttpClient;
  /** @internal */
  private readonly log: FastifyBaseLogger;

  constructor(options: BlockfrostClientOptions) {
    this.log = options.logger.child({ backend: 'blockfrost' });
    const url = resolveBlockfrostUrl(options.network, options.backend);
    this.api = new BlockFrostAPI({
      projectId: options.backend.projectId,
      customBackend: url,
      rateLimiter: true,
      // callers own retries and deadlines
      retrySettings: { limit: 0 },
    });
    this.http = new HttpClient({
      baseUrl: url,
      headers: { project_id: options.backend.projectId },
      logger: this.log,
      backend: 'blockfrost',
      fetchImpl: options.fetchImpl,
    });
  }

  /** Run an SDK call with cancellation and error mapping; 404 -> null when allowed. */
  private async call<T>(
    fn: () => Promise<T>,
    options: RequestOptions,
    nullOnNotFound: boolean
  ): Promise<T | null> {
    this.log.debug({ operation: options.operation }, 'Blockfrost request');
    try {
      return await abortable(fn(), options.signal, options.operation, options.key);
    } catch (error) {
      if (nullOnNotFound && isNotFound(error)) {
        return null;
      }
      throw mapError(error, options);
    }
  }

  /** Fetch the latest block on chain. */
  async getLatestBlock(options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.blocksLatest(), options, false);
  }

  async getLatestEpoch(options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.epochsLatest(), options, false);
  }

  /** Fetch current epoch protocol parameters. */
  async getEpochParameters(options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.epochsLatestParameters(), options, false);
  }

  async getGenesis(options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.genesis(), options, false);
  }

  /**
   * Fetch one page of UTxOs for an address, optionally holding `unit`.
   * Resolves null for unused addresses (Blockfrost returns 404).
   */
  async getAddressUtxos(
    address: string,
    page: number,
    count: number,
    unit: string | undefined,
    options: RequestOptions
  ): Promise<unknown> {
    const pagination = { page, count, order: 'asc' as const };
    return this.call(
      () =>
        unit === undefined
          ? this.api.addressesUtxos(address, pagination)
          : this.api.addressesUtxosAsset(address, unit, pagination),
      options,
      true
    );
  }

  async getAssetAddresses(unit: string, count: number, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.assetsAddresses(unit, { count }), options, true);
  }

  async getTransactionUtxos(txHash: string, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.txsUtxos(txHash), options, true);
  }

  async getTransaction(txHash: string, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.txs(txHash), options, true);
  }

  async getAccount(stakeAddress: string, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.accounts(stakeAddress), options, true);
  }

  async getDatumCbor(datumHash: string, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.scriptsDatumCbor(datumHash), options, true);
  }

  async getScript(scriptHash: string, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.scriptsByHash(scriptHash), options, true);
  }

  async getScriptCbor(scriptHash: string, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.scriptsCbor(scriptHash), options, true);
  }

  async getScriptJson(scriptHash: string, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.scriptsJson(scriptHash), options, true);
  }

  async submitTransaction(tx: Uint8Array, options: RequestOptions): Promise<unknown> {
    return this.call(() => this.api.txSubmit(tx), options, false);
  }

  async submitToEndpoint(endpoint: string, tx: Uint8Array, options: RequestOptions): Promise<unknown> {
    const response = await this.http.postCbor(endpoint, tx, options);
    if (response.status === 404) {
      throw new ChainProviderError(options.operation, `submit endpoint not found: ${endpoint}`);
    }
    return response.body;
  }

  async evaluateTransaction(
    cborHex: string,
    additionalUtxoSet: unknown[],
    options: RequestOptions
  ): Promise<unknown> {
    const body = await this.http.postJson(
      '/utils/txs/evaluate/utxos',
      { cbor: cborHex, additionalUtxoSet },
      options
    );
    if (body === null) {
      throw new ChainProviderError(options.operation, 'evaluation endpoint not found');
    }
    return body;
  }
}
