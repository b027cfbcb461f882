/**
 * UTxO RPC client over gRPC.
 *
 * The v1alpha .proto files are loaded at construction with
 * @grpc/proto-loader; calls go through one shared grpc-js channel. Responses
 * are handed back as plain objects for the provider to validate.
 */
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import type { FastifyBaseLogger } from 'fastify';

import {
  ChainCancelledError,
  ChainDecodeError,
  ChainNotFoundError,
  ChainProviderError,
  ChainRateLimitedError,
} from '../errors.js';
import type { RequestOptions } from '../http-client.js';
import { CONFIRMED_STAGE, WaitForTxResponseSchema } from './utxorpc-schemas.js';

const QUERY_SERVICE = 'utxorpc.v1alpha.query.QueryService';
const SUBMIT_SERVICE = 'utxorpc.v1alpha.submit.SubmitService';
const SYNC_SERVICE = 'utxorpc.v1alpha.sync.SyncService';

const PROTO_FILES = [
  'utxorpc/v1alpha/query/query.proto',
  'utxorpc/v1alpha/submit/submit.proto',
  'utxorpc/v1alpha/sync/sync.proto',
];

// src/chain/utxorpc when run from sources, dist/src/chain/utxorpc when built
const PROTO_DIR_CANDIDATES = ['../../../proto', '../../../../proto'];

export interface TxoRefMessage {
  hash: Uint8Array;
  index: number;
}

export interface UtxoPatternMessage {
  address?: { exact_address: Uint8Array };
  asset?: { policy_id: Uint8Array; asset_name: Uint8Array };
}

export interface UtxorpcTransport {
  readParams(options: RequestOptions): Promise<unknown>;
  readUtxos(keys: readonly TxoRefMessage[], options: RequestOptions): Promise<unknown>;
  searchUtxos(
    pattern: UtxoPatternMessage,
    page: { maxItems: number; startToken?: string },
    options: RequestOptions
  ): Promise<unknown>;
  readTip(options: RequestOptions): Promise<unknown>;
  fetchBlock(ref: { slot: string; hash: Uint8Array }, options: RequestOptions): Promise<unknown>;
  submitTx(tx: Uint8Array, options: RequestOptions): Promise<unknown>;
  evalTx(tx: Uint8Array, options: RequestOptions): Promise<unknown>;
  /**
   * Follow the WaitForTx stream: true once the confirmed stage is reported,
   * false when the server ends the stream first.
   */
  waitForTx(txHash: string, options: RequestOptions): Promise<boolean>;
  close(): Promise<void>;
}

export interface UtxorpcClientOptions {
  /** host:port, or an http(s):// URL whose scheme is dropped */
  url: string;
  tls: boolean;
  headers: Record<string, string>;
  protoDir?: string;
  logger: FastifyBaseLogger;
}

export function resolveProtoDir(protoDir: string | undefined): string {
  if (protoDir) {
    return protoDir;
  }
  for (const candidate of PROTO_DIR_CANDIDATES) {
    const dir = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(`${dir}/${PROTO_FILES[0]}`)) {
      return dir;
    }
  }
  throw new Error('utxorpc .proto files not found; set chain.backend.protoDir');
}

function isTypeDefinition(
  definition: protoLoader.AnyDefinition
): definition is protoLoader.MessageTypeDefinition | protoLoader.EnumTypeDefinition {
  return 'format' in definition && typeof definition.format === 'string';
}

function isServiceError(error: unknown): error is grpc.ServiceError {
  return error instanceof Error && 'code' in error && typeof error.code === 'number';
}

export class UtxorpcClient implements UtxorpcTransport {
  private readonly client: grpc.Client;
  private readonly definition: protoLoader.PackageDefinition;
  private readonly headers: Record<string, string>;
  private readonly log: FastifyBaseLogger;

  constructor(options: UtxorpcClientOptions) {
    this.log = options.logger.child({ backend: 'utxorpc' });
    this.headers = options.headers;
    this.definition = protoLoader.loadSync(PROTO_FILES, {
      keepCase: true,
      longs: String,
      enums: String,
      defaults: true,
      oneofs: true,
      includeDirs: [resolveProtoDir(options.protoDir)],
    });
    const credentials = options.tls
      ? grpc.credentials.createSsl()
      : grpc.credentials.createInsecure();
    this.client = new grpc.Client(options.url.replace(/^https?:\/\//, ''), credentials);
  }

  // ---- QueryService ----

  async readParams(options: RequestOptions): Promise<unknown> {
    return this.unary(QUERY_SERVICE, 'ReadParams', {}, options);
  }

  async readUtxos(keys: readonly TxoRefMessage[], options: RequestOptions): Promise<unknown> {
    return this.unary(QUERY_SERVICE, 'ReadUtxos', { keys }, options);
  }

  async searchUtxos(
    pattern: UtxoPatternMessage,
    page: { maxItems: number; startToken?: string },
    options: RequestOptions
  ): Promise<unknown> {
    const request = {
      predicate: { match: { cardano: pattern } },
      max_items: page.maxItems,
      start_token: page.startToken ?? '',
    };
    return this.unary(QUERY_SERVICE, 'SearchUtxos', request, options);
  }

  // ---- SyncService ----

  async readTip(options: RequestOptions): Promise<unknown> {
    return this.unary(SYNC_SERVICE, 'ReadTip', {}, options);
  }

  async fetchBlock(ref: { slot: string; hash: Uint8Array }, options: RequestOptions): Promise<unknown> {
    return this.unary(SYNC_SERVICE, 'FetchBlock', { ref: [ref] }, options);
  }

  // ---- SubmitService ----

  async submitTx(tx: Uint8Array, options: RequestOptions): Promise<unknown> {
    return this.unary(SUBMIT_SERVICE, 'SubmitTx', { tx: [{ raw: tx }] }, options);
  }

  async evalTx(tx: Uint8Array, options: RequestOptions): Promise<unknown> {
    return this.unary(SUBMIT_SERVICE, 'EvalTx', { tx: [{ raw: tx }] }, options);
  }

  async waitForTx(txHash: string, options: RequestOptions): Promise<boolean> {
    const { operation, key, signal } = options;
    const method = this.method(SUBMIT_SERVICE, 'WaitForTx');

    return new Promise<boolean>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ChainCancelledError(operation, key));
        return;
      }

      const stream = this.client.makeServerStreamRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        { ref: [Buffer.from(txHash, 'hex')] },
        this.metadata(),
        {}
      );

      let settled = false;
      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        settle();
      };
      const onAbort = (): void => {
        finish(() => reject(new ChainCancelledError(operation, key)));
        stream.cancel();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      stream.on('data', (message: unknown) => {
        const parsed = WaitForTxResponseSchema.safeParse(message);
        if (!parsed.success) {
          finish(() => reject(new ChainDecodeError(operation, 'malformed WaitForTx message')));
          stream.cancel();
          return;
        }
        this.log.debug({ operation, txHash, stage: parsed.data.stage }, 'WaitForTx stage');
        if (parsed.data.stage === CONFIRMED_STAGE) {
          finish(() => resolve(true));
          stream.cancel();
        }
      });
      // a cancel issued above surfaces here as CANCELLED after settling
      stream.on('error', (error: unknown) => {
        finish(() => reject(this.toChainError(error, options)));
      });
      stream.on('end', () => {
        finish(() => resolve(false));
      });
    });
  }

  async close(): Promise<void> {
    this.client.close();
  }

  // ---- Internals ----

  private method(service: string, name: string): protoLoader.MethodDefinition<object, object> {
    const definition = this.definition[service];
    if (!definition || isTypeDefinition(definition)) {
      throw new Error(`utxorpc service ${service} missing from the loaded protos`);
    }
    const method = definition[name];
    if (!method) {
      throw new Error(`utxorpc method ${service}/${name} missing from the loaded protos`);
    }
    return method;
  }

  private metadata(): grpc.Metadata {
    const metadata = new grpc.Metadata();
    for (const [header, value] of Object.entries(this.headers)) {
      metadata.add(header, value);
    }
    return metadata;
  }

  private unary(service: string, name: string, request: object, options: RequestOptions): Promise<object> {
    const { operation, key, signal } = options;
    const method = this.method(service, name);

    return new Promise<object>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ChainCancelledError(operation, key));
        return;
      }

      let call: grpc.ClientUnaryCall | undefined;
      const onAbort = (): void => call?.cancel();

      this.log.debug({ method: name, operation }, 'UTxORPC request');
      call = this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        this.metadata(),
        {},
        (error, response) => {
          signal?.removeEventListener('abort', onAbort);
          if (error) {
            reject(signal?.aborted ? new ChainCancelledError(operation, key) : this.toChainError(error, options));
            return;
          }
          if (response === undefined) {
            reject(new ChainDecodeError(operation, `empty ${name} response`));
            return;
          }
          resolve(response);
        }
      );
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private toChainError(error: unknown, options: RequestOptions): Error {
    const { operation, key } = options;
    if (!isServiceError(error)) {
      return new ChainProviderError(operation, `utxorpc: ${String(error)}`);
    }
    switch (error.code) {
      case grpc.status.CANCELLED:
        return new ChainCancelledError(operation, key);
      case grpc.status.NOT_FOUND:
        return new ChainNotFoundError(operation, key);
      case grpc.status.RESOURCE_EXHAUSTED:
        return new ChainRateLimitedError(operation, 'utxorpc');
      case grpc.status.INVALID_ARGUMENT:
      case grpc.status.FAILED_PRECONDITION:
        if (options.rejection) {
          return options.rejection(error.details);
        }
        break;
    }
    return new ChainProviderError(
      operation,
      `utxorpc ${grpc.status[error.code]} for ${key}: ${error.details}`
    );
  }
}
