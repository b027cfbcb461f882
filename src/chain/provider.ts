// Canonical operation set and backend selection

import type { Data } from '@lucid-evolution/lucid';
import type { FastifyBaseLogger } from 'fastify';

import { BlockfrostClient } from './blockfrost/blockfrost-client.js';
import { BlockfrostProvider } from './blockfrost/blockfrost-provider.js';
import type { ChainConfig } from './config.js';
import type { CallOptions } from './diagnostics.js';
import { KupmiosProvider } from './kupmios/kupmios-provider.js';
import { KupoClient } from './kupmios/kupo-client.js';
import { OgmiosClient } from './kupmios/ogmios-client.js';
import { MaestroClient } from './maestro/maestro-client.js';
import { MaestroProvider } from './maestro/maestro-provider.js';
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
} from './types.js';
import { networkIdOf } from './types.js';
import { UtxorpcClient } from './utxorpc/utxorpc-client.js';
import { UtxorpcProvider } from './utxorpc/utxorpc-provider.js';

export type BackendName = 'blockfrost' | 'kupmios' | 'maestro' | 'utxorpc';

/**
 * The provider-agnostic view of the ledger. Every backend adapter implements
 * the whole set; operations a backend cannot serve reject with
 * ChainNotImplementedError.
 */
export interface ChainProvider {
  readonly backend: BackendName;

  getProtocolParameters(options?: CallOptions): Promise<ProtocolParameters>;
  getGenesisParameters(options?: CallOptions): Promise<GenesisParameters>;
  network(): NetworkId;
  currentEpoch(options?: CallOptions): Promise<number>;
  getTip(options?: CallOptions): Promise<Tip>;

  getUtxosByAddress(address: string, options?: CallOptions): Promise<Utxo[]>;
  getUtxosWithUnit(address: string, unit: string, options?: CallOptions): Promise<Utxo[]>;
  /** Rejects with ChainNotFoundError or ChainAmbiguousResultError unless exactly one UTXO holds the unit */
  getUtxoByUnit(unit: string, options?: CallOptions): Promise<Utxo>;
  getUtxosByOutputRef(refs: readonly OutRef[], options?: CallOptions): Promise<Utxo[]>;

  getDelegation(stakeAddress: string, options?: CallOptions): Promise<Delegation>;
  getDatum(datumHash: string, options?: CallOptions): Promise<Data>;
  getScriptByHash(scriptHash: string, options?: CallOptions): Promise<ScriptRef>;

  /** Resolves true once the transaction is on chain; `interval` <= 0 uses the backend default */
  awaitConfirmation(txHash: string, interval?: number, options?: CallOptions): Promise<boolean>;
  submitTransaction(tx: Uint8Array, options?: CallOptions): Promise<string>;
  evaluateTransaction(
    tx: Uint8Array,
    additionalUtxos?: readonly Utxo[],
    options?: CallOptions
  ): Promise<EvalRedeemer[]>;

  /** Release connections held by the backend client */
  close(): Promise<void>;
}

export interface ProviderDeps {
  logger: FastifyBaseLogger;
  networkId: NetworkId;
  /** Bound on concurrent requests in output-ref lookups */
  maxConcurrency: number;
}

/**
 * Build the adapter selected by `config.backend.type`.
 */
export function createChainProvider(config: ChainConfig, logger: FastifyBaseLogger): ChainProvider {
  const log = logger.child({ component: 'chain', backend: config.backend.type });
  const deps: ProviderDeps = {
    logger: log,
    networkId: networkIdOf(config.network),
    maxConcurrency: config.maxConcurrency,
  };
  const backend = config.backend;

  log.info({ network: config.network }, 'Creating chain provider');

  switch (backend.type) {
    case 'blockfrost':
      return new BlockfrostProvider({
        ...deps,
        client: new BlockfrostClient({ network: config.network, backend, logger: log }),
        customSubmitEndpoints: backend.customSubmitEndpoints,
      });
    case 'kupmios':
      return new KupmiosProvider({
        ...deps,
        kupo: new KupoClient({ url: backend.kupoUrl, logger: log }),
        ogmios: new OgmiosClient(backend.ogmiosUrl, log),
      });
    case 'maestro':
      return new MaestroProvider({
        ...deps,
        client: new MaestroClient({ network: config.network, backend, logger: log }),
      });
    case 'utxorpc':
      return new UtxorpcProvider({
        ...deps,
        client: new UtxorpcClient({
          url: backend.url,
          tls: backend.tls,
          headers: backend.headers,
          protoDir: backend.protoDir,
          logger: log,
        }),
      });
  }
}
