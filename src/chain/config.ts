import { z } from 'zod';

import { DEFAULT_MAX_CONCURRENCY } from './concurrency.js';
import type { CardanoNetwork } from './types.js';

/**
 * Blockfrost API base URLs per network.
 */
export const BLOCKFROST_URLS: Record<CardanoNetwork, string> = {
  Preview: 'https://cardano-preview.blockfrost.io/api/v0',
  Preprod: 'https://cardano-preprod.blockfrost.io/api/v0',
  Mainnet: 'https://cardano-mainnet.blockfrost.io/api/v0',
} as const;

/**
 * Maestro API base URLs per network.
 */
export const MAESTRO_URLS: Record<CardanoNetwork, string> = {
  Preview: 'https://preview.gomaestro-api.org/v1',
  Preprod: 'https://preprod.gomaestro-api.org/v1',
  Mainnet: 'https://mainnet.gomaestro-api.org/v1',
} as const;

const BlockfrostBackendSchema = z.object({
  type: z.literal('blockfrost'),
  /** Blockfrost project ID (sensitive - network-specific, never log) */
  projectId: z.string().min(1, 'Blockfrost project ID is required'),
  /** Override URL (derived from network if not set) */
  url: z.string().url().optional(),
  /** Submit endpoints tried in order before Blockfrost's own */
  customSubmitEndpoints: z.array(z.string().url()).default([]),
});

const KupmiosBackendSchema = z.object({
  type: z.literal('kupmios'),
  kupoUrl: z.string().url(),
  /** ws:// or wss:// endpoint of Ogmios */
  ogmiosUrl: z.string().regex(/^wss?:\/\//, 'Ogmios URL must be ws:// or wss://'),
});

const MaestroBackendSchema = z.object({
  type: z.literal('maestro'),
  /** Maestro API key (sensitive - never log) */
  apiKey: z.string().min(1, 'Maestro API key is required'),
  url: z.string().url().optional(),
  /** Submit through the turbo transaction manager */
  turboSubmit: z.boolean().default(false),
});

const UtxorpcBackendSchema = z.object({
  type: z.literal('utxorpc'),
  /** host:port of the gRPC endpoint */
  url: z.string().min(1),
  /** Use TLS credentials for the channel */
  tls: z.boolean().default(true),
  /** Metadata attached to every call, e.g. an API key header */
  headers: z.record(z.string()).default({}),
  /** Directory holding the utxorpc .proto files */
  protoDir: z.string().optional(),
});

export const BackendConfigSchema = z.discriminatedUnion('type', [
  BlockfrostBackendSchema,
  KupmiosBackendSchema,
  MaestroBackendSchema,
  UtxorpcBackendSchema,
]);

export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type BlockfrostBackendConfig = z.infer<typeof BlockfrostBackendSchema>;
export type KupmiosBackendConfig = z.infer<typeof KupmiosBackendSchema>;
export type MaestroBackendConfig = z.infer<typeof MaestroBackendSchema>;
export type UtxorpcBackendConfig = z.infer<typeof UtxorpcBackendSchema>;

/**
 * Chain configuration Zod schema.
 *
 * SECURITY: Blockfrost `projectId`, Maestro `apiKey` and UTxORPC `headers`
 * are sensitive. They must be provided explicitly in config and must never
 * appear in logs.
 */
export const ChainConfigSchema = z
  .object({
    network: z.enum(['Preview', 'Preprod', 'Mainnet']).default('Preview'),

    /** Upper bound on concurrent backend requests in output-ref lookups */
    maxConcurrency: z.number().int().min(1).max(64).default(DEFAULT_MAX_CONCURRENCY),

    backend: BackendConfigSchema,
  })
  .superRefine((data, ctx) => {
    // Mainnet safety guardrail: require explicit MAINNET=true env var
    if (data.network === 'Mainnet' && process.env.MAINNET !== 'true') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Mainnet connection requires explicit MAINNET=true environment variable',
        path: ['network'],
      });
    }
  });

export type ChainConfig = z.infer<typeof ChainConfigSchema>;

/**
 * Resolve the Blockfrost API URL: the explicit override if set, otherwise
 * derived from the network.
 */
export function resolveBlockfrostUrl(
  network: CardanoNetwork,
  backend: BlockfrostBackendConfig
): string {
  return backend.url ?? BLOCKFROST_URLS[network];
}

export function resolveMaestroUrl(network: CardanoNetwork, backend: MaestroBackendConfig): string {
  return backend.url ?? MAESTRO_URLS[network];
}
