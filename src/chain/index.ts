// Barrel exports for the chain module

// Types
export type {
  Assets,
  CardanoNetwork,
  DatumOption,
  Delegation,
  EvalRedeemer,
  ExUnits,
  GenesisParameters,
  NetworkId,
  OutRef,
  Output,
  PostAlonzoOutput,
  PreAlonzoOutput,
  ProtocolParameters,
  RedeemerTag,
  ScriptRef,
  ScriptType,
  Tip,
  Utxo,
  Value,
} from './types.js';
export { networkIdOf, outRefToString, stringToOutRef } from './types.js';

// Errors
export type { ChainErrorCode } from './errors.js';
export {
  ChainAmbiguousResultError,
  ChainCancelledError,
  ChainDecodeError,
  ChainEvaluationError,
  ChainInvalidAddressError,
  ChainInvalidInputError,
  ChainInvalidUnitError,
  ChainNotFoundError,
  ChainNotImplementedError,
  ChainProviderError,
  ChainRateLimitedError,
  ChainSubmissionError,
  isChainError,
} from './errors.js';

// Config
export type { BackendConfig, ChainConfig } from './config.js';
export { BLOCKFROST_URLS, ChainConfigSchema, MAESTRO_URLS } from './config.js';

// Diagnostics and call options
export type { CallOptions, Diagnostic } from './diagnostics.js';
export { Diagnostics } from './diagnostics.js';

// Units and values
export { LOVELACE, encodeUnit, parseUnit } from './unit.js';
export { ValueBuilder, quantityOf } from './value.js';
export { decodeNativeOutput, encodeOutput } from './native-output.js';

// Provider (orchestrator)
export type { BackendName, ChainProvider } from './provider.js';
export { createChainProvider } from './provider.js';

// Backend adapters
export { BlockfrostProvider } from './blockfrost/blockfrost-provider.js';
export { KupmiosProvider } from './kupmios/kupmios-provider.js';
export { MaestroProvider } from './maestro/maestro-provider.js';
export { UtxorpcProvider } from './utxorpc/utxorpc-provider.js';
