// Canonical ledger model shared by every backend adapter

import type { Data } from '@lucid-evolution/lucid';

/**
 * Supported Cardano networks (matches Lucid Evolution's expected strings).
 */
export type CardanoNetwork = 'Preview' | 'Preprod' | 'Mainnet';

/** Network id as carried in address headers: 1 mainnet, 0 any testnet. */
export type NetworkId = 0 | 1;

export function networkIdOf(network: CardanoNetwork): NetworkId {
  return network === 'Mainnet' ? 1 : 0;
}

/**
 * Unique UTXO identifier (transaction hash + output index).
 */
export interface OutRef {
  txHash: string;
  outputIndex: number;
}

/**
 * Native assets keyed by policy id, then asset name (both lowercase hex).
 * Never holds a zero quantity; empty when only lovelace is carried.
 */
export type Assets = Readonly<Record<string, Readonly<Record<string, bigint>>>>;

export interface Value {
  /** Lovelace (bigint to prevent precision loss above 2^53) */
  readonly coin: bigint;
  readonly assets: Assets;
}

export type DatumOption =
  | { readonly type: 'none' }
  | { readonly type: 'hash'; readonly hash: string }
  | { readonly type: 'inline'; readonly cbor: string; readonly data: Data };

export type ScriptType = 'Native' | 'PlutusV1' | 'PlutusV2' | 'PlutusV3';

/**
 * Reference script. Plutus scripts are held double-CBOR-encoded, native
 * scripts as their plain CBOR, the same convention Lucid uses.
 */
export interface ScriptRef {
  readonly type: ScriptType;
  readonly script: string;
}

export interface PreAlonzoOutput {
  readonly era: 'preAlonzo';
  readonly address: string;
  readonly value: Value;
}

export interface PostAlonzoOutput {
  readonly era: 'postAlonzo';
  readonly address: string;
  readonly value: Value;
  readonly datum: DatumOption;
  readonly scriptRef?: ScriptRef;
}

export type Output = PreAlonzoOutput | PostAlonzoOutput;

export interface Utxo {
  readonly input: Readonly<OutRef>;
  readonly output: Output;
}

/**
 * Flat protocol parameter record. Fields a backend does not expose stay at
 * zero (numbers, bigints), '' (strings) or {} (cost models).
 */
export interface ProtocolParameters {
  minFeeA: number;
  minFeeB: number;
  maxBlockSize: number;
  maxTxSize: number;
  maxBlockHeaderSize: number;
  keyDeposit: bigint;
  poolDeposit: bigint;
  /** Pool pledge influence (a0) */
  poolInfluence: number;
  /** Monetary expansion (rho) */
  monetaryExpansion: number;
  /** Treasury expansion (tau) */
  treasuryExpansion: number;
  decentralisationParam: number;
  extraEntropy: string;
  protocolMajorVersion: number;
  protocolMinorVersion: number;
  minUtxo: bigint;
  minPoolCost: bigint;
  priceMem: number;
  priceStep: number;
  maxTxExMem: bigint;
  maxTxExSteps: bigint;
  maxBlockExMem: bigint;
  maxBlockExSteps: bigint;
  maxValSize: number;
  collateralPercentage: number;
  maxCollateralInputs: number;
  coinsPerUtxoByte: bigint;
  /** Keyed by 'PlutusV1' | 'PlutusV2' | 'PlutusV3' */
  costModels: Record<string, number[]>;
  maxReferenceScriptsSize: number;
  minFeeReferenceScriptsRange: number;
  minFeeReferenceScriptsBase: number;
  minFeeReferenceScriptsMultiplier: number;
  drepDeposit: bigint;
  governanceActionDeposit: bigint;
}

export interface GenesisParameters {
  activeSlotsCoefficient: number;
  updateQuorum: number;
  maxLovelaceSupply: bigint;
  networkMagic: number;
  epochLength: number;
  /** Unix seconds */
  systemStart: number;
  slotsPerKesPeriod: number;
  /** Seconds */
  slotLength: number;
  maxKesEvolutions: number;
  securityParam: number;
}

export interface Delegation {
  active: boolean;
  rewards: bigint;
  /** Empty when undelegated */
  poolId: string;
  epoch?: number;
}

export interface Tip {
  slot: number;
  height: number;
  hash: string;
}

export type RedeemerTag = 'spend' | 'mint' | 'cert' | 'reward' | 'vote' | 'propose';

export interface ExUnits {
  mem: bigint;
  steps: bigint;
}

export interface EvalRedeemer {
  tag: RedeemerTag;
  index: number;
  exUnits: ExUnits;
}

/**
 * Convert an OutRef object to its string representation.
 * Format: "txHash#outputIndex"
 */
export function outRefToString(ref: OutRef): string {
  return `${ref.txHash}#${ref.outputIndex}`;
}

/**
 * Parse an output reference string back to an OutRef object.
 * Expected format: "txHash#outputIndex"
 *
 * @throws {Error} If the string format is invalid
 */
export function stringToOutRef(ref: string): OutRef {
  const hashIndex = ref.lastIndexOf('#');
  if (hashIndex === -1) {
    throw new Error(`Invalid output reference format: "${ref}" (expected "txHash#outputIndex")`);
  }

  const txHash = ref.slice(0, hashIndex);
  const outputIndexStr = ref.slice(hashIndex + 1);
  const outputIndex = Number(outputIndexStr);

  if (!txHash || outputIndexStr === '' || !Number.isInteger(outputIndex) || outputIndex < 0) {
    throw new Error(`Invalid output reference format: "${ref}" (expected "txHash#outputIndex")`);
  }

  return { txHash, outputIndex };
}
