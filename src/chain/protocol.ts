// Zero values and shared helpers for protocol/genesis parameter mapping

import type { ProtocolParameters } from './types.js';

/**
 * The documented value of every field a backend does not expose.
 */
export function emptyProtocolParameters(): ProtocolParameters {
  return {
    minFeeA: 0,
    minFeeB: 0,
    maxBlockSize: 0,
    maxTxSize: 0,
    maxBlockHeaderSize: 0,
    keyDeposit: 0n,
    poolDeposit: 0n,
    poolInfluence: 0,
    monetaryExpansion: 0,
    treasuryExpansion: 0,
    decentralisationParam: 0,
    extraEntropy: '',
    protocolMajorVersion: 0,
    protocolMinorVersion: 0,
    minUtxo: 0n,
    minPoolCost: 0n,
    priceMem: 0,
    priceStep: 0,
    maxTxExMem: 0n,
    maxTxExSteps: 0n,
    maxBlockExMem: 0n,
    maxBlockExSteps: 0n,
    maxValSize: 0,
    collateralPercentage: 0,
    maxCollateralInputs: 0,
    coinsPerUtxoByte: 0n,
    costModels: {},
    maxReferenceScriptsSize: 0,
    minFeeReferenceScriptsRange: 0,
    minFeeReferenceScriptsBase: 0,
    minFeeReferenceScriptsMultiplier: 0,
    drepDeposit: 0n,
    governanceActionDeposit: 0n,
  };
}

const COST_MODEL_LANGUAGES: Record<string, string> = {
  plutusv1: 'PlutusV1',
  'plutus:v1': 'PlutusV1',
  plutus_v1: 'PlutusV1',
  plutusv2: 'PlutusV2',
  'plutus:v2': 'PlutusV2',
  plutus_v2: 'PlutusV2',
  plutusv3: 'PlutusV3',
  'plutus:v3': 'PlutusV3',
  plutus_v3: 'PlutusV3',
};

/** Canonical cost model key, or undefined for languages this layer does not know. */
export function costModelLanguage(label: string): string | undefined {
  return COST_MODEL_LANGUAGES[label.toLowerCase()];
}

/**
 * Normalize a per-language cost model map. Object-shaped models (named
 * parameters) are flattened in parameter-name order.
 */
export function normalizeCostModels(
  raw: Record<string, number[] | Record<string, number>> | null | undefined
): Record<string, number[]> {
  const models: Record<string, number[]> = {};
  if (!raw) {
    return models;
  }
  for (const [label, model] of Object.entries(raw)) {
    const language = costModelLanguage(label);
    if (!language) continue;
    if (Array.isArray(model)) {
      models[language] = [...model];
    } else {
      models[language] = Object.keys(model)
        .sort()
        .map((name) => model[name] ?? 0);
    }
  }
  return models;
}
