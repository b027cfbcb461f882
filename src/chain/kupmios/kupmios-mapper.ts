// Kupo matches and Ogmios results -> canonical model

import { applySingleCborEncoding } from '@lucid-evolution/lucid';

import { ChainDecodeError, ChainInvalidInputError } from '../errors.js';
import { parseLovelace, parseLovelaceOrZero, parseRationalOrZero } from '../numeric.js';
import type { OutputParts } from '../output-builder.js';
import { datumHashOf, inlineDatumOf, scriptRefOf } from '../output-builder.js';
import { emptyProtocolParameters, normalizeCostModels } from '../protocol.js';
import { parsePurposeKey } from '../redeemers.js';
import type { RawRedeemer } from '../redeemers.js';
import type {
  Delegation,
  GenesisParameters,
  ProtocolParameters,
  Tip,
  Utxo,
  Value,
} from '../types.js';
import { ValueBuilder, flattenAssets } from '../value.js';
import type {
  KupoMatch,
  OgmiosEvaluation,
  OgmiosProtocolParameters,
  OgmiosRewardSummary,
  OgmiosShelleyGenesis,
} from './kupmios-schemas.js';

// ---- Kupo ----

export function mapKupoValue(raw: KupoMatch['value'], context: string): Value {
  const value = new ValueBuilder(context).addCoin(parseLovelace(raw.coins, context));
  for (const [unit, quantity] of Object.entries(raw.assets)) {
    value.addUnit(unit, parseLovelace(quantity, context));
  }
  return value.build();
}

/** Address and value of a match; datum and script are resolved by the provider. */
export function toKupoOutputParts(match: KupoMatch, context: string): OutputParts {
  return {
    address: match.address,
    value: mapKupoValue(match.value, context),
    datumHash: match.datum_hash,
  };
}

// ---- Ogmios ----

function lovelaceOf(raw: { ada: { lovelace: number | string } } | undefined, field: string): bigint {
  return raw === undefined ? 0n : parseLovelace(raw.ada.lovelace, field);
}

export function mapOgmiosProtocolParameters(raw: OgmiosProtocolParameters): ProtocolParameters {
  return {
    ...emptyProtocolParameters(),
    minFeeA: raw.minFeeCoefficient,
    minFeeB: Number(lovelaceOf(raw.minFeeConstant, 'minFeeConstant')),
    maxBlockSize: raw.maxBlockBodySize.bytes,
    maxTxSize: raw.maxTransactionSize.bytes,
    maxBlockHeaderSize: raw.maxBlockHeaderSize.bytes,
    keyDeposit: lovelaceOf(raw.stakeCredentialDeposit, 'stakeCredentialDeposit'),
    poolDeposit: lovelaceOf(raw.stakePoolDeposit, 'stakePoolDeposit'),
    poolInfluence: parseRationalOrZero(raw.stakePoolPledgeInfluence),
    monetaryExpansion: parseRationalOrZero(raw.monetaryExpansion),
    treasuryExpansion: parseRationalOrZero(raw.treasuryExpansion),
    // not reported since Babbage; zero on every current network
    decentralisationParam: 0,
    extraEntropy: raw.extraEntropy ?? '',
    protocolMajorVersion: raw.version.major,
    protocolMinorVersion: raw.version.minor,
    minUtxo: lovelaceOf(raw.minUtxoDepositConstant, 'minUtxoDepositConstant'),
    minPoolCost: lovelaceOf(raw.minStakePoolCost, 'minStakePoolCost'),
    priceMem: parseRationalOrZero(raw.scriptExecutionPrices?.memory),
    priceStep: parseRationalOrZero(raw.scriptExecutionPrices?.cpu),
    maxTxExMem: parseLovelaceOrZero(raw.maxExecutionUnitsPerTransaction?.memory, 'maxTxExMem'),
    maxTxExSteps: parseLovelaceOrZero(raw.maxExecutionUnitsPerTransaction?.cpu, 'maxTxExSteps'),
    maxBlockExMem: parseLovelaceOrZero(raw.maxExecutionUnitsPerBlock?.memory, 'maxBlockExMem'),
    maxBlockExSteps: parseLovelaceOrZero(raw.maxExecutionUnitsPerBlock?.cpu, 'maxBlockExSteps'),
    maxValSize: raw.maxValueSize?.bytes ?? 0,
    collateralPercentage: raw.collateralPercentage ?? 0,
    maxCollateralInputs: raw.maxCollateralInputs ?? 0,
    coinsPerUtxoByte: parseLovelaceOrZero(raw.minUtxoDepositCoefficient, 'minUtxoDepositCoefficient'),
    costModels: normalizeCostModels(raw.plutusCostModels),
    maxReferenceScriptsSize: raw.maxReferenceScriptsSize?.bytes ?? 0,
    minFeeReferenceScriptsRange: raw.minFeeReferenceScripts?.range ?? 0,
    minFeeReferenceScriptsBase: raw.minFeeReferenceScripts?.base ?? 0,
    minFeeReferenceScriptsMultiplier: raw.minFeeReferenceScripts?.multiplier ?? 0,
    drepDeposit: lovelaceOf(raw.delegateRepresentativeDeposit, 'delegateRepresentativeDeposit'),
    governanceActionDeposit: lovelaceOf(raw.governanceActionDeposit, 'governanceActionDeposit'),
  };
}

export function mapOgmiosGenesis(raw: OgmiosShelleyGenesis): GenesisParameters {
  const startMs = Date.parse(raw.startTime);
  return {
    activeSlotsCoefficient: parseRationalOrZero(raw.activeSlotsCoefficient),
    updateQuorum: raw.updateQuorum,
    maxLovelaceSupply: parseLovelace(raw.maxLovelaceSupply, 'maxLovelaceSupply'),
    networkMagic: raw.networkMagic,
    epochLength: raw.epochLength,
    systemStart: Number.isNaN(startMs) ? 0 : Math.floor(startMs / 1000),
    slotsPerKesPeriod: raw.slotsPerKesPeriod,
    slotLength: raw.slotLength.milliseconds / 1000,
    maxKesEvolutions: raw.maxKesEvolutions,
    securityParam: raw.securityParameter,
  };
}

export function mapOgmiosTip(
  tip: 'origin' | { slot: number; id: string },
  height: 'origin' | number
): Tip {
  if (tip === 'origin') {
    return { slot: 0, height: 0, hash: '' };
  }
  return { slot: tip.slot, height: height === 'origin' ? 0 : height, hash: tip.id };
}

/** A credential with no summary is unregistered: undelegated, nothing to withdraw. */
export function mapRewardSummary(summary: OgmiosRewardSummary | undefined): Delegation {
  if (!summary) {
    return { active: false, rewards: 0n, poolId: '' };
  }
  const poolId = summary.delegate?.id ?? '';
  return {
    active: poolId !== '',
    rewards: lovelaceOf(summary.rewards, 'rewards'),
    poolId,
  };
}

export function mapOgmiosEvaluation(raw: OgmiosEvaluation, context: string): RawRedeemer[] {
  return raw.map((item) => {
    const validator =
      typeof item.validator === 'string' ? parsePurposeKey(item.validator) : item.validator;
    if (!validator) {
      throw new ChainDecodeError(context, `malformed validator ${String(item.validator)}`);
    }
    return {
      purpose: validator.purpose,
      index: validator.index,
      exUnits: {
        mem: parseLovelace(item.budget.memory, 'memory'),
        steps: parseLovelace(item.budget.cpu, 'cpu'),
      },
    };
  });
}

// ---- Additional UTxO wire shape (Ogmios v6) ----

export interface OgmiosUtxo {
  transaction: { id: string };
  index: number;
  address: string;
  value: Record<string, Record<string, bigint>>;
  datumHash?: string;
  datum?: string;
  script?: { language: string; cbor: string };
}

const V6_SCRIPT_LANGUAGES = {
  Native: undefined,
  PlutusV1: 'plutus:v1',
  PlutusV2: 'plutus:v2',
  PlutusV3: 'plutus:v3',
} as const;

/** Amounts stay bigint; the Ogmios client writes them as bare integers. */
export function toOgmiosUtxo(utxo: Utxo, context: string): OgmiosUtxo {
  const { output } = utxo;
  const value: Record<string, Record<string, bigint>> = { ada: { lovelace: output.value.coin } };
  for (const [policyId, assetName, quantity] of flattenAssets(output.value.assets)) {
    value[policyId] = { ...value[policyId], [assetName]: quantity };
  }

  const wire: OgmiosUtxo = {
    transaction: { id: utxo.input.txHash },
    index: utxo.input.outputIndex,
    address: output.address,
    value,
  };

  const datumHash = datumHashOf(output);
  const inlineDatum = inlineDatumOf(output);
  if (datumHash) wire.datumHash = datumHash;
  if (inlineDatum) wire.datum = inlineDatum;

  const scriptRef = scriptRefOf(output);
  if (scriptRef) {
    const language = V6_SCRIPT_LANGUAGES[scriptRef.type];
    if (!language) {
      throw new ChainInvalidInputError(
        context,
        `native reference script on ${utxo.input.txHash}#${utxo.input.outputIndex} cannot be sent to the evaluator`
      );
    }
    wire.script = { language, cbor: applySingleCborEncoding(scriptRef.script) };
  }

  return wire;
}
