// Pure mapping from Blockfrost payloads to the canonical model

import { applySingleCborEncoding } from '@lucid-evolution/lucid';

import { nativeScriptCborFromJson, scriptTypeFromLanguage, toScriptRef } from '../cbor.js';
import type { NativeScriptJson } from '../cbor.js';
import { ChainDecodeError, ChainEvaluationError, ChainInvalidInputError } from '../errors.js';
import { parseLovelace, parseLovelaceOrZero, toSafeNumber } from '../numeric.js';
import type { UnresolvedOutputParts } from '../output-builder.js';
import { datumHashOf, inlineDatumOf, scriptRefOf } from '../output-builder.js';
import { emptyProtocolParameters, normalizeCostModels } from '../protocol.js';
import { parsePurposeKey } from '../redeemers.js';
import type { RawRedeemer } from '../redeemers.js';
import type {
  Delegation,
  GenesisParameters,
  ProtocolParameters,
  ScriptRef,
  Tip,
  Utxo,
  Value,
} from '../types.js';
import { ValueBuilder, flattenAssets } from '../value.js';
import type {
  BlockfrostAddressUtxo,
  BlockfrostEvaluation,
  BlockfrostParameters,
  BlockfrostTxOutput,
} from './blockfrost-schemas.js';

export function mapAmount(amount: BlockfrostAddressUtxo['amount'], context: string): Value {
  const value = new ValueBuilder(context);
  for (const entry of amount) {
    value.addUnit(entry.unit, parseLovelace(entry.quantity, context));
  }
  return value.build();
}

/**
 * Output parts of an address UTXO or a transaction output. The reference
 * script, when present, is known only by hash.
 */
export function toOutputParts(
  raw: BlockfrostAddressUtxo | BlockfrostTxOutput,
  context: string
): UnresolvedOutputParts {
  return {
    address: raw.address,
    value: mapAmount(raw.amount, context),
    datumHash: raw.data_hash,
    inlineDatum: raw.inline_datum,
    scriptHash: raw.reference_script_hash,
  };
}

/**
 * Combine /scripts/{hash} and /scripts/{hash}/cbor into a ScriptRef.
 * Native scripts come through {@link mapNativeScript} instead.
 */
export function mapScript(
  scriptHash: string,
  type: string,
  cbor: string | null,
  context: string
): ScriptRef {
  const scriptType = scriptTypeFromLanguage(type);
  if (!scriptType) {
    throw new ChainDecodeError(context, `unknown script type ${type} for ${scriptHash}`);
  }
  if (!cbor) {
    throw new ChainDecodeError(context, `no CBOR served for ${scriptType} script ${scriptHash}`);
  }
  return toScriptRef(scriptType, cbor, context);
}

/** /scripts/{hash}/json of a timelock script -> Native ScriptRef */
export function mapNativeScript(
  scriptHash: string,
  json: NativeScriptJson | null,
  context: string
): ScriptRef {
  if (json === null) {
    throw new ChainDecodeError(context, `no JSON served for native script ${scriptHash}`);
  }
  return toScriptRef('Native', nativeScriptCborFromJson(json, context), context);
}

export function mapTip(raw: { hash: string; slot: number | null; height: number | null }): Tip {
  return { slot: raw.slot ?? 0, height: raw.height ?? 0, hash: raw.hash };
}

export function mapProtocolParameters(raw: BlockfrostParameters): ProtocolParameters {
  return {
    ...emptyProtocolParameters(),
    minFeeA: raw.min_fee_a,
    minFeeB: raw.min_fee_b,
    maxBlockSize: raw.max_block_size,
    maxTxSize: raw.max_tx_size,
    maxBlockHeaderSize: raw.max_block_header_size,
    keyDeposit: parseLovelace(raw.key_deposit, 'key_deposit'),
    poolDeposit: parseLovelace(raw.pool_deposit, 'pool_deposit'),
    poolInfluence: raw.a0,
    monetaryExpansion: raw.rho,
    treasuryExpansion: raw.tau,
    decentralisationParam: raw.decentralisation_param ?? 0,
    extraEntropy: typeof raw.extra_entropy === 'string' ? raw.extra_entropy : '',
    protocolMajorVersion: raw.protocol_major_ver,
    protocolMinorVersion: raw.protocol_minor_ver,
    minUtxo: parseLovelaceOrZero(raw.min_utxo, 'min_utxo'),
    minPoolCost: parseLovelace(raw.min_pool_cost, 'min_pool_cost'),
    priceMem: toSafeNumber(raw.price_mem, 'price_mem'),
    priceStep: toSafeNumber(raw.price_step, 'price_step'),
    maxTxExMem: parseLovelaceOrZero(raw.max_tx_ex_mem, 'max_tx_ex_mem'),
    maxTxExSteps: parseLovelaceOrZero(raw.max_tx_ex_steps, 'max_tx_ex_steps'),
    maxBlockExMem: parseLovelaceOrZero(raw.max_block_ex_mem, 'max_block_ex_mem'),
    maxBlockExSteps: parseLovelaceOrZero(raw.max_block_ex_steps, 'max_block_ex_steps'),
    maxValSize: toSafeNumber(raw.max_val_size, 'max_val_size'),
    collateralPercentage: raw.collateral_percent ?? 0,
    maxCollateralInputs: raw.max_collateral_inputs ?? 0,
    coinsPerUtxoByte: parseLovelaceOrZero(raw.coins_per_utxo_size, 'coins_per_utxo_size'),
    costModels: normalizeCostModels(raw.cost_models_raw ?? raw.cost_models),
    minFeeReferenceScriptsBase: raw.min_fee_ref_script_cost_per_byte ?? 0,
    drepDeposit: parseLovelaceOrZero(raw.drep_deposit, 'drep_deposit'),
    governanceActionDeposit: parseLovelaceOrZero(raw.gov_action_deposit, 'gov_action_deposit'),
  };
}

export function mapGenesis(raw: {
  active_slots_coefficient: number;
  update_quorum: number;
  max_lovelace_supply: string | number;
  network_magic: number;
  epoch_length: number;
  system_start: number;
  slots_per_kes_period: number;
  slot_length: number;
  max_kes_evolutions: number;
  security_param: number;
}): GenesisParameters {
  return {
    activeSlotsCoefficient: raw.active_slots_coefficient,
    updateQuorum: raw.update_quorum,
    maxLovelaceSupply: parseLovelace(raw.max_lovelace_supply, 'max_lovelace_supply'),
    networkMagic: raw.network_magic,
    epochLength: raw.epoch_length,
    systemStart: raw.system_start,
    slotsPerKesPeriod: raw.slots_per_kes_period,
    slotLength: raw.slot_length,
    maxKesEvolutions: raw.max_kes_evolutions,
    securityParam: raw.security_param,
  };
}

/** Account -> Delegation; an unknown account is undelegated with no rewards. */
export function mapDelegation(
  raw: {
    active: boolean;
    active_epoch?: number | null;
    withdrawable_amount: string;
    pool_id?: string | null;
  } | null
): Delegation {
  if (raw === null) {
    return { active: false, rewards: 0n, poolId: '' };
  }
  const poolId = raw.pool_id ?? '';
  return {
    active: poolId !== '' && raw.active,
    rewards: parseLovelace(raw.withdrawable_amount, 'withdrawable_amount'),
    poolId,
    ...(raw.active_epoch !== null && raw.active_epoch !== undefined
      ? { epoch: raw.active_epoch }
      : {}),
  };
}

/**
 * Flatten the evaluation envelope into raw redeemers.
 *
 * @throws ChainEvaluationError when the backend reports an evaluation failure
 */
export function mapEvaluation(raw: BlockfrostEvaluation, context: string): RawRedeemer[] {
  if (!('EvaluationResult' in raw.result)) {
    throw new ChainEvaluationError(context, JSON.stringify(raw.result.EvaluationFailure));
  }
  const redeemers: RawRedeemer[] = [];
  for (const [key, units] of Object.entries(raw.result.EvaluationResult)) {
    const parsed = parsePurposeKey(key);
    if (!parsed) {
      throw new ChainDecodeError(context, `malformed redeemer key ${key}`);
    }
    redeemers.push({
      purpose: parsed.purpose,
      index: parsed.index,
      exUnits: {
        mem: parseLovelace(units.memory, 'memory'),
        steps: parseLovelace(units.steps, 'steps'),
      },
    });
  }
  return redeemers;
}

// ---------------------------------------------------------------------------
// Additional UTxO wire shape (Ogmios v5 TxIn/TxOut pairs)
// ---------------------------------------------------------------------------

interface OgmiosV5TxOut {
  address: string;
  value: { coins: number | string; assets?: Record<string, number | string> };
  datumHash?: string;
  datum?: string;
  script?: Record<string, string>;
}

type OgmiosV5Utxo = [{ txId: string; index: number }, OgmiosV5TxOut];

const V5_SCRIPT_LANGUAGES = {
  Native: undefined,
  PlutusV1: 'plutus:v1',
  PlutusV2: 'plutus:v2',
  PlutusV3: 'plutus:v3',
} as const;

function bigToWire(value: bigint): number | string {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
}

/**
 * Adapt a canonical UTXO into the pair shape Blockfrost's evaluator takes.
 * Assets are keyed "policy.name", or "policy" alone for an empty name.
 */
export function toAdditionalUtxo(utxo: Utxo, context: string): OgmiosV5Utxo {
  const { output } = utxo;
  const assets: Record<string, number | string> = {};
  for (const [policyId, assetName, quantity] of flattenAssets(output.value.assets)) {
    assets[assetName === '' ? policyId : `${policyId}.${assetName}`] = bigToWire(quantity);
  }

  const txOut: OgmiosV5TxOut = {
    address: output.address,
    value: {
      coins: bigToWire(output.value.coin),
      ...(Object.keys(assets).length > 0 ? { assets } : {}),
    },
  };

  const datumHash = datumHashOf(output);
  const inlineDatum = inlineDatumOf(output);
  if (datumHash) txOut.datumHash = datumHash;
  if (inlineDatum) txOut.datum = inlineDatum;

  const scriptRef = scriptRefOf(output);
  if (scriptRef) {
    const language = V5_SCRIPT_LANGUAGES[scriptRef.type];
    if (!language) {
      throw new ChainInvalidInputError(
        context,
        `native reference script on ${utxo.input.txHash}#${utxo.input.outputIndex} cannot be sent to the evaluator`
      );
    }
    txOut.script = { [language]: applySingleCborEncoding(scriptRef.script) };
  }

  return [{ txId: utxo.input.txHash, index: utxo.input.outputIndex }, txOut];
}
