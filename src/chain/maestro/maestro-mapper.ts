// Pure mapping from Maestro payloads to the canonical model

import { decodeNativeOutput, encodeOutput } from '../native-output.js';
import { parseLovelace, parseLovelaceOrZero, parseRationalOrZero } from '../numeric.js';
import { emptyProtocolParameters, normalizeCostModels } from '../protocol.js';
import type { RawRedeemer } from '../redeemers.js';
import type { Delegation, ProtocolParameters, Utxo } from '../types.js';
import { outRefToString } from '../types.js';
import type {
  MaestroAccount,
  MaestroEvaluation,
  MaestroProtocolParameters,
  MaestroUtxo,
} from './maestro-schemas.js';

export function mapMaestroUtxo(raw: MaestroUtxo): Utxo {
  const input = { txHash: raw.tx_hash.toLowerCase(), outputIndex: raw.index };
  return { input, output: decodeNativeOutput(raw.txout_cbor, outRefToString(input)) };
}

export function mapMaestroProtocolParameters(raw: MaestroProtocolParameters): ProtocolParameters {
  const version = raw.version ?? raw.protocol_version;
  const prices = raw.script_execution_prices;
  return {
    ...emptyProtocolParameters(),
    minFeeA: raw.min_fee_coefficient,
    minFeeB: Number(parseLovelace(raw.min_fee_constant, 'min_fee_constant')),
    maxBlockSize: raw.max_block_body_size.bytes,
    maxTxSize: raw.max_transaction_size.bytes,
    maxBlockHeaderSize: raw.max_block_header_size.bytes,
    keyDeposit: parseLovelace(raw.stake_credential_deposit, 'stake_credential_deposit'),
    poolDeposit: parseLovelace(raw.stake_pool_deposit, 'stake_pool_deposit'),
    poolInfluence: parseRationalOrZero(raw.stake_pool_pledge_influence),
    monetaryExpansion: parseRationalOrZero(raw.monetary_expansion),
    treasuryExpansion: parseRationalOrZero(raw.treasury_expansion),
    protocolMajorVersion: version?.major ?? 0,
    protocolMinorVersion: version?.minor ?? 0,
    minUtxo: parseLovelaceOrZero(raw.min_utxo_deposit_constant, 'min_utxo_deposit_constant'),
    minPoolCost: parseLovelace(raw.min_stake_pool_cost, 'min_stake_pool_cost'),
    priceMem: parseRationalOrZero(prices?.memory),
    priceStep: parseRationalOrZero(prices?.cpu ?? prices?.steps),
    maxTxExMem: parseLovelaceOrZero(raw.max_execution_units_per_transaction?.memory, 'max_tx_ex_mem'),
    maxTxExSteps: parseLovelaceOrZero(raw.max_execution_units_per_transaction?.steps, 'max_tx_ex_steps'),
    maxBlockExMem: parseLovelaceOrZero(raw.max_execution_units_per_block?.memory, 'max_block_ex_mem'),
    maxBlockExSteps: parseLovelaceOrZero(raw.max_execution_units_per_block?.steps, 'max_block_ex_steps'),
    maxValSize: raw.max_value_size?.bytes ?? 0,
    collateralPercentage: raw.collateral_percentage ?? 0,
    maxCollateralInputs: raw.max_collateral_inputs ?? 0,
    coinsPerUtxoByte: parseLovelaceOrZero(raw.min_utxo_deposit_coefficient, 'min_utxo_deposit_coefficient'),
    costModels: normalizeCostModels(raw.plutus_cost_models),
    maxReferenceScriptsSize: raw.max_reference_scripts_size?.bytes ?? 0,
    minFeeReferenceScriptsRange: raw.min_fee_reference_scripts?.range ?? 0,
    minFeeReferenceScriptsBase: raw.min_fee_reference_scripts?.base ?? 0,
    minFeeReferenceScriptsMultiplier: raw.min_fee_reference_scripts?.multiplier ?? 0,
    drepDeposit: parseLovelaceOrZero(raw.delegate_representative_deposit, 'delegate_representative_deposit'),
    governanceActionDeposit: parseLovelaceOrZero(raw.governance_action_deposit, 'governance_action_deposit'),
  };
}

/** A registered account counts as active; `epoch` is that of its last update. */
export function mapMaestroDelegation(raw: MaestroAccount | null, epoch?: number): Delegation {
  if (raw === null) {
    return { active: false, rewards: 0n, poolId: '' };
  }
  return {
    active: raw.registered,
    rewards: parseLovelace(raw.rewards_available, 'rewards_available'),
    poolId: raw.delegated_pool ?? '',
    ...(epoch !== undefined ? { epoch } : {}),
  };
}

export function mapMaestroEvaluation(raw: MaestroEvaluation): RawRedeemer[] {
  return raw.map((item) => ({
    purpose: item.redeemer_tag,
    index: item.redeemer_index,
    exUnits: {
      mem: parseLovelace(item.ex_units.mem, 'mem'),
      steps: parseLovelace(item.ex_units.steps, 'steps'),
    },
  }));
}

export interface MaestroAdditionalUtxo {
  tx_hash: string;
  index: number;
  txout_cbor: string;
}

export function toMaestroAdditionalUtxo(utxo: Utxo): MaestroAdditionalUtxo {
  return {
    tx_hash: utxo.input.txHash,
    index: utxo.input.outputIndex,
    txout_cbor: encodeOutput(utxo.output),
  };
}
