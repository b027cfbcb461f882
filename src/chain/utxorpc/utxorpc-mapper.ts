// Pure mapping from UTxO RPC messages to the canonical model

import { ChainDecodeError } from '../errors.js';
import { decodeNativeOutput } from '../native-output.js';
import { parseLovelace, ratioToNumber, toSafeNumber } from '../numeric.js';
import { emptyProtocolParameters } from '../protocol.js';
import type { RawRedeemer } from '../redeemers.js';
import type { ProtocolParameters, Utxo } from '../types.js';
import { outRefToString } from '../types.js';
import type { AnyUtxoData, PParams, TxEval } from './utxorpc-schemas.js';

export function mapPParams(raw: PParams): ProtocolParameters {
  const costModels: Record<string, number[]> = {};
  const models = raw.cost_models;
  if (models?.plutus_v1) costModels.PlutusV1 = models.plutus_v1.values.map(Number);
  if (models?.plutus_v2) costModels.PlutusV2 = models.plutus_v2.values.map(Number);
  if (models?.plutus_v3) costModels.PlutusV3 = models.plutus_v3.values.map(Number);

  const perTx = raw.max_execution_units_per_transaction;
  const perBlock = raw.max_execution_units_per_block;
  return {
    ...emptyProtocolParameters(),
    minFeeA: toSafeNumber(raw.min_fee_coefficient, 'min_fee_coefficient'),
    minFeeB: toSafeNumber(raw.min_fee_constant, 'min_fee_constant'),
    maxBlockSize: toSafeNumber(raw.max_block_body_size, 'max_block_body_size'),
    maxTxSize: toSafeNumber(raw.max_tx_size, 'max_tx_size'),
    maxBlockHeaderSize: toSafeNumber(raw.max_block_header_size, 'max_block_header_size'),
    keyDeposit: parseLovelace(raw.stake_key_deposit, 'stake_key_deposit'),
    poolDeposit: parseLovelace(raw.pool_deposit, 'pool_deposit'),
    poolInfluence: ratioToNumber(raw.pool_influence),
    monetaryExpansion: ratioToNumber(raw.monetary_expansion),
    treasuryExpansion: ratioToNumber(raw.treasury_expansion),
    protocolMajorVersion: raw.protocol_version?.major ?? 0,
    protocolMinorVersion: raw.protocol_version?.minor ?? 0,
    minPoolCost: parseLovelace(raw.min_pool_cost, 'min_pool_cost'),
    priceMem: ratioToNumber(raw.prices?.memory),
    priceStep: ratioToNumber(raw.prices?.steps),
    maxTxExMem: perTx ? parseLovelace(perTx.memory, 'max_tx_ex_mem') : 0n,
    maxTxExSteps: perTx ? parseLovelace(perTx.steps, 'max_tx_ex_steps') : 0n,
    maxBlockExMem: perBlock ? parseLovelace(perBlock.memory, 'max_block_ex_mem') : 0n,
    maxBlockExSteps: perBlock ? parseLovelace(perBlock.steps, 'max_block_ex_steps') : 0n,
    maxValSize: toSafeNumber(raw.max_value_size, 'max_value_size'),
    collateralPercentage: toSafeNumber(raw.collateral_percentage, 'collateral_percentage'),
    maxCollateralInputs: toSafeNumber(raw.max_collateral_inputs, 'max_collateral_inputs'),
    coinsPerUtxoByte: parseLovelace(raw.coins_per_utxo_byte, 'coins_per_utxo_byte'),
    costModels,
  };
}

export function mapAnyUtxo(raw: AnyUtxoData, operation: string): Utxo {
  if (!raw.txo_ref) {
    throw new ChainDecodeError(operation, 'UTxO without txo_ref');
  }
  const input = { txHash: raw.txo_ref.hash, outputIndex: raw.txo_ref.index };
  return { input, output: decodeNativeOutput(raw.native_bytes, outRefToString(input)) };
}

/** Redeemers of a Cardano evaluation report; purposes stay as enum names. */
export function mapTxEval(raw: TxEval): RawRedeemer[] {
  return raw.redeemers.map((redeemer) => ({
    purpose: redeemer.purpose,
    index: redeemer.index,
    exUnits: {
      mem: redeemer.ex_units ? parseLovelace(redeemer.ex_units.memory, 'memory') : 0n,
      steps: redeemer.ex_units ? parseLovelace(redeemer.ex_units.steps, 'steps') : 0n,
    },
  }));
}
