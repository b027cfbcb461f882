import { z } from 'zod';

import type { NativeScriptJson } from '../cbor.js';

const Numeric = z.string().regex(/^\d+$/, 'Must be a numeric string');
const NumericLike = z.union([Numeric, z.number().nonnegative()]);
const NullableNumber = z.union([z.number(), z.string()]).nullable().optional();

/**
 * Asset amount. Quantities are numeric strings to keep precision.
 */
export const BlockfrostAmountSchema = z.object({
  unit: z.string().min(1, 'Asset unit must not be empty'),
  quantity: Numeric,
});

/**
 * UTXO from /addresses/{address}/utxos[/{asset}]
 *
 * - data_hash: datum hash (also set alongside inline_datum)
 * - inline_datum: inline datum CBOR
 * - reference_script_hash: hash of the reference script; bytes need a side-lookup
 */
export const BlockfrostAddressUtxoSchema = z.object({
  address: z.string().min(1),
  tx_hash: z.string().length(64),
  output_index: z.number().int().nonnegative(),
  amount: z.array(BlockfrostAmountSchema),
  data_hash: z.string().nullable().optional(),
  inline_datum: z.string().nullable().optional(),
  reference_script_hash: z.string().nullable().optional(),
});

export type BlockfrostAddressUtxo = z.infer<typeof BlockfrostAddressUtxoSchema>;

/**
 * Output entry of /txs/{hash}/utxos
 */
export const BlockfrostTxOutputSchema = z.object({
  address: z.string().min(1),
  amount: z.array(BlockfrostAmountSchema),
  output_index: z.number().int().nonnegative(),
  data_hash: z.string().nullable().optional(),
  inline_datum: z.string().nullable().optional(),
  reference_script_hash: z.string().nullable().optional(),
  collateral: z.boolean().optional(),
  consumed_by_tx: z.string().nullable().optional(),
});

export type BlockfrostTxOutput = z.infer<typeof BlockfrostTxOutputSchema>;

export const BlockfrostTxUtxosSchema = z.object({
  hash: z.string().length(64),
  outputs: z.array(BlockfrostTxOutputSchema),
});

/** /assets/{asset}/addresses */
export const BlockfrostAssetAddressesSchema = z.array(
  z.object({
    address: z.string().min(1),
    quantity: Numeric,
  })
);

/** /txs/{hash}; `block` is set once the transaction is in a block */
export const BlockfrostTransactionSchema = z.object({
  hash: z.string(),
  block: z.string().nullable().optional(),
  block_height: z.number().nullable().optional(),
});

/** /accounts/{stake_address} */
export const BlockfrostAccountSchema = z.object({
  stake_address: z.string(),
  active: z.boolean(),
  active_epoch: z.number().int().nullable().optional(),
  withdrawable_amount: Numeric,
  pool_id: z.string().nullable().optional(),
});

export const BlockfrostDatumCborSchema = z.object({ cbor: z.string().min(1) });

/** /scripts/{hash} */
export const BlockfrostScriptSchema = z.object({
  script_hash: z.string(),
  type: z.string(),
});

/** /scripts/{hash}/cbor; null for native scripts */
export const BlockfrostScriptCborSchema = z.object({ cbor: z.string().nullable() });

/** cardano-cli simple-script JSON, as /scripts/{hash}/json serves it */
export const NativeScriptJsonSchema: z.ZodType<NativeScriptJson> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('sig'), keyHash: z.string() }),
    z.object({ type: z.enum(['all', 'any']), scripts: NativeScriptJsonSchema.array() }),
    z.object({
      type: z.literal('atLeast'),
      required: z.number().int().nonnegative(),
      scripts: NativeScriptJsonSchema.array(),
    }),
    z.object({ type: z.enum(['before', 'after']), slot: z.number().int().nonnegative() }),
  ])
);

/** /scripts/{hash}/json; null for Plutus scripts */
export const BlockfrostScriptJsonSchema = z.object({ json: NativeScriptJsonSchema.nullable() });

/** /blocks/latest */
export const BlockfrostBlockSchema = z.object({
  hash: z.string().length(64),
  slot: z.number().int().nonnegative().nullable(),
  height: z.number().int().nonnegative().nullable(),
});

/** /epochs/latest */
export const BlockfrostEpochSchema = z.object({ epoch: z.number().int().nonnegative() });

/** /genesis */
export const BlockfrostGenesisSchema = z.object({
  active_slots_coefficient: z.number(),
  update_quorum: z.number().int(),
  max_lovelace_supply: NumericLike,
  network_magic: z.number().int(),
  epoch_length: z.number().int(),
  system_start: z.number().int(),
  slots_per_kes_period: z.number().int(),
  slot_length: z.number(),
  max_kes_evolutions: z.number().int(),
  security_param: z.number().int(),
});

/**
 * /epochs/latest/parameters. Optional fields are absent on older eras.
 */
export const BlockfrostParametersSchema = z.object({
  min_fee_a: z.number(),
  min_fee_b: z.number(),
  max_block_size: z.number(),
  max_tx_size: z.number(),
  max_block_header_size: z.number(),
  key_deposit: NumericLike,
  pool_deposit: NumericLike,
  e_max: z.number().optional(),
  n_opt: z.number().optional(),
  a0: z.number(),
  rho: z.number(),
  tau: z.number(),
  decentralisation_param: z.number().nullable().optional(),
  extra_entropy: z.unknown().optional(),
  protocol_major_ver: z.number(),
  protocol_minor_ver: z.number(),
  min_utxo: NumericLike.nullable().optional(),
  min_pool_cost: NumericLike,
  price_mem: NullableNumber,
  price_step: NullableNumber,
  max_tx_ex_mem: NumericLike.nullable().optional(),
  max_tx_ex_steps: NumericLike.nullable().optional(),
  max_block_ex_mem: NumericLike.nullable().optional(),
  max_block_ex_steps: NumericLike.nullable().optional(),
  max_val_size: NumericLike.nullable().optional(),
  collateral_percent: z.number().nullable().optional(),
  max_collateral_inputs: z.number().nullable().optional(),
  coins_per_utxo_size: NumericLike.nullable().optional(),
  coins_per_utxo_word: NumericLike.nullable().optional(),
  cost_models: z.record(z.record(z.number())).nullable().optional(),
  cost_models_raw: z.record(z.array(z.number())).nullable().optional(),
  min_fee_ref_script_cost_per_byte: z.number().nullable().optional(),
  drep_deposit: NumericLike.nullable().optional(),
  gov_action_deposit: NumericLike.nullable().optional(),
});

export type BlockfrostParameters = z.infer<typeof BlockfrostParametersSchema>;

const ExUnitsSchema = z.object({ memory: z.number(), steps: z.number() });

/**
 * /utils/txs/evaluate/utxos. Ogmios v5 envelope: a map keyed "spend:0" on
 * success, an EvaluationFailure object otherwise.
 */
export const BlockfrostEvaluationSchema = z.object({
  result: z.union([
    z.object({ EvaluationResult: z.record(ExUnitsSchema) }),
    z.object({ EvaluationFailure: z.unknown() }),
  ]),
});

export type BlockfrostEvaluation = z.infer<typeof BlockfrostEvaluationSchema>;
