import { z } from 'zod';

// Messages as produced by @grpc/proto-loader with
// { longs: String, enums: String, defaults: true, oneofs: true }:
// 64-bit integers arrive as decimal strings, bytes as Buffers and unset
// sub-messages as null.

const Long = z.union([z.string(), z.number()]);

const Bytes = z.instanceof(Uint8Array).transform((bytes) => Buffer.from(bytes).toString('hex'));

const RationalSchema = z.object({ numerator: z.number(), denominator: z.number() }).nullish();

const ExUnitsSchema = z.object({ steps: Long, memory: Long });

const CostModelSchema = z.object({ values: z.array(Long) }).nullish();

// ---- Query ----

export const PParamsSchema = z.object({
  coins_per_utxo_byte: Long,
  max_tx_size: Long,
  min_fee_coefficient: Long,
  min_fee_constant: Long,
  max_block_body_size: Long,
  max_block_header_size: Long,
  stake_key_deposit: Long,
  pool_deposit: Long,
  pool_influence: RationalSchema,
  monetary_expansion: RationalSchema,
  treasury_expansion: RationalSchema,
  min_pool_cost: Long,
  protocol_version: z.object({ major: z.number(), minor: z.number() }).nullish(),
  max_value_size: Long,
  collateral_percentage: Long,
  max_collateral_inputs: Long,
  cost_models: z
    .object({
      plutus_v1: CostModelSchema,
      plutus_v2: CostModelSchema,
      plutus_v3: CostModelSchema,
    })
    .nullish(),
  prices: z.object({ steps: RationalSchema, memory: RationalSchema }).nullish(),
  max_execution_units_per_transaction: ExUnitsSchema.nullish(),
  max_execution_units_per_block: ExUnitsSchema.nullish(),
});

export type PParams = z.infer<typeof PParamsSchema>;

export const ReadParamsResponseSchema = z.object({
  values: z.object({ cardano: PParamsSchema.nullish() }).nullish(),
});

export const AnyUtxoDataSchema = z.object({
  native_bytes: Bytes,
  txo_ref: z.object({ hash: Bytes, index: z.number().int().nonnegative() }).nullish(),
});

export type AnyUtxoData = z.infer<typeof AnyUtxoDataSchema>;

export const ReadUtxosResponseSchema = z.object({
  items: z.array(AnyUtxoDataSchema),
});

export const SearchUtxosResponseSchema = z.object({
  items: z.array(AnyUtxoDataSchema),
  next_token: z.string().default(''),
});

// ---- Sync ----

const BlockRefSchema = z.object({ slot: Long, hash: Bytes, height: Long.default('0') });

export const ReadTipResponseSchema = z.object({
  tip: BlockRefSchema.nullish(),
});

export type BlockRef = z.infer<typeof BlockRefSchema>;

export const FetchBlockResponseSchema = z.object({
  block: z.array(
    z.object({
      cardano: z.object({ header: BlockRefSchema.nullish() }).nullish(),
    })
  ),
});

// ---- Submit ----

export const SubmitTxResponseSchema = z.object({
  ref: z.array(Bytes),
});

export const EvalTxResponseSchema = z.object({
  report: z.array(
    z.object({
      cardano: z
        .object({
          errors: z.array(z.object({ msg: z.string() })).default([]),
          redeemers: z.array(
            z.object({
              purpose: z.string(),
              index: z.number().int().nonnegative(),
              ex_units: ExUnitsSchema.nullish(),
            })
          ),
        })
        .nullish(),
    })
  ),
});

export type TxEval = NonNullable<z.infer<typeof EvalTxResponseSchema>['report'][number]['cardano']>;

export const WaitForTxResponseSchema = z.object({
  ref: Bytes,
  stage: z.string(),
});

export const CONFIRMED_STAGE = 'STAGE_CONFIRMED';
