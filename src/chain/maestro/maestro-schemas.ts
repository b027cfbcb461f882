import { z } from 'zod';

const Amount = z.union([z.number(), z.string()]);

/** `{ ada: { lovelace } }` on current servers, a bare amount on older ones */
const LovelaceSchema = z.union([
  z.object({ ada: z.object({ lovelace: Amount }) }).transform((value) => value.ada.lovelace),
  z.object({ lovelace: Amount }).transform((value) => value.lovelace),
  Amount,
]);

const BytesSchema = z.object({ bytes: z.number() });

const BudgetSchema = z
  .object({
    memory: Amount,
    steps: Amount.optional(),
    cpu: Amount.optional(),
  })
  .transform((value) => ({ memory: value.memory, steps: value.steps ?? value.cpu ?? 0 }));

/** Every Maestro response wraps its payload in `data` */
function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ data });
}

// ---- Chain state ----

export const MaestroEpochSchema = envelope(z.object({ epoch_no: z.number().int().nonnegative() }));

export const MaestroChainTipSchema = envelope(
  z.object({
    block_hash: z.string(),
    slot: z.number(),
    height: z.number(),
  })
);

export const MaestroProtocolParametersSchema = envelope(
  z.object({
    min_fee_coefficient: z.number(),
    min_fee_constant: LovelaceSchema,
    max_block_body_size: BytesSchema,
    max_block_header_size: BytesSchema,
    max_transaction_size: BytesSchema,
    max_value_size: BytesSchema.optional(),
    stake_credential_deposit: LovelaceSchema,
    stake_pool_deposit: LovelaceSchema,
    stake_pool_pledge_influence: z.string(),
    monetary_expansion: z.string(),
    treasury_expansion: z.string(),
    min_stake_pool_cost: LovelaceSchema,
    min_utxo_deposit_constant: LovelaceSchema.optional(),
    min_utxo_deposit_coefficient: Amount.optional(),
    version: z.object({ major: z.number(), minor: z.number() }).optional(),
    protocol_version: z.object({ major: z.number(), minor: z.number() }).optional(),
    script_execution_prices: z
      .object({
        memory: z.string(),
        cpu: z.string().optional(),
        steps: z.string().optional(),
      })
      .optional(),
    max_execution_units_per_transaction: BudgetSchema.optional(),
    max_execution_units_per_block: BudgetSchema.optional(),
    collateral_percentage: z.number().optional(),
    max_collateral_inputs: z.number().optional(),
    plutus_cost_models: z.record(z.array(z.number())).optional(),
    max_reference_scripts_size: BytesSchema.optional(),
    min_fee_reference_scripts: z
      .object({ range: z.number(), base: z.number(), multiplier: z.number() })
      .optional(),
    delegate_representative_deposit: LovelaceSchema.optional(),
    governance_action_deposit: LovelaceSchema.optional(),
  })
);

export type MaestroProtocolParameters = z.infer<typeof MaestroProtocolParametersSchema>['data'];

// ---- UTxOs ----

export const MaestroUtxoSchema = z.object({
  tx_hash: z.string(),
  index: z.number().int().nonnegative(),
  address: z.string().optional(),
  txout_cbor: z.string(),
});

export type MaestroUtxo = z.infer<typeof MaestroUtxoSchema>;

export const MaestroUtxoPageSchema = z.object({
  data: z.array(MaestroUtxoSchema),
  next_cursor: z.string().nullish(),
});

export const MaestroUtxoResponseSchema = envelope(MaestroUtxoSchema);

export const MaestroAssetAddressesSchema = envelope(
  z.array(z.object({ address: z.string(), amount: Amount.optional() }))
);

// ---- Accounts ----

export const MaestroAccountSchema = z.object({
  data: z.object({
    delegated_pool: z.string().nullish(),
    registered: z.boolean(),
    rewards_available: Amount,
  }),
  last_updated: z
    .object({
      block_hash: z.string(),
    })
    .optional(),
});

export type MaestroAccount = z.infer<typeof MaestroAccountSchema>['data'];

export const MaestroBlockSchema = envelope(z.object({ epoch: z.number().int().nonnegative() }));

// ---- Datums, scripts, transactions ----

export const MaestroDatumSchema = envelope(z.object({ bytes: z.string() }));

export const MaestroScriptSchema = envelope(
  z.object({
    type: z.string(),
    bytes: z.string(),
  })
);

export const MaestroTxCborSchema = envelope(z.string());

export const MaestroEvaluationSchema = z.array(
  z.object({
    redeemer_tag: z.string(),
    redeemer_index: z.number().int().nonnegative(),
    ex_units: z.object({ mem: Amount, steps: Amount }),
  })
);

export type MaestroEvaluation = z.infer<typeof MaestroEvaluationSchema>;
