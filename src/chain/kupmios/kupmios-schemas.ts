import { z } from 'zod';

// Integers that may exceed 2^53 arrive as strings (see parseJson)
const Amount = z.union([z.number(), z.string()]);

// ---------------------------------------------------------------------------
// Kupo
// ---------------------------------------------------------------------------

const KupoPointSchema = z.object({
  slot_no: z.number(),
  header_hash: z.string(),
});

export const KupoMatchSchema = z.object({
  transaction_id: z.string(),
  output_index: z.number().int().nonnegative(),
  address: z.string(),
  value: z.object({
    coins: Amount,
    /** "policy.name" or "policy" -> quantity */
    assets: z.record(Amount).default({}),
  }),
  datum_hash: z.string().nullish(),
  datum_type: z.enum(['hash', 'inline']).nullish(),
  script_hash: z.string().nullish(),
  created_at: KupoPointSchema,
  spent_at: KupoPointSchema.nullish(),
});

export const KupoMatchesSchema = z.array(KupoMatchSchema);

/** /datums/{hash}: null when Kupo never saw the datum */
export const KupoDatumSchema = z.object({ datum: z.string() }).nullable();

/** /scripts/{hash}: null when Kupo never saw the script */
export const KupoScriptSchema = z
  .object({
    language: z.string(),
    script: z.string(),
  })
  .nullable();

export type KupoMatch = z.infer<typeof KupoMatchSchema>;

// ---------------------------------------------------------------------------
// Ogmios (JSON-RPC v6)
// ---------------------------------------------------------------------------

export const OgmiosResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
  id: z.unknown().optional(),
});

const AdaSchema = z.object({ ada: z.object({ lovelace: Amount }) });
const BytesSchema = z.object({ bytes: z.number() });
const BudgetSchema = z.object({ memory: Amount, cpu: Amount });

export const OgmiosProtocolParametersSchema = z.object({
  minFeeCoefficient: z.number(),
  minFeeConstant: AdaSchema,
  maxBlockBodySize: BytesSchema,
  maxBlockHeaderSize: BytesSchema,
  maxTransactionSize: BytesSchema,
  maxValueSize: BytesSchema.optional(),
  stakeCredentialDeposit: AdaSchema,
  stakePoolDeposit: AdaSchema,
  stakePoolPledgeInfluence: z.string(),
  monetaryExpansion: z.string(),
  treasuryExpansion: z.string(),
  extraEntropy: z.string().nullish(),
  minUtxoDepositConstant: AdaSchema.optional(),
  minUtxoDepositCoefficient: Amount.optional(),
  minStakePoolCost: AdaSchema,
  version: z.object({ major: z.number(), minor: z.number() }),
  scriptExecutionPrices: z.object({ memory: z.string(), cpu: z.string() }).optional(),
  maxExecutionUnitsPerTransaction: BudgetSchema.optional(),
  maxExecutionUnitsPerBlock: BudgetSchema.optional(),
  collateralPercentage: z.number().optional(),
  maxCollateralInputs: z.number().optional(),
  plutusCostModels: z.record(z.array(z.number())).optional(),
  maxReferenceScriptsSize: BytesSchema.optional(),
  minFeeReferenceScripts: z
    .object({ range: z.number(), base: z.number(), multiplier: z.number() })
    .optional(),
  delegateRepresentativeDeposit: AdaSchema.optional(),
  governanceActionDeposit: AdaSchema.optional(),
});

export type OgmiosProtocolParameters = z.infer<typeof OgmiosProtocolParametersSchema>;

export const OgmiosShelleyGenesisSchema = z.object({
  era: z.literal('shelley').optional(),
  startTime: z.string(),
  networkMagic: z.number(),
  activeSlotsCoefficient: z.string(),
  securityParameter: z.number(),
  epochLength: z.number(),
  slotsPerKesPeriod: z.number(),
  maxKesEvolutions: z.number(),
  slotLength: z.object({ milliseconds: z.number() }),
  updateQuorum: z.number(),
  maxLovelaceSupply: Amount,
});

export type OgmiosShelleyGenesis = z.infer<typeof OgmiosShelleyGenesisSchema>;

export const OgmiosTipSchema = z.union([
  z.literal('origin'),
  z.object({ slot: z.number(), id: z.string() }),
]);

export const OgmiosBlockHeightSchema = z.union([z.literal('origin'), z.number()]);

export const OgmiosEpochSchema = z.number().int().nonnegative();

const RewardSummarySchema = z.object({
  delegate: z.object({ id: z.string() }).nullish(),
  rewards: AdaSchema,
});

/**
 * queryLedgerState/rewardAccountSummaries. Older servers key summaries by
 * credential hash; newer ones return a list carrying the credential.
 */
export const OgmiosRewardSummariesSchema = z.union([
  z.array(RewardSummarySchema.extend({ credential: z.string().optional() })),
  z.record(RewardSummarySchema),
]);

export type OgmiosRewardSummary = z.infer<typeof RewardSummarySchema>;

export const OgmiosSubmitSchema = z.object({
  transaction: z.object({ id: z.string() }),
});

export const OgmiosEvaluationSchema = z.array(
  z.object({
    /** "spend:0" on early v6 servers */
    validator: z.union([
      z.string(),
      z.object({ purpose: z.string(), index: z.number().int().nonnegative() }),
    ]),
    budget: BudgetSchema,
  })
);

export type OgmiosEvaluation = z.infer<typeof OgmiosEvaluationSchema>;
