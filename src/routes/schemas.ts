import { z } from 'zod';

const Hex = z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'must be even-length hex');

export const AddressParamsSchema = z.object({ address: z.string().min(1) });

export const UnitQuerySchema = z.object({ unit: z.string().min(1).optional() });

export const UnitParamsSchema = z.object({ unit: z.string().min(1) });

export const StakeAddressParamsSchema = z.object({ stakeAddress: z.string().min(1) });

export const HashParamsSchema = z.object({ hash: z.string().min(1) });

export const OutRefsBodySchema = z.object({
  refs: z
    .array(
      z.object({
        txHash: z.string(),
        outputIndex: z.number().int().nonnegative(),
      })
    )
    .max(500),
});

export const SubmitBodySchema = z.object({
  /** Signed transaction CBOR */
  cbor: Hex.min(2),
});

/** Additional UTxO in the gateway's own wire shape */
const AdditionalUtxoSchema = z.object({
  txHash: z.string(),
  outputIndex: z.number().int().nonnegative(),
  /** Ledger transaction_output CBOR */
  outputCbor: Hex.min(2),
});

export const EvaluateBodySchema = z.object({
  cbor: Hex.min(2),
  additionalUtxos: z.array(AdditionalUtxoSchema).default([]),
});

export const AwaitBodySchema = z.object({
  /** Poll interval in ms; non-positive or absent uses the backend default */
  interval: z.number().int().optional(),
  /** Give up after this many ms */
  timeoutMs: z.number().int().min(1).max(600_000).default(120_000),
});
