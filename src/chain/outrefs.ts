// Output-reference batch helpers

import { ChainInvalidInputError } from './errors.js';
import type { OutRef, Utxo } from './types.js';
import { outRefToString } from './types.js';
import { requireHash32 } from './validation.js';

/**
 * Validate and normalize references; exact duplicates collapse to one.
 */
export function normalizeOutRefs(refs: readonly OutRef[], operation: string): OutRef[] {
  const seen = new Set<string>();
  const unique: OutRef[] = [];
  for (const ref of refs) {
    const normalized = {
      txHash: requireHash32(ref.txHash, operation),
      outputIndex: ref.outputIndex,
    };
    if (!Number.isInteger(normalized.outputIndex) || normalized.outputIndex < 0) {
      throw new ChainInvalidInputError(operation, outRefToString(ref));
    }
    const key = outRefToString(normalized);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(normalized);
    }
  }
  return unique;
}

/** Distinct transaction hashes in first-appearance order. */
export function distinctTxHashes(refs: readonly OutRef[]): string[] {
  return [...new Set(refs.map((ref) => ref.txHash))];
}

/**
 * Pick each requested output out of the fetched transactions, in request
 * order. References whose transaction or index is missing yield nothing.
 */
export function selectOutputs(
  refs: readonly OutRef[],
  fetched: ReadonlyMap<string, readonly Utxo[]>
): Utxo[] {
  const selected: Utxo[] = [];
  for (const ref of refs) {
    const match = fetched.get(ref.txHash)?.find((utxo) => utxo.input.outputIndex === ref.outputIndex);
    if (match) {
      selected.push(match);
    }
  }
  return selected;
}
