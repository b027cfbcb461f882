// Redeemer purpose canonicalization and execution-unit results

import type { FastifyBaseLogger } from 'fastify';

import { report } from './diagnostics.js';
import type { CallOptions } from './diagnostics.js';
import { ChainDecodeError } from './errors.js';
import type { EvalRedeemer, ExUnits, RedeemerTag } from './types.js';

const PURPOSES: Record<string, RedeemerTag> = {
  spend: 'spend',
  spending: 'spend',
  mint: 'mint',
  minting: 'mint',
  cert: 'cert',
  certificate: 'cert',
  certifying: 'cert',
  publish: 'cert',
  reward: 'reward',
  rewarding: 'reward',
  withdraw: 'reward',
  withdrawal: 'reward',
  vote: 'vote',
  voting: 'vote',
  propose: 'propose',
  proposal: 'propose',
  proposing: 'propose',
};

const ENUM_PREFIX = 'redeemer_purpose_';

/**
 * Map any backend's purpose label onto the canonical tag set.
 * Returns undefined for labels this layer does not know.
 */
export function normalizeRedeemerPurpose(label: string): RedeemerTag | undefined {
  let key = label.trim().toLowerCase();
  if (key.startsWith(ENUM_PREFIX)) {
    key = key.slice(ENUM_PREFIX.length);
  }
  return PURPOSES[key];
}

export interface RawRedeemer {
  purpose: string;
  index: number;
  exUnits: ExUnits;
}

/**
 * Canonicalize a backend's evaluation result. Unknown purposes are dropped
 * and reported; a repeated (tag, index) key is a malformed result.
 */
export function normalizeRedeemers(
  raw: readonly RawRedeemer[],
  log: FastifyBaseLogger,
  operation: string,
  options?: CallOptions
): EvalRedeemer[] {
  const seen = new Set<string>();
  const result: EvalRedeemer[] = [];

  for (const item of raw) {
    const tag = normalizeRedeemerPurpose(item.purpose);
    if (!tag) {
      report(log, options, {
        operation,
        key: `${item.purpose}:${item.index}`,
        message: 'Dropped redeemer with unrecognized purpose',
      });
      continue;
    }
    const key = redeemerKey(tag, item.index);
    if (seen.has(key)) {
      throw new ChainDecodeError(operation, `duplicate redeemer ${key}`);
    }
    seen.add(key);
    result.push({ tag, index: item.index, exUnits: item.exUnits });
  }

  return result;
}

export function redeemerKey(tag: RedeemerTag, index: number): string {
  return `${tag}:${index}`;
}

/** Evaluation result keyed by "tag:index". */
export function redeemersToExUnitsMap(redeemers: readonly EvalRedeemer[]): Record<string, ExUnits> {
  const map: Record<string, ExUnits> = {};
  for (const redeemer of redeemers) {
    map[redeemerKey(redeemer.tag, redeemer.index)] = redeemer.exUnits;
  }
  return map;
}

/**
 * Parse the "spend:0" keys used by Ogmios v5 style evaluation results.
 */
export function parsePurposeKey(key: string): { purpose: string; index: number } | undefined {
  const colon = key.lastIndexOf(':');
  if (colon === -1) {
    return undefined;
  }
  const index = Number(key.slice(colon + 1));
  if (!Number.isInteger(index) || index < 0) {
    return undefined;
  }
  return { purpose: key.slice(0, colon), index };
}
