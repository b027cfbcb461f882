// Rational and integer parsers for backend numeric encodings

import { ChainDecodeError } from './errors.js';

const DECIMAL = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;
const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Parse "a/b" (or a plain decimal) into a float.
 *
 * @throws ChainDecodeError on malformed text or a zero denominator
 */
export function parseRational(text: string, field = 'rational'): number {
  const trimmed = text.trim();
  const slash = trimmed.indexOf('/');

  if (slash === -1) {
    if (!DECIMAL.test(trimmed)) {
      throw new ChainDecodeError(field, text);
    }
    return Number(trimmed);
  }

  const numerator = trimmed.slice(0, slash).trim();
  const denominator = trimmed.slice(slash + 1).trim();
  if (!DECIMAL.test(numerator) || !DECIMAL.test(denominator)) {
    throw new ChainDecodeError(field, text);
  }
  const den = Number(denominator);
  if (den === 0) {
    throw new ChainDecodeError(field, text);
  }
  return Number(numerator) / den;
}

/** Lenient variant: unparseable or absent input is 0. */
export function parseRationalOrZero(text: string | number | null | undefined): number {
  if (text === null || text === undefined) {
    return 0;
  }
  if (typeof text === 'number') {
    return Number.isFinite(text) ? text : 0;
  }
  try {
    return parseRational(text);
  } catch {
    return 0;
  }
}

export interface Ratio {
  numerator: number | bigint | string;
  denominator: number | bigint | string;
}

/** Float division of a numerator/denominator pair; 0 when the denominator is 0. */
export function ratioToNumber(ratio: Ratio | null | undefined): number {
  if (!ratio) {
    return 0;
  }
  const den = Number(ratio.denominator);
  if (!Number.isFinite(den) || den === 0) {
    return 0;
  }
  return Number(ratio.numerator) / den;
}

/**
 * Parse a non-negative integer amount from a decimal string, number or bigint.
 *
 * @throws ChainDecodeError on negatives, fractions or garbage
 */
export function parseLovelace(raw: string | number | bigint, field = 'amount'): bigint {
  if (typeof raw === 'bigint') {
    if (raw < 0n) {
      throw new ChainDecodeError(field, raw.toString());
    }
    return raw;
  }
  if (typeof raw === 'number') {
    if (!Number.isSafeInteger(raw) || raw < 0) {
      throw new ChainDecodeError(field, String(raw));
    }
    return BigInt(raw);
  }
  if (!UNSIGNED_INTEGER.test(raw)) {
    throw new ChainDecodeError(field, raw);
  }
  return BigInt(raw);
}

/** Like parseLovelace but missing values become 0n. */
export function parseLovelaceOrZero(
  raw: string | number | bigint | null | undefined,
  field = 'amount'
): bigint {
  return raw === null || raw === undefined ? 0n : parseLovelace(raw, field);
}

/** Integer as a JS number; missing values become 0. */
export function toSafeNumber(raw: string | number | bigint | null | undefined, field = 'number'): number {
  if (raw === null || raw === undefined) {
    return 0;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ChainDecodeError(field, String(raw));
  }
  return value;
}
