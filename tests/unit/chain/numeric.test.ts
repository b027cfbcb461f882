import { describe, it, expect } from 'vitest';

import {
  parseLovelace,
  parseLovelaceOrZero,
  parseRational,
  parseRationalOrZero,
  ratioToNumber,
  toSafeNumber,
} from '@/chain/numeric.js';

describe('parseRational', () => {
  it('should divide a fraction', () => {
    expect(parseRational('577/10000')).toBeCloseTo(0.0577);
    expect(parseRational(' 3 / 4 ')).toBe(0.75);
  });

  it('should accept a plain decimal', () => {
    expect(parseRational('0.3')).toBe(0.3);
    expect(parseRational('1e-3')).toBe(0.001);
  });

  it('should reject a zero denominator', () => {
    expect(() => parseRational('1/0', 'priceMem')).toThrow(
      'priceMem: failed to decode backend payload: 1/0'
    );
  });

  it('should reject garbage', () => {
    expect(() => parseRational('one half')).toThrow(/failed to decode/);
    expect(() => parseRational('1/x')).toThrow(/failed to decode/);
  });
});

describe('parseRationalOrZero', () => {
  it('should fall back to 0 for absent or malformed input', () => {
    expect(parseRationalOrZero(undefined)).toBe(0);
    expect(parseRationalOrZero(null)).toBe(0);
    expect(parseRationalOrZero('x/y')).toBe(0);
    expect(parseRationalOrZero(Number.NaN)).toBe(0);
  });

  it('should pass numbers through', () => {
    expect(parseRationalOrZero(0.05)).toBe(0.05);
    expect(parseRationalOrZero('1/2')).toBe(0.5);
  });
});

describe('ratioToNumber', () => {
  it('should divide numerator by denominator', () => {
    expect(ratioToNumber({ numerator: 721, denominator: '10000000' })).toBeCloseTo(0.0000721);
  });

  it('should return 0 for a zero denominator or missing ratio', () => {
    expect(ratioToNumber({ numerator: 1, denominator: 0 })).toBe(0);
    expect(ratioToNumber(undefined)).toBe(0);
  });
});

describe('parseLovelace', () => {
  it('should keep values beyond 2^53 exact', () => {
    expect(parseLovelace('45000000000000000')).toBe(45000000000000000n);
  });

  it('should accept numbers and bigints', () => {
    expect(parseLovelace(1_000_000)).toBe(1000000n);
    expect(parseLovelace(7n)).toBe(7n);
  });

  it('should reject negatives and fractions', () => {
    expect(() => parseLovelace('-1', 'coin')).toThrow('coin: failed to decode backend payload: -1');
    expect(() => parseLovelace(1.5)).toThrow(/failed to decode/);
    expect(() => parseLovelace(-2n)).toThrow(/failed to decode/);
  });

  it('should default missing values to zero in the lenient variant', () => {
    expect(parseLovelaceOrZero(undefined)).toBe(0n);
    expect(parseLovelaceOrZero(null)).toBe(0n);
    expect(parseLovelaceOrZero('12')).toBe(12n);
  });
});

describe('toSafeNumber', () => {
  it('should convert strings and bigints', () => {
    expect(toSafeNumber('16384')).toBe(16384);
    expect(toSafeNumber(44n)).toBe(44);
    expect(toSafeNumber(undefined)).toBe(0);
  });

  it('should reject non-numeric text', () => {
    expect(() => toSafeNumber('abc', 'maxTxSize')).toThrow('maxTxSize: failed to decode backend payload: abc');
  });
});
