import { describe, it, expect } from 'vitest';

import { parseJson, stringifyJson } from '@/chain/json.js';

describe('parseJson', () => {
  it('should turn integers past double precision into strings', () => {
    expect(parseJson('{"coins":45000000000000001,"small":42}')).toEqual({
      coins: '45000000000000001',
      small: 42,
    });
  });

  it('should convert large integers inside arrays', () => {
    expect(parseJson('[1, 12345678901234567890]')).toEqual([1, '12345678901234567890']);
  });

  it('should leave decimals and strings alone', () => {
    expect(parseJson('{"a":"1234567890123456789","b":0.5}')).toEqual({
      a: '1234567890123456789',
      b: 0.5,
    });
  });

  it('should not rewrite digit runs inside string values', () => {
    expect(parseJson('{"msg":"a,12345678901234567890]","n":[12345678901234567890]}')).toEqual({
      msg: 'a,12345678901234567890]',
      n: ['12345678901234567890'],
    });
  });

  it('should skip escaped quotes when scanning strings', () => {
    expect(parseJson('{"msg":"say \\":12345678901234567890}"}')).toEqual({
      msg: 'say ":12345678901234567890}',
    });
  });

  it('should leave fractions and exponents of long numbers alone', () => {
    expect(parseJson('[0.12345678901234567, 1e-12345678901234567]')).toEqual([0.12345678901234567, 0]);
  });
});

describe('stringifyJson', () => {
  it('should write bigints as bare integers', () => {
    expect(stringifyJson({ coins: 45000000000000001n, list: [1n] })).toBe(
      '{"coins":45000000000000001,"list":[1]}'
    );
  });

  it('should behave like JSON.stringify without bigints', () => {
    expect(stringifyJson({ a: 'x', b: [true, null] })).toBe('{"a":"x","b":[true,null]}');
  });
});
