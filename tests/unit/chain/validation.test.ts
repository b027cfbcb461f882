import { describe, it, expect } from 'vitest';

import { errorMessage, isChainError, ChainNotFoundError } from '@/chain/errors.js';
import {
  requireAddress,
  requireHash28,
  requireHash32,
  requireStakeAddress,
  requireTransaction,
} from '@/chain/validation.js';

describe('input validation', () => {
  it('should lowercase valid hashes', () => {
    expect(requireHash32('AB'.repeat(32), 'getDatum')).toBe('ab'.repeat(32));
    expect(requireHash28('CD'.repeat(28), 'getScriptByHash')).toBe('cd'.repeat(28));
  });

  it('should reject hashes of the wrong length', () => {
    expect(() => requireHash32('ab'.repeat(28), 'getDatum')).toThrow(
      `getDatum: invalid input: ${'ab'.repeat(28)}`
    );
    expect(() => requireHash28('ab'.repeat(32), 'getScriptByHash')).toThrow(/invalid input/);
  });

  it('should reject blank or spaced addresses', () => {
    expect(() => requireAddress('', 'getUtxosByAddress')).toThrow(
      'getUtxosByAddress: invalid address or credential: '
    );
    expect(() => requireAddress('addr_test1 vz', 'getUtxosByAddress')).toThrow(/invalid address/);
    expect(requireAddress('addr_test1vz', 'getUtxosByAddress')).toBe('addr_test1vz');
  });

  it('should only accept stake addresses with a known prefix', () => {
    expect(requireStakeAddress('stake_test1uq', 'getDelegation')).toBe('stake_test1uq');
    expect(() => requireStakeAddress('addr_test1vz', 'getDelegation')).toThrow(/invalid address/);
  });

  it('should hex-encode a transaction and reject an empty one', () => {
    expect(requireTransaction(Uint8Array.from([0x84, 0xa4]), 'submitTransaction')).toBe('84a4');
    expect(() => requireTransaction(new Uint8Array(), 'submitTransaction')).toThrow(
      'submitTransaction: invalid input: empty transaction'
    );
  });
});

describe('isChainError', () => {
  it('should narrow by code', () => {
    const error = new ChainNotFoundError('getDatum', 'ff');
    expect(isChainError(error)).toBe(true);
    expect(isChainError(error, 'CHAIN_NOT_FOUND')).toBe(true);
    expect(isChainError(error, 'CHAIN_DECODE_FAILED')).toBe(false);
    expect(error.statusCode).toBe(404);
  });

  it('should reject non-chain errors', () => {
    expect(isChainError(new Error('plain'))).toBe(false);
    expect(isChainError(Object.assign(new Error('x'), { code: 'CONFIG_INVALID' }))).toBe(false);
    expect(isChainError('CHAIN_NOT_FOUND')).toBe(false);
  });

  it('should describe any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
