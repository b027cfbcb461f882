// Input checks shared by the adapters

import { ChainInvalidAddressError, ChainInvalidInputError } from './errors.js';
import { isHex } from './unit.js';

const HASH_28_LENGTH = 56;
const HASH_32_LENGTH = 64;

/** 32-byte hash (tx id, datum hash, block hash) as lowercase hex. */
export function requireHash32(hash: string, operation: string): string {
  if (hash.length !== HASH_32_LENGTH || !isHex(hash)) {
    throw new ChainInvalidInputError(operation, hash);
  }
  return hash.toLowerCase();
}

/** 28-byte hash (script hash, policy id) as lowercase hex. */
export function requireHash28(hash: string, operation: string): string {
  if (hash.length !== HASH_28_LENGTH || !isHex(hash)) {
    throw new ChainInvalidInputError(operation, hash);
  }
  return hash.toLowerCase();
}

export function requireAddress(address: string, operation: string): string {
  if (address.trim() === '' || /\s/.test(address)) {
    throw new ChainInvalidAddressError(operation, address);
  }
  return address;
}

/**
 * Reward addresses are bech32 with a "stake" prefix; `prefixes` narrows the
 * accepted human-readable parts where a backend is stricter.
 */
export function requireStakeAddress(
  address: string,
  operation: string,
  prefixes: readonly string[] = ['stake']
): string {
  if (!prefixes.some((prefix) => address.startsWith(prefix))) {
    throw new ChainInvalidAddressError(operation, address);
  }
  return address;
}

export function requireTransaction(tx: Uint8Array, operation: string): string {
  if (tx.length === 0) {
    throw new ChainInvalidInputError(operation, 'empty transaction');
  }
  return Buffer.from(tx).toString('hex');
}
