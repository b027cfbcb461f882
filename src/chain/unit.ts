// Asset unit codec: "lovelace" | policyId(56 hex) + assetName(0-64 hex)

import { ChainInvalidUnitError } from './errors.js';

export const LOVELACE = 'lovelace';

const POLICY_ID_LENGTH = 56;
const MAX_ASSET_NAME_LENGTH = 64;
const HEX = /^[0-9a-fA-F]*$/;

export interface ParsedUnit {
  /** Empty for lovelace */
  policyId: string;
  /** Hex, possibly empty */
  assetName: string;
}

export function isHex(text: string): boolean {
  return HEX.test(text) && text.length % 2 === 0;
}

/**
 * Split a unit into policy id and asset name.
 *
 * Accepts the fixed-offset form (`<policy><name>`) and the dotted form
 * Kupo uses (`<policy>.<name>`). Output is lowercase.
 */
export function parseUnit(unit: string): ParsedUnit {
  if (unit === LOVELACE) {
    return { policyId: '', assetName: '' };
  }

  let policyId: string;
  let assetName: string;
  const dot = unit.indexOf('.');
  if (dot !== -1) {
    policyId = unit.slice(0, dot);
    assetName = unit.slice(dot + 1);
  } else {
    policyId = unit.slice(0, POLICY_ID_LENGTH);
    assetName = unit.slice(POLICY_ID_LENGTH);
  }

  if (policyId.length !== POLICY_ID_LENGTH || !isHex(policyId)) {
    throw new ChainInvalidUnitError('parseUnit', unit);
  }
  if (!isHex(assetName) || assetName.length > MAX_ASSET_NAME_LENGTH) {
    throw new ChainInvalidUnitError('parseUnit', unit);
  }

  return { policyId: policyId.toLowerCase(), assetName: assetName.toLowerCase() };
}

/**
 * Inverse of parseUnit (fixed-offset form). Empty policy yields lovelace.
 */
export function encodeUnit(policyId: string, assetName = ''): string {
  if (policyId === '') {
    if (assetName !== '') {
      throw new ChainInvalidUnitError('encodeUnit', assetName);
    }
    return LOVELACE;
  }
  const unit = policyId + assetName;
  // validates both halves
  parseUnit(unit);
  return unit.toLowerCase();
}

/** `<policy>.<name>`, or `<policy>` alone when the asset name is empty. */
export function toDottedUnit(unit: string): string {
  const { policyId, assetName } = parseUnit(unit);
  if (policyId === '') {
    return LOVELACE;
  }
  return assetName === '' ? policyId : `${policyId}.${assetName}`;
}
