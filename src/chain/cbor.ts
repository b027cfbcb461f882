// CBOR interop for ledger primitives
//
// Uses CML (Cardano Multiplatform Library) re-exported from @lucid-evolution/lucid.
// CML handles returned to callers are theirs to free.

import {
  CML,
  Data,
  applyDoubleCborEncoding,
  applySingleCborEncoding,
} from '@lucid-evolution/lucid';

import { ChainDecodeError, ChainInvalidAddressError, errorMessage } from './errors.js';
import type { ScriptRef, ScriptType } from './types.js';
import { isHex } from './unit.js';

// ---------------------------------------------------------------------------
// Datums
// ---------------------------------------------------------------------------

/**
 * Decode inline datum CBOR into structured plutus data.
 *
 * @throws ChainDecodeError when the bytes are not valid plutus data
 */
export function decodeDatum(cborHex: string, context = 'datum'): Data {
  if (!isHex(cborHex) || cborHex.length === 0) {
    throw new ChainDecodeError(context, `datum is not hex: ${cborHex}`);
  }
  try {
    return Data.from(cborHex);
  } catch (error) {
    throw new ChainDecodeError(context, errorMessage(error));
  }
}

// ---------------------------------------------------------------------------
// Scripts
// ---------------------------------------------------------------------------

const SCRIPT_LANGUAGES: Record<string, ScriptType> = {
  native: 'Native',
  timelock: 'Native',
  'plutus:v1': 'PlutusV1',
  plutusv1: 'PlutusV1',
  plutus_v1: 'PlutusV1',
  'plutus:v2': 'PlutusV2',
  plutusv2: 'PlutusV2',
  plutus_v2: 'PlutusV2',
  'plutus:v3': 'PlutusV3',
  plutusv3: 'PlutusV3',
  plutus_v3: 'PlutusV3',
};

/** Map a backend's script language label onto the canonical script type. */
export function scriptTypeFromLanguage(language: string): ScriptType | undefined {
  return SCRIPT_LANGUAGES[language.toLowerCase()];
}

/**
 * Build a canonical ScriptRef from backend script bytes. Plutus scripts
 * may arrive flat, single or double wrapped; they leave double wrapped.
 */
export function toScriptRef(type: ScriptType, scriptHex: string, context = 'script'): ScriptRef {
  if (!isHex(scriptHex) || scriptHex.length === 0) {
    throw new ChainDecodeError(context, `script is not hex: ${scriptHex.slice(0, 16)}`);
  }
  const hex = scriptHex.toLowerCase();
  if (type === 'Native') {
    return Object.freeze({ type, script: hex });
  }
  try {
    return Object.freeze({ type, script: applyDoubleCborEncoding(hex) });
  } catch (error) {
    throw new ChainDecodeError(context, errorMessage(error));
  }
}

/** cardano-cli simple-script JSON */
export type NativeScriptJson =
  | { type: 'sig'; keyHash: string }
  | { type: 'all' | 'any'; scripts: NativeScriptJson[] }
  | { type: 'atLeast'; required: number; scripts: NativeScriptJson[] }
  | { type: 'before' | 'after'; slot: number };

function nativeScriptToCml(json: NativeScriptJson): CML.NativeScript {
  switch (json.type) {
    case 'sig': {
      const keyHash = CML.Ed25519KeyHash.from_hex(json.keyHash);
      try {
        return CML.NativeScript.new_script_pubkey(keyHash);
      } finally {
        keyHash.free();
      }
    }
    case 'all':
      return withNativeScriptList(json.scripts, (list) => CML.NativeScript.new_script_all(list));
    case 'any':
      return withNativeScriptList(json.scripts, (list) => CML.NativeScript.new_script_any(list));
    case 'atLeast': {
      const required = BigInt(json.required);
      return withNativeScriptList(json.scripts, (list) => CML.NativeScript.new_script_n_of_k(required, list));
    }
    // "before" bounds the validity interval from above, "after" from below
    case 'before':
      return CML.NativeScript.new_script_invalid_hereafter(BigInt(json.slot));
    case 'after':
      return CML.NativeScript.new_script_invalid_before(BigInt(json.slot));
  }
}

function withNativeScriptList(
  scripts: readonly NativeScriptJson[],
  build: (list: CML.NativeScriptList) => CML.NativeScript
): CML.NativeScript {
  const list = CML.NativeScriptList.new();
  try {
    for (const script of scripts) {
      const child = nativeScriptToCml(script);
      try {
        list.add(child);
      } finally {
        child.free();
      }
    }
    return build(list);
  } finally {
    list.free();
  }
}

/**
 * Encode a simple-script JSON document as native script CBOR.
 *
 * @throws ChainDecodeError when a key hash or slot is rejected by CML
 */
export function nativeScriptCborFromJson(json: NativeScriptJson, context = 'script'): string {
  try {
    const script = nativeScriptToCml(json);
    try {
      return script.to_cbor_hex();
    } finally {
      script.free();
    }
  } catch (error) {
    throw new ChainDecodeError(context, errorMessage(error));
  }
}

export function scriptToCml(ref: ScriptRef): CML.Script {
  switch (ref.type) {
    case 'Native':
      return CML.Script.new_native(CML.NativeScript.from_cbor_hex(ref.script));
    case 'PlutusV1':
      return CML.Script.new_plutus_v1(
        CML.PlutusV1Script.from_cbor_hex(applySingleCborEncoding(ref.script))
      );
    case 'PlutusV2':
      return CML.Script.new_plutus_v2(
        CML.PlutusV2Script.from_cbor_hex(applySingleCborEncoding(ref.script))
      );
    case 'PlutusV3':
      return CML.Script.new_plutus_v3(
        CML.PlutusV3Script.from_cbor_hex(applySingleCborEncoding(ref.script))
      );
  }
}

export function scriptFromCml(script: CML.Script, context: string): ScriptRef {
  switch (script.kind()) {
    case CML.ScriptKind.Native: {
      const native = script.as_native();
      if (native) return toScriptRef('Native', native.to_cbor_hex(), context);
      break;
    }
    case CML.ScriptKind.PlutusV1: {
      const plutus = script.as_plutus_v1();
      if (plutus) return toScriptRef('PlutusV1', plutus.to_cbor_hex(), context);
      break;
    }
    case CML.ScriptKind.PlutusV2: {
      const plutus = script.as_plutus_v2();
      if (plutus) return toScriptRef('PlutusV2', plutus.to_cbor_hex(), context);
      break;
    }
    case CML.ScriptKind.PlutusV3: {
      const plutus = script.as_plutus_v3();
      if (plutus) return toScriptRef('PlutusV3', plutus.to_cbor_hex(), context);
      break;
    }
  }
  throw new ChainDecodeError(context, 'unsupported script kind');
}

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

export function addressToString(address: CML.Address): string {
  if (address.kind() === CML.AddressKind.Byron) {
    const byron = CML.ByronAddress.from_address(address);
    if (!byron) {
      throw new ChainDecodeError('address', address.to_hex());
    }
    return byron.to_base58();
  }
  return address.to_bech32();
}

export function addressFromString(address: string): CML.Address {
  try {
    if (address.startsWith('addr') || address.startsWith('stake')) {
      return CML.Address.from_bech32(address);
    }
    return CML.ByronAddress.from_base58(address).to_address();
  } catch (error) {
    throw new ChainInvalidAddressError('address', `${address} (${errorMessage(error)})`);
  }
}

/** Raw address bytes of a bech32 or base58 address. */
export function addressToBytes(address: string): Uint8Array {
  const parsed = addressFromString(address);
  try {
    return parsed.to_raw_bytes();
  } finally {
    parsed.free();
  }
}

export interface StakeCredential {
  type: 'key' | 'script';
  hash: string;
}

/**
 * Extract the stake credential hash of a reward address.
 *
 * @throws ChainInvalidAddressError when the address carries no stake credential
 */
export function stakeCredentialOf(stakeAddress: string): StakeCredential {
  const address = addressFromString(stakeAddress);
  try {
    const credential = address.staking_cred();
    if (!credential) {
      throw new ChainInvalidAddressError('stakeCredentialOf', stakeAddress);
    }
    const keyHash = credential.as_pub_key();
    if (keyHash) {
      return { type: 'key', hash: keyHash.to_hex() };
    }
    const scriptHash = credential.as_script();
    if (scriptHash) {
      return { type: 'script', hash: scriptHash.to_hex() };
    }
    throw new ChainInvalidAddressError('stakeCredentialOf', stakeAddress);
  } finally {
    address.free();
  }
}
