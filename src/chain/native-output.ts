// Ledger output CBOR <-> canonical Output

import { CML } from '@lucid-evolution/lucid';

import { addressFromString, addressToString, scriptFromCml, scriptToCml } from './cbor.js';
import { ChainDecodeError, errorMessage } from './errors.js';
import { buildOutput } from './output-builder.js';
import type { Output, Value } from './types.js';
import { ValueBuilder, flattenAssets } from './value.js';

/**
 * Build a canonical Output from ledger `transaction_output` CBOR, as served
 * in Maestro's `txout_cbor` and UTxORPC's `native_bytes`.
 */
export function decodeNativeOutput(cborHex: string, context = 'output'): Output {
  let output: CML.TransactionOutput;
  try {
    output = CML.TransactionOutput.from_cbor_hex(cborHex);
  } catch (error) {
    throw new ChainDecodeError(context, errorMessage(error));
  }

  try {
    const value = readValue(output, context);

    let datumHash: string | undefined;
    let inlineDatum: string | undefined;
    const datum = output.datum();
    if (datum) {
      if (datum.kind() === CML.DatumOptionKind.Hash) {
        const hash = datum.as_hash();
        datumHash = hash?.to_hex();
        hash?.free();
      } else {
        const data = datum.as_datum();
        inlineDatum = data?.to_cbor_hex();
        data?.free();
      }
      datum.free();
    }

    const script = output.script_ref();
    const address = output.address();
    try {
      return buildOutput(
        {
          address: addressToString(address),
          value,
          datumHash,
          inlineDatum,
          scriptRef: script ? scriptFromCml(script, context) : undefined,
        },
        context
      );
    } finally {
      address.free();
      script?.free();
    }
  } finally {
    output.free();
  }
}

/** Coin and multi-asset of a CML output; the CML handles are freed here. */
function readValue(output: CML.TransactionOutput, context: string): Value {
  const amount = output.amount();
  try {
    const value = new ValueBuilder(context).addCoin(amount.coin());
    if (!amount.has_multiassets()) {
      return value.build();
    }
    const multiAsset = amount.multi_asset();
    const policies = multiAsset.keys();
    try {
      for (let p = 0; p < policies.len(); p++) {
        const policyId = policies.get(p);
        const assetMap = multiAsset.get_assets(policyId);
        if (assetMap) {
          const assetNames = assetMap.keys();
          for (let a = 0; a < assetNames.len(); a++) {
            const assetName = assetNames.get(a);
            const quantity = assetMap.get(assetName);
            if (quantity !== undefined) {
              value.addAsset(policyId.to_hex(), assetName.to_hex(), quantity);
            }
            assetName.free();
          }
          assetNames.free();
          assetMap.free();
        }
        policyId.free();
      }
    } finally {
      policies.free();
      multiAsset.free();
    }
    return value.build();
  } finally {
    amount.free();
  }
}

/**
 * Encode a canonical Output as ledger CBOR hex. Used to ship additional
 * UTxOs to backends that take outputs as CBOR.
 */
export function encodeOutput(output: Output): string {
  const address = addressFromString(output.address);
  const multiAsset = CML.MultiAsset.new();
  for (const [policyId, assetName, quantity] of flattenAssets(output.value.assets)) {
    multiAsset.set(CML.ScriptHash.from_hex(policyId), CML.AssetName.from_hex(assetName), quantity);
  }
  const value = CML.Value.new(output.value.coin, multiAsset);
  multiAsset.free();

  let encoded: CML.TransactionOutput;
  if (output.era === 'preAlonzo') {
    encoded = CML.TransactionOutput.new(address, value);
  } else {
    let datum: CML.DatumOption | undefined;
    if (output.datum.type === 'hash') {
      datum = CML.DatumOption.new_hash(CML.DatumHash.from_hex(output.datum.hash));
    } else if (output.datum.type === 'inline') {
      datum = CML.DatumOption.new_datum(CML.PlutusData.from_cbor_hex(output.datum.cbor));
    }
    const script = output.scriptRef ? scriptToCml(output.scriptRef) : undefined;
    encoded = CML.TransactionOutput.new(address, value, datum, script);
  }

  try {
    return encoded.to_cbor_hex();
  } finally {
    encoded.free();
    value.free();
    address.free();
  }
}
