// Era-aware construction of canonical outputs

import { decodeDatum } from './cbor.js';
import { ChainDecodeError } from './errors.js';
import type {
  DatumOption,
  Output,
  PostAlonzoOutput,
  PreAlonzoOutput,
  ScriptRef,
  Value,
} from './types.js';
import { isHex } from './unit.js';

const HASH_32_LENGTH = 64;

export interface OutputParts {
  address: string;
  value: Value;
  datumHash?: string | null;
  /** Inline datum CBOR hex */
  inlineDatum?: string | null;
  scriptRef?: ScriptRef;
}

export interface UnresolvedOutputParts extends OutputParts {
  /** Reference script known only by hash; resolved before building */
  scriptHash?: string | null;
}

export type ScriptResolver = (scriptHash: string) => Promise<ScriptRef>;

function datumOf(parts: OutputParts, context: string): DatumOption {
  // an inline datum makes the hash derivable, so the hash is dropped
  let datum: DatumOption = { type: 'none' };
  if (parts.inlineDatum) {
    const cbor = parts.inlineDatum.toLowerCase();
    datum = { type: 'inline', cbor, data: decodeDatum(cbor, context) };
  } else if (parts.datumHash) {
    if (parts.datumHash.length !== HASH_32_LENGTH || !isHex(parts.datumHash)) {
      throw new ChainDecodeError(context, `malformed datum hash ${parts.datumHash}`);
    }
    datum = { type: 'hash', hash: parts.datumHash.toLowerCase() };
  }
  return Object.freeze(datum);
}

/**
 * Build the canonical Output. The output is post-Alonzo iff it carries a
 * datum hash, an inline datum or a reference script.
 *
 * @throws ChainDecodeError when an inline datum does not decode
 */
export function buildOutput(parts: OutputParts, context = 'output'): Output {
  if (!parts.datumHash && !parts.inlineDatum && !parts.scriptRef) {
    const output: PreAlonzoOutput = { era: 'preAlonzo', address: parts.address, value: parts.value };
    return Object.freeze(output);
  }

  const output: PostAlonzoOutput = {
    era: 'postAlonzo',
    address: parts.address,
    value: parts.value,
    datum: datumOf(parts, context),
    ...(parts.scriptRef ? { scriptRef: parts.scriptRef } : {}),
  };
  return Object.freeze(output);
}

/**
 * Build an output whose reference script may be known only by hash.
 * Resolver failures propagate.
 */
export async function buildOutputResolvingScript(
  parts: UnresolvedOutputParts,
  resolveScript: ScriptResolver,
  context = 'output'
): Promise<Output> {
  const { scriptHash, ...rest } = parts;
  if (rest.scriptRef || !scriptHash) {
    return buildOutput(rest, context);
  }
  const scriptRef = await resolveScript(scriptHash);
  return buildOutput({ ...rest, scriptRef }, context);
}

/** Datum hash of an output, if it carries one as a hash. */
export function datumHashOf(output: Output): string | undefined {
  if (output.era === 'postAlonzo' && output.datum.type === 'hash') {
    return output.datum.hash;
  }
  return undefined;
}

/** Inline datum CBOR of an output, if any. */
export function inlineDatumOf(output: Output): string | undefined {
  if (output.era === 'postAlonzo' && output.datum.type === 'inline') {
    return output.datum.cbor;
  }
  return undefined;
}

/** Reference script of an output, if any. */
export function scriptRefOf(output: Output): ScriptRef | undefined {
  return output.era === 'postAlonzo' ? output.scriptRef : undefined;
}
