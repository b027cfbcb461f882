// JSON rendering of canonical ledger values for HTTP responses.
//
// Bigints become decimal strings; inline datums are rendered as their CBOR
// only (the decoded plutus data has no JSON form).

import type { FastifyReply } from 'fastify';

import { Diagnostics } from '../chain/diagnostics.js';
import type { Output, ScriptRef, Utxo, Value } from '../chain/types.js';

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

/** Plain-data conversion: bigint -> string, undefined fields dropped. */
export function toJson(value: unknown): Json {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJson(item));
  }
  if (typeof value === 'object') {
    const result: { [key: string]: Json } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) {
        result[key] = toJson(field);
      }
    }
    return result;
  }
  return null;
}

export function serializeValue(value: Value): Json {
  return toJson(value);
}

function serializeScript(script: ScriptRef): Json {
  return { type: script.type, script: script.script };
}

export function serializeOutput(output: Output): Json {
  const base = {
    era: output.era,
    address: output.address,
    value: serializeValue(output.value),
  };
  if (output.era === 'preAlonzo') {
    return base;
  }
  const datum: Json =
    output.datum.type === 'inline'
      ? { type: 'inline', cbor: output.datum.cbor }
      : output.datum.type === 'hash'
        ? { type: 'hash', hash: output.datum.hash }
        : { type: 'none' };
  return {
    ...base,
    datum,
    ...(output.scriptRef ? { scriptRef: serializeScript(output.scriptRef) } : {}),
  };
}

export function serializeUtxo(utxo: Utxo): Json {
  return {
    txHash: utxo.input.txHash,
    outputIndex: utxo.input.outputIndex,
    output: serializeOutput(utxo.output),
  };
}

export interface RequestCallOptions {
  signal: AbortSignal;
  diagnostics: Diagnostics;
}

/**
 * Call options bound to one request: the signal aborts when the client goes
 * away before the reply is written, or after `timeoutMs`.
 */
export function callOptionsFor(reply: FastifyReply, timeoutMs?: number): RequestCallOptions {
  const controller = new AbortController();
  const timer =
    timeoutMs === undefined ? undefined : setTimeout(() => controller.abort(), timeoutMs).unref();
  reply.raw.once('close', () => {
    clearTimeout(timer);
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return { signal: controller.signal, diagnostics: new Diagnostics() };
}

/** Attach collected diagnostics to a response body when there are any. */
export function withDiagnostics(
  body: { [key: string]: Json },
  diagnostics: Diagnostics
): { [key: string]: Json } {
  if (diagnostics.size === 0) {
    return body;
  }
  return {
    ...body,
    diagnostics: diagnostics.entries.map((entry) => ({
      operation: entry.operation,
      key: entry.key,
      message: entry.message,
    })),
  };
}
