import type { FastifyBaseLogger } from 'fastify';

export interface Diagnostic {
  /** Canonical operation that degraded, e.g. "getUtxosByAddress" */
  operation: string;
  /** Address, hash, unit or purpose the entry is about */
  key: string;
  message: string;
}

/**
 * Caller-visible collector for per-item warnings. An operation that
 * degrades (skips an item, falls back to a datum hash, drops an unknown
 * redeemer purpose) appends here instead of failing.
 */
export class Diagnostics {
  private readonly items: Diagnostic[] = [];

  add(entry: Diagnostic): void {
    this.items.push(entry);
  }

  get entries(): readonly Diagnostic[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }
}

/** Options every async canonical operation accepts as its last argument. */
export interface CallOptions {
  signal?: AbortSignal;
  diagnostics?: Diagnostics;
}

/** Record a degradation on the caller's collector and log it at warn. */
export function report(
  log: FastifyBaseLogger,
  options: CallOptions | undefined,
  entry: Diagnostic
): void {
  options?.diagnostics?.add(entry);
  log.warn({ operation: entry.operation, key: entry.key }, entry.message);
}
