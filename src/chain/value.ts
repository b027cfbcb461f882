// Value accumulation with zero filtering and canonical key order

import { ChainDecodeError } from './errors.js';
import type { Assets, Value } from './types.js';
import { parseUnit } from './unit.js';

/** Shorter key first, then bytewise; the ledger's canonical map order. */
export function compareCanonical(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export class ValueBuilder {
  private coin = 0n;
  private readonly assets = new Map<string, Map<string, bigint>>();

  constructor(private readonly context = 'value') {}

  addCoin(amount: bigint): this {
    if (amount < 0n) {
      throw new ChainDecodeError(this.context, `negative coin ${amount}`);
    }
    this.coin += amount;
    return this;
  }

  addAsset(policyId: string, assetName: string, quantity: bigint): this {
    if (quantity < 0n) {
      throw new ChainDecodeError(this.context, `negative quantity for ${policyId}${assetName}`);
    }
    if (quantity === 0n) {
      return this;
    }
    const policy = policyId.toLowerCase();
    const name = assetName.toLowerCase();
    let names = this.assets.get(policy);
    if (!names) {
      names = new Map();
      this.assets.set(policy, names);
    }
    names.set(name, (names.get(name) ?? 0n) + quantity);
    return this;
  }

  /** Add by unit; "lovelace" goes to coin. */
  addUnit(unit: string, quantity: bigint): this {
    const { policyId, assetName } = parseUnit(unit);
    if (policyId === '') {
      return this.addCoin(quantity);
    }
    return this.addAsset(policyId, assetName, quantity);
  }

  build(): Value {
    const assets: Record<string, Readonly<Record<string, bigint>>> = {};
    for (const policy of [...this.assets.keys()].sort(compareCanonical)) {
      const names = this.assets.get(policy);
      if (!names) continue;
      const entries: Record<string, bigint> = {};
      for (const name of [...names.keys()].sort(compareCanonical)) {
        const quantity = names.get(name);
        if (quantity !== undefined && quantity > 0n) {
          entries[name] = quantity;
        }
      }
      if (Object.keys(entries).length > 0) {
        assets[policy] = Object.freeze(entries);
      }
    }
    return Object.freeze({ coin: this.coin, assets: Object.freeze(assets) });
  }
}

/** Quantity of one unit inside a value (0n when absent). */
export function quantityOf(value: Value, unit: string): bigint {
  const { policyId, assetName } = parseUnit(unit);
  if (policyId === '') {
    return value.coin;
  }
  return value.assets[policyId]?.[assetName] ?? 0n;
}

/** Flatten assets into [policyId, assetName, quantity] triples in canonical order. */
export function flattenAssets(assets: Assets): Array<[string, string, bigint]> {
  const out: Array<[string, string, bigint]> = [];
  for (const policy of Object.keys(assets).sort(compareCanonical)) {
    const names = assets[policy] ?? {};
    for (const name of Object.keys(names).sort(compareCanonical)) {
      const quantity = names[name];
      if (quantity !== undefined) {
        out.push([policy, name, quantity]);
      }
    }
  }
  return out;
}
