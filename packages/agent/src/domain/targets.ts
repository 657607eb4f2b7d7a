import type { TargetsConfig } from "../types/config.js";

export interface Target {
  skuId: number;
  storeId: number;
}

/**
 * Parse a comma-separated ID list ("3, 1,3,x,-2") into positive integers, first
 * occurrence order, duplicates and unparseable entries dropped.
 */
export function parseIdList(raw: string): number[] {
  const ids: number[] = [];
  const seen = new Set<number>();
  for (const part of raw.split(",")) {
    const value = part.trim();
    if (!/^[+-]?\d+$/.test(value)) continue;
    const parsed = Number(value);
    if (parsed <= 0 || seen.has(parsed)) continue;
    seen.add(parsed);
    ids.push(parsed);
  }
  return ids;
}

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i + 1);
}

function dedupe(ids: number[]): number[] {
  return [...new Set(ids)];
}

/**
 * Deterministic scan order: store-major, i.e. every configured SKU for store 1, then store 2, ...
 * Empty lists fall back to the default 1..N ranges.
 */
export function buildTargets(config: TargetsConfig): Target[] {
  const skus = config.skus.length > 0 ? dedupe(config.skus) : range(config.defaultSkuCount);
  const stores = config.stores.length > 0 ? dedupe(config.stores) : range(config.defaultStoreCount);
  const targets: Target[] = [];
  for (const storeId of stores) {
    for (const skuId of skus) {
      targets.push({ skuId, storeId });
    }
  }
  return targets;
}

export function formatTarget(target: Target): string {
  return `sku=${target.skuId} store=${target.storeId}`;
}
