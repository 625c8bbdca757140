import type { Item, PooledKind, PoolType, SharedCostPools } from "../../types/project";
import { splitMinor, toMinor } from "../../utils/money";

export type DistributionMode = "explicit" | "distributed";

export type SharedCostPolicy = Record<PooledKind, Record<PoolType, DistributionMode>>;

/**
 * How each pool reaches the customer. "explicit" pools are their own subtotal
 * rows on the area; "distributed" pools are folded into the prices of the
 * units that triggered them. Commissioning is never split.
 */
export const SHARED_COST_POLICY: SharedCostPolicy = {
  canopy: { delivery: "explicit", commissioning: "explicit" },
  fireSuppression: { delivery: "distributed", commissioning: "explicit" },
  recoair: { delivery: "explicit", commissioning: "explicit" },
};

export const POOLED_KINDS: PooledKind[] = ["canopy", "fireSuppression", "recoair"];

export const POOL_TYPES: PoolType[] = ["delivery", "commissioning"];

export function poolAmount(pools: SharedCostPools, kind: PooledKind, pool: PoolType): number {
  const amount = pools[kind]?.[pool];
  return typeof amount === "number" && Number.isFinite(amount) ? amount : 0;
}

/** Items whose lines of `kind` absorb a distributed pool of that kind. */
export function isAbsorber(item: Item, kind: PooledKind): boolean {
  switch (kind) {
    case "canopy":
      return true;
    case "fireSuppression":
      return item.options.fireSuppression !== undefined;
    case "recoair":
      return false;
  }
}

/** This absorber's share of a pool in pence; 0 when it is not an absorber. */
export function shareOfPool(poolMinor: number, absorbers: readonly unknown[], absorber: unknown): number {
  const position = absorbers.indexOf(absorber);
  if (position < 0 || poolMinor === 0) return 0;
  return splitMinor(poolMinor, absorbers.length)[position];
}

export function poolMinor(pools: SharedCostPools, kind: PooledKind, pool: PoolType): number {
  return toMinor(poolAmount(pools, kind, pool));
}
