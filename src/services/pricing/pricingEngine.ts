import { ALL_FEATURES_ENABLED, type FeatureFlags } from "../../config/features";
import type {
  EquipmentKind,
  Item,
  ItemSpec,
  PooledKind,
  PoolType,
  SharedCostPools,
} from "../../types/project";
import {
  NOT_APPLICABLE,
  type ItemPrice,
  type LinePrice,
  type ResolvedSpec,
  type ResolvedSpecValue,
  type SpecField,
} from "../../types/pricing";
import { fromMinor, sumMinor, toMinor } from "../../utils/money";
import { matchModelExceptions, type ModelException } from "./modelExceptions";
import {
  isAbsorber,
  poolMinor,
  POOL_TYPES,
  SHARED_COST_POLICY,
  shareOfPool,
  type SharedCostPolicy,
} from "./sharedCosts";

export interface PricingOptions {
  features?: FeatureFlags;
  policy?: SharedCostPolicy;
  exceptions?: ModelException[];
}

/** A set of siblings sharing one set of pools (an area, or a whole level). */
export interface CostScope {
  siblings: Item[];
  pools: SharedCostPools;
}

function isPooledKind(kind: EquipmentKind): kind is PooledKind {
  return kind === "canopy" || kind === "fireSuppression" || kind === "recoair";
}

function specValue(spec: ItemSpec, field: SpecField): ResolvedSpecValue {
  const value = spec[field];
  if (value === undefined || value === null) return null;
  if (typeof value === "string" && value.trim() === "") return null;
  return value;
}

export function resolveSpec(item: Item, exceptions?: ModelException[]): { spec: ResolvedSpec; rules: string[] } {
  const match = matchModelExceptions(item.model, exceptions);
  const resolve = (field: SpecField): ResolvedSpecValue =>
    match.fields.has(field) ? NOT_APPLICABLE : specValue(item.spec, field);
  const spec: ResolvedSpec = {
    extractVolume: resolve("extractVolume"),
    extractStatic: resolve("extractStatic"),
    supplyVolume: resolve("supplyVolume"),
    supplyStatic: resolve("supplyStatic"),
    cwsCapacity: resolve("cwsCapacity"),
    hwsRequirement: resolve("hwsRequirement"),
    hwStorage: resolve("hwStorage"),
  };
  return { spec, rules: match.rules };
}

/** Base price of each unit an item carries, main unit first. */
export function itemUnits(item: Item, features: FeatureFlags = ALL_FEATURES_ENABLED): Array<{ kind: EquipmentKind; basePrice: number }> {
  const units: Array<{ kind: EquipmentKind; basePrice: number }> = [{ kind: "canopy", basePrice: item.basePrice }];
  const { wallCladding, fireSuppression, sdu } = item.options;
  if (wallCladding && features.isEnabled("cladding")) {
    units.push({ kind: "cladding", basePrice: wallCladding.price });
  }
  if (fireSuppression && features.isEnabled("fireSuppression")) {
    units.push({ kind: "fireSuppression", basePrice: fireSuppression.basePrice });
  }
  if (sdu && features.isEnabled("sdu")) {
    units.push({ kind: "sdu", basePrice: sdu.basePrice });
  }
  return units;
}

function absorbersIn(scope: CostScope, kind: PooledKind, features: FeatureFlags): Item[] {
  if (!features.isEnabled(kind)) return [];
  return scope.siblings.filter((sibling) => isAbsorber(sibling, kind));
}

function lineShares(
  item: Item,
  kind: EquipmentKind,
  scopes: CostScope[],
  policy: SharedCostPolicy,
  features: FeatureFlags
): Record<PoolType, number> {
  const shares: Record<PoolType, number> = { delivery: 0, commissioning: 0 };
  if (!isPooledKind(kind)) return shares;
  for (const scope of scopes) {
    const absorbers = absorbersIn(scope, kind, features);
    for (const pool of POOL_TYPES) {
      if (policy[kind][pool] !== "distributed") continue;
      shares[pool] += shareOfPool(poolMinor(scope.pools, kind, pool), absorbers, item);
    }
  }
  return shares;
}

/**
 * Prices one item against every cost scope it belongs to. Shares come back in
 * pence from the pool split and are converted once per line.
 */
export function priceItemInScopes(item: Item, scopes: CostScope[], options: PricingOptions = {}): ItemPrice {
  const features = options.features ?? ALL_FEATURES_ENABLED;
  const policy = options.policy ?? SHARED_COST_POLICY;
  const { spec, rules } = resolveSpec(item, options.exceptions);

  const lines: LinePrice[] = itemUnits(item, features).map(({ kind, basePrice }) => {
    const sharesMinor = lineShares(item, kind, scopes, policy, features);
    const priceMinor = toMinor(basePrice) + sharesMinor.delivery + sharesMinor.commissioning;
    return {
      kind,
      reference: item.reference,
      model: item.model,
      basePrice,
      shares: { delivery: fromMinor(sharesMinor.delivery), commissioning: fromMinor(sharesMinor.commissioning) },
      price: fromMinor(priceMinor),
    };
  });

  return {
    reference: item.reference,
    model: item.model,
    spec,
    exceptionRules: rules,
    lines,
    total: fromMinor(sumMinor(lines.map((line) => toMinor(line.price)))),
  };
}

/** `siblings` may leave the item itself out; it then counts as the first sibling. */
export function priceItem(
  item: Item,
  siblings: Item[],
  sharedCosts: SharedCostPools,
  options: PricingOptions = {}
): ItemPrice {
  const scopeItems = siblings.includes(item) ? siblings : [item, ...siblings];
  return priceItemInScopes(item, [{ siblings: scopeItems, pools: sharedCosts }], options);
}
