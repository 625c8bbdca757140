import { ALL_FEATURES_ENABLED, type FeatureFlags } from "../../config/features";
import type { Area, EquipmentKind, Level, PooledKind, Project, SharedCostPools } from "../../types/project";
import type {
  AreaSummary,
  ExplicitCostLine,
  KindRollup,
  LevelSummary,
  LinePrice,
  PoolScope,
  PricingAnomaly,
  PricingSummary,
  SubtotalCategory,
} from "../../types/pricing";
import { fromMinor, sumMinor, toMinor } from "../../utils/money";
import { priceItemInScopes, type CostScope, type PricingOptions } from "./pricingEngine";
import {
  isAbsorber,
  poolAmount,
  poolMinor,
  POOL_TYPES,
  POOLED_KINDS,
  SHARED_COST_POLICY,
  shareOfPool,
  type SharedCostPolicy,
} from "./sharedCosts";

export const EQUIPMENT_KINDS: EquipmentKind[] = [
  "canopy",
  "cladding",
  "fireSuppression",
  "sdu",
  "uvc",
  "recoair",
  "reactaway",
];

export const CATEGORY_BY_KIND: Record<EquipmentKind, SubtotalCategory> = {
  canopy: "mainUnits",
  cladding: "cladding",
  fireSuppression: "fireSuppression",
  sdu: "ancillary",
  uvc: "ancillary",
  recoair: "ancillary",
  reactaway: "ancillary",
};

const CATEGORIES: SubtotalCategory[] = ["mainUnits", "cladding", "fireSuppression", "ancillary"];

function zeroByKind(): Record<EquipmentKind, number> {
  return { canopy: 0, cladding: 0, fireSuppression: 0, sdu: 0, uvc: 0, recoair: 0, reactaway: 0 };
}

function zeroByCategory(): Record<SubtotalCategory, number> {
  return { mainUnits: 0, cladding: 0, fireSuppression: 0, ancillary: 0 };
}

/** Whether an area carries at least one line of `kind`, i.e. can host that kind's explicit rows. */
function hostsKind(area: Area, kind: PooledKind, features: FeatureFlags): boolean {
  if (!features.isEnabled(kind)) return false;
  if (kind === "recoair") return area.options.recoair !== undefined;
  return area.items.some((item) => isAbsorber(item, kind));
}

function absorberCount(areas: Area[], kind: PooledKind, features: FeatureFlags): number {
  if (!features.isEnabled(kind)) return 0;
  if (kind === "recoair") return areas.filter((area) => area.options.recoair !== undefined).length;
  return areas.reduce((count, area) => count + area.items.filter((item) => isAbsorber(item, kind)).length, 0);
}

interface PoolPlacement {
  explicitByArea: Map<Area, ExplicitCostLine[]>;
  anomalies: PricingAnomaly[];
}

/**
 * Resolves where every non-zero pool of a level lands: explicit rows go to a
 * host area, distributed pools only need at least one absorber. A pool that
 * cannot land anywhere is reported and counts as zero.
 */
function placePools(level: Level, policy: SharedCostPolicy, features: FeatureFlags): PoolPlacement {
  const explicitByArea = new Map<Area, ExplicitCostLine[]>();
  const anomalies: PricingAnomaly[] = [];

  const visit = (pools: SharedCostPools, scope: PoolScope, areas: Area[], areaName?: string) => {
    for (const kind of POOLED_KINDS) {
      for (const pool of POOL_TYPES) {
        const amount = poolAmount(pools, kind, pool);
        if (amount === 0) continue;
        const where = { level: level.name, ...(areaName !== undefined ? { area: areaName } : {}) };
        if (!features.isEnabled(kind)) {
          anomalies.push({
            severity: "info",
            rule: "kind-disabled",
            message: `${kind} ${pool} pool of ${amount} ignored because ${kind} is switched off`,
            ...where,
          });
          continue;
        }
        if (policy[kind][pool] === "distributed") {
          if (absorberCount(areas, kind, features) === 0) {
            anomalies.push({
              severity: "warning",
              rule: "pool-without-absorber",
              message: `${kind} ${pool} pool of ${amount} has no ${kind} unit to absorb it and was treated as zero`,
              ...where,
            });
          }
          continue;
        }
        const host = areas.find((area) => hostsKind(area, kind, features));
        if (!host) {
          anomalies.push({
            severity: "warning",
            rule: "pool-without-absorber",
            message: `${kind} ${pool} pool of ${amount} has no ${kind} unit to carry it and was treated as zero`,
            ...where,
          });
          continue;
        }
        const lines = explicitByArea.get(host) ?? [];
        lines.push({ kind, pool, scope, amount });
        explicitByArea.set(host, lines);
      }
    }
  };

  level.areas.forEach((area) => visit(area.sharedCosts, "area", [area], area.name));
  visit(level.sharedCosts, "level", level.areas);
  return { explicitByArea, anomalies };
}

function areaLines(area: Area, level: Level, policy: SharedCostPolicy, features: FeatureFlags): LinePrice[] {
  const units: Array<{ kind: EquipmentKind; model: string; basePrice: number }> = [];
  const { uvc, recoair, reactaway } = area.options;
  if (uvc && features.isEnabled("uvc")) units.push({ kind: "uvc", model: "UV-C", basePrice: uvc.price });
  if (recoair && features.isEnabled("recoair")) {
    units.push({ kind: "recoair", model: recoair.model ?? "RecoAir", basePrice: recoair.price });
  }
  if (reactaway && features.isEnabled("reactaway")) {
    units.push({ kind: "reactaway", model: "ReactAway", basePrice: reactaway.price });
  }

  return units.map(({ kind, model, basePrice }) => {
    const shares = { delivery: 0, commissioning: 0 };
    if (kind === "recoair") {
      const levelAbsorbers = level.areas.filter((candidate) => candidate.options.recoair !== undefined);
      for (const pool of POOL_TYPES) {
        if (policy.recoair[pool] !== "distributed") continue;
        shares[pool] += shareOfPool(poolMinor(area.sharedCosts, "recoair", pool), [area], area);
        shares[pool] += shareOfPool(poolMinor(level.sharedCosts, "recoair", pool), levelAbsorbers, area);
      }
    }
    return {
      kind,
      reference: area.name,
      model,
      basePrice,
      shares: { delivery: fromMinor(shares.delivery), commissioning: fromMinor(shares.commissioning) },
      price: fromMinor(toMinor(basePrice) + shares.delivery + shares.commissioning),
    };
  });
}

function summarizeArea(
  area: Area,
  level: Level,
  explicitCosts: ExplicitCostLine[],
  options: PricingOptions,
  policy: SharedCostPolicy,
  features: FeatureFlags
): AreaSummary {
  const levelItems = level.areas.flatMap((candidate) => candidate.items);
  const scopes: CostScope[] = [
    { siblings: area.items, pools: area.sharedCosts },
    { siblings: levelItems, pools: level.sharedCosts },
  ];
  const items = area.items.map((item) => priceItemInScopes(item, scopes, { ...options, policy, features }));
  const unitLines = areaLines(area, level, policy, features);

  const byKindMinor = zeroByKind();
  for (const line of [...items.flatMap((item) => item.lines), ...unitLines]) {
    byKindMinor[line.kind] += toMinor(line.price);
  }
  const subtotalsMinor = zeroByCategory();
  for (const kind of EQUIPMENT_KINDS) {
    subtotalsMinor[CATEGORY_BY_KIND[kind]] += byKindMinor[kind];
  }
  const explicitMinor = sumMinor(explicitCosts.map((line) => toMinor(line.amount)));
  const totalMinor = sumMinor(CATEGORIES.map((category) => subtotalsMinor[category])) + explicitMinor;

  const byKind = zeroByKind();
  for (const kind of EQUIPMENT_KINDS) byKind[kind] = fromMinor(byKindMinor[kind]);
  const subtotals = zeroByCategory();
  for (const category of CATEGORIES) subtotals[category] = fromMinor(subtotalsMinor[category]);

  return {
    level: level.name,
    area: area.name,
    items,
    areaLines: unitLines,
    byKind,
    subtotals,
    explicitCosts,
    total: fromMinor(totalMinor),
  };
}

/**
 * Folds the project tree into its pricing summary. Every total is summed in
 * pence from the same per-line values, so project, level and area totals
 * agree exactly.
 */
export function aggregate(project: Project, options: PricingOptions = {}): PricingSummary {
  const policy = options.policy ?? SHARED_COST_POLICY;
  const features = options.features ?? ALL_FEATURES_ENABLED;
  const anomalies: PricingAnomaly[] = [];

  const levels: LevelSummary[] = project.levels.map((level) => {
    const placement = placePools(level, policy, features);
    anomalies.push(...placement.anomalies);
    const areas = level.areas.map((area) =>
      summarizeArea(area, level, placement.explicitByArea.get(area) ?? [], options, policy, features)
    );
    return {
      name: level.name,
      areas,
      total: fromMinor(sumMinor(areas.map((area) => toMinor(area.total)))),
    };
  });

  const counts = zeroByKind();
  const totalsMinor = zeroByKind();
  for (const area of levels.flatMap((level) => level.areas)) {
    for (const line of [...area.items.flatMap((item) => item.lines), ...area.areaLines]) {
      counts[line.kind] += 1;
      totalsMinor[line.kind] += toMinor(line.price);
    }
  }
  const rollup = (kind: EquipmentKind): KindRollup => ({ count: counts[kind], total: fromMinor(totalsMinor[kind]) });
  const byKind: Record<EquipmentKind, KindRollup> = {
    canopy: rollup("canopy"),
    cladding: rollup("cladding"),
    fireSuppression: rollup("fireSuppression"),
    sdu: rollup("sdu"),
    uvc: rollup("uvc"),
    recoair: rollup("recoair"),
    reactaway: rollup("reactaway"),
  };

  return {
    levels,
    byKind,
    total: fromMinor(sumMinor(levels.map((level) => toMinor(level.total)))),
    anomalies,
  };
}

/** Flat list of every area summary, in project order. */
export function allAreaSummaries(summary: PricingSummary): AreaSummary[] {
  return summary.levels.flatMap((level) => level.areas);
}
