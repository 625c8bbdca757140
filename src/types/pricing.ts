import type { EquipmentKind, PooledKind, PoolType } from "./project";

export const NOT_APPLICABLE = "n/a" as const;
export type NotApplicable = typeof NOT_APPLICABLE;

export type SpecField =
  | "extractVolume"
  | "extractStatic"
  | "supplyVolume"
  | "supplyStatic"
  | "cwsCapacity"
  | "hwsRequirement"
  | "hwStorage";

export type ResolvedSpecValue = string | number | null | NotApplicable;

export type ResolvedSpec = Record<SpecField, ResolvedSpecValue>;

export type SubtotalCategory = "mainUnits" | "cladding" | "fireSuppression" | "ancillary";

export type PoolScope = "area" | "level";

export type AnomalySeverity = "info" | "warning";

export interface PricingAnomaly {
  severity: AnomalySeverity;
  rule: string;
  message: string;
  level?: string;
  area?: string;
  item?: string;
}

/** One priced line: an item's main unit, or one of its satellite units. */
export interface LinePrice {
  kind: EquipmentKind;
  /** Item reference, or the area name for area-scoped units. */
  reference: string;
  model: string;
  basePrice: number;
  shares: Record<PoolType, number>;
  price: number;
}

export interface ItemPrice {
  reference: string;
  model: string;
  spec: ResolvedSpec;
  /** Rules from the model-exception table that matched this item. */
  exceptionRules: string[];
  lines: LinePrice[];
  total: number;
}

export interface ExplicitCostLine {
  kind: PooledKind;
  pool: PoolType;
  scope: PoolScope;
  amount: number;
}

export interface AreaSummary {
  level: string;
  area: string;
  items: ItemPrice[];
  /** Area-scoped units that do not belong to any single item. */
  areaLines: LinePrice[];
  byKind: Record<EquipmentKind, number>;
  subtotals: Record<SubtotalCategory, number>;
  explicitCosts: ExplicitCostLine[];
  total: number;
}

export interface LevelSummary {
  name: string;
  areas: AreaSummary[];
  total: number;
}

export interface KindRollup {
  count: number;
  total: number;
}

export interface PricingSummary {
  levels: LevelSummary[];
  byKind: Record<EquipmentKind, KindRollup>;
  total: number;
  anomalies: PricingAnomaly[];
}
