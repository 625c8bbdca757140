export type EquipmentKind =
  | "canopy"
  | "cladding"
  | "fireSuppression"
  | "sdu"
  | "uvc"
  | "recoair"
  | "reactaway";

/** Kinds that can carry a delivery/commissioning pool. */
export type PooledKind = "canopy" | "fireSuppression" | "recoair";

export type PoolType = "delivery" | "commissioning";

export type ItemFeature = "fireSuppression" | "sdu" | "wallCladding";

export type AreaFeature = "uvc" | "recoair" | "reactaway";

export type SharedCostPools = Partial<Record<PooledKind, Partial<Record<PoolType, number>>>>;

export interface ProjectMeta {
  projectNumber: string;
  projectName: string;
  customer: string;
  company?: string;
  address?: string;
  location?: string;
  estimator?: string;
  salesContact?: string;
  deliveryLocation?: string;
  /** DD/MM/YYYY */
  date: string;
  /** "" before the first revision, then "A", "B", ... */
  revision: string;
}

export interface FireSuppressionUnit {
  basePrice: number;
  systemType?: string;
  /** null when the tank count has not been decided yet */
  tankQuantity: number | null;
}

export interface SduUnit {
  basePrice: number;
}

export interface WallCladding {
  price: number;
  width: number | null;
  height: number | null;
  positions: string[];
}

export interface ItemOptions {
  fireSuppression?: FireSuppressionUnit;
  sdu?: SduUnit;
  wallCladding?: WallCladding;
}

/** Presentation-only fields; none of these feed pricing. */
export interface ItemSpec {
  length?: number | null;
  width?: number | null;
  height?: number | null;
  sections?: number | null;
  lightingType?: string | null;
  extractVolume?: number | null;
  extractStatic?: string | number | null;
  supplyVolume?: number | null;
  supplyStatic?: string | number | null;
  cwsCapacity?: string | number | null;
  hwsRequirement?: string | number | null;
  hwStorage?: string | number | null;
}

export interface Item {
  reference: string;
  model: string;
  configuration?: string;
  basePrice: number;
  options: ItemOptions;
  spec: ItemSpec;
}

export interface UvcSystem {
  price: number;
}

export interface RecoAirUnit {
  model?: string;
  price: number;
}

export interface ReactAwayUnit {
  price: number;
}

export interface AreaOptions {
  uvc?: UvcSystem;
  recoair?: RecoAirUnit;
  reactaway?: ReactAwayUnit;
}

export interface Area {
  name: string;
  options: AreaOptions;
  items: Item[];
  sharedCosts: SharedCostPools;
}

export interface Level {
  name: string;
  areas: Area[];
  sharedCosts: SharedCostPools;
}

export interface Project {
  meta: ProjectMeta;
  levels: Level[];
}

export const ITEM_FEATURES: ItemFeature[] = ["fireSuppression", "sdu", "wallCladding"];

export const AREA_FEATURES: AreaFeature[] = ["uvc", "recoair", "reactaway"];

export function hasItemFeature(item: Item, feature: ItemFeature): boolean {
  return item.options[feature] !== undefined;
}

export function hasAreaFeature(area: Area, feature: AreaFeature): boolean {
  return area.options[feature] !== undefined;
}
