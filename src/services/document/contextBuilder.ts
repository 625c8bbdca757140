import type { Area, EquipmentKind, Item, Level, Project } from "../../types/project";
import type { AreaSummary, ItemPrice, PricingSummary, ResolvedSpec, SubtotalCategory } from "../../types/pricing";
import { formatMoney } from "../../utils/money";
import { initials } from "../../utils/text";
import { EQUIPMENT_KINDS } from "../pricing/aggregation";
import { resolveSpec } from "../pricing/pricingEngine";
import {
  BLANK,
  claddingDescription,
  dearLine,
  displayValue,
  lightingLabel,
  longDate,
  quoteReference,
  staticPressure,
  subjectLine,
  tankQuantity,
  volume,
} from "./formatters";

export interface ItemContext {
  reference: string;
  model: string;
  configuration: string;
  length: string;
  width: string;
  height: string;
  sections: string;
  lightingType: string;
  extractVolume: string;
  extractStatic: string;
  supplyVolume: string;
  supplyStatic: string;
  cwsCapacity: string;
  hwsRequirement: string;
  hwStorage: string;
  hasWashServices: boolean;
  hasWallCladding: boolean;
  hasFireSuppression: boolean;
  hasSdu: boolean;
  price: string;
}

export interface ExplicitCostContext {
  label: string;
  amount: string;
}

export interface AreaContext {
  level: string;
  name: string;
  levelAreaName: string;
  items: ItemContext[];
  hasUvc: boolean;
  hasRecoair: boolean;
  hasReactaway: boolean;
  recoairModel: string;
  subtotals: Record<SubtotalCategory, string>;
  explicitCosts: ExplicitCostContext[];
  total: string;
}

export interface LevelContext {
  name: string;
  areas: AreaContext[];
  total: string;
}

export interface KindSummaryContext {
  kind: EquipmentKind;
  label: string;
  count: number;
  total: string;
}

export interface CladdingContext {
  itemNumber: string;
  description: string;
  dimensions: string;
  positions: string;
  levelAreaName: string;
}

export interface FireSuppressionContext {
  itemNumber: string;
  systemDescription: string;
  systemType: string;
  manualRelease: string;
  tankQuantity: string;
  levelAreaName: string;
}

export interface DocumentContext {
  clientName: string;
  company: string;
  address: string;
  projectName: string;
  projectNumber: string;
  location: string;
  estimator: string;
  estimatorInitials: string;
  salesContact: string;
  deliveryLocation: string;
  date: string;
  quoteReference: string;
  revision: string;
  dearLine: string;
  subjectLine: string;

  levels: LevelContext[];
  areas: AreaContext[];
  items: Array<ItemContext & { levelAreaName: string }>;
  totalItems: number;
  wallCladdingItems: CladdingContext[];
  fireSuppressionItems: FireSuppressionContext[];
  kindSummary: KindSummaryContext[];

  hasCanopies: boolean;
  hasWallCladding: boolean;
  hasFireSuppression: boolean;
  hasSdu: boolean;
  hasUvc: boolean;
  hasRecoair: boolean;
  hasReactaway: boolean;

  grandTotal: string;
}

const KIND_LABELS: Record<EquipmentKind, string> = {
  canopy: "Canopies",
  cladding: "Wall cladding",
  fireSuppression: "Fire suppression",
  sdu: "Service distribution units",
  uvc: "UV-C systems",
  recoair: "RecoAir units",
  reactaway: "ReactAway units",
};

const POOL_LABELS = { delivery: "Delivery", commissioning: "Commissioning" } as const;

function itemContext(item: Item, spec: ResolvedSpec, price: ItemPrice | undefined): ItemContext {
  const washServices = [spec.cwsCapacity, spec.hwsRequirement, spec.hwStorage].some(
    (value) => displayValue(value) !== BLANK
  );
  return {
    reference: displayValue(item.reference),
    model: displayValue(item.model),
    configuration: displayValue(item.configuration),
    length: displayValue(item.spec.length),
    width: displayValue(item.spec.width),
    height: displayValue(item.spec.height),
    sections: displayValue(item.spec.sections),
    lightingType: lightingLabel(item.spec.lightingType),
    extractVolume: volume(spec.extractVolume),
    extractStatic: staticPressure(spec.extractStatic),
    supplyVolume: volume(spec.supplyVolume),
    supplyStatic: staticPressure(spec.supplyStatic),
    cwsCapacity: displayValue(spec.cwsCapacity),
    hwsRequirement: displayValue(spec.hwsRequirement),
    hwStorage: displayValue(spec.hwStorage),
    hasWashServices: washServices,
    hasWallCladding: item.options.wallCladding !== undefined,
    hasFireSuppression: item.options.fireSuppression !== undefined,
    hasSdu: item.options.sdu !== undefined,
    price: formatMoney(price?.total ?? 0),
  };
}

function areaContext(level: Level, area: Area, summary: AreaSummary | undefined): AreaContext {
  const levelAreaName = `${level.name} - ${area.name}`;
  const items = area.items.map((item, idx) => {
    const price = summary?.items[idx];
    const spec = price?.spec ?? resolveSpec(item).spec;
    return itemContext(item, spec, price);
  });
  const subtotals = summary?.subtotals ?? { mainUnits: 0, cladding: 0, fireSuppression: 0, ancillary: 0 };
  return {
    level: level.name,
    name: area.name,
    levelAreaName,
    items,
    hasUvc: area.options.uvc !== undefined,
    hasRecoair: area.options.recoair !== undefined,
    hasReactaway: area.options.reactaway !== undefined,
    recoairModel: displayValue(area.options.recoair?.model),
    subtotals: {
      mainUnits: formatMoney(subtotals.mainUnits),
      cladding: formatMoney(subtotals.cladding),
      fireSuppression: formatMoney(subtotals.fireSuppression),
      ancillary: formatMoney(subtotals.ancillary),
    },
    explicitCosts: (summary?.explicitCosts ?? []).map((cost) => ({
      label: `${KIND_LABELS[cost.kind]} ${POOL_LABELS[cost.pool].toLowerCase()}`,
      amount: formatMoney(cost.amount),
    })),
    total: formatMoney(summary?.total ?? 0),
  };
}

/**
 * Flattens a project and its pricing summary into the variables a quotation
 * template reads. Project-wide flags scan every area and item. Pure: the same
 * inputs always give an equal context.
 */
export function buildContext(project: Project, summary: PricingSummary): DocumentContext {
  const { meta } = project;
  const levels: LevelContext[] = project.levels.map((level, levelIdx) => {
    const levelSummary = summary.levels[levelIdx];
    return {
      name: level.name,
      areas: level.areas.map((area, areaIdx) => areaContext(level, area, levelSummary?.areas[areaIdx])),
      total: formatMoney(levelSummary?.total ?? 0),
    };
  });
  const areas = levels.flatMap((level) => level.areas);

  const wallCladdingItems: CladdingContext[] = [];
  const fireSuppressionItems: FireSuppressionContext[] = [];
  for (const level of project.levels) {
    for (const area of level.areas) {
      const levelAreaName = `${level.name} - ${area.name}`;
      for (const item of area.items) {
        const cladding = item.options.wallCladding;
        if (cladding) {
          wallCladdingItems.push({
            itemNumber: item.reference,
            description: claddingDescription(cladding.positions),
            dimensions:
              cladding.width !== null && cladding.height !== null ? `${cladding.width}X${cladding.height}` : BLANK,
            positions: cladding.positions.join("/"),
            levelAreaName,
          });
        }
        const suppression = item.options.fireSuppression;
        if (suppression) {
          fireSuppressionItems.push({
            itemNumber: item.reference,
            systemDescription: "Ansul R 102 System",
            systemType: displayValue(suppression.systemType),
            manualRelease: "1no station",
            tankQuantity: tankQuantity(suppression.tankQuantity),
            levelAreaName,
          });
        }
      }
    }
  }

  const allItems = project.levels.flatMap((level) => level.areas.flatMap((area) => area.items));
  const allAreas = project.levels.flatMap((level) => level.areas);

  return {
    clientName: displayValue(meta.customer),
    company: displayValue(meta.company),
    address: displayValue(meta.address),
    projectName: displayValue(meta.projectName),
    projectNumber: displayValue(meta.projectNumber),
    location: displayValue(meta.location),
    estimator: displayValue(meta.estimator),
    estimatorInitials: displayValue(initials(meta.estimator)),
    salesContact: displayValue(meta.salesContact),
    deliveryLocation: displayValue(meta.deliveryLocation),
    date: longDate(meta.date),
    quoteReference: quoteReference(meta.projectNumber, meta.date),
    revision: meta.revision,
    dearLine: dearLine(meta.customer),
    subjectLine: subjectLine(meta.projectName, meta.location),

    levels,
    areas,
    items: areas.flatMap((area) => area.items.map((item) => ({ ...item, levelAreaName: area.levelAreaName }))),
    totalItems: allItems.length,
    wallCladdingItems,
    fireSuppressionItems,
    kindSummary: EQUIPMENT_KINDS.filter((kind) => summary.byKind[kind].count > 0).map((kind) => ({
      kind,
      label: KIND_LABELS[kind],
      count: summary.byKind[kind].count,
      total: formatMoney(summary.byKind[kind].total),
    })),

    hasCanopies: allItems.length > 0,
    hasWallCladding: allItems.some((item) => item.options.wallCladding !== undefined),
    hasFireSuppression: allItems.some((item) => item.options.fireSuppression !== undefined),
    hasSdu: allItems.some((item) => item.options.sdu !== undefined),
    hasUvc: allAreas.some((area) => area.options.uvc !== undefined),
    hasRecoair: allAreas.some((area) => area.options.recoair !== undefined),
    hasReactaway: allAreas.some((area) => area.options.reactaway !== undefined),

    grandTotal: formatMoney(summary.total),
  };
}
