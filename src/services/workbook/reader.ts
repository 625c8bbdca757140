import * as XLSX from "xlsx";
import { ALL_FEATURES_ENABLED, type FeatureFlags } from "../../config/features";
import {
  AREA_FEATURES,
  ITEM_FEATURES,
  type Area,
  type AreaFeature,
  type Item,
  type ItemFeature,
  type ItemSpec,
  type Level,
  type PooledKind,
  type PoolType,
  type Project,
  type ProjectMeta,
  type SharedCostPools,
} from "../../types/project";
import type { PricingSummary } from "../../types/pricing";
import { WorkbookReadError } from "../../utils/errors";
import { fromMinor, sumMinor, toMinor } from "../../utils/money";
import { aggregate } from "../pricing/aggregation";
import type { PricingOptions } from "../pricing/pricingEngine";
import { POOL_TYPES, SHARED_COST_POLICY } from "../pricing/sharedCosts";
import { readPrice, readQuantity, readSpecValue, readText } from "./cells";
import {
  blockCells,
  blockRow,
  BLOCKS_PER_SHEET,
  CLADDING_MARKER,
  JOB_TOTAL_SHEET,
  kindOfPlacedSheet,
  LISTS_SHEET,
  META_CELLS,
  POOL_CELLS,
  PROJECT_DATA_SHEET,
  SHEET_KINDS,
  SHEET_TITLE,
  type SheetKind,
} from "./layout";
import { parseProjectData, type FlagSnapshotArea, type ProjectDataSnapshot } from "./projectData";
import { matchReference } from "./referenceMatch";

export interface SkippedSheet {
  sheet: string;
  reason: string;
}

export interface UnmatchedReference {
  sheet: string;
  reference: string;
}

export interface ReadReport {
  skippedSheets: SkippedSheet[];
  unmatchedReferences: UnmatchedReference[];
  warnings: string[];
  /** Where the feature flags came from. */
  flagSource: "projectData" | "inferred";
}

export interface ReadResult {
  project: Project;
  summary: PricingSummary;
  report: ReadReport;
}

interface BlockRead {
  reference: string;
  model: string;
  basePrice: number;
  share: number;
  configuration: string;
  spec: ItemSpec;
  cladding: { price: number; width: number | null; height: number | null; positions: string[] } | null;
  systemType: string;
  tankQuantity: number | null;
}

interface SheetRead {
  name: string;
  kind: SheetKind;
  levelName: string;
  areaName: string;
  blocks: BlockRead[];
  explicit: Record<PoolType, number>;
  distributed: Record<PoolType, number>;
}

interface AreaDraft {
  levelIndex: number;
  name: string;
  sheets: SheetRead[];
  snapshot: FlagSnapshotArea | null;
}

interface LevelDraft {
  name: string;
  areas: AreaDraft[];
}

function isHidden(workbook: XLSX.WorkBook, index: number): boolean {
  const hidden = workbook.Workbook?.Sheets?.[index]?.Hidden;
  return hidden === 1 || hidden === 2;
}

/** Placed sheets are recognised by name, or by the title cell when a user renamed the tab. */
function sheetKind(name: string, sheet: XLSX.WorkSheet): SheetKind | null {
  const byName = kindOfPlacedSheet(name);
  if (byName) return byName;
  const title = readText(sheet, META_CELLS.title).toUpperCase();
  return SHEET_KINDS.find((kind) => SHEET_TITLE[kind] === title) ?? null;
}

function parseTank(raw: string): number | null {
  const match = /(\d+)/.exec(raw);
  return match ? Number(match[1]) : null;
}

function parseCladdingSize(raw: string): { width: number | null; height: number | null } {
  const match = /^\s*(\d+(?:\.\d+)?)\s*[xX×]\s*(\d+(?:\.\d+)?)\s*$/.exec(raw);
  if (!match) return { width: null, height: null };
  return { width: Number(match[1]), height: Number(match[2]) };
}

function readBlock(sheet: XLSX.WorkSheet, kind: SheetKind, r: number): BlockRead | null {
  const cells = blockCells(r);
  const reference = readText(sheet, cells.reference);
  const model = readText(sheet, cells.model);
  if (!reference && !model) return null;

  const block: BlockRead = {
    reference,
    model,
    basePrice: readPrice(sheet, cells.basePrice),
    share: readPrice(sheet, cells.share),
    configuration: "",
    spec: {},
    cladding: null,
    systemType: "",
    tankQuantity: null,
  };

  if (kind === "canopy") {
    block.configuration = readText(sheet, cells.configuration);
    const lighting = readText(sheet, cells.lighting);
    block.spec = {
      length: readQuantity(sheet, cells.length),
      width: readQuantity(sheet, cells.width),
      height: readQuantity(sheet, cells.height),
      sections: readQuantity(sheet, cells.sections),
      lightingType: lighting || null,
      extractVolume: readQuantity(sheet, cells.extractVolume),
      extractStatic: readSpecValue(sheet, cells.extractStatic),
      supplyVolume: readQuantity(sheet, cells.supplyVolume),
      supplyStatic: readSpecValue(sheet, cells.supplyStatic),
      cwsCapacity: readSpecValue(sheet, cells.cwsCapacity),
      hwsRequirement: readSpecValue(sheet, cells.hwsRequirement),
      hwStorage: readSpecValue(sheet, cells.hwStorage),
    };
    const marker = readText(sheet, cells.claddingMarker);
    const claddingPrice = readPrice(sheet, cells.claddingPrice);
    if (marker === CLADDING_MARKER || claddingPrice > 0) {
      const positions = readText(sheet, cells.claddingPositions)
        .split("/")
        .map((position) => position.trim())
        .filter(Boolean);
      block.cladding = { price: claddingPrice, ...parseCladdingSize(readText(sheet, cells.claddingSize)), positions };
    }
  } else if (kind === "fireSuppression") {
    block.systemType = readText(sheet, cells.systemType);
    block.tankQuantity = parseTank(readText(sheet, cells.tank));
  }
  return block;
}

function readSheet(name: string, sheet: XLSX.WorkSheet, kind: SheetKind): SheetRead {
  const levelName = readText(sheet, META_CELLS.level);
  const areaName = readText(sheet, META_CELLS.area);
  if (!levelName || !areaName) {
    throw new Error("level or area cell is blank");
  }
  const blocks: BlockRead[] = [];
  const blockCount = kind === "canopy" || kind === "fireSuppression" ? BLOCKS_PER_SHEET : 1;
  for (let idx = 0; idx < blockCount; idx += 1) {
    const block = readBlock(sheet, kind, blockRow(idx));
    if (block) blocks.push(block);
  }
  return {
    name,
    kind,
    levelName,
    areaName,
    blocks,
    explicit: {
      delivery: readPrice(sheet, POOL_CELLS.delivery),
      commissioning: readPrice(sheet, POOL_CELLS.commissioning),
    },
    distributed: {
      delivery: readPrice(sheet, POOL_CELLS.distributedDelivery),
      commissioning: readPrice(sheet, POOL_CELLS.distributedCommissioning),
    },
  };
}

function readMetaFromSheet(sheet: XLSX.WorkSheet): Partial<Record<keyof ProjectMeta, string>> {
  return {
    projectNumber: readText(sheet, META_CELLS.projectNumber),
    customer: readText(sheet, META_CELLS.customer),
    estimator: readText(sheet, META_CELLS.estimator),
    projectName: readText(sheet, META_CELLS.projectName),
    location: readText(sheet, META_CELLS.location),
    date: readText(sheet, META_CELLS.date),
    revision: readText(sheet, META_CELLS.revision),
    deliveryLocation: readText(sheet, META_CELLS.deliveryLocation),
  };
}

function buildMeta(raw: Partial<Record<keyof ProjectMeta, string>>, warnings: string[]): ProjectMeta {
  const required = (key: "projectNumber" | "projectName" | "customer" | "date"): string => {
    const value = raw[key] ?? "";
    if (!value) warnings.push(`Project ${key} is blank in the workbook`);
    return value;
  };
  const optional = (key: keyof ProjectMeta): string | undefined => raw[key] || undefined;
  return {
    projectNumber: required("projectNumber"),
    projectName: required("projectName"),
    customer: required("customer"),
    company: optional("company"),
    address: optional("address"),
    location: optional("location"),
    estimator: optional("estimator"),
    salesContact: optional("salesContact"),
    deliveryLocation: optional("deliveryLocation"),
    date: required("date"),
    revision: (raw.revision ?? "").toUpperCase(),
  };
}

/** Groups readable sheets into levels and areas, following the snapshot when there is one. */
function draftLevels(sheets: SheetRead[], snapshot: ProjectDataSnapshot | null, report: ReadReport): LevelDraft[] {
  if (!snapshot) {
    const levels: LevelDraft[] = [];
    for (const sheet of sheets) {
      let levelIndex = levels.findIndex((level) => level.name === sheet.levelName);
      if (levelIndex < 0) {
        levels.push({ name: sheet.levelName, areas: [] });
        levelIndex = levels.length - 1;
      }
      const level = levels[levelIndex];
      let area = level.areas.find((candidate) => candidate.name === sheet.areaName);
      if (!area) {
        area = { levelIndex, name: sheet.areaName, sheets: [], snapshot: null };
        level.areas.push(area);
      }
      area.sheets.push(sheet);
    }
    return levels;
  }

  const levels: LevelDraft[] = snapshot.levels.map((level, levelIndex) => ({
    name: level.name,
    areas: level.areas.map((area) => ({ levelIndex, name: area.name, sheets: [], snapshot: area })),
  }));
  for (const sheet of sheets) {
    const record = snapshot.sheets.find((candidate) => candidate.name === sheet.name);
    let target: AreaDraft | undefined = record ? levels[record.levelIndex]?.areas[record.areaIndex] : undefined;
    if (!target) {
      target = levels
        .find((level) => level.name === sheet.levelName)
        ?.areas.find((area) => area.name === sheet.areaName);
    }
    if (!target) {
      report.skippedSheets.push({ sheet: sheet.name, reason: "sheet does not belong to any known area" });
      continue;
    }
    target.sheets.push(sheet);
  }
  // Names typed on the sheets win over the stored ones.
  for (const level of levels) {
    const first = level.areas.flatMap((area) => area.sheets)[0];
    if (first) level.name = first.levelName;
    for (const area of level.areas) {
      if (area.sheets[0]) area.name = area.sheets[0].areaName;
    }
  }
  return levels;
}

function addPool(pools: SharedCostPools, kind: PooledKind, pool: PoolType, amount: number): void {
  if (amount === 0) return;
  const current = pools[kind] ?? {};
  current[pool] = fromMinor(toMinor(current[pool] ?? 0) + toMinor(amount));
  pools[kind] = current;
}

function isPooledSheetKind(kind: SheetKind): kind is PooledKind {
  return kind === "canopy" || kind === "fireSuppression" || kind === "recoair";
}

/** Pools of a foreign workbook, rebuilt from the explicit rows and the shares folded into unit prices. */
function inferAreaPools(area: AreaDraft): SharedCostPools {
  const pools: SharedCostPools = {};
  for (const sheet of area.sheets) {
    const kind = sheet.kind;
    if (!isPooledSheetKind(kind)) continue;
    const policy = SHARED_COST_POLICY[kind];
    const distributedPools = POOL_TYPES.filter((pool) => policy[pool] === "distributed");
    for (const pool of POOL_TYPES) {
      if (policy[pool] === "explicit") addPool(pools, kind, pool, sheet.explicit[pool]);
    }
    if (distributedPools.length === 1) {
      const shares = fromMinor(sumMinor(sheet.blocks.map((block) => toMinor(block.share))));
      addPool(pools, kind, distributedPools[0], shares);
    } else {
      distributedPools.forEach((pool) => addPool(pools, kind, pool, sheet.distributed[pool]));
    }
  }
  return pools;
}

interface AreaBuild {
  area: Area;
  /** Flags the visible sheets imply, for comparison with the stored ones. */
  inferredItemFlags: Map<Item, Set<ItemFeature>>;
  inferredAreaFlags: Set<AreaFeature>;
}

function buildArea(draft: AreaDraft, report: ReadReport): AreaBuild {
  const canopySheets = draft.sheets.filter((sheet) => sheet.kind === "canopy");
  const inferredItemFlags = new Map<Item, Set<ItemFeature>>();
  const inferredAreaFlags = new Set<AreaFeature>();

  const items: Item[] = draft.snapshot
    ? draft.snapshot.items.map((stored) => ({ reference: stored.reference, model: stored.model, basePrice: 0, options: {}, spec: {} }))
    : canopySheets.flatMap((sheet) =>
        sheet.blocks.map((block) => ({ reference: block.reference, model: block.model, basePrice: 0, options: {}, spec: {} }))
      );
  items.forEach((item) => inferredItemFlags.set(item, new Set()));
  const references = items.map((item) => item.reference);

  const locate = (sheet: SheetRead, reference: string): Item | null => {
    const idx = matchReference(reference, references);
    if (idx < 0) {
      report.unmatchedReferences.push({ sheet: sheet.name, reference });
      return null;
    }
    return items[idx];
  };

  const area: Area = { name: draft.name, options: {}, items, sharedCosts: {} };
  for (const sheet of draft.sheets) {
    switch (sheet.kind) {
      case "canopy":
        for (const block of sheet.blocks) {
          const item = locate(sheet, block.reference);
          if (!item) continue;
          item.model = item.model || block.model;
          item.basePrice = block.basePrice;
          if (block.configuration) item.configuration = block.configuration;
          item.spec = block.spec;
          if (block.cladding) {
            item.options.wallCladding = block.cladding;
            inferredItemFlags.get(item)?.add("wallCladding");
          }
        }
        break;
      case "fireSuppression":
        for (const block of sheet.blocks) {
          const item = locate(sheet, block.reference);
          if (!item) continue;
          item.options.fireSuppression = {
            basePrice: block.basePrice,
            ...(block.systemType ? { systemType: block.systemType } : {}),
            tankQuantity: block.tankQuantity,
          };
          inferredItemFlags.get(item)?.add("fireSuppression");
        }
        break;
      case "sdu":
        for (const block of sheet.blocks) {
          const item = locate(sheet, block.reference);
          if (!item) continue;
          item.options.sdu = { basePrice: block.basePrice };
          inferredItemFlags.get(item)?.add("sdu");
        }
        break;
      case "uvc":
        area.options.uvc = { price: sheet.blocks[0]?.basePrice ?? 0 };
        inferredAreaFlags.add("uvc");
        break;
      case "recoair": {
        const block = sheet.blocks[0];
        area.options.recoair = { price: block?.basePrice ?? 0, ...(block?.model ? { model: block.model } : {}) };
        inferredAreaFlags.add("recoair");
        break;
      }
      case "reactaway":
        area.options.reactaway = { price: sheet.blocks[0]?.basePrice ?? 0 };
        inferredAreaFlags.add("reactaway");
        break;
    }
  }
  if (!draft.snapshot) area.sharedCosts = inferAreaPools(draft);
  return { area, inferredItemFlags, inferredAreaFlags };
}

/**
 * Stored flags win. A stored flag without a sheet gets a zero-priced unit; a
 * sheet without a stored flag is dropped. Both are reported.
 */
function applyStoredFlags(build: AreaBuild, stored: FlagSnapshotArea, features: FeatureFlags, report: ReadReport): void {
  const { area } = build;
  const where = `area '${area.name}'`;
  for (const feature of AREA_FEATURES) {
    if (!features.isEnabled(feature)) continue;
    const wanted = stored.flags.includes(feature);
    const seen = build.inferredAreaFlags.has(feature);
    if (wanted === seen) continue;
    report.warnings.push(
      wanted
        ? `Stored flags give ${where} ${feature} but no ${feature} sheet was found`
        : `${where} has a ${feature} sheet that the stored flags do not list`
    );
    if (wanted) area.options[feature] = { price: 0 };
    else delete area.options[feature];
  }

  area.items.forEach((item, idx) => {
    const flags = stored.items[idx]?.flags ?? [];
    const seen = build.inferredItemFlags.get(item) ?? new Set<ItemFeature>();
    for (const feature of ITEM_FEATURES) {
      const kind = feature === "wallCladding" ? "cladding" : feature;
      if (!features.isEnabled(kind)) continue;
      const wanted = flags.includes(feature);
      if (wanted === seen.has(feature)) continue;
      report.warnings.push(
        wanted
          ? `Stored flags give item '${item.reference}' ${feature} but its sheets do not show it`
          : `Item '${item.reference}' shows ${feature} on its sheets but the stored flags do not list it`
      );
      if (!wanted) {
        delete item.options[feature];
      } else if (feature === "fireSuppression") {
        item.options.fireSuppression = { basePrice: 0, tankQuantity: null };
      } else if (feature === "sdu") {
        item.options.sdu = { basePrice: 0 };
      } else {
        item.options.wallCladding = { price: 0, width: null, height: null, positions: [] };
      }
    }
  });
}

function applyStoredPools(levels: Level[], snapshot: ProjectDataSnapshot, report: ReadReport): void {
  for (const record of snapshot.pools) {
    const level = levels[record.levelIndex];
    const target = record.scope === "level" ? level : record.areaIndex !== null ? level?.areas[record.areaIndex] : undefined;
    if (!target) {
      report.warnings.push(`Stored ${record.kind} ${record.pool} pool points at a missing ${record.scope}`);
      continue;
    }
    addPool(target.sharedCosts, record.kind, record.pool, record.amount);
  }
}

function cachedGrandTotal(workbook: XLSX.WorkBook): number | null {
  const sheet = workbook.Sheets[JOB_TOTAL_SHEET];
  if (!sheet) return null;
  for (let row = 4; row < 4 + 1000; row += 1) {
    const label = readText(sheet, `A${row}`);
    if (label.toUpperCase() === "GRAND TOTAL") return readQuantity(sheet, `D${row}`);
    if (!label) return null;
  }
  return null;
}

/**
 * Rebuilds a project from cost-sheet bytes. Feature flags come from the
 * hidden ProjectData sheet when present, otherwise from which satellite
 * sheets are visible. Sheets that cannot be read are skipped and reported.
 */
export function readCostSheet(bytes: Buffer, options: PricingOptions = {}): ReadResult {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: "buffer" });
  } catch (error) {
    throw new WorkbookReadError(`Workbook could not be opened: ${error instanceof Error ? error.message : String(error)}`);
  }
  const features = options.features ?? ALL_FEATURES_ENABLED;
  const report: ReadReport = { skippedSheets: [], unmatchedReferences: [], warnings: [], flagSource: "inferred" };

  const sheets: SheetRead[] = [];
  const metaSheets: XLSX.WorkSheet[] = [];
  workbook.SheetNames.forEach((name, index) => {
    if (isHidden(workbook, index) || name === JOB_TOTAL_SHEET || name === LISTS_SHEET || name === PROJECT_DATA_SHEET) {
      return;
    }
    const sheet = workbook.Sheets[name];
    const kind = sheet ? sheetKind(name, sheet) : null;
    if (!sheet || !kind) {
      report.skippedSheets.push({ sheet: name, reason: "not a cost sheet" });
      return;
    }
    try {
      sheets.push(readSheet(name, sheet, kind));
      metaSheets.push(sheet);
    } catch (error) {
      report.skippedSheets.push({ sheet: name, reason: error instanceof Error ? error.message : String(error) });
    }
  });

  const dataSheet = workbook.Sheets[PROJECT_DATA_SHEET];
  const snapshot = dataSheet ? parseProjectData(dataSheet) : null;
  if (!snapshot && sheets.length === 0) {
    throw new WorkbookReadError("Workbook has no readable cost sheets", { sheets: workbook.SheetNames });
  }
  if (snapshot) {
    report.flagSource = "projectData";
    report.warnings.push(...snapshot.warnings);
  }

  const rawMeta = snapshot ? snapshot.meta : metaSheets[0] ? readMetaFromSheet(metaSheets[0]) : {};
  const meta = buildMeta(rawMeta, report.warnings);

  const drafts = draftLevels(sheets, snapshot, report);
  const levels: Level[] = drafts.map((draft) => ({
    name: draft.name,
    sharedCosts: {},
    areas: draft.areas.map((areaDraft) => {
      const build = buildArea(areaDraft, report);
      if (areaDraft.snapshot) applyStoredFlags(build, areaDraft.snapshot, features, report);
      return build.area;
    }),
  }));
  if (snapshot) applyStoredPools(levels, snapshot, report);

  const project: Project = { meta, levels };
  const summary = aggregate(project, options);

  const cached = cachedGrandTotal(workbook);
  if (cached !== null && toMinor(cached) !== toMinor(summary.total)) {
    report.warnings.push(`JOB TOTAL shows ${cached} but the sheets add up to ${summary.total}`);
  }

  if (report.skippedSheets.length > 0 || report.unmatchedReferences.length > 0 || report.warnings.length > 0) {
    console.warn("[Reader] workbook read with issues", {
      project: meta.projectNumber,
      skipped: report.skippedSheets.length,
      unmatched: report.unmatchedReferences.length,
      warnings: report.warnings.length,
    });
  }
  return { project, summary, report };
}
