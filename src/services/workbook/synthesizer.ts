import fs from "fs/promises";
import ExcelJS from "exceljs";
import { ALL_FEATURES_ENABLED } from "../../config/features";
import type { Area, Item, Level, Project } from "../../types/project";
import type { AreaSummary, ItemPrice, LinePrice, PricingSummary } from "../../types/pricing";
import { AreaCapacityError, WorkbookIntegrityError } from "../../utils/errors";
import { withTempFile } from "../../utils/fs";
import { fromMinor, sumMinor, toMinor } from "../../utils/money";
import { initials } from "../../utils/text";
import { aggregate } from "../pricing/aggregation";
import type { PricingOptions } from "../pricing/pricingEngine";
import { poolAmount, SHARED_COST_POLICY } from "../pricing/sharedCosts";
import { applyDropdowns, loadDropdownLists, writeListsSheet, type DropdownLists } from "./dropdowns";
import {
  blockCells,
  blockRow,
  BLOCKS_PER_SHEET,
  CLADDING_MARKER,
  JOB_TOTAL_SHEET,
  LISTS_SHEET,
  META_CELLS,
  parsePoolSheetName,
  placedSheetName,
  POOL_CELLS,
  PROJECT_DATA_SHEET,
  sheetRef,
  SHEET_TITLE,
  tabColorFor,
  uniqueSheetName,
  type SheetKind,
} from "./layout";
import { writeProjectData, type PlacedSheetRecord } from "./projectData";
import { SheetPool } from "./sheetPool";
import { openPoolTemplate, type TemplateOptions } from "./templateWorkbook";

export interface SynthesisOptions extends PricingOptions, TemplateOptions {
  /** Reuse an already computed summary instead of aggregating again. */
  summary?: PricingSummary;
  lists?: DropdownLists;
}

export interface SynthesizedWorkbook {
  workbook: ExcelJS.Workbook;
  summary: PricingSummary;
  sheets: PlacedSheetRecord[];
}

interface Placement {
  kind: SheetKind;
  levelIndex: number;
  areaIndex: number;
  areaNumber: number;
  level: Level;
  area: Area;
  areaSummary: AreaSummary;
  /** Set on item-scoped sheets. */
  item?: Item;
  itemPrice?: ItemPrice;
}

const PRICE_FORMAT = "#,##0.00";

/** Which satellite sheets an area needs, in tab order. */
function planArea(
  level: Level,
  area: Area,
  areaSummary: AreaSummary,
  position: { levelIndex: number; areaIndex: number; areaNumber: number },
  options: PricingOptions
): Placement[] {
  const features = options.features ?? ALL_FEATURES_ENABLED;
  const base = { ...position, level, area, areaSummary };
  const plan: Placement[] = [];

  if (area.items.length > BLOCKS_PER_SHEET) {
    throw new AreaCapacityError({
      level: level.name,
      area: area.name,
      capacity: BLOCKS_PER_SHEET,
      requested: area.items.length,
    });
  }
  if (area.items.length > 0) plan.push({ ...base, kind: "canopy" });
  if (features.isEnabled("fireSuppression") && area.items.some((item) => item.options.fireSuppression)) {
    plan.push({ ...base, kind: "fireSuppression" });
  }
  if (features.isEnabled("sdu")) {
    area.items.forEach((item, idx) => {
      if (item.options.sdu) plan.push({ ...base, kind: "sdu", item, itemPrice: areaSummary.items[idx] });
    });
  }
  if (area.options.uvc && features.isEnabled("uvc")) plan.push({ ...base, kind: "uvc" });
  if (area.options.recoair && features.isEnabled("recoair")) plan.push({ ...base, kind: "recoair" });
  if (area.options.reactaway && features.isEnabled("reactaway")) plan.push({ ...base, kind: "reactaway" });
  return plan;
}

function lineOf(itemPrice: ItemPrice | undefined, kind: LinePrice["kind"]): LinePrice | undefined {
  return itemPrice?.lines.find((line) => line.kind === kind);
}

function setPrice(sheet: ExcelJS.Worksheet, address: string, value: number): void {
  const cell = sheet.getCell(address);
  cell.value = value;
  cell.numFmt = PRICE_FORMAT;
}

/** Writes base, distributed share and the unit-price formula of one line; returns the line price. */
function writeLine(sheet: ExcelJS.Worksheet, r: number, line: LinePrice): number {
  const cells = blockCells(r);
  setPrice(sheet, cells.basePrice, line.basePrice);
  setPrice(sheet, cells.share, fromMinor(toMinor(line.shares.delivery) + toMinor(line.shares.commissioning)));
  const price = sheet.getCell(cells.price);
  price.value = { formula: `${cells.basePrice}+${cells.share}`, result: line.price };
  price.numFmt = PRICE_FORMAT;
  return line.price;
}

function writeMeta(sheet: ExcelJS.Worksheet, kind: SheetKind, project: Project, placement: Placement): void {
  const { meta } = project;
  const values: Array<[string, string]> = [
    [META_CELLS.title, SHEET_TITLE[kind]],
    [META_CELLS.projectNumber, meta.projectNumber],
    [META_CELLS.customer, meta.customer],
    [META_CELLS.estimator, initials(meta.estimator)],
    [META_CELLS.projectName, meta.projectName],
    [META_CELLS.location, meta.location ?? ""],
    [META_CELLS.date, meta.date],
    [META_CELLS.revision, meta.revision],
    [META_CELLS.level, placement.level.name],
    [META_CELLS.area, placement.area.name],
    [META_CELLS.deliveryLocation, meta.deliveryLocation ?? ""],
  ];
  for (const [address, value] of values) {
    sheet.getCell(address).value = value;
  }
}

function writeCanopyBlocks(sheet: ExcelJS.Worksheet, placement: Placement): number[] {
  const prices: number[] = [];
  placement.area.items.forEach((item, idx) => {
    const r = blockRow(idx);
    const cells = blockCells(r);
    const itemPrice = placement.areaSummary.items[idx];
    const { spec } = item;
    sheet.getCell(cells.reference).value = item.reference;
    sheet.getCell(cells.configuration).value = item.configuration ?? null;
    sheet.getCell(cells.model).value = item.model;
    sheet.getCell(cells.length).value = spec.length ?? null;
    sheet.getCell(cells.width).value = spec.width ?? null;
    sheet.getCell(cells.height).value = spec.height ?? null;
    sheet.getCell(cells.sections).value = spec.sections ?? null;
    sheet.getCell(cells.extractVolume).value = spec.extractVolume ?? null;
    sheet.getCell(cells.supplyVolume).value = spec.supplyVolume ?? null;
    sheet.getCell(cells.supplyStatic).value = spec.supplyStatic ?? null;
    sheet.getCell(cells.lighting).value = spec.lightingType ?? null;
    sheet.getCell(cells.extractStatic).value = spec.extractStatic ?? null;
    sheet.getCell(cells.cwsCapacity).value = spec.cwsCapacity ?? null;
    sheet.getCell(cells.hwsRequirement).value = spec.hwsRequirement ?? null;
    sheet.getCell(cells.hwStorage).value = spec.hwStorage ?? null;

    const canopyLine = lineOf(itemPrice, "canopy");
    if (canopyLine) prices.push(writeLine(sheet, r, canopyLine));

    const claddingLine = lineOf(itemPrice, "cladding");
    const cladding = item.options.wallCladding;
    if (cladding && claddingLine) {
      setPrice(sheet, cells.claddingPrice, claddingLine.basePrice);
      const linePrice = sheet.getCell(cells.claddingLinePrice);
      linePrice.value = { formula: cells.claddingPrice, result: claddingLine.price };
      linePrice.numFmt = PRICE_FORMAT;
      sheet.getCell(cells.claddingMarker).value = CLADDING_MARKER;
      sheet.getCell(cells.claddingSize).value =
        cladding.width !== null && cladding.height !== null ? `${cladding.width}x${cladding.height}` : null;
      sheet.getCell(cells.claddingPositions).value = cladding.positions.join("/");
      prices.push(claddingLine.price);
    }
  });
  return prices;
}

function writeFireSuppressionBlocks(sheet: ExcelJS.Worksheet, placement: Placement): number[] {
  const prices: number[] = [];
  let block = 0;
  placement.area.items.forEach((item, idx) => {
    const unit = item.options.fireSuppression;
    const line = lineOf(placement.areaSummary.items[idx], "fireSuppression");
    if (!unit || !line) return;
    const r = blockRow(block);
    const cells = blockCells(r);
    sheet.getCell(cells.reference).value = item.reference;
    sheet.getCell(cells.model).value = item.model;
    sheet.getCell(cells.systemType).value = unit.systemType ?? null;
    sheet.getCell(cells.tank).value = unit.tankQuantity === null ? null : `${unit.tankQuantity} TANK`;
    prices.push(writeLine(sheet, r, line));
    block += 1;
  });
  return prices;
}

function writeSingleUnit(sheet: ExcelJS.Worksheet, reference: string, line: LinePrice | undefined): number[] {
  if (!line) return [];
  const r = blockRow(0);
  const cells = blockCells(r);
  sheet.getCell(cells.reference).value = reference;
  sheet.getCell(cells.model).value = line.model;
  return [writeLine(sheet, r, line)];
}

/** Explicit pool rows, the area's own distributed pools for reference, and the sheet total. */
function writePoolsAndTotal(sheet: ExcelJS.Worksheet, placement: Placement, linePrices: number[]): number {
  const { kind, area, areaSummary } = placement;
  const explicit = { delivery: 0, commissioning: 0 };
  for (const cost of areaSummary.explicitCosts) {
    if (cost.kind === kind) explicit[cost.pool] += toMinor(cost.amount);
  }
  setPrice(sheet, POOL_CELLS.delivery, fromMinor(explicit.delivery));
  setPrice(sheet, POOL_CELLS.commissioning, fromMinor(explicit.commissioning));

  if (kind === "canopy" || kind === "fireSuppression" || kind === "recoair") {
    const policy = SHARED_COST_POLICY[kind];
    if (policy.delivery === "distributed") {
      setPrice(sheet, POOL_CELLS.distributedDelivery, poolAmount(area.sharedCosts, kind, "delivery"));
    }
    if (policy.commissioning === "distributed") {
      setPrice(sheet, POOL_CELLS.distributedCommissioning, poolAmount(area.sharedCosts, kind, "commissioning"));
    }
  }

  const priceCells: string[] = [];
  for (let idx = 0; idx < BLOCKS_PER_SHEET; idx += 1) {
    const cells = blockCells(blockRow(idx));
    priceCells.push(cells.price);
    if (kind === "canopy") priceCells.push(cells.claddingLinePrice);
  }
  const totalMinor = sumMinor(linePrices.map(toMinor)) + explicit.delivery + explicit.commissioning;
  const total = sheet.getCell(POOL_CELLS.total);
  total.value = {
    formula: `SUM(${priceCells.join(",")})+${POOL_CELLS.delivery}+${POOL_CELLS.commissioning}`,
    result: fromMinor(totalMinor),
  };
  total.numFmt = PRICE_FORMAT;
  return fromMinor(totalMinor);
}

function fillSheet(sheet: ExcelJS.Worksheet, project: Project, placement: Placement): number {
  writeMeta(sheet, placement.kind, project, placement);
  let prices: number[];
  switch (placement.kind) {
    case "canopy":
      prices = writeCanopyBlocks(sheet, placement);
      break;
    case "fireSuppression":
      prices = writeFireSuppressionBlocks(sheet, placement);
      break;
    case "sdu":
      prices = writeSingleUnit(sheet, placement.item?.reference ?? "", lineOf(placement.itemPrice, "sdu"));
      break;
    default: {
      const kind = placement.kind;
      const line = placement.areaSummary.areaLines.find((candidate) => candidate.kind === kind);
      prices = writeSingleUnit(sheet, placement.area.name, line);
    }
  }
  return writePoolsAndTotal(sheet, placement, prices);
}

function writeJobTotal(sheet: ExcelJS.Worksheet, project: Project, rows: Array<PlacedSheetRecord & { total: number }>, grandTotal: number): void {
  sheet.getCell("A1").value = `JOB TOTAL - ${project.meta.projectNumber} ${project.meta.projectName}`;
  sheet.getCell("A1").font = { bold: true, size: 12 };
  ["SHEET", "LEVEL", "AREA", "TOTAL"].forEach((header, idx) => {
    const cell = sheet.getRow(3).getCell(idx + 1);
    cell.value = header;
    cell.font = { bold: true };
  });
  sheet.getColumn(1).width = 34;
  sheet.getColumn(2).width = 18;
  sheet.getColumn(3).width = 18;
  sheet.getColumn(4).width = 16;

  rows.forEach((row, idx) => {
    const excelRow = sheet.getRow(4 + idx);
    excelRow.getCell(1).value = row.name;
    excelRow.getCell(2).value = project.levels[row.levelIndex]?.name ?? "";
    excelRow.getCell(3).value = project.levels[row.levelIndex]?.areas[row.areaIndex]?.name ?? "";
    const total = excelRow.getCell(4);
    total.value = { formula: sheetRef(row.name, POOL_CELLS.total), result: row.total };
    total.numFmt = PRICE_FORMAT;
  });

  const grandRow = sheet.getRow(4 + rows.length);
  grandRow.getCell(1).value = "GRAND TOTAL";
  grandRow.getCell(1).font = { bold: true };
  const grand = grandRow.getCell(4);
  grand.value = rows.length > 0 ? { formula: `SUM(D4:D${3 + rows.length})`, result: grandTotal } : 0;
  grand.numFmt = PRICE_FORMAT;
  grand.font = { bold: true };
}

/**
 * Final check after placement: every placed sheet is present and visible,
 * and no template slot survived.
 */
export function assertWorkbookIntegrity(workbook: ExcelJS.Workbook, placed: PlacedSheetRecord[]): void {
  for (const record of placed) {
    const sheet = workbook.getWorksheet(record.name);
    if (!sheet) {
      throw new WorkbookIntegrityError(`Placed sheet '${record.name}' is missing`, { sheet: record.name });
    }
    if (sheet.state !== "visible") {
      throw new WorkbookIntegrityError(`Placed sheet '${record.name}' is not visible`, { sheet: record.name });
    }
  }
  workbook.eachSheet((sheet) => {
    if (parsePoolSheetName(sheet.name)) {
      throw new WorkbookIntegrityError(`Unused template sheet '${sheet.name}' was left in the workbook`, {
        sheet: sheet.name,
      });
    }
  });
}

/** Builds the cost-sheet workbook for a project. Throws on pool exhaustion or area overflow. */
export async function synthesize(project: Project, options: SynthesisOptions = {}): Promise<SynthesizedWorkbook> {
  const summary = options.summary ?? aggregate(project, options);
  const workbook = await openPoolTemplate(options);
  const pool = new SheetPool(workbook);

  const plan: Placement[] = [];
  let areaNumber = 0;
  project.levels.forEach((level, levelIndex) => {
    level.areas.forEach((area, areaIndex) => {
      areaNumber += 1;
      const areaSummary = summary.levels[levelIndex].areas[areaIndex];
      plan.push(...planArea(level, area, areaSummary, { levelIndex, areaIndex, areaNumber }, options));
    });
  });

  const taken = new Set<string>();
  workbook.eachSheet((sheet) => taken.add(sheet.name.toUpperCase()));
  [JOB_TOTAL_SHEET, LISTS_SHEET, PROJECT_DATA_SHEET].forEach((name) => taken.add(name.toUpperCase()));

  const ranges = writeListsSheet(workbook, options.lists ?? loadDropdownLists());
  const ordered: ExcelJS.Worksheet[] = [];
  const records: Array<PlacedSheetRecord & { total: number }> = [];

  for (const placement of plan) {
    const { kind, level, area, item } = placement;
    const sheet = pool.take(kind, { level: level.name, area: area.name, ...(item ? { item: item.reference } : {}) });
    const name = uniqueSheetName(placedSheetName(kind, level.name, placement.areaNumber, item?.reference), taken);
    sheet.name = name;
    sheet.state = "visible";
    sheet.properties.tabColor = { argb: tabColorFor(placement.levelIndex) };
    applyDropdowns(sheet, kind, ranges);
    const total = fillSheet(sheet, project, placement);
    ordered.push(sheet);
    records.push({
      name,
      kind,
      levelIndex: placement.levelIndex,
      areaIndex: placement.areaIndex,
      reference: item?.reference ?? null,
      total,
    });
  }

  const unused = pool.unused();
  for (const sheet of unused) workbook.removeWorksheet(sheet.id);

  const jobTotal = workbook.addWorksheet(JOB_TOTAL_SHEET);
  writeJobTotal(jobTotal, project, records, summary.total);
  const projectData = workbook.addWorksheet(PROJECT_DATA_SHEET, { state: "hidden" });
  const placed: PlacedSheetRecord[] = records.map(({ total: _total, ...record }) => record);
  writeProjectData(projectData, project, placed);

  const lists = workbook.getWorksheet(LISTS_SHEET);
  const tabOrder = [...ordered, jobTotal, ...(lists ? [lists] : []), projectData];
  // orderNo drives the written tab order
  tabOrder.forEach((sheet, idx) => Object.assign(sheet, { orderNo: idx + 1 }));

  assertWorkbookIntegrity(workbook, placed);
  console.log("[Synthesizer] workbook assembled", {
    project: project.meta.projectNumber,
    placed: placed.length,
    removedTemplateSheets: unused.length,
    total: summary.total,
  });
  return { workbook, summary, sheets: placed };
}

/** Synthesizes, writes through a temp file and hands back only the bytes. */
export async function writeCostSheet(
  project: Project,
  options: SynthesisOptions = {}
): Promise<{ bytes: Buffer; summary: PricingSummary; sheets: PlacedSheetRecord[] }> {
  const { workbook, summary, sheets } = await synthesize(project, options);
  const bytes = await withTempFile("cost-sheet.xlsx", async (filePath) => {
    await workbook.xlsx.writeFile(filePath);
    return fs.readFile(filePath);
  });
  return { bytes, summary, sheets };
}
