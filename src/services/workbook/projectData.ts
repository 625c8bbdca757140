import type { Worksheet } from "exceljs";
import type * as XLSX from "xlsx";
import {
  AREA_FEATURES,
  hasAreaFeature,
  hasItemFeature,
  ITEM_FEATURES,
  type AreaFeature,
  type ItemFeature,
  type PooledKind,
  type PoolType,
  type Project,
  type ProjectMeta,
} from "../../types/project";
import { poolAmount, POOL_TYPES, POOLED_KINDS } from "../pricing/sharedCosts";
import { readCell, readPrice, readText } from "./cells";
import { kindForPrefix, SHEET_PREFIX, type SheetKind } from "./layout";

/**
 * Hidden sheet carrying what the visible sheets only imply: project metadata,
 * an explicit feature-flag table, the shared-cost pools at their real scope,
 * and a registry of placed sheets.
 *
 *   A:B  metadata key/value
 *   D:K  TYPE | LEVEL | AREA | LEVEL NAME | AREA NAME | REFERENCE | MODEL | FLAGS
 *   M:R  SCOPE | LEVEL | AREA | KIND | POOL | AMOUNT
 *   T:X  SHEET | KIND | LEVEL | AREA | REFERENCE
 */

const META_KEYS: Array<keyof ProjectMeta> = [
  "projectNumber",
  "projectName",
  "customer",
  "company",
  "address",
  "location",
  "estimator",
  "salesContact",
  "deliveryLocation",
  "date",
  "revision",
];

export interface PlacedSheetRecord {
  name: string;
  kind: SheetKind;
  levelIndex: number;
  areaIndex: number;
  reference: string | null;
}

export interface FlagSnapshotItem {
  reference: string;
  model: string;
  flags: ItemFeature[];
}

export interface FlagSnapshotArea {
  name: string;
  flags: AreaFeature[];
  items: FlagSnapshotItem[];
}

export interface FlagSnapshotLevel {
  name: string;
  areas: FlagSnapshotArea[];
}

export interface PoolRecord {
  scope: "level" | "area";
  levelIndex: number;
  areaIndex: number | null;
  kind: PooledKind;
  pool: PoolType;
  amount: number;
}

export interface ProjectDataSnapshot {
  meta: Partial<Record<keyof ProjectMeta, string>>;
  levels: FlagSnapshotLevel[];
  pools: PoolRecord[];
  sheets: PlacedSheetRecord[];
  warnings: string[];
}

export function writeProjectData(sheet: Worksheet, project: Project, placed: PlacedSheetRecord[]): void {
  sheet.getCell("A1").value = "KEY";
  sheet.getCell("B1").value = "VALUE";
  META_KEYS.forEach((key, idx) => {
    sheet.getCell(`A${idx + 2}`).value = key;
    sheet.getCell(`B${idx + 2}`).value = project.meta[key] ?? "";
  });

  ["TYPE", "LEVEL", "AREA", "LEVEL NAME", "AREA NAME", "REFERENCE", "MODEL", "FLAGS"].forEach((header, idx) => {
    sheet.getRow(1).getCell(4 + idx).value = header;
  });
  let row = 2;
  const flagRow = (values: Array<string | number>) => {
    values.forEach((value, idx) => {
      sheet.getRow(row).getCell(4 + idx).value = value;
    });
    row += 1;
  };
  project.levels.forEach((level, levelIndex) => {
    flagRow(["LEVEL", levelIndex, "", level.name, "", "", "", ""]);
    level.areas.forEach((area, areaIndex) => {
      const areaFlags = AREA_FEATURES.filter((feature) => hasAreaFeature(area, feature));
      flagRow(["AREA", levelIndex, areaIndex, level.name, area.name, "", "", areaFlags.join(",")]);
      for (const item of area.items) {
        const itemFlags = ITEM_FEATURES.filter((feature) => hasItemFeature(item, feature));
        flagRow(["ITEM", levelIndex, areaIndex, level.name, area.name, item.reference, item.model, itemFlags.join(",")]);
      }
    });
  });

  ["SCOPE", "LEVEL", "AREA", "KIND", "POOL", "AMOUNT"].forEach((header, idx) => {
    sheet.getRow(1).getCell(13 + idx).value = header;
  });
  row = 2;
  const poolRows = (scope: "level" | "area", levelIndex: number, areaIndex: number | "", pools: Project["levels"][number]["sharedCosts"]) => {
    for (const kind of POOLED_KINDS) {
      for (const pool of POOL_TYPES) {
        const amount = poolAmount(pools, kind, pool);
        if (amount === 0) continue;
        [scope.toUpperCase(), levelIndex, areaIndex, kind, pool, amount].forEach((value, idx) => {
          sheet.getRow(row).getCell(13 + idx).value = value;
        });
        row += 1;
      }
    }
  };
  project.levels.forEach((level, levelIndex) => {
    poolRows("level", levelIndex, "", level.sharedCosts);
    level.areas.forEach((area, areaIndex) => poolRows("area", levelIndex, areaIndex, area.sharedCosts));
  });

  ["SHEET", "KIND", "LEVEL", "AREA", "REFERENCE"].forEach((header, idx) => {
    sheet.getRow(1).getCell(20 + idx).value = header;
  });
  placed.forEach((record, idx) => {
    const values = [record.name, SHEET_PREFIX[record.kind], record.levelIndex, record.areaIndex, record.reference ?? ""];
    values.forEach((value, col) => {
      sheet.getRow(idx + 2).getCell(20 + col).value = value;
    });
  });
}

function parseFlags<T extends string>(raw: string, allowed: readonly T[], where: string, warnings: string[]): T[] {
  const flags: T[] = [];
  for (const token of raw.split(",").map((part) => part.trim()).filter(Boolean)) {
    const match = allowed.find((candidate) => candidate === token);
    if (match) flags.push(match);
    else warnings.push(`Unknown flag '${token}' on ${where}`);
  }
  return flags;
}

function readIndex(sheet: XLSX.WorkSheet, address: string): number | null {
  const value = readCell(sheet, address);
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

const isPooledKind = (value: string): value is PooledKind => POOLED_KINDS.some((kind) => kind === value);
const isPoolType = (value: string): value is PoolType => POOL_TYPES.some((pool) => pool === value);

export function parseProjectData(sheet: XLSX.WorkSheet): ProjectDataSnapshot {
  const warnings: string[] = [];
  const meta: Partial<Record<keyof ProjectMeta, string>> = {};
  for (let row = 2; readText(sheet, `A${row}`) !== ""; row += 1) {
    const key = META_KEYS.find((candidate) => candidate === readText(sheet, `A${row}`));
    if (key) meta[key] = readText(sheet, `B${row}`);
  }

  const levels: FlagSnapshotLevel[] = [];
  for (let row = 2; readText(sheet, `D${row}`) !== ""; row += 1) {
    const type = readText(sheet, `D${row}`).toUpperCase();
    const levelIndex = readIndex(sheet, `E${row}`);
    if (levelIndex === null) {
      warnings.push(`ProjectData row ${row} has no level index`);
      continue;
    }
    const level = (levels[levelIndex] ??= { name: readText(sheet, `G${row}`), areas: [] });
    if (type === "LEVEL") continue;
    const areaIndex = readIndex(sheet, `F${row}`);
    if (areaIndex === null) {
      warnings.push(`ProjectData row ${row} has no area index`);
      continue;
    }
    const areaName = readText(sheet, `H${row}`);
    const area = (level.areas[areaIndex] ??= { name: areaName, flags: [], items: [] });
    const rawFlags = readText(sheet, `K${row}`);
    if (type === "AREA") {
      area.flags = parseFlags(rawFlags, AREA_FEATURES, `area '${areaName}'`, warnings);
    } else if (type === "ITEM") {
      const reference = readText(sheet, `I${row}`);
      area.items.push({
        reference,
        model: readText(sheet, `J${row}`),
        flags: parseFlags(rawFlags, ITEM_FEATURES, `item '${reference}'`, warnings),
      });
    } else {
      warnings.push(`ProjectData row ${row} has unknown type '${type}'`);
    }
  }

  const pools: PoolRecord[] = [];
  for (let row = 2; readText(sheet, `M${row}`) !== ""; row += 1) {
    const scope = readText(sheet, `M${row}`).toLowerCase();
    const levelIndex = readIndex(sheet, `N${row}`);
    const areaIndex = readIndex(sheet, `O${row}`);
    const kind = readText(sheet, `P${row}`);
    const pool = readText(sheet, `Q${row}`);
    if ((scope !== "level" && scope !== "area") || levelIndex === null || !isPooledKind(kind) || !isPoolType(pool)) {
      warnings.push(`ProjectData pool row ${row} is malformed`);
      continue;
    }
    if (scope === "area" && areaIndex === null) {
      warnings.push(`ProjectData pool row ${row} has no area index`);
      continue;
    }
    pools.push({ scope, levelIndex, areaIndex: scope === "area" ? areaIndex : null, kind, pool, amount: readPrice(sheet, `R${row}`) });
  }

  const sheets: PlacedSheetRecord[] = [];
  for (let row = 2; readText(sheet, `T${row}`) !== ""; row += 1) {
    const kind = kindForPrefix(readText(sheet, `U${row}`));
    const levelIndex = readIndex(sheet, `V${row}`);
    const areaIndex = readIndex(sheet, `W${row}`);
    if (!kind || levelIndex === null || areaIndex === null) {
      warnings.push(`ProjectData sheet row ${row} is malformed`);
      continue;
    }
    sheets.push({
      name: readText(sheet, `T${row}`),
      kind,
      levelIndex,
      areaIndex,
      reference: readText(sheet, `X${row}`) || null,
    });
  }

  // Sparse indexes would leave holes; close them so callers can iterate safely.
  const dense = Array.from(levels, (level, idx) => level ?? { name: `Level ${idx + 1}`, areas: [] }).map((level) => ({
    ...level,
    areas: Array.from(level.areas, (area, idx) => area ?? { name: `Area ${idx + 1}`, flags: [], items: [] }),
  }));

  return { meta, levels: dense, pools, sheets, warnings };
}
