import fs from "fs";
import path from "path";
import type { Workbook, Worksheet } from "exceljs";
import { z } from "zod";
import { config } from "../../config";
import { blockCells, blockRow, BLOCKS_PER_SHEET, LISTS_SHEET, type SheetKind } from "./layout";

const dropdownListsSchema = z.object({
  lighting: z.array(z.string()).min(1),
  specialWorks: z.array(z.string()).min(1),
  configuration: z.array(z.string()).min(1),
  model: z.array(z.string()).min(1),
  wallCladding: z.array(z.string()).min(1),
  fireSuppressionSystem: z.array(z.string()).min(1),
  tank: z.array(z.string()).min(1),
});

export type DropdownLists = z.infer<typeof dropdownListsSchema>;
export type DropdownName = keyof DropdownLists;

/** Absolute `Lists!$X$1:$X$n` range of each vocabulary. */
export type ListRanges = Record<DropdownName, string>;

const defaultListsPath = path.join(config.dataDir, "dropdown-lists.json");

let cachedLists: DropdownLists | null = null;

export function loadDropdownLists(filePath = defaultListsPath): DropdownLists {
  if (cachedLists && filePath === defaultListsPath) return cachedLists;
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const lists = dropdownListsSchema.parse(raw);
  if (filePath === defaultListsPath) cachedLists = lists;
  return lists;
}

function columnLetter(index: number): string {
  let letters = "";
  for (let n = index + 1; n > 0; n = Math.floor((n - 1) / 26)) {
    letters = String.fromCharCode(65 + ((n - 1) % 26)) + letters;
  }
  return letters;
}

const DROPDOWN_NAMES: DropdownName[] = [
  "lighting",
  "specialWorks",
  "configuration",
  "model",
  "wallCladding",
  "fireSuppressionSystem",
  "tank",
];

/** Writes every vocabulary as one column of a hidden Lists sheet. */
export function writeListsSheet(workbook: Workbook, lists: DropdownLists = loadDropdownLists()): ListRanges {
  const sheet = workbook.addWorksheet(LISTS_SHEET, { state: "hidden" });
  const rangeOf = (name: DropdownName): string => {
    const column = columnLetter(DROPDOWN_NAMES.indexOf(name));
    return `${LISTS_SHEET}!$${column}$1:$${column}$${lists[name].length}`;
  };
  DROPDOWN_NAMES.forEach((name, idx) => {
    lists[name].forEach((entry, row) => {
      sheet.getCell(`${columnLetter(idx)}${row + 1}`).value = entry;
    });
  });
  return {
    lighting: rangeOf("lighting"),
    specialWorks: rangeOf("specialWorks"),
    configuration: rangeOf("configuration"),
    model: rangeOf("model"),
    wallCladding: rangeOf("wallCladding"),
    fireSuppressionSystem: rangeOf("fireSuppressionSystem"),
    tank: rangeOf("tank"),
  };
}

function listValidation(sheet: Worksheet, address: string, range: string): void {
  sheet.getCell(address).dataValidation = {
    type: "list",
    allowBlank: true,
    formulae: [range],
  };
}

/** Attaches list validations to every item block of a placed sheet. */
export function applyDropdowns(sheet: Worksheet, kind: SheetKind, ranges: ListRanges): void {
  for (let idx = 0; idx < BLOCKS_PER_SHEET; idx += 1) {
    const cells = blockCells(blockRow(idx));
    if (kind === "canopy") {
      listValidation(sheet, cells.configuration, ranges.configuration);
      listValidation(sheet, cells.model, ranges.model);
      listValidation(sheet, cells.lighting, ranges.lighting);
      cells.specialWorks.forEach((address) => listValidation(sheet, address, ranges.specialWorks));
      listValidation(sheet, cells.claddingMarker, ranges.wallCladding);
    } else if (kind === "fireSuppression") {
      listValidation(sheet, cells.systemType, ranges.fireSuppressionSystem);
      listValidation(sheet, cells.tank, ranges.tank);
    }
  }
}
