import type { EquipmentKind } from "../../types/project";

/** Kinds that get a satellite sheet of their own. Cladding is priced on the canopy sheet. */
export type SheetKind = Exclude<EquipmentKind, "cladding">;

export const SHEET_KINDS: SheetKind[] = ["canopy", "fireSuppression", "sdu", "uvc", "recoair", "reactaway"];

export const SHEET_PREFIX: Record<SheetKind, string> = {
  canopy: "CANOPY",
  fireSuppression: "FIRE SUPP",
  sdu: "SDU",
  uvc: "UV-C",
  recoair: "RECOAIR",
  reactaway: "REACTAWAY",
};

export const SHEET_TITLE: Record<SheetKind, string> = {
  canopy: "CANOPY COST SHEET",
  fireSuppression: "FIRE SUPPRESSION COST SHEET",
  sdu: "SERVICE DISTRIBUTION UNIT COST SHEET",
  uvc: "UV-C SYSTEM COST SHEET",
  recoair: "RECOAIR COST SHEET",
  reactaway: "REACTAWAY COST SHEET",
};

export function kindForPrefix(prefix: string): SheetKind | null {
  const normalized = prefix.trim().toUpperCase();
  return SHEET_KINDS.find((kind) => SHEET_PREFIX[kind] === normalized) ?? null;
}

export const JOB_TOTAL_SHEET = "JOB TOTAL";
export const LISTS_SHEET = "Lists";
export const PROJECT_DATA_SHEET = "ProjectData";

/** Level position → tab colour (ARGB). Cycles past ten levels. */
export const TAB_COLORS = [
  "FF92D050",
  "FF00B0F0",
  "FFFF9900",
  "FFFF00FF",
  "FF7030A0",
  "FFFF0000",
  "FF00FF00",
  "FF0070C0",
  "FFFFC000",
  "FF00FFFF",
];

export function tabColorFor(levelIndex: number): string {
  return TAB_COLORS[levelIndex % TAB_COLORS.length];
}

export const META_CELLS = {
  title: "B1",
  projectNumber: "C3",
  customer: "C5",
  estimator: "C7",
  projectName: "G3",
  location: "G5",
  date: "G7",
  revision: "O7",
  level: "C9",
  area: "G9",
  deliveryLocation: "D186",
} as const;

export const META_LABELS: Array<[string, string]> = [
  ["B3", "PROJECT NO:"],
  ["B5", "CUSTOMER:"],
  ["B7", "ESTIMATOR:"],
  ["F3", "PROJECT:"],
  ["F5", "LOCATION:"],
  ["F7", "DATE:"],
  ["N7", "REV:"],
  ["B9", "LEVEL:"],
  ["F9", "AREA:"],
  ["B186", "DELIVERY TO:"],
];

export const FIRST_BLOCK_ROW = 14;
export const BLOCK_SPACING = 17;
export const BLOCKS_PER_SHEET = 10;

export function blockRow(index: number): number {
  return FIRST_BLOCK_ROW + index * BLOCK_SPACING;
}

/** Cell addresses of one item block whose model row is `r`. */
export function blockCells(r: number) {
  return {
    reference: `B${r - 2}`,
    basePrice: `N${r - 2}`,
    share: `Q${r - 2}`,
    price: `P${r - 2}`,
    configuration: `C${r}`,
    model: `D${r}`,
    length: `E${r}`,
    width: `F${r}`,
    height: `G${r}`,
    sections: `H${r}`,
    extractVolume: `I${r}`,
    supplyVolume: `K${r}`,
    supplyStatic: `L${r}`,
    lighting: `C${r + 1}`,
    specialWorks: [`C${r + 2}`, `C${r + 3}`, `C${r + 4}`],
    extractStatic: `F${r + 8}`,
    cwsCapacity: `F${r + 11}`,
    hwsRequirement: `F${r + 12}`,
    hwStorage: `F${r + 13}`,
    claddingPrice: `N${r - 1}`,
    claddingLinePrice: `P${r - 1}`,
    claddingMarker: `C${r + 5}`,
    claddingSize: `P${r + 5}`,
    claddingPositions: `Q${r + 5}`,
    systemType: `C${r + 2}`,
    tank: `C${r + 3}`,
  };
}

export const CLADDING_MARKER = "2M² (HFL)";

export const POOL_CELLS = {
  delivery: "N182",
  commissioning: "N183",
  distributedDelivery: "Q182",
  distributedCommissioning: "Q183",
  total: "N184",
} as const;

export const MAX_SHEET_NAME = 31;

const INVALID_SHEET_CHARS = /[\\/?*[\]:]/g;

// Excel refuses a name that starts or ends with an apostrophe
const EDGE_QUOTES = /^[\s']+|[\s']+$/g;

export function sanitizeSheetName(name: string): string {
  const cleaned = name.replace(INVALID_SHEET_CHARS, " ").replace(/\s+/g, " ").replace(EDGE_QUOTES, "");
  return cleaned.slice(0, MAX_SHEET_NAME).replace(EDGE_QUOTES, "");
}

/** `CANOPY - Ground Floor (1)`, plus ` - K1` for item-scoped sheets. */
export function placedSheetName(kind: SheetKind, level: string, areaNumber: number, reference?: string): string {
  const base = `${SHEET_PREFIX[kind]} - ${level} (${areaNumber})`;
  return sanitizeSheetName(reference ? `${base} - ${reference}` : base);
}

/** Appends ` 2`, ` 3`… (inside the length limit) until the name is free. */
export function uniqueSheetName(name: string, taken: Set<string>): string {
  const key = (candidate: string) => candidate.toUpperCase();
  if (!taken.has(key(name))) {
    taken.add(key(name));
    return name;
  }
  for (let n = 2; ; n += 1) {
    const suffix = ` ${n}`;
    const candidate = `${name.slice(0, MAX_SHEET_NAME - suffix.length).replace(EDGE_QUOTES, "")}${suffix}`;
    if (!taken.has(key(candidate))) {
      taken.add(key(candidate));
      return candidate;
    }
  }
}

/** Pool sheets in a template are named `<PREFIX> (<n>)`. */
export const POOL_SHEET_PATTERN = /^(.+) \((\d+)\)$/;

export function poolSheetName(kind: SheetKind, index: number): string {
  return `${SHEET_PREFIX[kind]} (${index})`;
}

export function parsePoolSheetName(name: string): { kind: SheetKind; index: number } | null {
  const match = POOL_SHEET_PATTERN.exec(name);
  if (!match) return null;
  const kind = kindForPrefix(match[1]);
  if (!kind) return null;
  return { kind, index: Number(match[2]) };
}

/** Placed sheets are `<PREFIX> - <rest>`; returns the kind, if any. */
export function kindOfPlacedSheet(name: string): SheetKind | null {
  const separator = name.indexOf(" - ");
  if (separator <= 0) return null;
  return kindForPrefix(name.slice(0, separator));
}

/** `'Sheet Name'!A1` with embedded quotes doubled. */
export function sheetRef(sheetName: string, address: string): string {
  return `'${sheetName.replace(/'/g, "''")}'!${address}`;
}
