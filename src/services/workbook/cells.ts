import * as XLSX from "xlsx";

export type CellScalar = string | number | boolean | null;

export function readCell(sheet: XLSX.WorkSheet, address: string): CellScalar {
  const cell: XLSX.CellObject | undefined = sheet[address];
  if (!cell || cell.v === undefined || cell.v === null) return null;
  if (cell.v instanceof Date) return cell.w ?? cell.v.toISOString();
  return cell.v;
}

/** Trimmed text; blank cells come back as "". */
export function readText(sheet: XLSX.WorkSheet, address: string): string {
  const value = readCell(sheet, address);
  if (value === null) return "";
  return String(value).trim();
}

/** A display quantity: blank or non-numeric text is "unspecified" (null), never 0. */
export function readQuantity(sheet: XLSX.WorkSheet, address: string): number | null {
  const value = readCell(sheet, address);
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.replace(/,/g, "").trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** A pricing input: blank counts as 0. */
export function readPrice(sheet: XLSX.WorkSheet, address: string): number {
  return readQuantity(sheet, address) ?? 0;
}

/** Text or number as stored, blank as null. */
export function readSpecValue(sheet: XLSX.WorkSheet, address: string): string | number | null {
  const value = readCell(sheet, address);
  if (value === null || typeof value === "boolean") return null;
  if (typeof value === "string" && value.trim() === "") return null;
  return typeof value === "string" ? value.trim() : value;
}
