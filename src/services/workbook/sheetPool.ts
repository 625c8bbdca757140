import type { Workbook, Worksheet } from "exceljs";
import { PoolExhaustedError, type ErrorDetails } from "../../utils/errors";
import { parsePoolSheetName, SHEET_KINDS, type SheetKind } from "./layout";

/**
 * Freelist of pre-built template sheets, one list per kind. Slots are handed
 * out lowest index first, so the same project always lands on the same
 * template sheets.
 */
export class SheetPool {
  private readonly free = new Map<SheetKind, Worksheet[]>();
  private readonly capacity = new Map<SheetKind, number>();

  constructor(workbook: Workbook) {
    for (const kind of SHEET_KINDS) this.free.set(kind, []);
    const indexed: Array<{ kind: SheetKind; index: number; sheet: Worksheet }> = [];
    workbook.eachSheet((sheet) => {
      const parsed = parsePoolSheetName(sheet.name);
      if (parsed) indexed.push({ ...parsed, sheet });
    });
    indexed.sort((a, b) => a.index - b.index);
    for (const { kind, sheet } of indexed) {
      this.free.get(kind)?.push(sheet);
    }
    for (const kind of SHEET_KINDS) this.capacity.set(kind, this.free.get(kind)?.length ?? 0);
  }

  take(kind: SheetKind, details: ErrorDetails = {}): Worksheet {
    const sheet = this.free.get(kind)?.shift();
    if (!sheet) {
      throw new PoolExhaustedError(kind, { ...details, available: this.capacity.get(kind) ?? 0 });
    }
    return sheet;
  }

  available(kind: SheetKind): number {
    return this.free.get(kind)?.length ?? 0;
  }

  /** Every slot never taken, in kind order. */
  unused(): Worksheet[] {
    return SHEET_KINDS.flatMap((kind) => this.free.get(kind) ?? []);
  }
}
