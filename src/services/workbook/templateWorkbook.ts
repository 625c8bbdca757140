import ExcelJS from "exceljs";
import { config } from "../../config";
import {
  blockRow,
  BLOCKS_PER_SHEET,
  META_LABELS,
  poolSheetName,
  SHEET_KINDS,
  SHEET_TITLE,
  type SheetKind,
} from "./layout";

const HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, size: 12 };
const LABEL_FONT: Partial<ExcelJS.Font> = { bold: true };
const TOTAL_FILL: ExcelJS.Fill = { type: "pattern", pattern: "solid", fgColor: { argb: "FFE7E6E6" } };

function layOutSheet(sheet: ExcelJS.Worksheet, kind: SheetKind): void {
  sheet.getColumn("A").width = 6;
  sheet.getColumn("B").width = 14;
  sheet.getColumn("C").width = 22;
  sheet.getColumn("D").width = 14;
  for (const column of ["N", "P", "Q"]) {
    sheet.getColumn(column).width = 14;
  }

  const title = sheet.getCell("B1");
  title.value = SHEET_TITLE[kind];
  title.font = HEADER_FONT;
  for (const [address, label] of META_LABELS) {
    const cell = sheet.getCell(address);
    cell.value = label;
    cell.font = LABEL_FONT;
  }

  for (let idx = 0; idx < BLOCKS_PER_SHEET; idx += 1) {
    const r = blockRow(idx);
    sheet.getCell(`A${r - 2}`).value = "REF";
    sheet.getCell(`M${r - 2}`).value = "UNIT";
    if (kind === "canopy") {
      sheet.getCell(`M${r - 1}`).value = "CLADDING";
      sheet.getCell(`E${r + 8}`).value = "EXTRACT STATIC";
    }
  }

  const labels: Array<[string, string]> = [
    ["M182", "DELIVERY"],
    ["M183", "COMMISSIONING"],
    ["P182", "IN UNIT PRICES"],
    ["M184", "SHEET TOTAL"],
  ];
  for (const [address, label] of labels) {
    const cell = sheet.getCell(address);
    cell.value = label;
    cell.font = LABEL_FONT;
  }
  sheet.getCell("N184").fill = TOTAL_FILL;
}

/** A template workbook holding `poolSize` hidden sheets per satellite kind. */
export function buildPoolTemplate(poolSize: number = config.sheetPoolSize): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "cost-sheet-engine";
  for (const kind of SHEET_KINDS) {
    for (let index = 1; index <= poolSize; index += 1) {
      const sheet = workbook.addWorksheet(poolSheetName(kind, index), { state: "hidden" });
      layOutSheet(sheet, kind);
    }
  }
  return workbook;
}

export async function loadPoolTemplate(filePath: string): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  return workbook;
}

export interface TemplateOptions {
  /** .xlsx with a pre-built pool; wins over `poolSize`. */
  templatePath?: string | null;
  poolSize?: number;
}

export async function openPoolTemplate(options: TemplateOptions = {}): Promise<ExcelJS.Workbook> {
  const templatePath = options.templatePath === undefined ? config.costSheetTemplatePath : options.templatePath;
  if (templatePath) {
    console.log("[Synthesizer] loading pool template", { templatePath });
    return loadPoolTemplate(templatePath);
  }
  return buildPoolTemplate(options.poolSize ?? config.sheetPoolSize);
}
