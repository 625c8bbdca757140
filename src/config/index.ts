import dotenv from "dotenv";
import os from "os";
import path from "path";

dotenv.config();

const rootDir = path.resolve(__dirname, "..", "..");

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export const config = {
  rootDir,
  port: Number(process.env.PORT ?? 4000),
  mongoUri: process.env.MONGO_URI ?? "mongodb://localhost:27017/cost-sheets",
  // Scratch space for workbooks and PDFs while they are written; only bytes leave the core
  outputDir: path.resolve(process.env.OUTPUT_DIR ?? os.tmpdir()),
  dataDir: path.join(rootDir, "data"),
  templateDir: path.resolve(process.env.TEMPLATE_DIR ?? path.join(rootDir, "templates")),
  // Optional .xlsx carrying the hidden satellite-sheet pool. When unset the pool is built in memory.
  costSheetTemplatePath: process.env.COST_SHEET_TEMPLATE ? path.resolve(process.env.COST_SHEET_TEMPLATE) : null,
  sheetPoolSize: Number(process.env.SHEET_POOL_SIZE ?? 40),
  maxFileSize: Number(process.env.MAX_FILE_SIZE ?? 20 * 1024 * 1024), // 20MB per workbook
  currencyLocale: process.env.CURRENCY_LOCALE ?? "en-GB",
  currency: process.env.CURRENCY ?? "GBP",
  disabledFeatures: parseList(process.env.DISABLED_FEATURES),
};
