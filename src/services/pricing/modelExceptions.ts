import fs from "fs";
import path from "path";
import { z } from "zod";
import { config } from "../../config";
import type { SpecField } from "../../types/pricing";

const SPEC_FIELDS = [
  "extractVolume",
  "extractStatic",
  "supplyVolume",
  "supplyStatic",
  "cwsCapacity",
  "hwsRequirement",
  "hwStorage",
] as const satisfies readonly SpecField[];

const exceptionTableSchema = z.array(
  z.object({
    rule: z.string().min(1),
    prefix: z.string().min(1),
    fields: z.array(z.enum(SPEC_FIELDS)).min(1),
  })
);

export type ModelException = z.infer<typeof exceptionTableSchema>[number];

export interface ExceptionMatch {
  rules: string[];
  fields: Set<SpecField>;
}

const exceptionTablePath = path.join(config.dataDir, "model-exceptions.json");

let cachedTable: ModelException[] | null = null;

export function loadModelExceptions(filePath = exceptionTablePath): ModelException[] {
  if (cachedTable && filePath === exceptionTablePath) return cachedTable;
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const table = exceptionTableSchema.parse(raw).map((entry) => ({
    ...entry,
    prefix: normalizeModel(entry.prefix),
  }));
  if (filePath === exceptionTablePath) cachedTable = table;
  return table;
}

export function normalizeModel(model: string): string {
  return String(model ?? "").trim().toUpperCase();
}

/**
 * Every entry whose prefix starts the model applies; an unknown model simply
 * matches nothing.
 */
export function matchModelExceptions(model: string, table: ModelException[] = loadModelExceptions()): ExceptionMatch {
  const normalized = normalizeModel(model);
  const rules: string[] = [];
  const fields = new Set<SpecField>();
  if (!normalized) return { rules, fields };
  for (const entry of table) {
    if (!normalized.startsWith(entry.prefix)) continue;
    if (!rules.includes(entry.rule)) rules.push(entry.rule);
    entry.fields.forEach((field) => fields.add(field));
  }
  return { rules, fields };
}
