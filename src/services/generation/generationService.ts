import { featureFlags as defaultFlags, type FeatureFlags } from "../../config/features";
import { parseProject } from "../../modules/validation/projectSchema";
import type { Project } from "../../types/project";
import type { PricingAnomaly, PricingSummary } from "../../types/pricing";
import { toAppError, ValidationError, type ErrorCode, type ErrorDetails } from "../../utils/errors";
import { buildContext, type DocumentContext } from "../document/contextBuilder";
import { DOCUMENT_TITLES, documentTypesFor, type DocumentType } from "../document/documentTypes";
import { renderDocument } from "../document/renderer";
import { FileTemplateStore, type TemplateStore } from "../document/templateStore";
import { buildBundle, bundleFileName, type BundleEntry } from "../output/bundle";
import { nextRevision, outputFileName } from "../output/fileNaming";
import { aggregate } from "../pricing/aggregation";
import type { PricingOptions } from "../pricing/pricingEngine";
import { readCostSheet, type ReadReport } from "../workbook/reader";
import { writeCostSheet } from "../workbook/synthesizer";
import type { TemplateOptions } from "../workbook/templateWorkbook";
import type { PlacedSheetRecord } from "../workbook/projectData";

export type GenerationResult<T> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; error: { code: ErrorCode; message: string; details: ErrorDetails } };

export interface GenerationOptions extends PricingOptions, TemplateOptions {
  templates?: TemplateStore;
}

export interface OutputFile {
  fileName: string;
  contentType: string;
  bytes: Buffer;
}

export interface CostSheetOutput extends OutputFile {
  project: Project;
  summary: PricingSummary;
  sheets: PlacedSheetRecord[];
}

export interface QuotationOutput extends OutputFile {
  project: Project;
  summary: PricingSummary;
  documents: DocumentType[];
  report: ReadReport;
}

export interface QuotationPreview {
  project: Project;
  summary: PricingSummary;
  context: DocumentContext;
  documents: DocumentType[];
  report: ReadReport;
}

export const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
export const PDF_CONTENT_TYPE = "application/pdf";
export const ZIP_CONTENT_TYPE = "application/zip";

function anomalyWarnings(anomalies: PricingAnomaly[]): string[] {
  return anomalies.filter((anomaly) => anomaly.severity === "warning").map((anomaly) => anomaly.message);
}

function logAnomalies(operation: string, project: Project, anomalies: PricingAnomaly[]): void {
  for (const anomaly of anomalies.filter((entry) => entry.severity === "warning")) {
    console.warn("[Generation] pricing anomaly", {
      operation,
      project: project.meta.projectNumber,
      rule: anomaly.rule,
      level: anomaly.level,
      area: anomaly.area,
      item: anomaly.item,
      message: anomaly.message,
    });
  }
}

async function run<T>(operation: string, work: () => Promise<{ value: T; warnings: string[] }>): Promise<GenerationResult<T>> {
  try {
    const { value, warnings } = await work();
    return { ok: true, value, warnings };
  } catch (error) {
    const appError = toAppError(error);
    const log = appError.status >= 500 ? console.error : console.warn;
    log("[Generation] failed", { operation, code: appError.code, message: appError.message, details: appError.details });
    return { ok: false, error: appError.toJSON() };
  }
}

function flagsOf(options: GenerationOptions): FeatureFlags {
  return options.features ?? defaultFlags;
}

/** Validates a project and prices it. */
export function pricePreview(input: unknown, options: GenerationOptions = {}): Promise<GenerationResult<PricingSummary>> {
  return run("price", async () => {
    const project = parseProject(input);
    const summary = aggregate(project, { ...options, features: flagsOf(options) });
    logAnomalies("price", project, summary.anomalies);
    return { value: summary, warnings: anomalyWarnings(summary.anomalies) };
  });
}

/** Validates a project and synthesizes its cost-sheet workbook. */
export function generateCostSheet(input: unknown, options: GenerationOptions = {}): Promise<GenerationResult<CostSheetOutput>> {
  return run("cost-sheet", async () => {
    const project = parseProject(input);
    const { bytes, summary, sheets } = await writeCostSheet(project, { ...options, features: flagsOf(options) });
    logAnomalies("cost-sheet", project, summary.anomalies);
    return {
      value: {
        fileName: outputFileName(project.meta, "Cost Sheet", ".xlsx"),
        contentType: XLSX_CONTENT_TYPE,
        bytes,
        project,
        summary,
        sheets,
      },
      warnings: anomalyWarnings(summary.anomalies),
    };
  });
}

function readWarnings(report: ReadReport): string[] {
  return [
    ...report.warnings,
    ...report.skippedSheets.map((entry) => `Sheet '${entry.sheet}' skipped: ${entry.reason}`),
    ...report.unmatchedReferences.map((entry) => `Reference '${entry.reference}' on '${entry.sheet}' matched no item`),
  ];
}

/** Reads an uploaded cost sheet and returns what a quotation would be built from, without rendering. */
export function previewQuotation(bytes: Buffer, options: GenerationOptions = {}): Promise<GenerationResult<QuotationPreview>> {
  return run("preview", async () => {
    const features = flagsOf(options);
    const { project, summary, report } = readCostSheet(bytes, { ...options, features });
    logAnomalies("preview", project, summary.anomalies);
    return {
      value: {
        project,
        summary,
        context: buildContext(project, summary),
        documents: documentTypesFor(project, features),
        report,
      },
      warnings: [...readWarnings(report), ...anomalyWarnings(summary.anomalies)],
    };
  });
}

/**
 * Reads an uploaded cost sheet, advances its revision one step and renders
 * every quotation document it calls for. A single document comes back as a
 * PDF, several as a zip bundle.
 */
export function generateQuotation(bytes: Buffer, options: GenerationOptions = {}): Promise<GenerationResult<QuotationOutput>> {
  return run("quotation", async () => {
    const features = flagsOf(options);
    const store = options.templates ?? new FileTemplateStore();
    const read = readCostSheet(bytes, { ...options, features });
    const project: Project = {
      ...read.project,
      meta: { ...read.project.meta, revision: nextRevision(read.project.meta.revision) },
    };
    const { summary, report } = read;
    logAnomalies("quotation", project, summary.anomalies);

    const documents = documentTypesFor(project, features);
    if (documents.length === 0) {
      throw new ValidationError([
        { path: "levels", message: "Workbook holds no equipment to quote" },
      ]);
    }
    const context = buildContext(project, summary);
    const rendered: BundleEntry[] = [];
    for (const type of documents) {
      const document = await renderDocument(store, type, context);
      rendered.push({ fileName: outputFileName(project.meta, DOCUMENT_TITLES[type], ".pdf"), bytes: document.bytes });
    }

    const single = rendered.length === 1 ? rendered[0] : null;
    const output: OutputFile = single
      ? { fileName: single.fileName, contentType: PDF_CONTENT_TYPE, bytes: single.bytes }
      : { fileName: bundleFileName(project.meta), contentType: ZIP_CONTENT_TYPE, bytes: await buildBundle(rendered) };

    console.log("[Generation] quotation rendered", {
      project: project.meta.projectNumber,
      revision: project.meta.revision,
      documents,
      fileName: output.fileName,
    });
    return {
      value: { ...output, project, summary, documents, report },
      warnings: [...readWarnings(report), ...anomalyWarnings(summary.anomalies)],
    };
  });
}
