import type { EquipmentKind } from "../types/project";

export interface ErrorDetails {
  level?: string;
  area?: string;
  item?: string;
  sheet?: string;
  rule?: string;
  [key: string]: unknown;
}

export type ErrorCode =
  | "VALIDATION_FAILED"
  | "POOL_EXHAUSTED"
  | "AREA_CAPACITY_EXCEEDED"
  | "WORKBOOK_INTEGRITY"
  | "WORKBOOK_UNREADABLE"
  | "TEMPLATE_NOT_FOUND"
  | "TEMPLATE_RENDER_FAILED"
  | "INTERNAL";

export const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_FAILED: 400,
  POOL_EXHAUSTED: 422,
  AREA_CAPACITY_EXCEEDED: 422,
  WORKBOOK_INTEGRITY: 500,
  WORKBOOK_UNREADABLE: 422,
  TEMPLATE_NOT_FOUND: 404,
  TEMPLATE_RENDER_FAILED: 500,
  INTERNAL: 500,
};

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly details: ErrorDetails;

  constructor(code: ErrorCode, message: string, status: number, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }

  toJSON(): { code: ErrorCode; message: string; details: ErrorDetails } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AppError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const first = issues[0];
    const summary = first ? `${first.path || "project"}: ${first.message}` : "invalid project";
    super("VALIDATION_FAILED", `Project input is invalid (${summary})`, 400, { issues });
    this.issues = issues;
  }
}

export class PoolExhaustedError extends AppError {
  constructor(kind: EquipmentKind, details: ErrorDetails & { available: number }) {
    super(
      "POOL_EXHAUSTED",
      `No ${kind} template sheets left (pool held ${details.available})`,
      422,
      { ...details, rule: "sheet-pool" }
    );
  }
}

export class AreaCapacityError extends AppError {
  constructor(details: ErrorDetails & { capacity: number; requested: number }) {
    super(
      "AREA_CAPACITY_EXCEEDED",
      `Area '${details.area ?? ""}' has ${details.requested} items but a sheet holds ${details.capacity}`,
      422,
      { ...details, rule: "items-per-sheet" }
    );
  }
}

export class WorkbookIntegrityError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("WORKBOOK_INTEGRITY", message, 500, { ...details, rule: "integrity-pass" });
  }
}

export class WorkbookReadError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("WORKBOOK_UNREADABLE", message, 422, details);
  }
}

export class TemplateNotFoundError extends AppError {
  constructor(templateId: string) {
    super("TEMPLATE_NOT_FOUND", `Template '${templateId}' not found`, 404, { template: templateId });
  }
}

export class TemplateRenderError extends AppError {
  constructor(templateId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("TEMPLATE_RENDER_FAILED", `Template '${templateId}' failed to render: ${reason}`, 500, {
      template: templateId,
    });
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new AppError("INTERNAL", message, 500);
}
