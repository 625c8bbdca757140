import { compactDate } from "../document/formatters";
import type { ProjectMeta } from "../../types/project";

const REVISION = /^[A-Z]*$/;

/**
 * Next revision letter: none → A, A → B, Z → AA, AZ → BA.
 * Counts like spreadsheet column letters.
 */
export function nextRevision(current: string): string {
  const revision = current.trim().toUpperCase();
  if (!REVISION.test(revision)) throw new Error(`Invalid revision '${current}'`);
  let value = 0;
  for (const char of revision) value = value * 26 + (char.charCodeAt(0) - 64);
  value += 1;
  let next = "";
  while (value > 0) {
    const digit = (value - 1) % 26;
    next = String.fromCharCode(65 + digit) + next;
    value = Math.floor((value - 1) / 26);
  }
  return next;
}

function safeSegment(value: string): string {
  return value.replace(/[\\/:*?"<>|]/g, "-").trim();
}

/** `{number} {kind} {DDMMYYYY}[ Rev X]{ext}`. No revision yet means no suffix at all. */
export function outputFileName(meta: Pick<ProjectMeta, "projectNumber" | "date" | "revision">, kind: string, extension: string): string {
  const ext = extension.startsWith(".") ? extension : `.${extension}`;
  const revision = meta.revision.trim() ? ` Rev ${meta.revision.trim()}` : "";
  return `${safeSegment(meta.projectNumber)} ${kind} ${compactDate(meta.date)}${revision}${ext}`;
}
