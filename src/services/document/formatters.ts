import { NOT_APPLICABLE } from "../../types/pricing";

export const BLANK = "-";
export const TBD = "TBD";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

type RawValue = string | number | boolean | null | undefined;

function isBlank(value: RawValue): boolean {
  if (value === null || value === undefined) return true;
  const text = String(value).trim();
  return text === "" || text.toLowerCase() === "none" || text === NOT_APPLICABLE || text === BLANK;
}

export function displayValue(value: RawValue): string {
  return isBlank(value) ? BLANK : String(value).trim();
}

/** Collapses the lighting vocabulary to the labels used in documents. */
export function lightingLabel(value: RawValue): string {
  if (isBlank(value)) return BLANK;
  const text = String(value).trim().toUpperCase();
  if (text === "LIGHT SELECTION") return BLANK;
  if (text.includes("LED STRIP")) return "LED STRIP";
  if (text.includes("SPOT")) return "LED SPOTS";
  return BLANK;
}

/** "250 Pa" → "250". */
export function staticPressure(value: RawValue): string {
  if (isBlank(value)) return BLANK;
  const cleaned = String(value).replace(/pa/gi, "").trim();
  return cleaned === "" ? BLANK : cleaned;
}

/** Volumes show one decimal place; text that is not a number passes through. */
export function volume(value: RawValue): string {
  if (isBlank(value)) return BLANK;
  const numeric = typeof value === "number" ? value : Number(String(value).trim());
  if (!Number.isFinite(numeric)) return String(value).trim();
  return (Math.round(numeric * 10) / 10).toFixed(1);
}

export function tankQuantity(value: number | null | undefined): string {
  return typeof value === "number" && value > 0 ? String(value) : TBD;
}

function dateParts(date: string): { day: string; month: number; year: string } | null {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(date.trim());
  if (!match) return null;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return { day: match[1].padStart(2, "0"), month, year: match[3] };
}

/** "18/10/2026" → "18 October 2026". Anything unparseable is shown as given. */
export function longDate(date: string): string {
  const parts = dateParts(date);
  if (!parts) return displayValue(date);
  return `${parts.day} ${MONTHS[parts.month - 1]} ${parts.year}`;
}

/** `{number}/{MM}/{YY}` from the project date. */
export function quoteReference(projectNumber: string, date: string): string {
  const parts = dateParts(date);
  if (!parts) return `${projectNumber}/XX/XX`;
  return `${projectNumber}/${String(parts.month).padStart(2, "0")}/${parts.year.slice(-2)}`;
}

/** DDMMYYYY for file names. */
export function compactDate(date: string): string {
  const parts = dateParts(date);
  if (!parts) return date.replace(/[^0-9]/g, "");
  return `${parts.day}${String(parts.month).padStart(2, "0")}${parts.year}`;
}

export function claddingDescription(positions: string[]): string {
  const cleaned = positions.map((position) => position.trim()).filter(Boolean);
  if (cleaned.length === 0) return "Cladding to walls";
  if (cleaned.length === 1) return `Cladding to ${cleaned[0]} walls`;
  return `Cladding to ${cleaned.slice(0, -1).join(", ")} and ${cleaned[cleaned.length - 1]} walls`;
}

export function dearLine(customer: string | undefined): string {
  return customer && customer.trim() ? `${customer.trim()},` : "Sir/Madam,";
}

export function subjectLine(projectName: string, location: string | undefined): string {
  return location && location.trim() ? `${projectName}, ${location.trim()}` : projectName;
}
