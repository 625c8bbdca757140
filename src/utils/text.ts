/** "Jane Doe" → "JD"; several people split by "/" or "," → "JD/AB". */
export function initials(names: string | undefined | null): string {
  if (!names) return "";
  return names
    .split(/[/,]/)
    .map((name) =>
      name
        .trim()
        .split(/\s+/)
        .filter(Boolean)
        .map((part) => part[0].toUpperCase())
        .join("")
    )
    .filter(Boolean)
    .join("/");
}

/** Uppercased with everything but letters and digits removed, for reference-code joins. */
export function normalizeReference(reference: string): string {
  return reference.toUpperCase().replace(/[^A-Z0-9]/g, "");
}
