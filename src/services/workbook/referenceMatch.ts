import stringSimilarity from "string-similarity";
import { normalizeReference } from "../../utils/text";

export const SIMILARITY_THRESHOLD = 0.8;

const rawKey = (reference: string) => reference.trim().toUpperCase();

/** Index of the only entry equal to `key`, -1 when none or several are. */
function onlyIndex(keys: readonly string[], key: string): number {
  const first = keys.indexOf(key);
  if (first < 0 || keys.indexOf(key, first + 1) >= 0) return -1;
  return first;
}

/** Longest key that prefixes `code`; a tie between distinct keys of that length matches nothing. */
function longestPrefix(keys: readonly string[], code: string): number {
  let best = -1;
  let tied = false;
  keys.forEach((key, idx) => {
    if (!key || !code.startsWith(key)) return;
    if (best < 0 || key.length > keys[best].length) {
      best = idx;
      tied = false;
    } else if (key.length === keys[best].length) {
      tied = true;
    }
  });
  return tied ? -1 : best;
}

/**
 * Finds which known reference a code read from a sheet belongs to. The code
 * as typed is tried first, so references that only differ in punctuation
 * ("1.11", "11.1") keep apart. Users append free text to codes after sheets
 * are made ("K1 rev", "K1-OLD"), so the longest known reference that
 * prefixes the code wins, and a close fuzzy match is accepted when nothing
 * prefixes it. Normalized keys shared by several references never match.
 * Returns the index into `references`, or -1.
 */
export function matchReference(code: string, references: readonly string[]): number {
  const raw = rawKey(code);
  const normalized = normalizeReference(code);
  if (!normalized || references.length === 0) return -1;

  const rawKnown = references.map(rawKey);
  const exact = rawKnown.indexOf(raw);
  if (exact >= 0) return exact;

  const known = references.map(normalizeReference);
  const loose = onlyIndex(known, normalized);
  if (loose >= 0) return loose;

  const rawPrefix = longestPrefix(rawKnown, raw);
  if (rawPrefix >= 0) return rawPrefix;

  const prefix = longestPrefix(known, normalized);
  if (prefix >= 0) return prefix;

  const candidates = known.filter(Boolean);
  if (candidates.length === 0) return -1;
  const { bestMatch } = stringSimilarity.findBestMatch(normalized, candidates);
  if (bestMatch.rating < SIMILARITY_THRESHOLD) return -1;
  return onlyIndex(known, bestMatch.target);
}
