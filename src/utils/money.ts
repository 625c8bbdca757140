import { config } from "../config";

/** Money is carried in major units at the edges and summed in pence internally. */
export function toMinor(amount: number): number {
  if (!Number.isFinite(amount)) return 0;
  return Math.round(amount * 100);
}

export function fromMinor(minor: number): number {
  return minor / 100;
}

export function sumMinor(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/**
 * Splits a pool into `count` shares that add back to the pool exactly.
 * The remainder of the integer division lands on the first share.
 */
export function splitMinor(poolMinor: number, count: number): number[] {
  if (count <= 0) return [];
  const base = Math.trunc(poolMinor / count);
  const remainder = poolMinor - base * count;
  return Array.from({ length: count }, (_, idx) => (idx === 0 ? base + remainder : base));
}

const moneyFormatter = new Intl.NumberFormat(config.currencyLocale, {
  style: "currency",
  currency: config.currency,
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatMoney(amount: number): string {
  return moneyFormatter.format(amount);
}
