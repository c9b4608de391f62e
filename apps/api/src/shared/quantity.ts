// apps/api/src/shared/quantity.ts
// Stock is kept to 3 decimals (grams / millilitres on KG / LTR units).

const QTY_DECIMALS = 3;
const FACTOR = 10 ** QTY_DECIMALS;

export function roundQty(n: number): number {
  return Math.round(n * FACTOR) / FACTOR;
}

/**
 * Accepts numbers and numeric strings ("12", " 2.5 "); anything else is null.
 * Blank strings are null rather than 0.
 */
export function parseNumber(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string") {
    const s = v.trim();
    if (!s) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Non-negative quantity rounded to 3 decimals, or null when it does not parse. */
export function parseQuantity(v: unknown): number | null {
  const n = parseNumber(v);
  if (n === null || n < 0) return null;
  return roundQty(n);
}
