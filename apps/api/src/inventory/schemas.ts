// apps/api/src/inventory/schemas.ts
import { z } from "zod";
import { invalidQuantity } from "../common/errors";
import { parseNumber } from "../shared/quantity";

const text = z.string().trim().min(1);
const numeric = z.union([z.number(), z.string()]);

export const ItemCreateBody = z.object({
  name: text,
  category: text.optional(),
  unit: text.optional(),
  quantity: numeric.optional(),
  unitPrice: numeric.nullable().optional(),
});

export const ItemUpdateBody = z
  .object({
    name: text.optional(),
    category: text.optional(),
    unit: text.optional(),
    quantity: numeric.optional(),
    unitPrice: numeric.nullable().optional(),
  })
  .refine((b) => Object.values(b).some((v) => v !== undefined), { message: "nothing to update" });

/** Quantity field → number; anything non-numeric is InvalidQuantity rather than a schema error. */
export function quantityOf(raw: number | string | undefined, fallback?: number): number | undefined {
  if (raw === undefined) return fallback;
  const n = parseNumber(raw);
  if (n === null) throw invalidQuantity("quantity must be a number", { quantity: String(raw) });
  return n;
}

/** Price field → number, null to clear, undefined to leave as is. */
export function priceOf(raw: number | string | null | undefined): number | null | undefined {
  if (raw === undefined || raw === null) return raw;
  const n = parseNumber(raw);
  return n !== null && n >= 0 ? n : null;
}
