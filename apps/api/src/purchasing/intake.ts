// apps/api/src/purchasing/intake.ts
// Purchase Intake: single purchases, bulk rows and spreadsheet uploads, all merged by item name.
import type { CategoryService } from "../categories/service";
import { conflict, errorMessage, invalidQuantity, isApiError, validationError } from "../common/errors";
import { emitDomainEvent, logger, type LogCtx } from "../common/logger";
import { detectFromName, normalizeUnit } from "../inventory/catalog";
import type { ItemStore } from "../inventory/store";
import type { Actor, Item, Movement } from "../inventory/types";
import { parseNumber, parseQuantity, roundQty } from "../shared/quantity";
import { retryOnConflict } from "../shared/retry";
import { parsePurchaseSheet, type SheetRow } from "../shared/spreadsheet";

export type PurchaseInput = {
  name: string;
  quantity: number;
  unitPrice?: number | null;
  category?: string;
  unit?: string;
  vendor?: string;
  note?: string;
};

export type PurchaseResult = { item: Item; movement: Movement; created: boolean };

/** A bulk row as it arrives (JSON body or spreadsheet); fields are checked one by one. */
export type BulkRow = Record<string, unknown>;

export type RejectedRow = { index: number; row: BulkRow; reason: string };

export type BulkResult = { applied: number; rejected: RejectedRow[]; items: Item[] };

export type PreviewRow = {
  rowNumber: number;
  name: string;
  quantity: number | null;
  unitPrice: number | null;
  vendor: string | null;
  category: string;
  unit: string;
  autoDetected: boolean;
  existing: boolean;
  currentQuantity: number | null;
  problem: string | null;
};

export type UploadPreview = {
  items: PreviewRow[];
  count: number;
  warningCount: number;
  warningItems: string[];
};

const text = (v: unknown): string | undefined => {
  if (typeof v !== "string" && typeof v !== "number") return undefined;
  const s = String(v).trim();
  return s || undefined;
};

type ValidRow = { ok: true; input: PurchaseInput } | { ok: false; reason: string };

/** Row checks shared by bulk JSON and spreadsheet rows. Bad prices are dropped, not rejected. */
export function validateRow(row: BulkRow): ValidRow {
  const name = text(row.name);
  if (!name) return { ok: false, reason: "name is required" };
  const quantity = parseQuantity(row.quantity);
  if (quantity === null) return { ok: false, reason: "quantity must be a non-negative number" };
  const price = parseNumber(row.unitPrice);
  return {
    ok: true,
    input: {
      name,
      quantity,
      unitPrice: price !== null && price >= 0 ? price : null,
      category: text(row.category),
      unit: text(row.unit),
      vendor: text(row.vendor),
      note: text(row.note),
    },
  };
}

export class PurchaseIntake {
  constructor(
    private readonly store: ItemStore,
    private readonly categories: CategoryService
  ) {}

  /**
   * Merge a purchase into the store by name. Existing items gain quantity;
   * a provided unit/category/price replaces the stored one.
   */
  async recordPurchase(input: PurchaseInput, actor: Actor, ctx?: LogCtx): Promise<PurchaseResult> {
    const name = input.name.trim().replace(/\s+/g, " ");
    if (!name) throw validationError("name is required");
    if (!Number.isFinite(input.quantity)) throw invalidQuantity("quantity must be a finite number");
    if (input.quantity < 0) throw invalidQuantity("quantity cannot be negative", { quantity: input.quantity });

    const qty = roundQty(input.quantity);
    const unitPrice = input.unitPrice ?? null;
    const unit = input.unit ? normalizeUnit(input.unit) ?? input.unit.trim() : undefined;
    const category = input.category ? await this.canonicalCategory(input.category) : undefined;

    const result = await retryOnConflict(async () => {
      const existing = await this.store.findByName(name);
      const base = existing ?? {
        id: this.store.newId(),
        name,
        ...detectFromName(name),
        quantity: 0,
        unitPrice: null,
        totalPurchased: 0,
      };
      const after = {
        id: base.id,
        name: base.name,
        category: category ?? base.category,
        unit: unit ?? base.unit,
        quantity: roundQty(base.quantity + qty),
        unitPrice: unitPrice ?? base.unitPrice,
        totalPurchased: roundQty(base.totalPurchased + qty),
      };
      const movement = this.store.movementFor(after, "purchase", qty, actor, {
        unitPrice,
        amount: unitPrice === null ? null : roundQty(unitPrice * qty),
        vendor: input.vendor ?? null,
        note: input.note ?? null,
      });

      try {
        const committed = await this.store.apply({ before: existing, after, movement });
        if (!committed.item || !committed.movement) throw new Error(`purchase of ${name} committed no item`);
        return { item: committed.item, movement: committed.movement, created: existing === null };
      } catch (err) {
        // lost a race to create the same name: re-read and merge
        if (!existing && isApiError(err) && err.code === "DuplicateName") throw conflict(err.message, { name });
        throw err;
      }
    });

    emitDomainEvent(ctx, "purchase.recorded", {
      itemId: result.item.id,
      itemName: result.item.name,
      qty,
      unitPrice,
      created: result.created,
      quantity: result.item.quantity,
    });
    return result;
  }

  /** Apply every valid row; bad rows are reported and never stop the batch. */
  async bulkRecord(rows: BulkRow[], actor: Actor, ctx?: LogCtx): Promise<BulkResult> {
    const rejected: RejectedRow[] = [];
    const items = new Map<string, Item>();

    for (const [index, row] of rows.entries()) {
      const checked = validateRow(row);
      if (!checked.ok) {
        rejected.push({ index, row, reason: checked.reason });
        continue;
      }
      try {
        const { item } = await this.recordPurchase(checked.input, actor, ctx);
        items.set(item.id, item);
      } catch (err) {
        if (!isApiError(err)) logger.error(ctx, "bulk row failed", { index, error: errorMessage(err) });
        rejected.push({ index, row, reason: errorMessage(err) });
      }
    }

    const applied = rows.length - rejected.length;
    logger.info(ctx, "bulk purchase intake", { applied, rejected: rejected.length });
    emitDomainEvent(ctx, "purchase.bulkRecorded", { applied, rejected: rejected.length });
    return { applied, rejected, items: Array.from(items.values()) };
  }

  /**
   * Resolve each sheet row the way a confirmed upload would store it:
   * sheet value (when valid) → existing item → keyword detection.
   */
  async previewUpload(content: Buffer): Promise<UploadPreview> {
    const rows = await parsePurchaseSheet(content);
    const items: PreviewRow[] = [];
    for (const row of rows) items.push(await this.previewRow(row));

    const warningItems = items.filter((i) => i.autoDetected && !i.problem).map((i) => i.name);
    return { items, count: items.length, warningCount: warningItems.length, warningItems };
  }

  /** Confirmed spreadsheet upload: preview resolution, then bulk intake. */
  async recordUpload(content: Buffer, actor: Actor, ctx?: LogCtx): Promise<BulkResult> {
    const preview = await this.previewUpload(content);
    const rows: BulkRow[] = preview.items.map((p) => ({
      name: p.name,
      quantity: p.quantity,
      unitPrice: p.unitPrice,
      category: p.category,
      unit: p.unit,
      vendor: p.vendor,
    }));
    return this.bulkRecord(rows, actor, ctx);
  }

  private async previewRow(row: SheetRow): Promise<PreviewRow> {
    const checked = validateRow({ ...row });
    const existing = row.name ? await this.store.findByName(row.name) : null;
    const sheetCategory = row.category ? (await this.categories.findByName(row.category))?.name : undefined;
    const sheetUnit = normalizeUnit(row.unit);
    const detected = detectFromName(row.name);

    const category = sheetCategory ?? existing?.category;
    const unit = sheetUnit ?? existing?.unit;
    const price = parseNumber(row.unitPrice);

    return {
      rowNumber: row.rowNumber,
      name: row.name,
      quantity: parseQuantity(row.quantity),
      unitPrice: price !== null && price >= 0 ? price : null,
      vendor: row.vendor || null,
      category: category ?? detected.category,
      unit: unit ?? detected.unit,
      autoDetected: category === undefined,
      existing: existing !== null,
      currentQuantity: existing?.quantity ?? null,
      problem: checked.ok ? null : checked.reason,
    };
  }

  private async canonicalCategory(raw: string): Promise<string> {
    const known = await this.categories.findByName(raw);
    return known?.name ?? raw.trim();
  }
}
