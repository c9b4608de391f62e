// apps/api/src/inventory/store.ts
// Item Store: the only writer of Item records. Every mutation goes through apply().
import { randomUUID } from "node:crypto";
import { conflict, invalidQuantity, notFound, validationError } from "../common/errors";
import { roundQty } from "../shared/quantity";
import type { InventoryRepo } from "./repo";
import type { Actor, Item, ItemChange, Movement, MovementAction } from "./types";

export type ItemDraft = Omit<Item, "version" | "createdAt" | "updatedAt"> & Partial<Pick<Item, "createdAt">>;

export type ItemFields = {
  name: string;
  category: string;
  unit: string;
  quantity: number;
  unitPrice?: number | null;
};

export type ItemPatch = Partial<ItemFields>;

/** What apply() commits: the item as read, the desired next state, and the movement to record. */
export type StoreChange = {
  before: Item | null;
  after: ItemDraft | null;
  movement?: Omit<Movement, "id" | "at">;
};

export type Committed = { item: Item | null; movement: Movement | null };

export type CategorySummary = { category: string; itemCount: number; inStock: number; outOfStock: number };

export type InventorySummary = {
  totalItems: number;
  categories: CategorySummary[];
  lowStock: Item[];
};

export type ItemStoreOptions = {
  repo: InventoryRepo;
  lowStockThresholdPercent: number;
  now?: () => Date;
  newId?: () => string;
};

const byCategoryThenName = (a: Item, b: Item) =>
  a.category.localeCompare(b.category) || a.name.localeCompare(b.name);

export class ItemStore {
  private readonly repo: InventoryRepo;
  private readonly thresholdPercent: number;
  readonly now: () => Date;
  readonly newId: () => string;

  constructor(opts: ItemStoreOptions) {
    this.repo = opts.repo;
    this.thresholdPercent = opts.lowStockThresholdPercent;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? (() => randomUUID());
  }

  async get(id: string): Promise<Item> {
    const item = await this.repo.getItem(id);
    if (!item) throw notFound("Item", id);
    return item;
  }

  async list(): Promise<Item[]> {
    const items = await this.repo.listItems();
    return items.sort(byCategoryThenName);
  }

  findByName(name: string): Promise<Item | null> {
    return this.repo.findItemByName(name);
  }

  async inStock(): Promise<Item[]> {
    const items = await this.list();
    return items.filter((it) => it.quantity > 0);
  }

  /** Below threshold: less than N% of everything ever purchased is left. */
  isLowStock(item: Pick<Item, "quantity" | "totalPurchased">): boolean {
    if (item.totalPurchased <= 0) return false;
    return item.quantity < item.totalPurchased * (this.thresholdPercent / 100);
  }

  async summary(): Promise<InventorySummary> {
    const items = await this.list();
    const byCategory = new Map<string, CategorySummary>();
    for (const it of items) {
      const row = byCategory.get(it.category) ?? { category: it.category, itemCount: 0, inStock: 0, outOfStock: 0 };
      row.itemCount += 1;
      if (it.quantity > 0) row.inStock += 1;
      else row.outOfStock += 1;
      byCategory.set(it.category, row);
    }
    return {
      totalItems: items.length,
      categories: Array.from(byCategory.values()),
      lowStock: items.filter((it) => this.isLowStock(it)),
    };
  }

  async create(fields: ItemFields, actor: Actor): Promise<Item> {
    const quantity = this.checkQuantity(fields.quantity);
    const draft: ItemDraft = {
      id: this.newId(),
      name: fields.name,
      category: fields.category,
      unit: fields.unit,
      quantity,
      unitPrice: fields.unitPrice ?? null,
      totalPurchased: 0,
    };
    const { item } = await this.apply({
      before: null,
      after: draft,
      movement: this.movementFor(draft, "create", quantity, actor),
    });
    return this.committedItem(item);
  }

  async update(id: string, patch: ItemPatch, actor: Actor): Promise<Item> {
    const before = await this.get(id);
    const after: ItemDraft = {
      ...before,
      ...(patch.name !== undefined && { name: patch.name }),
      ...(patch.category !== undefined && { category: patch.category }),
      ...(patch.unit !== undefined && { unit: patch.unit }),
      ...(patch.unitPrice !== undefined && { unitPrice: patch.unitPrice }),
      ...(patch.quantity !== undefined && { quantity: this.checkQuantity(patch.quantity) }),
    };
    const delta = roundQty(after.quantity - before.quantity);
    const { item } = await this.apply({
      before,
      after,
      movement: delta !== 0 ? this.movementFor(after, "adjust", delta, actor) : undefined,
    });
    return this.committedItem(item);
  }

  async delete(id: string, actor: Actor): Promise<void> {
    const before = await this.get(id);
    await this.apply({ before, after: null, movement: this.movementFor(before, "delete", before.quantity, actor) });
  }

  /**
   * Single commit path. Validates the next state, bumps the version and hands
   * item + movement to the repository as one conditional write.
   */
  async apply(change: StoreChange): Promise<Committed> {
    const at = this.now().toISOString();
    let after: Item | null = null;

    if (change.after) {
      const d = change.after;
      const name = d.name.trim().replace(/\s+/g, " ");
      const category = d.category.trim();
      const unit = d.unit.trim();
      if (!name) throw validationError("name is required");
      if (!category) throw validationError("category is required");
      if (!unit) throw validationError("unit is required");
      const quantity = this.checkQuantity(d.quantity);

      after = {
        id: d.id,
        name,
        category,
        unit,
        quantity,
        unitPrice: d.unitPrice,
        totalPurchased: roundQty(d.totalPurchased),
        version: (change.before?.version ?? 0) + 1,
        createdAt: change.before?.createdAt ?? d.createdAt ?? at,
        updatedAt: at,
      };
    }

    const movement: Movement | null = change.movement ? { ...change.movement, id: this.newId(), at } : null;
    const committed: ItemChange = { before: change.before, after, movement: movement ?? undefined };
    await this.repo.commitItem(committed);
    return { item: after, movement };
  }

  movementFor(
    item: Pick<Item, "id" | "name" | "category" | "unit">,
    action: MovementAction,
    qty: number,
    actor: Actor,
    extra: Partial<Pick<Movement, "unitPrice" | "amount" | "vendor" | "note">> = {}
  ): Omit<Movement, "id" | "at"> {
    return {
      itemId: item.id,
      itemName: item.name.trim().replace(/\s+/g, " "),
      category: item.category,
      unit: item.unit,
      action,
      qty,
      unitPrice: extra.unitPrice ?? null,
      amount: extra.amount ?? null,
      vendor: extra.vendor ?? null,
      note: extra.note ?? null,
      actor: actor.username,
    };
  }

  private checkQuantity(q: number): number {
    if (!Number.isFinite(q)) throw invalidQuantity("quantity must be a finite number", { quantity: String(q) });
    if (q < 0) throw invalidQuantity("quantity cannot be negative", { quantity: q });
    return roundQty(q);
  }

  private committedItem(item: Item | null): Item {
    if (!item) throw conflict("Item was not written");
    return item;
  }
}
