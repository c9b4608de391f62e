// apps/api/src/inventory/repo.ts
import { conflict, duplicateName } from "../common/errors";
import { nameKey, type Category, type Item, type ItemChange, type Movement, type MovementQuery } from "./types";

/**
 * Persistence port for the store room. Implementations must apply an
 * ItemChange atomically: the item write, its name lock and the movement
 * either all land or none do.
 *
 * Conditions every implementation enforces:
 * - create: id unused, name free
 * - update/delete: stored version equals `before.version`
 * - rename: new name free
 */
export interface InventoryRepo {
  getItem(id: string): Promise<Item | null>;
  findItemByName(name: string): Promise<Item | null>;
  listItems(): Promise<Item[]>;
  commitItem(change: ItemChange): Promise<void>;
  listMovements(query: MovementQuery): Promise<Movement[]>;
  listCategories(): Promise<Category[]>;
  getCategory(id: string): Promise<Category | null>;
  putCategory(category: Category): Promise<void>;
  deleteCategory(id: string): Promise<void>;
}

export const VERSION_CONFLICT = "Item was changed by another request; reload and retry";

/** Newest first, ties broken by id so paging is stable. */
export function byNewest(a: Movement, b: Movement) {
  if (a.at !== b.at) return a.at < b.at ? 1 : -1;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/** In-process repository for tests and STORE_DRIVER=memory. */
export class MemoryInventoryRepo implements InventoryRepo {
  private readonly items = new Map<string, Item>();
  private readonly names = new Map<string, string>();
  private readonly movements: Movement[] = [];
  private readonly categories = new Map<string, Category>();

  async getItem(id: string) {
    const it = this.items.get(id);
    return it ? { ...it } : null;
  }

  async findItemByName(name: string) {
    const id = this.names.get(nameKey(name));
    return id ? this.getItem(id) : null;
  }

  async listItems() {
    return Array.from(this.items.values(), (it) => ({ ...it }));
  }

  async commitItem({ before, after, movement }: ItemChange) {
    const id = before?.id ?? after?.id;
    if (!id) return;
    const stored = this.items.get(id);

    if (before) {
      if (!stored || stored.version !== before.version) throw conflict(VERSION_CONFLICT, { id });
    } else if (stored) {
      throw conflict(VERSION_CONFLICT, { id });
    }

    if (after) {
      const owner = this.names.get(nameKey(after.name));
      if (owner && owner !== id) throw duplicateName(after.name);
    }

    // all conditions hold: apply
    if (before) this.names.delete(nameKey(before.name));
    if (after) {
      this.items.set(id, { ...after });
      this.names.set(nameKey(after.name), id);
    } else {
      this.items.delete(id);
    }
    if (movement) this.movements.push({ ...movement });
  }

  async listMovements({ action, fromAt, toAt, limit }: MovementQuery) {
    return this.movements
      .filter((m) => m.at >= fromAt && m.at < toAt && (!action || m.action === action))
      .sort(byNewest)
      .slice(0, limit)
      .map((m) => ({ ...m }));
  }

  async listCategories() {
    return Array.from(this.categories.values(), (c) => ({ ...c }));
  }

  async getCategory(id: string) {
    const c = this.categories.get(id);
    return c ? { ...c } : null;
  }

  async putCategory(category: Category) {
    this.categories.set(category.id, { ...category });
  }

  async deleteCategory(id: string) {
    this.categories.delete(id);
  }
}
