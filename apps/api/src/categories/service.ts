// apps/api/src/categories/service.ts
import { conflict, notFound, validationError } from "../common/errors";
import { DEFAULT_CATEGORIES, iconFor } from "../inventory/catalog";
import type { InventoryRepo } from "../inventory/repo";
import type { ItemStore } from "../inventory/store";
import { nameKey, type Category, type Item } from "../inventory/types";
import { retryOnConflict } from "../shared/retry";

export type CategoryInput = { name: string; icon?: string };

const byName = (a: Category, b: Category) => a.name.localeCompare(b.name);

export class CategoryService {
  constructor(
    private readonly repo: InventoryRepo,
    private readonly store: ItemStore
  ) {}

  /** All categories by name; the defaults are written on first use. */
  async list(): Promise<Category[]> {
    const existing = await this.repo.listCategories();
    if (existing.length > 0) return existing.sort(byName);

    const createdAt = this.store.now().toISOString();
    const seeded = DEFAULT_CATEGORIES.map((c) => ({ id: this.store.newId(), name: c.name, icon: c.icon, createdAt }));
    for (const c of seeded) await this.repo.putCategory(c);
    return seeded.sort(byName);
  }

  /** Case-insensitive lookup of a category by name. */
  async findByName(name: string): Promise<Category | undefined> {
    const key = nameKey(name);
    const all = await this.list();
    return all.find((c) => nameKey(c.name) === key);
  }

  async add(input: CategoryInput): Promise<Category> {
    const name = this.cleanName(input.name);
    if (await this.findByName(name)) throw conflict(`Category "${name}" already exists`, { name });

    const category: Category = {
      id: this.store.newId(),
      name,
      icon: input.icon?.trim() || iconFor(name),
      createdAt: this.store.now().toISOString(),
    };
    await this.repo.putCategory(category);
    return category;
  }

  /** Rename and/or re-icon; a rename is carried over to every item in the category. */
  async update(id: string, input: CategoryInput): Promise<{ category: Category; itemsUpdated: number }> {
    const current = await this.repo.getCategory(id);
    if (!current) throw notFound("Category", id);

    const name = this.cleanName(input.name);
    const clash = await this.findByName(name);
    if (clash && clash.id !== id) throw conflict(`Category "${name}" already exists`, { name });

    const category: Category = { ...current, name, icon: input.icon?.trim() || current.icon };
    await this.repo.putCategory(category);

    let itemsUpdated = 0;
    if (current.name !== name) {
      for (const it of await this.itemsIn(current)) {
        await retryOnConflict(async () => {
          const before = await this.store.get(it.id);
          await this.store.apply({ before, after: { ...before, category: name } });
        });
        itemsUpdated += 1;
      }
    }
    return { category, itemsUpdated };
  }

  async delete(id: string): Promise<void> {
    const current = await this.repo.getCategory(id);
    if (!current) throw notFound("Category", id);

    const inUse = (await this.itemsIn(current)).length;
    if (inUse > 0) {
      throw conflict(`Category "${current.name}" is used by ${inUse} item(s)`, { name: current.name, inUse });
    }
    await this.repo.deleteCategory(id);
  }

  /** Items filed under the category, whatever the case of their stored category name. */
  private async itemsIn(category: Category): Promise<Item[]> {
    const key = nameKey(category.name);
    return (await this.store.list()).filter((i) => nameKey(i.category) === key);
  }

  private cleanName(raw: string): string {
    const name = raw.trim().replace(/\s+/g, " ");
    if (!name) throw validationError("Category name is required");
    return name;
  }
}
