// apps/api/src/categories/list.ts
import type { AppServices } from "../app";
import { ok } from "../common/responses";
import { nameKey } from "../inventory/types";

export async function handle(app: AppServices) {
  const [categories, items] = await Promise.all([app.categories.list(), app.store.list()]);
  const counts = new Map<string, number>();
  for (const it of items) counts.set(nameKey(it.category), (counts.get(nameKey(it.category)) ?? 0) + 1);
  return ok({ items: categories.map((c) => ({ ...c, itemCount: counts.get(nameKey(c.name)) ?? 0 })) });
}
