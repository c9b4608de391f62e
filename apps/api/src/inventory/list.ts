// apps/api/src/inventory/list.ts
import type { AppServices } from "../app";
import { ok } from "../common/responses";

/** Dashboard: every item plus per-category counts and the low-stock list. */
export async function handle(app: AppServices) {
  const [items, summary] = await Promise.all([app.store.list(), app.store.summary()]);
  return ok({ items, summary });
}
