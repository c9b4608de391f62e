// apps/api/src/inventory/in-stock.ts
import type { AppServices } from "../app";
import { ok } from "../common/responses";

export async function handle(app: AppServices) {
  const items = await app.store.inStock();
  return ok({
    items: items.map((it) => ({
      id: it.id,
      name: it.name,
      category: it.category,
      unit: it.unit,
      quantity: it.quantity,
      unitPrice: it.unitPrice,
    })),
  });
}
