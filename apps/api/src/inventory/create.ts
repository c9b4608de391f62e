// apps/api/src/inventory/create.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { emitDomainEvent } from "../common/logger";
import { created } from "../common/responses";
import { parseBody } from "../shared/body";
import type { Ctx } from "../shared/ctx";
import { detectFromName, normalizeUnit } from "./catalog";
import { ItemCreateBody, priceOf, quantityOf } from "./schemas";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const body = parseBody(event, ItemCreateBody);
  const detected = detectFromName(body.name);
  const category = body.category ? (await app.categories.findByName(body.category))?.name ?? body.category : detected.category;

  const item = await app.store.create(
    {
      name: body.name,
      category,
      unit: body.unit ? normalizeUnit(body.unit) ?? body.unit : detected.unit,
      quantity: quantityOf(body.quantity, 0) ?? 0,
      unitPrice: priceOf(body.unitPrice) ?? null,
    },
    { username: ctx.username }
  );
  emitDomainEvent(ctx.log, "inventory.itemCreated", { itemId: item.id, itemName: item.name, quantity: item.quantity });
  return created(item);
}
