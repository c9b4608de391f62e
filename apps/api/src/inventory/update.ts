// apps/api/src/inventory/update.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { emitDomainEvent } from "../common/logger";
import { ok } from "../common/responses";
import { parseBody } from "../shared/body";
import { pathId, type Ctx } from "../shared/ctx";
import { retryOnConflict } from "../shared/retry";
import { normalizeUnit } from "./catalog";
import { ItemUpdateBody, priceOf, quantityOf } from "./schemas";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const id = pathId(event);
  const body = parseBody(event, ItemUpdateBody);
  const category = body.category ? (await app.categories.findByName(body.category))?.name ?? body.category : undefined;

  const item = await retryOnConflict(() =>
    app.store.update(
      id,
      {
        name: body.name,
        category,
        unit: body.unit ? normalizeUnit(body.unit) ?? body.unit : undefined,
        quantity: quantityOf(body.quantity),
        unitPrice: priceOf(body.unitPrice),
      },
      { username: ctx.username }
    )
  );
  emitDomainEvent(ctx.log, "inventory.itemUpdated", { itemId: item.id, itemName: item.name, quantity: item.quantity });
  return ok(item);
}
