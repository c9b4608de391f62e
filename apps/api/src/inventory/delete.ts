// apps/api/src/inventory/delete.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { emitDomainEvent } from "../common/logger";
import { ok } from "../common/responses";
import { pathId, type Ctx } from "../shared/ctx";
import { retryOnConflict } from "../shared/retry";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const id = pathId(event);
  await retryOnConflict(() => app.store.delete(id, { username: ctx.username }));
  emitDomainEvent(ctx.log, "inventory.itemDeleted", { itemId: id });
  return ok({ id, deleted: true });
}
