// apps/api/src/categories/delete.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { emitDomainEvent } from "../common/logger";
import { ok } from "../common/responses";
import { pathId, type Ctx } from "../shared/ctx";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const id = pathId(event);
  await app.categories.delete(id);
  emitDomainEvent(ctx.log, "category.deleted", { categoryId: id });
  return ok({ id, deleted: true });
}
