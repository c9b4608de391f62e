// apps/api/src/categories/update.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { emitDomainEvent } from "../common/logger";
import { ok } from "../common/responses";
import { parseBody } from "../shared/body";
import { pathId, type Ctx } from "../shared/ctx";
import { CategoryBody } from "./schemas";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const result = await app.categories.update(pathId(event), parseBody(event, CategoryBody));
  emitDomainEvent(ctx.log, "category.updated", {
    categoryId: result.category.id,
    name: result.category.name,
    itemsUpdated: result.itemsUpdated,
  });
  return ok(result);
}
