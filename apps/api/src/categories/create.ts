// apps/api/src/categories/create.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { emitDomainEvent } from "../common/logger";
import { created } from "../common/responses";
import { parseBody } from "../shared/body";
import type { Ctx } from "../shared/ctx";
import { CategoryBody } from "./schemas";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const category = await app.categories.add(parseBody(event, CategoryBody));
  emitDomainEvent(ctx.log, "category.created", { categoryId: category.id, name: category.name });
  return created(category);
}
