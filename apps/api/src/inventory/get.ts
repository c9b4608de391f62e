// apps/api/src/inventory/get.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { ok } from "../common/responses";
import { pathId } from "../shared/ctx";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices) {
  const item = await app.store.get(pathId(event));
  return ok({ ...item, lowStock: app.store.isLowStock(item) });
}
