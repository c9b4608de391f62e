// apps/api/src/kitchen/transfer-create.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { z } from "zod";
import type { AppServices } from "../app";
import { created } from "../common/responses";
import { quantityOf } from "../inventory/schemas";
import { parseBody } from "../shared/body";
import type { Ctx } from "../shared/ctx";

const TransferBody = z.object({
  itemId: z.string().trim().min(1, "itemId is required"),
  quantity: z.union([z.number(), z.string()]),
  note: z.string().trim().optional().transform((s) => s || undefined),
});

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const body = parseBody(event, TransferBody);
  const result = await app.kitchen.transfer(
    { itemId: body.itemId, quantity: quantityOf(body.quantity) ?? 0, note: body.note },
    { username: ctx.username },
    ctx.log
  );
  return created(result);
}
