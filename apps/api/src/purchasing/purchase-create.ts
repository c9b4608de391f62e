// apps/api/src/purchasing/purchase-create.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { z } from "zod";
import type { AppServices } from "../app";
import { created, ok } from "../common/responses";
import { priceOf, quantityOf } from "../inventory/schemas";
import { parseBody } from "../shared/body";
import type { Ctx } from "../shared/ctx";

const optionalText = z.string().trim().optional().transform((s) => s || undefined);

const PurchaseBody = z.object({
  name: z.string().trim().min(1, "name is required"),
  quantity: z.union([z.number(), z.string()]),
  unitPrice: z.union([z.number(), z.string()]).nullable().optional(),
  category: optionalText,
  unit: optionalText,
  vendor: optionalText,
  note: optionalText,
});

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const body = parseBody(event, PurchaseBody);
  const result = await app.intake.recordPurchase(
    {
      name: body.name,
      quantity: quantityOf(body.quantity) ?? 0,
      unitPrice: priceOf(body.unitPrice) ?? null,
      category: body.category,
      unit: body.unit,
      vendor: body.vendor,
      note: body.note,
    },
    { username: ctx.username },
    ctx.log
  );
  return result.created ? created(result) : ok(result);
}
