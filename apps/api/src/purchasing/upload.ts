// apps/api/src/purchasing/upload.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { z } from "zod";
import type { AppServices } from "../app";
import { ok } from "../common/responses";
import { binaryBody, isJsonRequest, parseBody } from "../shared/body";
import type { Ctx } from "../shared/ctx";

const BulkBody = z.object({
  rows: z.array(z.record(z.unknown())).min(1, "rows must not be empty"),
});

/**
 * Confirm a bulk purchase: JSON { rows } (typically the edited preview) or
 * the .xlsx file itself.
 */
export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const actor = { username: ctx.username };
  const result = isJsonRequest(event)
    ? await app.intake.bulkRecord(parseBody(event, BulkBody).rows, actor, ctx.log)
    : await app.intake.recordUpload(binaryBody(event), actor, ctx.log);
  return ok(result);
}
