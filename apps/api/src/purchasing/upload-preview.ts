// apps/api/src/purchasing/upload-preview.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { logger } from "../common/logger";
import { ok } from "../common/responses";
import { binaryBody } from "../shared/body";
import type { Ctx } from "../shared/ctx";

/** Parse an .xlsx upload and show how each row would land, without writing anything. */
export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const preview = await app.intake.previewUpload(binaryBody(event));
  logger.info(ctx.log, "upload previewed", { rows: preview.count, warnings: preview.warningCount });
  return ok(preview);
}
