// apps/api/src/inventory/movements-export.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { logger } from "../common/logger";
import { file } from "../common/responses";
import type { Ctx } from "../shared/ctx";
import { XLSX_CONTENT_TYPE } from "../shared/spreadsheet";
import { ledgerQueryOf } from "./movements";

export async function handle(event: APIGatewayProxyEventV2, app: AppServices, ctx: Ctx) {
  const out = await app.ledger.export(ledgerQueryOf(event));
  if (out.truncated) {
    logger.warn(ctx.log, "ledger export truncated", { fileName: out.fileName, rows: out.count });
  } else {
    logger.info(ctx.log, "ledger exported", { fileName: out.fileName, rows: out.count });
  }
  return file(out.content, XLSX_CONTENT_TYPE, out.fileName, { "x-export-truncated": String(out.truncated) });
}
