// apps/api/src/inventory/movements.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AppServices } from "../app";
import { validationError } from "../common/errors";
import { ok } from "../common/responses";
import { queryParam } from "../shared/body";
import type { LedgerQuery } from "./ledger";
import { asMovementAction } from "./types";

/** ?type=purchase|transfer|…&from=&to=&date=&limit= */
export function ledgerQueryOf(event: APIGatewayProxyEventV2): LedgerQuery {
  const type = queryParam(event, "type") ?? queryParam(event, "action");
  const action = type && type !== "all" ? asMovementAction(type) : undefined;
  if (type && type !== "all" && !action) throw validationError(`Unknown transaction type: ${type}`, { type });

  const limitRaw = queryParam(event, "limit");
  const limit = limitRaw === undefined ? undefined : Number(limitRaw);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw validationError("limit must be a positive integer", { limit: limitRaw });
  }

  return {
    action,
    from: queryParam(event, "from"),
    to: queryParam(event, "to"),
    date: queryParam(event, "date"),
    limit,
  };
}

export async function handle(event: APIGatewayProxyEventV2, app: AppServices) {
  const page = await app.ledger.list(ledgerQueryOf(event));
  return ok(page);
}
