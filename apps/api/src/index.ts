// apps/api/src/index.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { createServices, type AppServices } from "./app";
import { getAuth } from "./auth/middleware";
import { capabilitiesOf, requireCapability } from "./auth/policy";
import { isApiError } from "./common/errors";
import { loadConfig } from "./common/env";
import { logger } from "./common/logger";
import { fromError, methodNotAllowed, notFoundRoute, ok, preflight, type ApiResponse } from "./common/responses";
import { buildCtx, requestIdOf, withId } from "./shared/ctx";

/* Routes */
// Auth
import * as Login from "./auth/login";
// Inventory
import * as InvList from "./inventory/list";
import * as InvInStock from "./inventory/in-stock";
import * as InvCreate from "./inventory/create";
import * as InvGet from "./inventory/get";
import * as InvUpdate from "./inventory/update";
import * as InvDelete from "./inventory/delete";
import * as InvMovements from "./inventory/movements";
import * as InvMovementsExport from "./inventory/movements-export";
// Purchasing
import * as PurchaseCreate from "./purchasing/purchase-create";
import * as UploadPreview from "./purchasing/upload-preview";
import * as Upload from "./purchasing/upload";
// Kitchen
import * as TransferCreate from "./kitchen/transfer-create";
// Categories
import * as CatList from "./categories/list";
import * as CatCreate from "./categories/create";
import * as CatUpdate from "./categories/update";
import * as CatDelete from "./categories/delete";

const match = (re: RegExp, s: string) => s.match(re)?.slice(1) ?? null;

export type Handler = (event: APIGatewayProxyEventV2) => Promise<ApiResponse>;

async function route(event: APIGatewayProxyEventV2, app: AppServices): Promise<ApiResponse> {
  const method = event.requestContext.http.method;
  const path = event.rawPath || event.requestContext.http.path;

  if (method === "OPTIONS") return preflight();

  // Public
  if (method === "GET" && (path === "/health" || path === "/")) {
    return ok({ ok: true, service: "storehouse-api", now: app.now().toISOString() });
  }
  if (method === "POST" && path === "/auth/login") return Login.handle(event, app);

  // Authenticated
  const auth = getAuth(event, app.config);
  const ctx = buildCtx(event, auth);

  if (method === "GET" && path === "/auth/policy") {
    return ok({ username: auth.username, role: auth.role, capabilities: capabilitiesOf(auth.role) });
  }

  // Inventory
  if (path === "/inventory") {
    if (method === "GET") { requireCapability(auth, "view"); return InvList.handle(app); }
    return methodNotAllowed(ctx.requestId);
  }
  if (path === "/inventory/in-stock") {
    if (method === "GET") { requireCapability(auth, "browse"); return InvInStock.handle(app); }
    return methodNotAllowed(ctx.requestId);
  }
  if (path === "/inventory/items") {
    if (method === "POST") { requireCapability(auth, "create"); return InvCreate.handle(event, app, ctx); }
    return methodNotAllowed(ctx.requestId);
  }
  {
    const m = match(/^\/inventory\/items\/([^/]+)$/, path);
    if (m) {
      const [id] = m;
      if (method === "GET")    { requireCapability(auth, "view");   return InvGet.handle(withId(event, id), app); }
      if (method === "PUT")    { requireCapability(auth, "update"); return InvUpdate.handle(withId(event, id), app, ctx); }
      if (method === "DELETE") { requireCapability(auth, "delete"); return InvDelete.handle(withId(event, id), app, ctx); }
      return methodNotAllowed(ctx.requestId);
    }
  }
  if (path === "/inventory/movements") {
    if (method === "GET") { requireCapability(auth, "view_ledger"); return InvMovements.handle(event, app); }
    return methodNotAllowed(ctx.requestId);
  }
  if (path === "/inventory/movements:export") {
    if (method === "GET") { requireCapability(auth, "export_ledger"); return InvMovementsExport.handle(event, app, ctx); }
    return methodNotAllowed(ctx.requestId);
  }

  // Purchasing
  if (path === "/purchasing/purchases") {
    if (method === "POST") { requireCapability(auth, "record_purchase"); return PurchaseCreate.handle(event, app, ctx); }
    return methodNotAllowed(ctx.requestId);
  }
  if (path === "/purchasing/upload:preview") {
    if (method === "POST") { requireCapability(auth, "bulk_record"); return UploadPreview.handle(event, app, ctx); }
    return methodNotAllowed(ctx.requestId);
  }
  if (path === "/purchasing/upload") {
    if (method === "POST") { requireCapability(auth, "bulk_record"); return Upload.handle(event, app, ctx); }
    return methodNotAllowed(ctx.requestId);
  }

  // Kitchen
  if (path === "/kitchen/transfers") {
    if (method === "POST") { requireCapability(auth, "transfer"); return TransferCreate.handle(event, app, ctx); }
    return methodNotAllowed(ctx.requestId);
  }

  // Categories
  if (path === "/categories") {
    if (method === "GET")  { requireCapability(auth, "browse");            return CatList.handle(app); }
    if (method === "POST") { requireCapability(auth, "manage_categories"); return CatCreate.handle(event, app, ctx); }
    return methodNotAllowed(ctx.requestId);
  }
  {
    const m = match(/^\/categories\/([^/]+)$/, path);
    if (m) {
      const [id] = m;
      if (method === "PUT")    { requireCapability(auth, "manage_categories"); return CatUpdate.handle(withId(event, id), app, ctx); }
      if (method === "DELETE") { requireCapability(auth, "manage_categories"); return CatDelete.handle(withId(event, id), app, ctx); }
      return methodNotAllowed(ctx.requestId);
    }
  }

  return notFoundRoute(`${method} ${path}`, ctx.requestId);
}

/** Router bound to a set of services; tests build one over the in-memory repository. */
export function createHandler(app: AppServices): Handler {
  return async (event) => {
    try {
      return await route(event, app);
    } catch (err) {
      const requestId = requestIdOf(event);
      const log = { requestId, route: event.rawPath, method: event.requestContext.http.method };
      if (!isApiError(err)) {
        logger.error(log, "unhandled error", {
          error: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
      } else if (err.statusCode >= 500) {
        logger.error(log, err.message, { code: err.code });
      }
      return fromError(err, requestId);
    }
  };
}

let cached: Handler | undefined;

/** Lambda entry point; configuration is loaded once per container. */
export async function handler(event: APIGatewayProxyEventV2): Promise<ApiResponse> {
  if (!cached) cached = createHandler(createServices(loadConfig()));
  return cached(event);
}
