import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { AuthContext } from "../auth/middleware";
import { validationError } from "../common/errors";
import type { LogCtx } from "../common/logger";

export type Ctx = {
  username: string;
  role: AuthContext["role"];
  /** API Gateway request id for logs/correlation. */
  requestId?: string;
  log: LogCtx;
};

/** Case-insensitive header getter. */
export function getHeader(event: APIGatewayProxyEventV2, name: string): string | undefined {
  const h = event.headers || {};
  const key = Object.keys(h).find((k) => k.toLowerCase() === name.toLowerCase());
  return key ? h[key] : undefined;
}

export function requestIdOf(event: APIGatewayProxyEventV2): string | undefined {
  return event.requestContext?.requestId || undefined;
}

/** Build the per-request ctx handed to every route handler. */
export function buildCtx(event: APIGatewayProxyEventV2, auth: AuthContext): Ctx {
  const requestId = requestIdOf(event);
  return {
    username: auth.username,
    role: auth.role,
    requestId,
    log: {
      requestId,
      userId: auth.username,
      role: auth.role,
      route: event.rawPath,
      method: event.requestContext?.http?.method,
    },
  };
}

/** Ensure handlers see { pathParameters: { id } }. */
export function withId(event: APIGatewayProxyEventV2, id: string): APIGatewayProxyEventV2 {
  return { ...event, pathParameters: { ...(event.pathParameters || {}), id } };
}

/** Decoded `{id}` path segment; a malformed escape is a 400, not a crash. */
export function pathId(event: APIGatewayProxyEventV2): string {
  const raw = event.pathParameters?.id ?? "";
  try {
    return decodeURIComponent(raw);
  } catch {
    throw validationError("Malformed id in path", { id: raw });
  }
}
