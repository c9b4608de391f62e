// apps/api/src/auth/middleware.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { unauthorized } from "../common/errors";
import type { AppConfig } from "../common/env";
import { logger } from "../common/logger";
import { getHeader, requestIdOf } from "../shared/ctx";
import { ROLES, type Role } from "./policy";

export type AuthContext = { username: string; role: Role };

const JwtClaims = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
});

const dbg = (event: APIGatewayProxyEventV2, msg: string) =>
  logger.warn({ requestId: requestIdOf(event), route: event.rawPath }, `[auth] ${msg}`);

/**
 * Bearer JWT → AuthContext. The token must name a configured account with
 * the same role it was issued for.
 */
export function getAuth(event: APIGatewayProxyEventV2, config: Pick<AppConfig, "jwt" | "users">): AuthContext {
  const authz = getHeader(event, "authorization");
  if (!authz?.startsWith("Bearer ")) {
    dbg(event, "missing bearer");
    throw unauthorized();
  }

  const token = authz.slice("Bearer ".length).trim();
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, config.jwt.secret, { issuer: config.jwt.issuer, algorithms: ["HS256"] });
  } catch (err) {
    dbg(event, `verify failed: ${err instanceof Error ? err.message : String(err)}`);
    throw unauthorized();
  }

  const claims = JwtClaims.safeParse(decoded);
  if (!claims.success) {
    dbg(event, "bad claims");
    throw unauthorized();
  }

  const account = config.users.find((u) => u.username === claims.data.sub);
  if (!account || account.role !== claims.data.role) {
    dbg(event, "unknown account");
    throw unauthorized();
  }
  return { username: account.username, role: account.role };
}
