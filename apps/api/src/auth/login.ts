// apps/api/src/auth/login.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { AppServices } from "../app";
import { unauthorized } from "../common/errors";
import type { AppConfig, UserAccount } from "../common/env";
import { emitDomainEvent, logger } from "../common/logger";
import { ok } from "../common/responses";
import { parseBody } from "../shared/body";
import { requestIdOf } from "../shared/ctx";

const LoginBody = z.object({
  username: z.string().trim().min(1, "username is required"),
  password: z.string().min(1, "password is required"),
});

export type LoginResult = { token: string; username: string; role: UserAccount["role"]; expiresIn: number };

/** Username match is case-insensitive; the password is checked against the bcrypt hash. */
export async function verifyCredentials(users: UserAccount[], username: string, password: string): Promise<UserAccount | null> {
  const wanted = username.trim().toLowerCase();
  const account = users.find((u) => u.username.toLowerCase() === wanted);
  if (!account) return null;
  return (await bcrypt.compare(password, account.passwordHash)) ? account : null;
}

export function issueToken(account: UserAccount, jwtCfg: AppConfig["jwt"]): string {
  return jwt.sign({ role: account.role }, jwtCfg.secret, {
    subject: account.username,
    issuer: jwtCfg.issuer,
    expiresIn: jwtCfg.expiresInSeconds,
    algorithm: "HS256",
  });
}

export async function handle(event: APIGatewayProxyEventV2, app: AppServices) {
  const body = parseBody(event, LoginBody);
  const log = { requestId: requestIdOf(event), route: event.rawPath, method: "POST" };

  const account = await verifyCredentials(app.config.users, body.username, body.password);
  if (!account) {
    logger.warn(log, "login rejected", { username: body.username });
    throw unauthorized("Invalid credentials");
  }

  const result: LoginResult = {
    token: issueToken(account, app.config.jwt),
    username: account.username,
    role: account.role,
    expiresIn: app.config.jwt.expiresInSeconds,
  };
  emitDomainEvent({ ...log, userId: account.username, role: account.role }, "auth.login", { role: account.role });
  return ok(result);
}
