// apps/api/src/common/env.ts
import { readFileSync } from "node:fs";
import bcrypt from "bcryptjs";
import { z } from "zod";
import { ROLES, type Role } from "../auth/policy";

export type UserAccount = {
  username: string;
  role: Role;
  passwordHash: string;
};

export type AppConfig = {
  storeDriver: "dynamo" | "memory";
  table: string;
  storeId: string;
  region: string;
  ddbEndpoint?: string;
  jwt: { secret: string; issuer: string; expiresInSeconds: number };
  users: UserAccount[];
  lowStockThresholdPercent: number;
  ledgerRetentionDays: number;
  alerts: { simulate: boolean; telegramBotToken?: string; telegramChatId?: string };
};

function asBool(v: string | undefined, dflt: boolean) {
  if (v == null) return dflt;
  const s = v.toLowerCase();
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  return dflt;
}

const EnvSchema = z.object({
  STORE_DRIVER: z.enum(["dynamo", "memory"]).default("dynamo"),
  STORE_TABLE: z.string().default("storehouse_objects"),
  STORE_ID: z.string().default("main"),
  AWS_REGION: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().optional(),
  DDB_ENDPOINT: z.string().url().optional(),
  JWT_SECRET: z.string({ required_error: "JWT_SECRET is required" }),
  JWT_ISSUER: z.string().default("storehouse"),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(12 * 60 * 60),
  STORE_USERS: z.string().optional(),
  STORE_USERS_FILE: z.string().optional(),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  LOW_STOCK_THRESHOLD_PERCENT: z.coerce.number().min(0).max(100).default(10),
  LEDGER_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  FEATURE_ALERTS_SIMULATE: z.string().optional(),
});

const UserEntrySchema = z
  .object({
    username: z.string().trim().min(1),
    role: z.enum(ROLES),
    password: z.string().min(1).optional(),
    passwordHash: z.string().min(1).optional(),
  })
  .refine((u) => Boolean(u.password || u.passwordHash), {
    message: "each user needs password or passwordHash",
  });

const UsersSchema = z
  .array(UserEntrySchema)
  .min(1, "at least one user account is required")
  .refine((users) => new Set(users.map((u) => u.username.toLowerCase())).size === users.length, {
    message: "usernames must be unique",
  });

function formatIssues(prefix: string, error: z.ZodError) {
  const lines = error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
  return `${prefix}: ${lines.join("; ")}`;
}

function readUsersSource(env: z.infer<typeof EnvSchema>): string {
  if (env.STORE_USERS) return env.STORE_USERS;
  if (env.STORE_USERS_FILE) return readFileSync(env.STORE_USERS_FILE, "utf8");
  throw new Error("Invalid configuration: STORE_USERS or STORE_USERS_FILE is required");
}

/**
 * Parse the static user accounts. Plain passwords are hashed here so only
 * bcrypt hashes stay in memory.
 */
export function parseUsers(raw: string, bcryptRounds: number): UserAccount[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error("Invalid configuration: user accounts are not valid JSON");
  }
  const parsed = UsersSchema.safeParse(json);
  if (!parsed.success) throw new Error(formatIssues("Invalid configuration (users)", parsed.error));

  return parsed.data.map((u) => ({
    username: u.username,
    role: u.role,
    passwordHash: u.passwordHash ?? bcrypt.hashSync(u.password ?? "", bcryptRounds),
  }));
}

/** Load and validate configuration once at startup; "" counts as unset. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(source)) {
    if (v !== undefined && v !== "") present[k] = v;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) throw new Error(formatIssues("Invalid configuration", parsed.error));
  const env = parsed.data;

  return {
    storeDriver: env.STORE_DRIVER,
    table: env.STORE_TABLE,
    storeId: env.STORE_ID,
    region: env.AWS_REGION ?? env.AWS_DEFAULT_REGION ?? "us-east-1",
    ddbEndpoint: env.DDB_ENDPOINT,
    jwt: { secret: env.JWT_SECRET, issuer: env.JWT_ISSUER, expiresInSeconds: env.JWT_EXPIRES_IN_SECONDS },
    users: parseUsers(readUsersSource(env), env.BCRYPT_ROUNDS),
    lowStockThresholdPercent: env.LOW_STOCK_THRESHOLD_PERCENT,
    ledgerRetentionDays: env.LEDGER_RETENTION_DAYS,
    alerts: {
      simulate: asBool(env.FEATURE_ALERTS_SIMULATE, !env.TELEGRAM_BOT_TOKEN),
      telegramBotToken: env.TELEGRAM_BOT_TOKEN,
      telegramChatId: env.TELEGRAM_CHAT_ID,
    },
  };
}
