// apps/api/src/common/env.test.ts
import assert from "node:assert";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import bcrypt from "bcryptjs";
import { loadConfig, parseUsers } from "./env";

const USERS = JSON.stringify([
  { username: "maria", role: "manager", password: "test-secret" },
  { username: "pete", role: "purchase_manager", password: "test-secret" },
]);

const baseEnv = { JWT_SECRET: "test-jwt-secret", STORE_USERS: USERS, BCRYPT_ROUNDS: "4" };

test("defaults fill everything but the secret and the accounts", () => {
  const cfg = loadConfig(baseEnv);
  assert.equal(cfg.storeDriver, "dynamo");
  assert.equal(cfg.table, "storehouse_objects");
  assert.equal(cfg.storeId, "main");
  assert.equal(cfg.region, "us-east-1");
  assert.equal(cfg.ddbEndpoint, undefined);
  assert.deepEqual(cfg.jwt, { secret: "test-jwt-secret", issuer: "storehouse", expiresInSeconds: 43200 });
  assert.equal(cfg.lowStockThresholdPercent, 10);
  assert.equal(cfg.ledgerRetentionDays, 30);
  assert.deepEqual(cfg.alerts, { simulate: true, telegramBotToken: undefined, telegramChatId: undefined });
});

test("plain passwords are hashed at load", () => {
  const cfg = loadConfig(baseEnv);
  assert.deepEqual(cfg.users.map((u) => [u.username, u.role]), [
    ["maria", "manager"],
    ["pete", "purchase_manager"],
  ]);
  for (const u of cfg.users) {
    assert.notEqual(u.passwordHash, "test-secret");
    assert.equal(bcrypt.compareSync("test-secret", u.passwordHash), true);
  }
});

test("empty strings count as unset", () => {
  const cfg = loadConfig({ ...baseEnv, STORE_TABLE: "", LOW_STOCK_THRESHOLD_PERCENT: "" });
  assert.equal(cfg.table, "storehouse_objects");
  assert.equal(cfg.lowStockThresholdPercent, 10);
});

test("explicit values override defaults", () => {
  const cfg = loadConfig({
    ...baseEnv,
    STORE_DRIVER: "memory",
    STORE_TABLE: "kitchen_objects",
    AWS_REGION: "eu-west-1",
    DDB_ENDPOINT: "http://localhost:8000",
    JWT_EXPIRES_IN_SECONDS: "600",
    LOW_STOCK_THRESHOLD_PERCENT: "25",
    LEDGER_RETENTION_DAYS: "7",
    TELEGRAM_BOT_TOKEN: "test-bot-token",
    TELEGRAM_CHAT_ID: "42",
  });
  assert.equal(cfg.storeDriver, "memory");
  assert.equal(cfg.table, "kitchen_objects");
  assert.equal(cfg.region, "eu-west-1");
  assert.equal(cfg.ddbEndpoint, "http://localhost:8000");
  assert.equal(cfg.jwt.expiresInSeconds, 600);
  assert.equal(cfg.lowStockThresholdPercent, 25);
  assert.equal(cfg.ledgerRetentionDays, 7);
  assert.deepEqual(cfg.alerts, { simulate: false, telegramBotToken: "test-bot-token", telegramChatId: "42" });
});

test("FEATURE_ALERTS_SIMULATE wins over a configured bot", () => {
  const cfg = loadConfig({ ...baseEnv, TELEGRAM_BOT_TOKEN: "test-bot-token", FEATURE_ALERTS_SIMULATE: "true" });
  assert.equal(cfg.alerts.simulate, true);
});

test("missing JWT_SECRET is a configuration error", () => {
  assert.throws(() => loadConfig({ STORE_USERS: USERS }), /JWT_SECRET is required/);
});

test("accounts are required", () => {
  assert.throws(() => loadConfig({ JWT_SECRET: "test-jwt-secret" }), /STORE_USERS or STORE_USERS_FILE is required/);
});

test("accounts can come from a file", () => {
  const dir = mkdtempSync(join(tmpdir(), "storehouse-env-"));
  const path = join(dir, "users.json");
  writeFileSync(path, JSON.stringify([{ username: "kim", role: "kitchen_manager", password: "test-secret" }]));
  const cfg = loadConfig({ JWT_SECRET: "test-jwt-secret", STORE_USERS_FILE: path, BCRYPT_ROUNDS: "4" });
  assert.deepEqual(cfg.users.map((u) => u.username), ["kim"]);
});

test("parseUsers rejects bad account lists", () => {
  assert.throws(() => parseUsers("not json", 4), /not valid JSON/);
  assert.throws(() => parseUsers("[]", 4), /at least one user account is required/);
  assert.throws(
    () => parseUsers(JSON.stringify([{ username: "x", role: "chef", password: "test-secret" }]), 4),
    /Invalid configuration \(users\)/
  );
  assert.throws(() => parseUsers(JSON.stringify([{ username: "x", role: "manager" }]), 4), /needs password or passwordHash/);
  assert.throws(
    () =>
      parseUsers(
        JSON.stringify([
          { username: "Maria", role: "manager", password: "test-secret" },
          { username: "maria", role: "kitchen_manager", password: "test-secret" },
        ]),
        4
      ),
    /usernames must be unique/
  );
});

test("parseUsers keeps a given bcrypt hash as is", () => {
  const hash = bcrypt.hashSync("test-secret", 4);
  const [u] = parseUsers(JSON.stringify([{ username: "maria", role: "manager", passwordHash: hash }]), 4);
  assert.equal(u?.passwordHash, hash);
});
