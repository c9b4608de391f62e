// apps/api/src/test/fixtures.ts
// Shared builders for tests: config, in-memory services, API Gateway v2 events.
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import bcrypt from "bcryptjs";
import { Workbook } from "exceljs";
import { createServices, type AppServices } from "../app";
import type { Role } from "../auth/policy";
import type { LowStockAlert, LowStockAlerter } from "../common/alerts";
import type { AppConfig } from "../common/env";
import { MemoryInventoryRepo } from "../inventory/repo";

export const PASSWORD = "test-secret";
export const START = Date.parse("2026-03-10T09:00:00.000Z");

const HASH = bcrypt.hashSync(PASSWORD, 4);

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    storeDriver: "memory",
    table: "test_table",
    storeId: "test",
    region: "us-east-1",
    jwt: { secret: "test-jwt-secret", issuer: "storehouse-test", expiresInSeconds: 3600 },
    users: [
      { username: "maria", role: "manager", passwordHash: HASH },
      { username: "pete", role: "purchase_manager", passwordHash: HASH },
      { username: "kim", role: "kitchen_manager", passwordHash: HASH },
    ],
    lowStockThresholdPercent: 10,
    ledgerRetentionDays: 30,
    alerts: { simulate: true },
    ...overrides,
  };
}

export const USER_BY_ROLE: Record<Role, string> = {
  manager: "maria",
  purchase_manager: "pete",
  kitchen_manager: "kim",
};

/** Manual clock; each read moves it forward 1s so movement times are distinct. */
export class TestClock {
  constructor(public ms = START) {}
  now = () => {
    const d = new Date(this.ms);
    this.ms += 1000;
    return d;
  };
  advanceDays(days: number) {
    this.ms += days * 24 * 60 * 60 * 1000;
  }
}

export class RecordingAlerter implements LowStockAlerter {
  readonly sent: LowStockAlert[] = [];
  fail = false;
  async notify(alert: LowStockAlert) {
    if (this.fail) throw new Error("alert channel down");
    this.sent.push(alert);
  }
}

export type TestApp = AppServices & { clock: TestClock; alerts: RecordingAlerter; memory: MemoryInventoryRepo };

export function testApp(configOverrides: Partial<AppConfig> = {}): TestApp {
  const clock = new TestClock();
  const alerts = new RecordingAlerter();
  const memory = new MemoryInventoryRepo();
  let seq = 0;
  const services = createServices(testConfig(configOverrides), {
    repo: memory,
    alerter: alerts,
    now: clock.now,
    newId: () => `id-${String(++seq).padStart(4, "0")}`,
  });
  return { ...services, clock, alerts, memory };
}

export const actor = (role: Role = "manager") => ({ username: USER_BY_ROLE[role] });

export type EventInit = {
  method: string;
  path: string;
  body?: unknown;
  rawBody?: Buffer;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  token?: string;
};

/** Minimal but complete HTTP API v2 event. */
export function httpEvent(init: EventInit): APIGatewayProxyEventV2 {
  const headers: Record<string, string> = { ...(init.headers ?? {}) };
  if (init.token) headers.authorization = `Bearer ${init.token}`;
  let body: string | undefined;
  let isBase64Encoded = false;
  if (init.rawBody) {
    body = init.rawBody.toString("base64");
    isBase64Encoded = true;
  } else if (init.body !== undefined) {
    body = JSON.stringify(init.body);
    headers["content-type"] ??= "application/json";
  }
  const query = init.query ?? {};
  return {
    version: "2.0",
    routeKey: "$default",
    rawPath: init.path,
    rawQueryString: new URLSearchParams(query).toString(),
    headers,
    queryStringParameters: Object.keys(query).length ? query : undefined,
    requestContext: {
      accountId: "000000000000",
      apiId: "test",
      domainName: "localhost",
      domainPrefix: "localhost",
      http: { method: init.method, path: init.path, protocol: "HTTP/1.1", sourceIp: "127.0.0.1", userAgent: "node-test" },
      requestId: "req-test",
      routeKey: "$default",
      stage: "$default",
      time: "10/Mar/2026:09:00:00 +0000",
      timeEpoch: START,
    },
    body,
    isBase64Encoded,
  };
}

/** Parse a JSON response body into the shape the test expects. */
export function json<T>(res: { body: string }): T {
  return JSON.parse(res.body);
}

export type ErrorBody = { code: string; error: string; message: string; details?: Record<string, unknown>; requestId?: string };

/** Build a one-sheet .xlsx in memory: first row is the header. */
export async function xlsx(rows: Array<Array<string | number | null>>, sheetName = "Purchases"): Promise<Buffer> {
  const wb = new Workbook();
  const ws = wb.addWorksheet(sheetName);
  for (const row of rows) ws.addRow(row);
  return Buffer.from(await wb.xlsx.writeBuffer());
}
