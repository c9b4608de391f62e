export type LogCtx = {
  requestId?: string;
  userId?: string;
  role?: string;
  route?: string;
  method?: string;
};

type Extra = Record<string, unknown> | undefined;

type Level = "info" | "warn" | "error";

const LEVELS = ["info", "warn", "error", "silent"] as const;
const RANK: Record<(typeof LEVELS)[number], number> = { info: 1, warn: 2, error: 3, silent: 4 };

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  const found = LEVELS.find((l) => l === raw);
  return found ? RANK[found] : RANK.info;
}

function clean(obj: Record<string, unknown>) {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v === undefined) continue;
    out[k] = v;
  }
  return out;
}

function log(level: Level, ctx: LogCtx | undefined, msg: string, extra?: Extra) {
  if (RANK[level] < threshold()) return;
  const target = level === "error" ? console.error : console.log;
  const base = clean({
    level,
    msg,
    requestId: ctx?.requestId,
    userId: ctx?.userId,
    role: ctx?.role,
    route: ctx?.route,
    method: ctx?.method,
    ts: new Date().toISOString(),
  });
  const payload = extra ? { ...base, ...extra } : base;
  try {
    target(JSON.stringify(payload));
  } catch {
    // circular extra: fall back to the plain object
    target(payload);
  }
}

export const logger = {
  info: (ctx: LogCtx | undefined, msg: string, extra?: Extra) => log("info", ctx, msg, extra),
  warn: (ctx: LogCtx | undefined, msg: string, extra?: Extra) => log("warn", ctx, msg, extra),
  error: (ctx: LogCtx | undefined, msg: string, extra?: Extra) => log("error", ctx, msg, extra),
};

/**
 * Keep primitives only; nested objects and arrays are dropped so events stay flat.
 */
function flatten(payload?: Record<string, unknown>): Record<string, unknown> {
  if (!payload) return {};
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    const type = typeof value;
    if (value === null || value === undefined) {
      out[key] = value;
    } else if (type === "string" || type === "number" || type === "boolean") {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Emit a structured domain event backed by the logger.
 * Adds envelope fields and merges the flattened payload.
 */
export function emitDomainEvent(ctx: LogCtx | undefined, eventName: string, payload?: Record<string, unknown>) {
  const base = clean({
    eventName,
    ts: new Date().toISOString(),
    source: "api",
    actorId: ctx?.userId,
    actorType: ctx?.userId ? undefined : "system",
  });
  log("info", ctx, `[DOMAIN_EVENT] ${eventName}`, { ...base, ...flatten(payload) });
}
