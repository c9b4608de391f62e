// apps/api/src/auth/policy.ts
import { denied } from "../common/errors";

export const ROLES = ["manager", "purchase_manager", "kitchen_manager"] as const;
export type Role = (typeof ROLES)[number];

export const OPERATIONS = [
  // item store
  "view",
  "create",
  "update",
  "delete",
  // purchase intake
  "record_purchase",
  "bulk_record",
  // kitchen
  "transfer",
  // shared screens
  "browse",
  "view_ledger",
  "export_ledger",
  "manage_categories",
] as const;
export type Operation = (typeof OPERATIONS)[number];

const SHARED: Operation[] = ["browse", "view_ledger", "export_ledger"];

/** Fixed role → capability table. Nothing outside this map is ever allowed. */
export const CAPABILITIES: Readonly<Record<Role, ReadonlySet<Operation>>> = {
  manager: new Set<Operation>(["view", "create", "update", "delete", "manage_categories", ...SHARED]),
  purchase_manager: new Set<Operation>(["record_purchase", "bulk_record", ...SHARED]),
  kitchen_manager: new Set<Operation>(["transfer", ...SHARED]),
};

export type Decision = { allowed: true } | { allowed: false; reason: string };

export function authorize(role: Role, operation: Operation): Decision {
  if (CAPABILITIES[role].has(operation)) return { allowed: true };
  return { allowed: false, reason: `Role ${role} may not ${operation}` };
}

export function capabilitiesOf(role: Role): Operation[] {
  return OPERATIONS.filter((op) => CAPABILITIES[role].has(op));
}

/** Throws Denied (403) when the caller's role lacks the operation. */
export function requireCapability(auth: { role: Role }, operation: Operation) {
  const decision = authorize(auth.role, operation);
  if (!decision.allowed) throw denied(auth.role, operation);
}
