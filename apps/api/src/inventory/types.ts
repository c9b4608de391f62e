// apps/api/src/inventory/types.ts

export type Item = {
  id: string;
  name: string;
  category: string;
  unit: string;
  quantity: number;
  unitPrice: number | null;
  /** Running total of purchased quantity; low-stock threshold is a share of it. */
  totalPurchased: number;
  version: number;
  createdAt: string;
  updatedAt: string;
};

export const MOVEMENT_ACTIONS = ["purchase", "transfer", "create", "adjust", "delete"] as const;
export type MovementAction = (typeof MOVEMENT_ACTIONS)[number];

export function asMovementAction(v: unknown): MovementAction | undefined {
  const s = String(v ?? "").trim().toLowerCase();
  return MOVEMENT_ACTIONS.find((a) => a === s);
}

/**
 * Ledger entry. `qty` is positive for purchase/transfer/create/delete;
 * for adjust it is the signed delta a manager edit applied.
 */
export type Movement = {
  id: string;
  itemId: string;
  itemName: string;
  category: string;
  unit: string;
  action: MovementAction;
  qty: number;
  unitPrice: number | null;
  amount: number | null;
  vendor: string | null;
  note: string | null;
  actor: string;
  at: string;
};

export type TransferEvent = Movement & { action: "transfer" };

export type Category = {
  id: string;
  name: string;
  icon: string;
  createdAt: string;
};

/** One atomic write: item before/after plus the movement recording it. */
export type ItemChange = {
  before: Item | null;
  after: Item | null;
  movement?: Movement;
};

export type MovementQuery = {
  action?: MovementAction;
  /** ISO timestamp, inclusive */
  fromAt: string;
  /** ISO timestamp, exclusive */
  toAt: string;
  limit: number;
};

export type Actor = { username: string };

export function nameKey(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}
