// apps/api/src/inventory/ledger.ts
import { ApiError, validationError } from "../common/errors";
import { writeSheet, type SheetColumn } from "../shared/spreadsheet";
import type { InventoryRepo } from "./repo";
import type { Movement, MovementAction } from "./types";

export type LedgerQuery = {
  action?: MovementAction;
  /** YYYY-MM-DD, UTC, inclusive */
  from?: string;
  to?: string;
  /** shorthand for from = to = date */
  date?: string;
  limit?: number;
};

export type LedgerPage = {
  items: Movement[];
  action: MovementAction | null;
  from: string;
  to: string;
  limit: number;
};

/** `truncated` is set when more rows matched than one export carries; the newest rows are kept. */
export type LedgerExport = { fileName: string; content: Buffer; count: number; truncated: boolean };

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 500;
const EXPORT_LIMIT = 10_000;
const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_RE = /^\d{4}-\d{2}-\d{2}$/;

function parseDay(label: string, v: string | undefined): Date | undefined {
  if (v === undefined) return undefined;
  const d = new Date(`${v}T00:00:00.000Z`);
  if (!DAY_RE.test(v) || Number.isNaN(d.getTime())) throw validationError(`${label} must be a date (YYYY-MM-DD)`, { [label]: v });
  return d;
}

const dayOf = (d: Date) => d.toISOString().slice(0, 10);

const COLUMNS: SheetColumn<Movement>[] = [
  { header: "Date", width: 12, value: (m) => m.at.slice(0, 10) },
  { header: "Time", width: 10, value: (m) => m.at.slice(11, 19) },
  { header: "Item", width: 28, value: (m) => m.itemName },
  { header: "Category", width: 16, value: (m) => m.category },
  { header: "Type", width: 12, value: (m) => m.action.charAt(0).toUpperCase() + m.action.slice(1) },
  { header: "Quantity", width: 10, value: (m) => m.qty },
  { header: "Unit", width: 8, value: (m) => m.unit },
  { header: "Unit Price", width: 11, value: (m) => m.unitPrice },
  { header: "Amount", width: 12, value: (m) => m.amount },
  { header: "Vendor", width: 18, value: (m) => m.vendor },
  { header: "Note", width: 24, value: (m) => m.note },
  { header: "By", width: 16, value: (m) => m.actor },
];

/**
 * Read side of the movement log. Only the last `retentionDays` are ever
 * returned; older movements stay stored but fall out of every window.
 */
export class Ledger {
  constructor(
    private readonly repo: InventoryRepo,
    private readonly retentionDays: number,
    private readonly now: () => Date = () => new Date(),
    private readonly exportLimit = EXPORT_LIMIT
  ) {}

  private window(q: LedgerQuery) {
    const now = this.now();
    const from = parseDay("from", q.date ?? q.from);
    const to = parseDay("to", q.date ?? q.to);
    if (from && to && from > to) throw validationError("from must not be after to", { from: q.from, to: q.to });

    const cutoff = new Date(now.getTime() - this.retentionDays * DAY_MS);
    const start = from && from > cutoff ? from : cutoff;
    const end = to ? new Date(to.getTime() + DAY_MS) : new Date(now.getTime() + DAY_MS);
    return {
      fromAt: start.toISOString(),
      toAt: end.toISOString(),
      fromDay: dayOf(start),
      toDay: to ? dayOf(to) : dayOf(now),
      explicit: Boolean(from || to),
    };
  }

  async list(q: LedgerQuery = {}): Promise<LedgerPage> {
    const limit = Math.min(Math.max(1, Math.trunc(q.limit ?? DEFAULT_LIMIT)), MAX_LIMIT);
    const w = this.window(q);
    const items = await this.repo.listMovements({ action: q.action, fromAt: w.fromAt, toAt: w.toAt, limit });
    return { items, action: q.action ?? null, from: w.fromDay, to: w.toDay, limit };
  }

  async export(q: LedgerQuery = {}): Promise<LedgerExport> {
    const w = this.window(q);
    const found = await this.repo.listMovements({ action: q.action, fromAt: w.fromAt, toAt: w.toAt, limit: this.exportLimit + 1 });
    const truncated = found.length > this.exportLimit;
    const items = truncated ? found.slice(0, this.exportLimit) : found;
    if (items.length === 0) throw new ApiError(404, "NotFound", "No transactions found for the selected filters");

    const kind = q.action ?? "all";
    const fileName = w.explicit
      ? `transactions_${kind}_${w.fromDay}_to_${w.toDay}.xlsx`
      : `transactions_${kind}_${dayOf(this.now())}.xlsx`;
    const content = await writeSheet("Transactions", COLUMNS, items);
    return { fileName, content, count: items.length, truncated };
  }
}
