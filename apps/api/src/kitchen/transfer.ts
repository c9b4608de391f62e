// apps/api/src/kitchen/transfer.ts
import { insufficientStock, invalidQuantity } from "../common/errors";
import { emitDomainEvent, logger, type LogCtx } from "../common/logger";
import type { LowStockAlerter } from "../common/alerts";
import type { ItemStore } from "../inventory/store";
import type { Actor, Item, TransferEvent } from "../inventory/types";
import { roundQty } from "../shared/quantity";
import { retryOnConflict } from "../shared/retry";

export type TransferInput = { itemId: string; quantity: number; note?: string };

export type TransferResult = { item: Item; transfer: TransferEvent; lowStock: boolean };

export class KitchenTransfer {
  constructor(
    private readonly store: ItemStore,
    private readonly alerter: LowStockAlerter,
    private readonly thresholdPercent: number
  ) {}

  /**
   * Issue stock to the kitchen. All-or-nothing: either the full quantity is
   * deducted together with its transfer movement, or nothing changes.
   */
  async transfer(input: TransferInput, actor: Actor, ctx?: LogCtx): Promise<TransferResult> {
    const requested = roundQty(input.quantity);
    if (!Number.isFinite(input.quantity) || requested <= 0) {
      throw invalidQuantity("Transfer quantity must be greater than zero", { quantity: String(input.quantity) });
    }

    const { before, item, transfer } = await retryOnConflict(async () => {
      const before = await this.store.get(input.itemId);
      if (requested > before.quantity) throw insufficientStock(before.quantity, requested, before.unit);

      const movement = this.store.movementFor(before, "transfer", requested, actor, {
        unitPrice: before.unitPrice,
        amount: before.unitPrice === null ? null : roundQty(before.unitPrice * requested),
        note: input.note ?? null,
      });
      const committed = await this.store.apply({
        before,
        after: { ...before, quantity: roundQty(before.quantity - requested) },
        movement,
      });
      if (!committed.item || !committed.movement) throw new Error(`transfer of ${before.id} committed no item`);
      const transfer: TransferEvent = { ...committed.movement, action: "transfer" };
      const item = committed.item;
      return { before, item, transfer };
    });

    emitDomainEvent(ctx, "kitchen.transferred", {
      itemId: item.id,
      itemName: item.name,
      qty: requested,
      remaining: item.quantity,
      unit: item.unit,
    });

    const lowStock = this.store.isLowStock(item);
    if (lowStock && !this.store.isLowStock(before)) {
      try {
        await this.alerter.notify({ item, thresholdPercent: this.thresholdPercent, actor: actor.username }, ctx);
      } catch (err) {
        logger.warn(ctx, "low-stock alert failed", {
          itemId: item.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return { item, transfer, lowStock };
  }
}
