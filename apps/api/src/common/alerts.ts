// apps/api/src/common/alerts.ts
import { z } from "zod";
import { emitDomainEvent, logger, type LogCtx } from "./logger";
import type { AppConfig } from "./env";
import type { Item } from "../inventory/types";

export type LowStockAlert = {
  item: Pick<Item, "id" | "name" | "unit" | "quantity" | "totalPurchased">;
  thresholdPercent: number;
  actor: string;
};

export interface LowStockAlerter {
  notify(alert: LowStockAlert, ctx?: LogCtx): Promise<void>;
}

export function formatLowStockMessage({ item, thresholdPercent, actor }: LowStockAlert): string {
  return [
    "⚠️ Low stock",
    `${item.name}: ${item.quantity} ${item.unit} left`,
    `Below ${thresholdPercent}% of ${item.totalPurchased} ${item.unit} purchased`,
    `Last issued by ${actor}`,
  ].join("\n");
}

/** Simulate mode: the alert becomes a domain event in the logs. */
export class LogAlerter implements LowStockAlerter {
  async notify(alert: LowStockAlert, ctx?: LogCtx) {
    emitDomainEvent(ctx, "inventory.lowStock", {
      itemId: alert.item.id,
      itemName: alert.item.name,
      quantity: alert.item.quantity,
      unit: alert.item.unit,
      totalPurchased: alert.item.totalPurchased,
      thresholdPercent: alert.thresholdPercent,
      simulated: true,
    });
  }
}

const TelegramResponse = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

/**
 * Bot API sendMessage
 * https://core.telegram.org/bots/api#sendmessage
 */
export class TelegramAlerter implements LowStockAlerter {
  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async notify(alert: LowStockAlert, ctx?: LogCtx) {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { Accept: "application/json", "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: this.chatId, text: formatLowStockMessage(alert) }),
      });
    } catch (err) {
      throw new Error(`Telegram API request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    let body: z.infer<typeof TelegramResponse>;
    try {
      body = TelegramResponse.parse(await response.json());
    } catch {
      throw new Error(`Telegram API returned invalid JSON (status ${response.status})`);
    }

    if (!response.ok || !body.ok) {
      throw new Error(`Telegram API error (${response.status}): [${body.error_code ?? response.status}] ${body.description ?? "Unknown error"}`);
    }

    logger.info(ctx, "low-stock alert sent", { itemId: alert.item.id, channel: "telegram" });
  }
}

export function createAlerter(cfg: AppConfig["alerts"]): LowStockAlerter {
  if (cfg.simulate || !cfg.telegramBotToken || !cfg.telegramChatId) return new LogAlerter();
  return new TelegramAlerter(cfg.telegramBotToken, cfg.telegramChatId);
}
