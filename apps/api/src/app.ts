// apps/api/src/app.ts
// Wires configuration to repositories and services; one instance per Lambda container.
import { createAlerter, type LowStockAlerter } from "./common/alerts";
import { createDocumentClient } from "./common/ddb";
import type { AppConfig } from "./common/env";
import { CategoryService } from "./categories/service";
import { Ledger } from "./inventory/ledger";
import { MemoryInventoryRepo, type InventoryRepo } from "./inventory/repo";
import { DynamoInventoryRepo } from "./inventory/repo-dynamo";
import { ItemStore } from "./inventory/store";
import { KitchenTransfer } from "./kitchen/transfer";
import { PurchaseIntake } from "./purchasing/intake";

export type AppServices = {
  config: AppConfig;
  repo: InventoryRepo;
  store: ItemStore;
  categories: CategoryService;
  intake: PurchaseIntake;
  kitchen: KitchenTransfer;
  ledger: Ledger;
  alerter: LowStockAlerter;
  now: () => Date;
};

export type ServiceOverrides = {
  repo?: InventoryRepo;
  alerter?: LowStockAlerter;
  now?: () => Date;
  newId?: () => string;
};

function createRepo(config: AppConfig): InventoryRepo {
  if (config.storeDriver === "memory") return new MemoryInventoryRepo();
  const ddb = createDocumentClient({ region: config.region, endpoint: config.ddbEndpoint });
  return new DynamoInventoryRepo(ddb, config.table, config.storeId);
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const now = overrides.now ?? (() => new Date());
  const repo = overrides.repo ?? createRepo(config);
  const alerter = overrides.alerter ?? createAlerter(config.alerts);

  const store = new ItemStore({
    repo,
    lowStockThresholdPercent: config.lowStockThresholdPercent,
    now,
    newId: overrides.newId,
  });
  const categories = new CategoryService(repo, store);

  return {
    config,
    repo,
    store,
    categories,
    intake: new PurchaseIntake(store, categories),
    kitchen: new KitchenTransfer(store, alerter, config.lowStockThresholdPercent),
    ledger: new Ledger(repo, config.ledgerRetentionDays, now),
    alerter,
    now,
  };
}
