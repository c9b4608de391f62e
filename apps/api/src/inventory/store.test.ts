// apps/api/src/inventory/store.test.ts
import assert from "node:assert";
import { test } from "node:test";
import { ApiError } from "../common/errors";
import { actor, testApp } from "../test/fixtures";

const hasCode = (code: string) => (err: unknown) => err instanceof ApiError && err.code === code;

test("create assigns id and version 1 and logs a create movement", async () => {
  const app = testApp();
  const item = await app.store.create({ name: "  Basmati   Rice ", category: "Grocery", unit: "KG", quantity: 12.34567 }, actor());

  assert.equal(item.id, "id-0001");
  assert.equal(item.name, "Basmati Rice");
  assert.equal(item.quantity, 12.346);
  assert.equal(item.version, 1);
  assert.equal(item.unitPrice, null);
  assert.equal(item.createdAt, "2026-03-10T09:00:00.000Z");

  const moves = await app.memory.listMovements({ fromAt: "2026-01-01", toAt: "2027-01-01", limit: 10 });
  assert.equal(moves.length, 1);
  assert.equal(moves[0]?.action, "create");
  assert.equal(moves[0]?.qty, 12.346);
  assert.equal(moves[0]?.actor, "maria");
});

test("get, findByName and list", async () => {
  const app = testApp();
  const milk = await app.store.create({ name: "Milk", category: "Dairy", unit: "LTR", quantity: 5 }, actor());
  await app.store.create({ name: "Apple", category: "Fruits", unit: "KG", quantity: 0 }, actor());
  await app.store.create({ name: "Butter", category: "Dairy", unit: "KG", quantity: 1 }, actor());

  assert.deepEqual(await app.store.get(milk.id), milk);
  assert.equal((await app.store.findByName("MILK"))?.id, milk.id);
  assert.equal(await app.store.findByName("Cheese"), null);
  assert.deepEqual((await app.store.list()).map((i) => i.name), ["Butter", "Milk", "Apple"]);
  assert.deepEqual((await app.store.inStock()).map((i) => i.name), ["Butter", "Milk"]);
  await assert.rejects(app.store.get("missing"), hasCode("NotFound"));
});

test("duplicate names are refused, case-insensitively", async () => {
  const app = testApp();
  await app.store.create({ name: "Paneer", category: "Dairy", unit: "KG", quantity: 1 }, actor());
  await assert.rejects(
    app.store.create({ name: "paneer", category: "Dairy", unit: "KG", quantity: 1 }, actor()),
    hasCode("DuplicateName")
  );
  const ghee = await app.store.create({ name: "Ghee", category: "Dairy", unit: "LTR", quantity: 1 }, actor());
  await assert.rejects(app.store.update(ghee.id, { name: "PANEER" }, actor()), hasCode("DuplicateName"));
});

test("update records the signed quantity delta as an adjust movement", async () => {
  const app = testApp();
  const oil = await app.store.create({ name: "Oil", category: "Grocery", unit: "LTR", quantity: 10 }, actor());
  const updated = await app.store.update(oil.id, { quantity: 7.5, unitPrice: 140 }, actor());

  assert.equal(updated.quantity, 7.5);
  assert.equal(updated.unitPrice, 140);
  assert.equal(updated.version, 2);

  const moves = await app.memory.listMovements({ fromAt: "2026-01-01", toAt: "2027-01-01", limit: 10 });
  assert.deepEqual(moves.map((m) => [m.action, m.qty]), [
    ["adjust", -2.5],
    ["create", 10],
  ]);
});

test("renaming frees the old name", async () => {
  const app = testApp();
  const a = await app.store.create({ name: "Dahi", category: "Dairy", unit: "KG", quantity: 1 }, actor());
  await app.store.update(a.id, { name: "Curd" }, actor());
  assert.equal(await app.store.findByName("Dahi"), null);
  const again = await app.store.create({ name: "Dahi", category: "Dairy", unit: "KG", quantity: 2 }, actor());
  assert.equal(again.name, "Dahi");
});

test("delete removes the item and keeps the last quantity in the ledger", async () => {
  const app = testApp();
  const salt = await app.store.create({ name: "Salt", category: "Grocery", unit: "KG", quantity: 3 }, actor());
  await app.store.delete(salt.id, actor());
  await assert.rejects(app.store.get(salt.id), hasCode("NotFound"));
  await assert.rejects(app.store.delete(salt.id, actor()), hasCode("NotFound"));

  const [last] = await app.memory.listMovements({ fromAt: "2026-01-01", toAt: "2027-01-01", limit: 1 });
  assert.equal(last?.action, "delete");
  assert.equal(last?.qty, 3);
});

test("quantities must be finite and non-negative", async () => {
  const app = testApp();
  await assert.rejects(
    app.store.create({ name: "Sugar", category: "Grocery", unit: "KG", quantity: -1 }, actor()),
    hasCode("InvalidQuantity")
  );
  await assert.rejects(
    app.store.create({ name: "Sugar", category: "Grocery", unit: "KG", quantity: Number.NaN }, actor()),
    hasCode("InvalidQuantity")
  );
  const sugar = await app.store.create({ name: "Sugar", category: "Grocery", unit: "KG", quantity: 1 }, actor());
  await assert.rejects(app.store.update(sugar.id, { quantity: -0.5 }, actor()), hasCode("InvalidQuantity"));
  assert.equal((await app.store.get(sugar.id)).quantity, 1);
});

test("apply refuses blank text fields", async () => {
  const app = testApp();
  await assert.rejects(
    app.store.create({ name: "   ", category: "Grocery", unit: "KG", quantity: 1 }, actor()),
    hasCode("ValidationError")
  );
  await assert.rejects(
    app.store.create({ name: "Flour", category: "", unit: "KG", quantity: 1 }, actor()),
    hasCode("ValidationError")
  );
});

test("a write based on a stale version is a Conflict and changes nothing", async () => {
  const app = testApp();
  const rice = await app.store.create({ name: "Rice", category: "Grocery", unit: "KG", quantity: 10 }, actor());
  await app.store.update(rice.id, { quantity: 8 }, actor());

  await assert.rejects(app.store.apply({ before: rice, after: { ...rice, quantity: 0 } }), hasCode("Conflict"));
  assert.equal((await app.store.get(rice.id)).quantity, 8);
});

test("summary counts per category and flags low stock", async () => {
  const app = testApp();
  const rice = await app.store.create({ name: "Rice", category: "Grocery", unit: "KG", quantity: 0 }, actor());
  await app.store.apply({ before: rice, after: { ...rice, quantity: 4, totalPurchased: 50 } });
  await app.store.create({ name: "Dal", category: "Grocery", unit: "KG", quantity: 0 }, actor());
  await app.store.create({ name: "Milk", category: "Dairy", unit: "LTR", quantity: 2 }, actor());

  const summary = await app.store.summary();
  assert.equal(summary.totalItems, 3);
  assert.deepEqual(summary.categories, [
    { category: "Dairy", itemCount: 1, inStock: 1, outOfStock: 0 },
    { category: "Grocery", itemCount: 2, inStock: 1, outOfStock: 1 },
  ]);
  assert.deepEqual(summary.lowStock.map((i) => i.name), ["Rice"]);
});

test("isLowStock uses the configured share of total purchased", () => {
  const app = testApp({ lowStockThresholdPercent: 20 });
  assert.equal(app.store.isLowStock({ quantity: 19, totalPurchased: 100 }), true);
  assert.equal(app.store.isLowStock({ quantity: 20, totalPurchased: 100 }), false);
  assert.equal(app.store.isLowStock({ quantity: 0, totalPurchased: 0 }), false);
});
