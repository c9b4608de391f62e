// apps/api/src/shared/spreadsheet.test.ts
import assert from "node:assert";
import { test } from "node:test";
import { Workbook } from "exceljs";
import { ApiError } from "../common/errors";
import { xlsx } from "../test/fixtures";
import { cellText, detectColumns, parsePurchaseSheet, writeSheet } from "./spreadsheet";

const isValidation = (err: unknown) => err instanceof ApiError && err.code === "ValidationError";

test("cellText flattens exceljs cell values", () => {
  assert.equal(cellText(null), "");
  assert.equal(cellText("  Rice "), "Rice");
  assert.equal(cellText(12.5), "12.5");
  assert.equal(cellText(new Date("2026-03-01T00:00:00Z")), "2026-03-01");
  assert.equal(cellText({ richText: [{ text: "Basmati " }, { text: "Rice" }] }), "Basmati Rice");
  assert.equal(cellText({ formula: "A1*2", result: 40 }), "40");
  assert.equal(cellText({ text: "link", hyperlink: "https://example.com" }), "link");
  assert.equal(cellText({ error: "#DIV/0!" }), "");
});

test("detectColumns picks fields by header words", () => {
  const cols = detectColumns(
    new Map([
      [1, "Vendor Name"],
      [2, "Item Name"],
      [3, "Unit Price"],
      [4, "Qty"],
      [5, "Category"],
      [6, "Unit"],
      [7, "Sub Category"],
      [8, "Notes"],
    ])
  );
  assert.deepEqual(cols, { vendor: 1, name: 2, unitPrice: 3, quantity: 4, category: 7, unit: 6 });
});

test("parsePurchaseSheet reads rows and skips blank ones", async () => {
  const file = await xlsx([
    ["Product", "Amount", "Rate", "Supplier"],
    ["Onion", 25, 18.5, "Mandi"],
    [null, null, null, null],
    ["Garlic", "2.5", null, null],
  ]);
  const rows = await parsePurchaseSheet(file);
  assert.deepEqual(rows, [
    { rowNumber: 2, name: "Onion", quantity: "25", unitPrice: "18.5", category: "", unit: "", vendor: "Mandi" },
    { rowNumber: 4, name: "Garlic", quantity: "2.5", unitPrice: "", category: "", unit: "", vendor: "" },
  ]);
});

test("parsePurchaseSheet needs name and quantity columns", async () => {
  const file = await xlsx([
    ["Product", "Rate"],
    ["Onion", 18.5],
  ]);
  await assert.rejects(parsePurchaseSheet(file), (err: unknown) => {
    assert.ok(isValidation(err));
    assert.equal(err instanceof Error && err.message, "Spreadsheet needs an item name column and a quantity column");
    return true;
  });
});

test("parsePurchaseSheet rejects bytes that are not .xlsx", async () => {
  await assert.rejects(parsePurchaseSheet(Buffer.from("name,qty\nRice,5\n")), isValidation);
});

test("writeSheet output reads back", async () => {
  type Row = { item: string; qty: number; price: number | null };
  const content = await writeSheet<Row>(
    "Transactions",
    [
      { header: "Item", value: (r) => r.item },
      { header: "Quantity", value: (r) => r.qty },
      { header: "Unit Price", value: (r) => r.price },
    ],
    [
      { item: "Rice", qty: 20, price: 2 },
      { item: "Milk", qty: 1.5, price: null },
    ]
  );

  const wb = new Workbook();
  const ab = new ArrayBuffer(content.byteLength);
  new Uint8Array(ab).set(content);
  await wb.xlsx.load(ab);
  const ws = wb.getWorksheet("Transactions");
  assert.ok(ws);
  const read = (r: number) => [1, 2, 3].map((c) => cellText(ws.getRow(r).getCell(c).value));
  assert.deepEqual(read(1), ["Item", "Quantity", "Unit Price"]);
  assert.deepEqual(read(2), ["Rice", "20", "2"]);
  assert.deepEqual(read(3), ["Milk", "1.5", ""]);
  assert.equal(ws.getRow(1).getCell(1).font?.bold, true);
});
