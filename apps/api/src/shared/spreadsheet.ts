// apps/api/src/shared/spreadsheet.ts
import { Workbook } from "exceljs";
import { validationError } from "../common/errors";

export const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

/** One data row of an uploaded purchase sheet; blank cells are "". */
export type SheetRow = {
  rowNumber: number;
  name: string;
  quantity: string;
  unitPrice: string;
  category: string;
  unit: string;
  vendor: string;
};

type Field = Exclude<keyof SheetRow, "rowNumber">;

// Checked in order, so "Vendor Name" is a vendor and "Unit Price" a price.
// First header match wins; category and unit take the last one.
const HEADER_RULES: { field: Field; words: string[]; last?: boolean }[] = [
  { field: "vendor", words: ["vendor", "supplier"] },
  { field: "unitPrice", words: ["rate", "price"] },
  { field: "category", words: ["category", "cat"], last: true },
  { field: "name", words: ["item", "name", "product"] },
  { field: "quantity", words: ["qty", "quantity", "amount"] },
  { field: "unit", words: ["unit"], last: true },
];

/** Plain text of an exceljs cell value (rich text, formulas, hyperlinks included). */
export function cellText(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (typeof v === "string") return v.trim();
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  if (v instanceof Date) return v.toISOString().slice(0, 10);
  if (typeof v === "object") {
    if ("richText" in v && Array.isArray(v.richText)) {
      const parts: unknown[] = v.richText;
      return parts
        .map((part) => (typeof part === "object" && part && "text" in part && typeof part.text === "string" ? part.text : ""))
        .join("")
        .trim();
    }
    if ("result" in v) return cellText(v.result);
    if ("text" in v) return cellText(v.text);
  }
  return "";
}

export function detectColumns(headers: Map<number, string>): Partial<Record<Field, number>> {
  const cols: Partial<Record<Field, number>> = {};
  for (const [col, raw] of headers) {
    const h = raw.toLowerCase();
    const rule = HEADER_RULES.find((r) => r.words.some((w) => h.includes(w)));
    if (!rule) continue;
    if (cols[rule.field] === undefined || rule.last) cols[rule.field] = col;
  }
  return cols;
}

function toArrayBuffer(buf: Buffer): ArrayBuffer {
  const ab = new ArrayBuffer(buf.byteLength);
  new Uint8Array(ab).set(buf);
  return ab;
}

/** Read the first worksheet of an .xlsx upload into purchase rows. */
export async function parsePurchaseSheet(content: Buffer): Promise<SheetRow[]> {
  const wb = new Workbook();
  try {
    await wb.xlsx.load(toArrayBuffer(content));
  } catch (err) {
    throw validationError("Could not read spreadsheet; upload an .xlsx file", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const ws = wb.worksheets[0];
  if (!ws) throw validationError("Spreadsheet has no worksheets");

  const headers = new Map<number, string>();
  ws.getRow(1).eachCell((cell, col) => {
    const text = cellText(cell.value);
    if (text) headers.set(col, text);
  });
  const cols = detectColumns(headers);
  if (cols.name === undefined || cols.quantity === undefined) {
    throw validationError("Spreadsheet needs an item name column and a quantity column", {
      headers: Array.from(headers.values()).join(", "),
    });
  }

  const rows: SheetRow[] = [];
  for (let r = 2; r <= ws.rowCount; r++) {
    const row = ws.getRow(r);
    const read = (col: number | undefined) => (col === undefined ? "" : cellText(row.getCell(col).value));
    const parsed: SheetRow = {
      rowNumber: r,
      name: read(cols.name),
      quantity: read(cols.quantity),
      unitPrice: read(cols.unitPrice),
      category: read(cols.category),
      unit: read(cols.unit),
      vendor: read(cols.vendor),
    };
    if (!parsed.name && !parsed.quantity) continue;
    rows.push(parsed);
  }
  return rows;
}

export type SheetColumn<T> = { header: string; width?: number; value: (row: T) => string | number | null };

/** Single-sheet workbook with a bold header row. */
export async function writeSheet<T>(sheetName: string, columns: SheetColumn<T>[], rows: T[]): Promise<Buffer> {
  const wb = new Workbook();
  const ws = wb.addWorksheet(sheetName);
  ws.columns = columns.map((c) => ({ header: c.header, width: c.width ?? 14 }));
  ws.getRow(1).font = { bold: true };
  for (const row of rows) ws.addRow(columns.map((c) => c.value(row)));
  return Buffer.from(await wb.xlsx.writeBuffer());
}
