// apps/api/src/inventory/catalog.ts
import catalog from "../../data/catalog.json";

export type CategoryDefault = { name: string; icon: string };

export const DEFAULT_CATEGORY: string = catalog.defaultCategory;
export const DEFAULT_UNIT: string = catalog.defaultUnit;
export const DEFAULT_CATEGORIES: readonly CategoryDefault[] = catalog.categories;
export const UNITS: readonly string[] = catalog.units;

export type Detection = { category: string; unit: string; autoDetected: boolean };

type KeywordRule = { value: string; patterns: RegExp[] };

const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// whole words, plural "s"/"es" allowed: "tomato" matches "Tomatoes" but "ice" never matches "Rice"
const wordPattern = (kw: string) => new RegExp(`\\b${escape(kw)}(?:e?s)?\\b`, "i");

const CATEGORY_RULES: KeywordRule[] = catalog.categoryKeywords.map((r) => ({
  value: r.category,
  patterns: r.keywords.map(wordPattern),
}));

const UNIT_RULES: KeywordRule[] = catalog.unitKeywords.map((r) => ({
  value: r.unit,
  patterns: r.keywords.map(wordPattern),
}));

function firstMatch(rules: KeywordRule[], name: string): string | undefined {
  return rules.find((r) => r.patterns.some((p) => p.test(name)))?.value;
}

/** Guess category and unit from an item name; unknown names fall back to the defaults. */
export function detectFromName(name: string): Detection {
  const category = firstMatch(CATEGORY_RULES, name);
  const unit = firstMatch(UNIT_RULES, name);
  return {
    category: category ?? DEFAULT_CATEGORY,
    unit: unit ?? DEFAULT_UNIT,
    autoDetected: true,
  };
}

/** Canonical unit code ("kg" → "KG") or undefined when not a known unit. */
export function normalizeUnit(raw: unknown): string | undefined {
  const s = String(raw ?? "").trim().toUpperCase();
  return UNITS.find((u) => u === s);
}

export function iconFor(category: string): string {
  return DEFAULT_CATEGORIES.find((c) => c.name.toLowerCase() === category.toLowerCase())?.icon ?? "📦";
}
