import { readFileSync } from "node:fs";
import { z } from "zod";

// ── Category Taxonomy ───────────────────────────────────────────────
// Expense categories, their subcategories and essential flags, plus the
// income sources. Loaded once from data/categories.json.

const taxonomySchema = z.object({
  expenseCategories: z.array(
    z.object({
      name: z.string().min(1),
      essential: z.boolean(),
      subcategories: z.array(z.string().min(1)).min(1),
    }),
  ),
  incomeSources: z.array(z.string().min(1)),
});

export type Taxonomy = z.infer<typeof taxonomySchema>;

const TAXONOMY_URL = new URL("../data/categories.json", import.meta.url);

let cached: Taxonomy | null = null;

export function loadTaxonomy(): Taxonomy {
  if (!cached) {
    cached = taxonomySchema.parse(JSON.parse(readFileSync(TAXONOMY_URL, "utf8")));
  }
  return cached;
}

export function essentialCategories(taxonomy: Taxonomy = loadTaxonomy()): Set<string> {
  return new Set(
    taxonomy.expenseCategories.filter((c) => c.essential).map((c) => c.name),
  );
}

export function getSubcategories(
  category: string,
  taxonomy: Taxonomy = loadTaxonomy(),
): string[] {
  return taxonomy.expenseCategories.find((c) => c.name === category)?.subcategories ?? [];
}

export function isKnownExpenseCategory(
  category: string,
  subcategory: string,
  taxonomy: Taxonomy = loadTaxonomy(),
): boolean {
  return getSubcategories(category, taxonomy).includes(subcategory);
}

export function isKnownIncomeSource(
  source: string,
  taxonomy: Taxonomy = loadTaxonomy(),
): boolean {
  return taxonomy.incomeSources.includes(source);
}
