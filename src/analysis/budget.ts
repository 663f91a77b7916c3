// ── Budget vs Actual ────────────────────────────────────────────────
// Joins a month's budget plan against actual spending. The plan drives
// the result: spending without a budget line is not reported.

import { aggregateMonthly, type Transaction } from "./aggregation.js";
import type { MonthRef } from "./periods.js";
import { round, safeDivide, sum } from "./stats.js";

export interface BudgetEntry {
  ownerId: string;
  category: string;
  subcategory: string;
  plannedAmount: number;
  month: number; // 1-12
  year: number;
}

export type BudgetStatus = "Over Budget" | "On Track";

export interface ComparisonRow {
  category: string;
  subcategory: string;
  plannedAmount: number;
  actualAmount: number;
  /** planned - actual; negative when overspent */
  difference: number;
  /** actual as a percentage of planned; 0 when nothing was planned */
  percentage: number;
  status: BudgetStatus;
}

export type CategoryComparisonRow = Omit<ComparisonRow, "subcategory">;

export interface BudgetSummary {
  totalPlanned: number;
  totalActual: number;
  totalDifference: number;
  overBudgetCount: number;
  categories: CategoryComparisonRow[];
}

/**
 * Compare budget entries with the expenses of the same month.
 *
 * Expenses outside `period` are ignored. Rows come back ordered by
 * category, then subcategory.
 */
export function compareBudget(
  entries: readonly BudgetEntry[],
  expenses: readonly Transaction[],
  period: MonthRef,
): ComparisonRow[] {
  const actuals = new Map<string, number>();
  const series = aggregateMonthly(
    expenses.filter((tx) => tx.kind === "expense"),
    { period, bySubcategory: true },
  );
  for (const row of series) {
    const key = budgetKey(row.category, row.subcategory ?? "");
    actuals.set(key, (actuals.get(key) ?? 0) + row.totalAmount);
  }

  return entries
    .filter((e) => e.month === period.month && e.year === period.year)
    .map((entry) => ({
      category: entry.category,
      subcategory: entry.subcategory,
      ...compareAmounts(
        entry.plannedAmount,
        actuals.get(budgetKey(entry.category, entry.subcategory)) ?? 0,
      ),
    }))
    .sort(
      (a, b) =>
        a.category.localeCompare(b.category) ||
        a.subcategory.localeCompare(b.subcategory),
    );
}

/**
 * Roll subcategory rows up to one row per category.
 */
export function summarizeByCategory(
  rows: readonly ComparisonRow[],
): CategoryComparisonRow[] {
  const totals = new Map<string, { planned: number; actual: number }>();
  for (const row of rows) {
    const current = totals.get(row.category) ?? { planned: 0, actual: 0 };
    current.planned += row.plannedAmount;
    current.actual += row.actualAmount;
    totals.set(row.category, current);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([category, { planned, actual }]) => ({
      category,
      ...compareAmounts(planned, actual),
    }));
}

export function summarizeBudget(rows: readonly ComparisonRow[]): BudgetSummary {
  const totalPlanned = sum(rows.map((r) => r.plannedAmount));
  const totalActual = sum(rows.map((r) => r.actualAmount));
  return {
    totalPlanned: round(totalPlanned),
    totalActual: round(totalActual),
    totalDifference: round(totalPlanned - totalActual),
    overBudgetCount: rows.filter((r) => r.status === "Over Budget").length,
    categories: summarizeByCategory(rows),
  };
}

// Derived fields use the cent-rounded amounts.
function compareAmounts(
  plannedTotal: number,
  actualTotal: number,
): Omit<CategoryComparisonRow, "category"> {
  const planned = round(plannedTotal);
  const actual = round(actualTotal);
  return {
    plannedAmount: planned,
    actualAmount: actual,
    difference: round(planned - actual),
    percentage: round(safeDivide(actual * 100, planned)),
    status: actual > planned ? "Over Budget" : "On Track",
  };
}

function budgetKey(category: string, subcategory: string): string {
  return `${category}\u0000${subcategory}`;
}
