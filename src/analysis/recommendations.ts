// ── Savings Recommendations ─────────────────────────────────────────
// Turns a month's budget comparison and balance into concrete,
// quantified suggestions. Three independent rules run over the same
// input and their results are concatenated.

import type { Balance } from "./balance.js";
import type { ComparisonRow } from "./budget.js";
import { failure, type Failure } from "./results.js";
import { round, safeDivide, sum } from "./stats.js";

export const DEFAULT_ESSENTIAL_CATEGORIES: ReadonlySet<string> = new Set([
  "Housing",
  "Insurance",
  "Loans",
]);

/** Target share of income to keep, in percent */
export const SAVINGS_RATE_TARGET = 10;
const OPTIMIZATION_CANDIDATES = 3;
const OPTIMIZATION_CUT = 0.15;
const HIGH_OVERSPEND_RATIO = 0.5;

export type RecommendationKind = "over_budget" | "optimization" | "savings_goal";
export type Priority = "High" | "Medium";

export interface Recommendation {
  category: string;
  subcategory: string | null;
  kind: RecommendationKind;
  priority: Priority;
  message: string;
  suggestion: string;
  suggestedAmount: number;
}

export interface RecommendationReport {
  success: true;
  recommendations: Recommendation[];
  totalPotentialSavings: number;
  currentSavingsRate: number;
}

export type RecommendationResult =
  | RecommendationReport
  | Failure<"no_budget_configured">;

export interface RecommendationOptions {
  /** Non-discretionary categories never proposed for cuts */
  essentialCategories?: ReadonlySet<string>;
}

/**
 * Generate savings recommendations for one month.
 *
 * Requires a budget: with no comparison rows the result is a
 * `no_budget_configured` failure.
 */
export function generateRecommendations(
  rows: readonly ComparisonRow[],
  balance: Balance,
  options: RecommendationOptions = {},
): RecommendationResult {
  if (rows.length === 0) {
    return failure(
      "no_budget_configured",
      "No budget configured for this month. Set a budget to get recommendations.",
    );
  }

  const essential = options.essentialCategories ?? DEFAULT_ESSENTIAL_CATEGORIES;

  const recommendations = [
    ...overBudgetAlerts(rows),
    ...optimizationOpportunities(rows, essential),
    ...savingsGoal(balance),
  ];

  return {
    success: true,
    recommendations,
    totalPotentialSavings: round(sum(recommendations.map((r) => r.suggestedAmount))),
    currentSavingsRate: balance.savingsRate,
  };
}

function overBudgetAlerts(rows: readonly ComparisonRow[]): Recommendation[] {
  return rows
    .filter((row) => row.actualAmount > row.plannedAmount)
    .map((row): Recommendation => {
      const overspend = row.actualAmount - row.plannedAmount;
      // Overspending a zero plan is always serious.
      const ratio = safeDivide(overspend, row.plannedAmount, Infinity);
      const suggestedAmount = round(overspend / 2);
      return {
        category: row.category,
        subcategory: row.subcategory,
        kind: "over_budget",
        priority: ratio > HIGH_OVERSPEND_RATIO ? "High" : "Medium",
        message:
          `${row.category} / ${row.subcategory} is $${overspend.toFixed(2)} over budget ` +
          `($${row.actualAmount.toFixed(2)} spent of $${row.plannedAmount.toFixed(2)} planned).`,
        suggestion: `Cut back by $${suggestedAmount.toFixed(2)} next month to halve the overspend.`,
        suggestedAmount,
      };
    });
}

function optimizationOpportunities(
  rows: readonly ComparisonRow[],
  essential: ReadonlySet<string>,
): Recommendation[] {
  return rows
    .filter((row) => !essential.has(row.category) && row.actualAmount > 0)
    .sort((a, b) => b.actualAmount - a.actualAmount)
    .slice(0, OPTIMIZATION_CANDIDATES)
    .map((row): Recommendation => {
      const suggestedAmount = round(row.actualAmount * OPTIMIZATION_CUT);
      return {
        category: row.category,
        subcategory: row.subcategory,
        kind: "optimization",
        priority: "Medium",
        message:
          `${row.category} / ${row.subcategory} is one of your largest discretionary ` +
          `expenses at $${row.actualAmount.toFixed(2)}.`,
        suggestion:
          `Reducing it by ${Math.round(OPTIMIZATION_CUT * 100)}% would save ` +
          `$${suggestedAmount.toFixed(2)} a month.`,
        suggestedAmount,
      };
    });
}

function savingsGoal(balance: Balance): Recommendation[] {
  if (balance.savingsRate >= SAVINGS_RATE_TARGET) return [];

  const target = balance.incomeTotal * (SAVINGS_RATE_TARGET / 100);
  const suggestedAmount = round(Math.max(0, target - balance.balance));
  return [
    {
      category: "Savings",
      subcategory: null,
      kind: "savings_goal",
      priority: "High",
      message:
        `Your savings rate is ${balance.savingsRate.toFixed(1)}%, ` +
        `below the ${SAVINGS_RATE_TARGET}% target.`,
      suggestion:
        `Set aside another $${suggestedAmount.toFixed(2)} this month to reach ` +
        `${SAVINGS_RATE_TARGET}% of income.`,
      suggestedAmount,
    },
  ];
}
