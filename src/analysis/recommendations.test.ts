import { describe, expect, test } from "vitest";
import { generateRecommendations } from "./recommendations.js";
import { computeBalance } from "./balance.js";
import type { ComparisonRow } from "./budget.js";

function row(overrides: Partial<ComparisonRow> = {}): ComparisonRow {
  const plannedAmount = overrides.plannedAmount ?? 500;
  const actualAmount = overrides.actualAmount ?? 400;
  return {
    category: overrides.category ?? "Food",
    subcategory: overrides.subcategory ?? "Groceries",
    plannedAmount,
    actualAmount,
    difference: plannedAmount - actualAmount,
    percentage: plannedAmount === 0 ? 0 : (actualAmount / plannedAmount) * 100,
    status: actualAmount > plannedAmount ? "Over Budget" : "On Track",
  };
}

// 20% savings rate: no savings-goal recommendation
const healthy = computeBalance(5000, 4000);

describe("computeBalance", () => {
  test("derives balance and savings rate", () => {
    expect(computeBalance(4000, 3000)).toEqual({
      incomeTotal: 4000,
      expenseTotal: 3000,
      balance: 1000,
      savingsRate: 25,
    });
  });

  test("savings rate is 0 without income", () => {
    const balance = computeBalance(0, 250);
    expect(balance.savingsRate).toBe(0);
    expect(balance.balance).toBe(-250);
  });
});

describe("generateRecommendations", () => {
  test("fails when no budget is configured", () => {
    const result = generateRecommendations([], healthy);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe("no_budget_configured");
    }
  });

  test("suggests halving the overspend of an over-budget row", () => {
    const result = generateRecommendations(
      [row({ category: "Housing", subcategory: "Electricity", plannedAmount: 500, actualAmount: 600 })],
      healthy,
    );
    expect(result.success).toBe(true);
    if (!result.success) return;

    const alerts = result.recommendations.filter((r) => r.kind === "over_budget");
    expect(alerts).toHaveLength(1);
    expect(alerts[0]?.suggestedAmount).toBe(50);
    // 100 / 500 = 0.2
    expect(alerts[0]?.priority).toBe("Medium");
  });

  test("overspending by more than half the plan is high priority", () => {
    const result = generateRecommendations(
      [row({ category: "Loans", plannedAmount: 100, actualAmount: 151 })],
      healthy,
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.recommendations[0]?.priority).toBe("High");
    expect(result.recommendations[0]?.suggestedAmount).toBe(25.5);
  });

  test("overspending a zero plan is high priority", () => {
    const result = generateRecommendations(
      [row({ category: "Insurance", plannedAmount: 0, actualAmount: 80 })],
      healthy,
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.recommendations).toHaveLength(1);
    expect(result.recommendations[0]?.priority).toBe("High");
    expect(result.recommendations[0]?.suggestedAmount).toBe(40);
  });

  test("proposes 15% cuts on the three largest non-essential rows", () => {
    const rows = [
      row({ category: "Housing", subcategory: "Utilities", actualAmount: 2000, plannedAmount: 2500 }),
      row({ category: "Food", subcategory: "Groceries", actualAmount: 400 }),
      row({ category: "Entertainment", subcategory: "Cinema", actualAmount: 100 }),
      row({ category: "Pets", subcategory: "Pet Food", actualAmount: 300 }),
      row({ category: "Transportation", subcategory: "Parking", actualAmount: 200 }),
      row({ category: "Gifts and Charity", subcategory: "Gifts", actualAmount: 0 }),
    ];

    const result = generateRecommendations(rows, healthy);
    expect(result.success).toBe(true);
    if (!result.success) return;

    const cuts = result.recommendations.filter((r) => r.kind === "optimization");
    expect(cuts.map((c) => c.category)).toEqual(["Food", "Pets", "Transportation"]);
    expect(cuts.map((c) => c.suggestedAmount)).toEqual([60, 45, 30]);
    expect(cuts.every((c) => c.priority === "Medium")).toBe(true);
  });

  test("honours an injected essential-category set", () => {
    const result = generateRecommendations(
      [row({ category: "Food", actualAmount: 400 }), row({ category: "Housing", actualAmount: 200 })],
      healthy,
      { essentialCategories: new Set(["Food"]) },
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    const cuts = result.recommendations.filter((r) => r.kind === "optimization");
    expect(cuts.map((c) => c.category)).toEqual(["Housing"]);
  });

  test("adds a savings goal when the savings rate is below 10%", () => {
    // balance 200, rate 5%; target 400 → 200 more
    const result = generateRecommendations(
      [row({ category: "Housing", actualAmount: 100 })],
      computeBalance(4000, 3800),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;

    const goal = result.recommendations.find((r) => r.kind === "savings_goal");
    expect(goal?.suggestedAmount).toBe(200);
    expect(goal?.priority).toBe("High");
    expect(result.currentSavingsRate).toBe(5);
  });

  test("savings goal with no income asks to cover the deficit", () => {
    const result = generateRecommendations(
      [row({ category: "Housing", actualAmount: 300, plannedAmount: 300 })],
      computeBalance(0, 300),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.currentSavingsRate).toBe(0);
    expect(result.recommendations.find((r) => r.kind === "savings_goal")?.suggestedAmount).toBe(300);
  });

  test("totals every suggested amount without dedup", () => {
    // Food is both over budget (50) and the top discretionary row (90)
    const result = generateRecommendations(
      [row({ category: "Food", plannedAmount: 500, actualAmount: 600 })],
      healthy,
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.recommendations.map((r) => r.kind)).toEqual(["over_budget", "optimization"]);
    expect(result.totalPotentialSavings).toBe(140);
    expect(result.currentSavingsRate).toBe(20);
  });
});
