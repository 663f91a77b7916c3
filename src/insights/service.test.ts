import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  addExpense,
  addIncome,
  closeLedger,
  initLedger,
  setBudget,
  sqliteLedger,
} from "../ledger/store.js";
import { createInsightsService, type InsightsService } from "./service.js";

const OWNER = "alice";
const MARCH = { month: 3, year: 2025 };

let insights: InsightsService;

function spend(category: string, subcategory: string, amount: number, date: string) {
  addExpense({ ownerId: OWNER, category, subcategory, amount, date });
}

beforeEach(() => {
  initLedger(":memory:");
  insights = createInsightsService(sqliteLedger, {
    essentialCategories: new Set(["Housing", "Insurance", "Loans"]),
    now: () => new Date(2025, 2, 20), // 2025-03-20
  });
});

afterEach(() => {
  closeLedger();
});

describe("forecast", () => {
  test("fails without three months of history", () => {
    spend("Housing", "Utilities", 1000, "2025-02-10");
    spend("Housing", "Utilities", 1100, "2025-03-10");

    const result = insights.forecast(OWNER);
    expect(result.success).toBe(false);
  });

  test("forecasts from the trailing six months", () => {
    spend("Housing", "Utilities", 5000, "2024-09-30"); // outside the window
    spend("Housing", "Utilities", 1000, "2025-01-10");
    spend("Housing", "Utilities", 1100, "2025-02-10");
    spend("Housing", "Electricity", 600, "2025-03-05");
    spend("Housing", "Utilities", 600, "2025-03-10");

    const result = insights.forecast(OWNER, "Housing");
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.predictions["Housing"]?.predictedAmount).toBeCloseTo(1200, 9);
    expect(result.predictions["Housing"]?.trend).toBe("increasing");
    expect(result.analysisPeriod).toEqual({ start: "2025-01", end: "2025-03" });
  });
});

describe("detectAnomalies", () => {
  test("reports failure when the window holds no expenses", () => {
    spend("Food", "Groceries", 100, "2024-11-30");
    const result = insights.detectAnomalies(OWNER);
    expect(result.success).toBe(false);
  });

  test("scans the trailing three months", () => {
    for (let day = 1; day <= 16; day++) {
      spend("Food", "Groceries", 10, `2025-02-${String(day).padStart(2, "0")}`);
    }
    spend("Food", "Dining Out & Catering", 500, "2025-03-14");

    const result = insights.detectAnomalies(OWNER);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.anomaliesFound).toBe(1);
    expect(result.anomalies[0]).toMatchObject({
      category: "Food",
      subcategory: "Dining Out & Catering",
      amount: 500,
      date: "2025-03-14",
      severity: "High",
    });
  });
});

describe("budget", () => {
  beforeEach(() => {
    setBudget({ ownerId: OWNER, category: "Food", subcategory: "Groceries", plannedAmount: 500, ...MARCH });
    setBudget({ ownerId: OWNER, category: "Housing", subcategory: "Utilities", plannedAmount: 1000, ...MARCH });
    spend("Food", "Groceries", 600, "2025-03-08");
    spend("Housing", "Utilities", 1000, "2025-03-01");
    spend("Pets", "Pet Food", 80, "2025-03-02");
  });

  test("compareBudget joins the plan with the month's spending", () => {
    const rows = insights.compareBudget(OWNER, MARCH);
    expect(rows).toEqual([
      { category: "Food", subcategory: "Groceries", plannedAmount: 500, actualAmount: 600, difference: -100, percentage: 120, status: "Over Budget" },
      { category: "Housing", subcategory: "Utilities", plannedAmount: 1000, actualAmount: 1000, difference: 0, percentage: 100, status: "On Track" },
    ]);
  });

  test("compareBudget is empty for a month without a budget", () => {
    expect(insights.compareBudget(OWNER, { month: 4, year: 2025 })).toEqual([]);
  });

  test("budgetSummary totals the comparison", () => {
    const summary = insights.budgetSummary(OWNER, MARCH);
    expect(summary).toMatchObject({ totalPlanned: 1500, totalActual: 1600, totalDifference: -100, overBudgetCount: 1 });
  });

  test("monthlyBalance counts all expenses, budgeted or not", () => {
    addIncome({ ownerId: OWNER, source: "Salary", amount: 2000, date: "2025-03-25" });
    expect(insights.monthlyBalance(OWNER, MARCH)).toEqual({
      incomeTotal: 2000,
      expenseTotal: 1680,
      balance: 320,
      savingsRate: 16,
    });
  });

  test("recommend combines overspend, optimisation and savings goal", () => {
    const result = insights.recommend(OWNER, MARCH);
    expect(result.success).toBe(true);
    if (!result.success) return;

    // No income: savings rate 0, goal covers the 1680 deficit
    expect(result.currentSavingsRate).toBe(0);
    expect(result.recommendations.map((r) => [r.kind, r.category, r.suggestedAmount])).toEqual([
      ["over_budget", "Food", 50],
      ["optimization", "Food", 90],
      ["savings_goal", "Savings", 1680],
    ]);
    expect(result.totalPotentialSavings).toBe(1820);
  });

  test("recommend fails without a budget", () => {
    const result = insights.recommend(OWNER, { month: 1, year: 2025 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe("no_budget_configured");
    }
  });
});

describe("monthlyTrend", () => {
  test("aggregates the trailing window per month and category", () => {
    spend("Food", "Groceries", 30, "2025-01-03");
    spend("Food", "Groceries", 20, "2025-01-28");
    spend("Pets", "Grooming", 45, "2025-03-01");

    expect(insights.monthlyTrend(OWNER, 3).map((r) => [r.period, r.category, r.totalAmount])).toEqual([
      ["2025-01", "Food", 50],
      ["2025-03", "Pets", 45],
    ]);
  });
});
