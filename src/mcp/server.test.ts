import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createInsightsService } from "../insights/service.js";
import { closeLedger, initLedger, sqliteLedger } from "../ledger/store.js";
import { setLogSink } from "../logger.js";
import type { ToolContext } from "../tools/index.js";
import { createMcpServer } from "./server.js";

const now = () => new Date(2025, 2, 20); // 2025-03-20

let client: Client;
let closeServer: () => Promise<void>;

beforeEach(async () => {
  setLogSink(() => {});
  initLedger(":memory:");

  const ctx: ToolContext = {
    insights: createInsightsService(sqliteLedger, {
      essentialCategories: new Set(["Housing", "Insurance", "Loans"]),
      now,
    }),
    defaultOwner: "household",
    now,
  };

  const server = createMcpServer(ctx);
  client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  closeServer = () => server.close();
});

afterEach(async () => {
  await client.close();
  await closeServer();
  closeLedger();
});

async function call(name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error("expected text content");
  return { isError: result.isError ?? false, text: first.text };
}

async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const { isError, text } = await call(name, args);
  expect(isError).toBe(false);
  return JSON.parse(text);
}

describe("Tool registry", () => {
  test("exposes analysis and ledger tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "compare_budget",
      "copy_budget",
      "detect_anomalies",
      "forecast_expenses",
      "get_budget_summary",
      "get_monthly_balance",
      "get_spending_trend",
      "recommend_savings",
      "record_expense",
      "record_income",
      "set_budget",
    ]);
  });

  test("analysis tools are marked read-only", async () => {
    const { tools } = await client.listTools();
    const readOnly = tools.filter((t) => t.annotations?.readOnlyHint).map((t) => t.name);
    expect(readOnly).toHaveLength(7);
    expect(readOnly).not.toContain("record_expense");
  });
});

describe("Ledger tools", () => {
  test("record_expense rejects unknown categories", async () => {
    const result = await call("record_expense", {
      category: "Food",
      subcategory: "Sushi",
      amount: 12,
      date: "2025-03-01",
    });
    expect(result).toEqual({ isError: true, text: 'Error: Unknown category "Food" / "Sushi"' });
  });

  test("record_expense surfaces validation errors", async () => {
    const result = await call("record_expense", {
      category: "Food",
      subcategory: "Groceries",
      amount: 0,
      date: "2025-03-01",
    });
    expect(result).toEqual({
      isError: true,
      text: "Error: Invalid expense: amount: amount must be greater than 0",
    });
  });

  test("record_income rejects unknown sources", async () => {
    const result = await call("record_income", { source: "Lottery", amount: 5, date: "2025-03-01" });
    expect(result).toEqual({ isError: true, text: 'Error: Unknown income source "Lottery"' });
  });

  test("records default to the configured owner", async () => {
    const expense = await callJson("record_expense", {
      category: "Food",
      subcategory: "Groceries",
      amount: 42,
      date: "2025-03-03",
    });
    expect(expense).toMatchObject({ ownerId: "household", kind: "expense", amount: 42 });
  });

  test("copy_budget copies the current month into the next", async () => {
    await callJson("set_budget", { category: "Pets", subcategory: "Pet Food", plannedAmount: 60 });
    expect(await callJson("copy_budget")).toEqual({
      success: true,
      copied: 1,
      skipped: 0,
      target: { month: 4, year: 2025 },
    });
  });
});

describe("Analysis tools", () => {
  beforeEach(async () => {
    await callJson("record_income", { source: "Salary", amount: 2000, date: "2025-03-01" });
    await callJson("record_expense", { category: "Food", subcategory: "Groceries", amount: 600, date: "2025-03-05" });
    await callJson("set_budget", { category: "Food", subcategory: "Groceries", plannedAmount: 500 });
  });

  test("compare_budget defaults to the current month", async () => {
    expect(await callJson("compare_budget")).toEqual([
      {
        category: "Food",
        subcategory: "Groceries",
        plannedAmount: 500,
        actualAmount: 600,
        difference: -100,
        percentage: 120,
        status: "Over Budget",
      },
    ]);
  });

  test("get_monthly_balance reports the savings rate", async () => {
    expect(await callJson("get_monthly_balance", { month: 3, year: 2025 })).toEqual({
      incomeTotal: 2000,
      expenseTotal: 600,
      balance: 1400,
      savingsRate: 70,
    });
  });

  test("recommend_savings lists overspend and optimisation", async () => {
    const result = await callJson("recommend_savings");
    expect(result).toMatchObject({
      success: true,
      totalPotentialSavings: 140,
      currentSavingsRate: 70,
    });
  });

  test("forecast_expenses reports missing history as a result, not an error", async () => {
    expect(await callJson("forecast_expenses")).toMatchObject({
      success: false,
      reason: "insufficient_history",
    });
  });

  test("other owners see an empty ledger", async () => {
    expect(await callJson("compare_budget", { owner: "guest" })).toEqual([]);
  });
});

describe("Resources and prompts", () => {
  test("finance://categories lists the taxonomy", async () => {
    const { contents } = await client.readResource({ uri: "finance://categories" });
    const first = contents[0];
    if (!first || !("text" in first)) throw new Error("expected text resource");
    const taxonomy: unknown = JSON.parse(first.text);
    expect(taxonomy).toMatchObject({
      incomeSources: expect.arrayContaining(["Salary", "Bonus"]),
    });
  });

  test("finance://budget/current compares the current month", async () => {
    await callJson("set_budget", { category: "Pets", subcategory: "Pet Food", plannedAmount: 60 });
    const { contents } = await client.readResource({ uri: "finance://budget/current" });
    const first = contents[0];
    if (!first || !("text" in first)) throw new Error("expected text resource");
    expect(JSON.parse(first.text)).toMatchObject({
      month: 3,
      year: 2025,
      summary: { totalPlanned: 60, totalActual: 0, overBudgetCount: 0 },
    });
  });

  test("monthly-review prompt walks through the analysis tools", async () => {
    const { messages } = await client.getPrompt({ name: "monthly-review" });
    const content = messages[0]?.content;
    expect(content?.type).toBe("text");
    if (content?.type === "text") {
      expect(content.text).toContain("**get_monthly_balance**");
      expect(content.text).toContain("**recommend_savings**");
    }
  });
});
