import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  monthArg,
  ownerArg,
  resolveOwner,
  resolvePeriod,
  yearArg,
  type ToolContext,
} from "./context.js";
import { runTool } from "./result.js";

export function registerInsightTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "forecast_expenses",
    {
      description:
        "Predict next month's expenses per category from the last 6 months of spending. Each prediction is the average of the 3 most recent months plus the month-over-month trend, with a 0-100 confidence score and an increasing/decreasing label. Requires at least 3 months of history. Use this when the user asks what they are likely to spend next month.",
      inputSchema: {
        owner: ownerArg,
        category: z
          .string()
          .optional()
          .describe(
            "Forecast only this expense category (e.g. 'Food'). Leave empty to forecast every category and get a total."
          ),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ owner, category }) =>
      runTool("forecast_expenses", () =>
        ctx.insights.forecast(resolveOwner(ctx, owner), category),
      ),
  );

  server.registerTool(
    "detect_anomalies",
    {
      description:
        "Scan the last 3 months of expenses for transactions whose amount is unusual for their category (z-score above the threshold). Categories with fewer than 5 transactions or no variation are skipped. Returns flagged transactions with the expected range and severity, largest first. Use this when the user wants to audit recent spending or spot unexpected charges.",
      inputSchema: {
        owner: ownerArg,
        threshold: z
          .number()
          .positive()
          .optional()
          .describe(
            "Number of standard deviations from the category mean a transaction must exceed to be flagged. Defaults to 2."
          ),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ owner, threshold }) =>
      runTool("detect_anomalies", () =>
        ctx.insights.detectAnomalies(resolveOwner(ctx, owner), threshold),
      ),
  );

  server.registerTool(
    "compare_budget",
    {
      description:
        "Compare the budget plan for a month with actual spending, line by line (category and subcategory). Each row has planned and actual amounts, the difference (negative when overspent), the percentage of the plan used, and an 'Over Budget' or 'On Track' status. Only budgeted lines appear; returns an empty list when no budget is set.",
      inputSchema: { owner: ownerArg, month: monthArg, year: yearArg },
      annotations: { readOnlyHint: true },
    },
    async ({ owner, month, year }) =>
      runTool("compare_budget", () =>
        ctx.insights.compareBudget(resolveOwner(ctx, owner), resolvePeriod(ctx, month, year)),
      ),
  );

  server.registerTool(
    "get_budget_summary",
    {
      description:
        "Summarize a month's budget: total planned, total spent, overall difference, how many lines are over budget, and a per-category rollup of all subcategories. Use this for a quick budget health check before drilling into compare_budget.",
      inputSchema: { owner: ownerArg, month: monthArg, year: yearArg },
      annotations: { readOnlyHint: true },
    },
    async ({ owner, month, year }) =>
      runTool("get_budget_summary", () =>
        ctx.insights.budgetSummary(resolveOwner(ctx, owner), resolvePeriod(ctx, month, year)),
      ),
  );

  server.registerTool(
    "recommend_savings",
    {
      description:
        "Generate savings recommendations for a month: alerts for over-budget lines (suggesting to cut half the overspend), 15% reduction ideas for the three largest non-essential expenses, and a savings-goal nudge when less than 10% of income is being saved. Returns each recommendation with priority and amount, the total potential savings, and the current savings rate. Requires a budget for the month.",
      inputSchema: { owner: ownerArg, month: monthArg, year: yearArg },
      annotations: { readOnlyHint: true },
    },
    async ({ owner, month, year }) =>
      runTool("recommend_savings", () =>
        ctx.insights.recommend(resolveOwner(ctx, owner), resolvePeriod(ctx, month, year)),
      ),
  );

  server.registerTool(
    "get_monthly_balance",
    {
      description:
        "Get total income, total expenses, the resulting balance and the savings rate (percentage of income not spent) for a month. The savings rate is 0 when there is no income.",
      inputSchema: { owner: ownerArg, month: monthArg, year: yearArg },
      annotations: { readOnlyHint: true },
    },
    async ({ owner, month, year }) =>
      runTool("get_monthly_balance", () =>
        ctx.insights.monthlyBalance(resolveOwner(ctx, owner), resolvePeriod(ctx, month, year)),
      ),
  );

  server.registerTool(
    "get_spending_trend",
    {
      description:
        "Get monthly spending totals per category over the trailing months, oldest first. Useful for charting how spending in each category has moved.",
      inputSchema: {
        owner: ownerArg,
        months: z
          .number()
          .int()
          .min(1)
          .max(24)
          .optional()
          .describe("Number of calendar months to include, counting the current one. Defaults to 6."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ owner, months }) =>
      runTool("get_spending_trend", () =>
        ctx.insights.monthlyTrend(resolveOwner(ctx, owner), months),
      ),
  );
}
