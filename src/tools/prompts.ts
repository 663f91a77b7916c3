import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "monthly-review",
    {
      description:
        "Monthly financial review covering balance, budget adherence, unusual spending, next month's forecast and savings opportunities",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please provide a monthly financial review. Use these tools in order:\n\n1. **get_monthly_balance** - Show income vs expenses for this month and the savings rate\n2. **get_budget_summary** - Show how the month is tracking against the budget\n3. **detect_anomalies** - Flag any unusual transactions from the last 3 months\n4. **forecast_expenses** - Predict next month's spending per category\n5. **recommend_savings** - Collect savings recommendations for this month\n\nFormat the review as a clear, actionable report with the following sections:\n- **Cash Flow Overview**: Income vs expenses, net savings or deficit\n- **Budget Status**: Planned vs actual, with over-budget categories called out\n- **Alerts & Anomalies**: Any transactions that need attention\n- **Next Month**: Forecast per category with trend and confidence\n- **Recommendations**: The highest-priority steps, with the amount each could save",
          },
        },
      ],
    })
  );

  server.registerPrompt(
    "budget-check",
    {
      description:
        "Check current month budget adherence, identify over-budget lines, and suggest adjustments for the rest of the month",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please check my budget adherence for the current month. Use these tools:\n\n1. **compare_budget** - Get the current month's budget with planned vs actual amounts per line\n2. **get_spending_trend** - See how spending in each category has moved over recent months\n3. **recommend_savings** - Get recommendations for lines that are over budget\n\nProvide a report with:\n- **Budget Status**: For each budget line, show planned amount, actual spending, remaining balance, and percentage used\n- **Over-Budget Alerts**: Highlight any lines that have exceeded or are close to exceeding (>80%) their budget\n- **Under-Budget Lines**: Identify lines with significant unused budget\n- **Recommendations**: Suggest specific adjustments for the remainder of the month to stay on track",
          },
        },
      ],
    })
  );
}
