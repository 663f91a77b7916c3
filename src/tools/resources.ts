import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { loadTaxonomy } from "../categories.js";
import { resolvePeriod, type ToolContext } from "./context.js";

export function registerResources(server: McpServer, ctx: ToolContext) {
  server.registerResource(
    "categories",
    "finance://categories",
    { description: "Expense categories with subcategories and essential flags, plus income sources" },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(loadTaxonomy(), null, 2),
        },
      ],
    })
  );

  server.registerResource(
    "budget-current",
    "finance://budget/current",
    { description: "Current month budget with planned vs actual amounts for the default owner" },
    async (uri) => {
      const period = resolvePeriod(ctx, undefined, undefined);
      const rows = ctx.insights.compareBudget(ctx.defaultOwner, period);

      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: JSON.stringify({ ...period, rows, summary: ctx.insights.budgetSummary(ctx.defaultOwner, period) }, null, 2),
          },
        ],
      };
    }
  );
}
