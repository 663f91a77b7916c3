import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  registerInsightTools,
  registerLedgerTools,
  registerPrompts,
  registerResources,
  type ToolContext,
} from "../tools/index.js";

const SERVER_NAME = "budget-insights";
const SERVER_VERSION = "0.1.0";

/**
 * Create and configure a fully-loaded MCP server instance
 * with all tools, resources, and prompts registered.
 */
export function createMcpServer(ctx: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Analysis tools — computed insights over the ledger
  registerInsightTools(server, ctx);

  // Ledger tools — record expenses, income and budgets
  registerLedgerTools(server, ctx);

  // Resources — read-only data surfaces
  registerResources(server, ctx);

  // Prompts — canned analysis templates
  registerPrompts(server);

  return server;
}
