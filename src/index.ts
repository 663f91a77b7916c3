#!/usr/bin/env node
/**
 * Budget Insights MCP Server
 *
 * Household budget analytics over a local SQLite ledger: expense forecasts,
 * unusual-spending flags, budget-vs-actual comparison and savings recommendations.
 * Supports dual transport: stdio (desktop MCP clients) and HTTP.
 *
 * Usage:
 *   node dist/index.js --transport stdio   # Local
 *   node dist/index.js --transport http    # HTTP server on port 3300
 */

import { loadConfig } from "./config.js";
import { createInsightsService } from "./insights/service.js";
import { closeLedger, initLedger, sqliteLedger } from "./ledger/store.js";
import { logger, setLogLevel } from "./logger.js";
import { createMcpServer } from "./mcp/server.js";
import type { ToolContext } from "./tools/index.js";

const config = loadConfig();
setLogLevel(config.logLevel);
initLedger(config.dbPath);

const ctx: ToolContext = {
  insights: createInsightsService(sqliteLedger, {
    essentialCategories: config.analysis.essentialCategories,
    anomalyThreshold: config.analysis.anomalyThreshold,
  }),
  defaultOwner: config.analysis.defaultOwner,
};

if (config.server.transport === "stdio") {
  await startStdio();
} else {
  await startHttp();
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio() {
  const { StdioServerTransport } = await import(
    "@modelcontextprotocol/sdk/server/stdio.js"
  );

  const server = createMcpServer(ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ dbPath: config.dbPath }, "MCP server ready on stdio");

  process.on("SIGINT", async () => {
    await server.close();
    closeLedger();
    process.exit(0);
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

async function startHttp() {
  const { serve } = await import("@hono/node-server");
  const { createHttpApp } = await import("./mcp/http.js");

  const { app, pruneSessions, closeAll } = createHttpApp(config, ctx);

  // Clean up stale sessions every 5 minutes
  const sweep = setInterval(() => {
    pruneSessions()
      .then((closed) => {
        if (closed > 0) logger.info({ closed }, "Closed idle MCP sessions");
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, "Session cleanup failed");
      });
  }, 5 * 60_000);
  sweep.unref();

  const { host, port } = config.server;
  const httpServer = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    logger.info(
      { url: `http://${host}:${info.port}`, mcp: "POST /mcp", health: "GET /health" },
      "MCP server listening",
    );
  });

  process.on("SIGINT", async () => {
    clearInterval(sweep);
    await closeAll();
    httpServer.close();
    closeLedger();
    process.exit(0);
  });
}
