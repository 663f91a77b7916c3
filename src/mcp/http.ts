import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { JSONRPCMessageSchema, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { auditLog } from "../middleware/audit.js";
import { rateLimit } from "../middleware/rate-limit.js";
import type { ToolContext } from "../tools/index.js";
import { createMcpServer } from "./server.js";
import { HttpTransport } from "./transport.js";

const SESSION_IDLE_MS = 30 * 60_000;

interface McpSession {
  server: McpServer;
  transport: HttpTransport;
  lastAccess: number;
}

export interface HttpAppOptions {
  requestTimeoutMs?: number;
}

export function createHttpApp(
  config: Pick<Config, "server" | "rateLimit">,
  ctx: ToolContext,
  options: HttpAppOptions = {},
) {
  const sessions = new Map<string, McpSession>();
  const app = new Hono();

  // ── Middleware ──
  app.use(auditLog());
  app.use(
    cors({
      origin: config.server.corsOrigins,
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Mcp-Session-Id"],
      exposeHeaders: ["Mcp-Session-Id", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
    })
  );

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({
      status: "ok",
      server: "budget-insights-mcp",
      version: "0.1.0",
      sessions: sessions.size,
    })
  );

  // ── MCP endpoint ──
  app.post("/mcp", rateLimit({ rpm: config.rateLimit.rpm }), async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch (error) {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: ErrorCode.ParseError, message: errorMessage(error) } },
        400
      );
    }

    const parsed = JSONRPCMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: ErrorCode.InvalidRequest, message: "Invalid JSON-RPC message" } },
        400
      );
    }

    const sessionId = c.req.header("mcp-session-id");
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    let session: McpSession;
    let newSessionId: string | undefined;

    if (existing) {
      session = existing;
      session.lastAccess = Date.now();
    } else {
      newSessionId = randomUUID();
      const server = createMcpServer(ctx);
      const transport = new HttpTransport(options.requestTimeoutMs);
      await server.connect(transport);
      session = { server, transport, lastAccess: Date.now() };
      sessions.set(newSessionId, session);
      logger.debug({ session: newSessionId }, "MCP session opened");
    }

    const response = await session.transport.handleJsonRpc(parsed.data);

    if (newSessionId) {
      c.header("mcp-session-id", newSessionId);
    }
    if (response === null) {
      return c.body(null, 202);
    }
    return c.json(response);
  });

  app.delete("/mcp", async (c) => {
    const sessionId = c.req.header("mcp-session-id");
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (!sessionId || !session) {
      return c.json({ error: "unknown_session" }, 404);
    }
    sessions.delete(sessionId);
    await session.server.close();
    return c.body(null, 204);
  });

  /** Close sessions idle since before `cutoff` */
  async function pruneSessions(cutoff: number = Date.now() - SESSION_IDLE_MS): Promise<number> {
    let closed = 0;
    for (const [id, session] of sessions) {
      if (session.lastAccess < cutoff) {
        sessions.delete(id);
        await session.server.close();
        closed++;
      }
    }
    return closed;
  }

  async function closeAll(): Promise<void> {
    await pruneSessions(Infinity);
  }

  return { app, pruneSessions, closeAll };
}
