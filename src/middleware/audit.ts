import type { MiddlewareHandler } from "hono";
import { logger } from "../logger.js";
import { clientIp } from "./client-ip.js";

/**
 * Structured audit logging middleware.
 *
 * Emits one log line per request with timing, status, method, path,
 * MCP session and client IP.
 */
export function auditLog(): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip = clientIp(c);
    const userAgent = c.req.header("user-agent") || "unknown";

    await next();

    const status = c.res.status;
    const level = status >= 500 ? "error" : status >= 400 ? "warn" : "info";

    logger[level](
      {
        method,
        path,
        status,
        duration: Date.now() - start,
        session: c.res.headers.get("mcp-session-id") ?? c.req.header("mcp-session-id"),
        ip,
        userAgent,
      },
      "request",
    );
  };
}
