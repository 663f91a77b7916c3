import type { MiddlewareHandler } from "hono";
import { clientIp } from "./client-ip.js";

const WINDOW_MS = 60_000; // 1 minute sliding window

/**
 * Simple per-IP sliding-window rate limiter.
 *
 * Tracks request timestamps in memory and rejects requests that exceed the
 * configured requests-per-minute (rpm) threshold with a 429 status code.
 */
export function rateLimit(
  options: { rpm?: number; now?: () => number } = {}
): MiddlewareHandler {
  const limit = options.rpm ?? 60;
  const now = options.now ?? Date.now;
  const windows = new Map<string, number[]>();

  // Periodic cleanup of idle addresses
  const cleanupInterval = setInterval(() => {
    const cutoff = now() - WINDOW_MS;
    for (const [ip, timestamps] of windows) {
      const filtered = timestamps.filter((t) => t > cutoff);
      if (filtered.length === 0) {
        windows.delete(ip);
      } else {
        windows.set(ip, filtered);
      }
    }
  }, WINDOW_MS);
  cleanupInterval.unref();

  return async (c, next) => {
    const ip = clientIp(c);
    const current = now();
    const cutoff = current - WINDOW_MS;

    const filtered = (windows.get(ip) ?? []).filter((t) => t > cutoff);
    const oldestInWindow = filtered[0];

    if (filtered.length >= limit && oldestInWindow !== undefined) {
      const resetAt = oldestInWindow + WINDOW_MS;
      const retryAfterSec = Math.ceil((resetAt - current) / 1000);

      c.header("Retry-After", String(retryAfterSec));
      c.header("X-RateLimit-Limit", String(limit));
      c.header("X-RateLimit-Remaining", "0");
      c.header("X-RateLimit-Reset", String(Math.ceil(resetAt / 1000)));

      return c.json(
        {
          error: "rate_limit_exceeded",
          error_description: `Too many requests. Limit: ${limit} requests per minute.`,
          retry_after: retryAfterSec,
        },
        429
      );
    }

    filtered.push(current);
    windows.set(ip, filtered);

    c.header("X-RateLimit-Limit", String(limit));
    c.header("X-RateLimit-Remaining", String(limit - filtered.length));

    await next();
  };
}
