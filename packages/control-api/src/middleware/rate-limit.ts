import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import type { Env } from "../instrumentation.js";

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export interface RateLimitOptions {
  /** Requests accepted per client within one window. */
  limit: number;
  windowMs: number;
  key?: (c: Context<Env>) => string;
  now?: () => number;
}

// First hop of X-Forwarded-For, or one shared bucket when the header is absent
function clientKey(c: Context<Env>) {
  const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  return forwarded || "unknown";
}

/**
 * Fixed-window request counter per client. Requests over the limit get a
 * 429 with a Retry-After header until the client's window ends.
 */
export const rateLimit = (options: RateLimitOptions) => {
  const { limit, windowMs, key = clientKey, now = Date.now } = options;
  const entries = new Map<string, RateLimitEntry>();

  const sweep = (at: number) => {
    for (const [client, entry] of entries) {
      if (at - entry.windowStart >= windowMs) {
        entries.delete(client);
      }
    }
  };

  return createMiddleware<Env>(async (c, next) => {
    const at = now();
    const client = key(c);

    let entry = entries.get(client);
    if (!entry || at - entry.windowStart >= windowMs) {
      sweep(at);
      entry = { count: 0, windowStart: at };
      entries.set(client, entry);
    }

    if (entry.count >= limit) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - at) / 1000);
      c.var.log.warn(`Rate limit exceeded for ${client}`);
      c.header("Retry-After", String(retryAfter));
      return c.json({ error: "Rate limit exceeded" }, 429);
    }

    entry.count++;
    await next();
  });
};
