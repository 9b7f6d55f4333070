import type { Context, Next } from "hono";

interface WindowCount {
  count: number;
  windowEndsAt: number;
}

export interface RateLimitOptions {
  /** Component tag for log lines, e.g. "Feedback" */
  name: string;
  windowMs: number;
  max: number;
  keyFor: (c: Context) => string;
}

/**
 * Fixed-window limiter. Counts live in memory per limiter instance, so each
 * app built by createApp() starts with clean windows.
 */
export function createRateLimiter(options: RateLimitOptions) {
  const { name, windowMs, max, keyFor } = options;
  const windows = new Map<string, WindowCount>();

  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [key, window] of windows) {
      if (window.windowEndsAt <= now) windows.delete(key);
    }
  }, windowMs);
  sweep.unref();

  return async (c: Context, next: Next) => {
    const key = keyFor(c);
    const now = Date.now();

    const current = windows.get(key);
    const window = current && current.windowEndsAt > now ? current : { count: 0, windowEndsAt: now + windowMs };
    window.count++;
    windows.set(key, window);

    const retryAfter = Math.ceil((window.windowEndsAt - now) / 1000);

    c.header("X-RateLimit-Limit", String(max));
    c.header("X-RateLimit-Remaining", String(Math.max(0, max - window.count)));
    c.header("X-RateLimit-Reset", String(retryAfter));

    if (window.count > max) {
      if (window.count === max + 1) {
        console.warn(`[RateLimit] ${name} limit of ${max} reached for ${key}`);
      }
      c.header("Retry-After", String(retryAfter));
      return c.json({ error: "Too many requests", retryAfter }, 429);
    }

    await next();
  };
}

export const FEEDBACK_WRITES_PER_MINUTE = 120;

/**
 * Feedback writes per client (X-Forwarded-For) per minute
 */
export function createFeedbackLimit(max = FEEDBACK_WRITES_PER_MINUTE) {
  return createRateLimiter({
    name: "Feedback",
    windowMs: 60 * 1000,
    max,
    keyFor: (c) => `feedback:${c.req.header("x-forwarded-for") ?? "anonymous"}`,
  });
}
