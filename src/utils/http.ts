import type { Context } from "hono";
import { errorMessage, isServiceError } from "./errors.js";

/**
 * Map service errors to their status; anything else is a logged 500
 */
export function handleRouteError(c: Context, err: unknown, tag: string) {
  if (isServiceError(err)) {
    if (err.status === 503) {
      console.error(`[${tag}] Upstream unavailable: ${err.message}`);
    }
    return c.json({ error: err.name, message: err.message }, err.status);
  }

  console.error(`[${tag}] Request failed:`, err);
  return c.json(
    {
      error: "Internal server error",
      message: process.env.NODE_ENV === "development" ? errorMessage(err) : undefined,
    },
    500
  );
}

/**
 * Parse a JSON body, treating a missing or malformed body as {}
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  return c.req.json().catch(() => ({}));
}

export function queryNumber(value: string | undefined, fallback: number, max: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.min(parsed, max);
}
