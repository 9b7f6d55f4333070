import { Hono } from "hono";
import type { AppDeps } from "../app.js";
import { DEFAULT_TRENDING_LIMIT } from "../services/feedback.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { handleRouteError, queryNumber, readJsonBody } from "../utils/http.js";
import { isRecord, optionalString } from "../utils/validation.js";
import { createFeedbackLimit } from "../middleware/rateLimit.js";

const MAX_TRENDING_LIMIT = 50;

export function createFeedbackRoutes(deps: AppDeps) {
  const feedback = new Hono();

  /**
   * POST / - Record one feedback event
   * Body: { user_id, item_id, feedback_type, additional_data? }
   */
  feedback.post("/", createFeedbackLimit(deps.feedbackRateLimit), async (c) => {
    try {
      const body = await readJsonBody(c);
      if (!isRecord(body)) {
        throw new InvalidArgumentError("Request body must be a JSON object");
      }

      const event = await deps.feedback.recordFeedback(
        optionalString(body.user_id),
        optionalString(body.item_id),
        optionalString(body.feedback_type),
        isRecord(body.additional_data) ? body.additional_data : {}
      );

      return c.json({ success: true, event }, 201);
    } catch (err) {
      return handleRouteError(c, err, "Feedback");
    }
  });

  feedback.get("/users/:userId", async (c) => {
    try {
      const summary = await deps.feedback.userFeedbackSummary(c.req.param("userId"));
      return c.json(summary);
    } catch (err) {
      return handleRouteError(c, err, "Feedback");
    }
  });

  feedback.get("/users/:userId/preferences", async (c) => {
    try {
      const preferences = await deps.feedback.userPreferences(c.req.param("userId"));
      return c.json(preferences);
    } catch (err) {
      return handleRouteError(c, err, "Feedback");
    }
  });

  feedback.get("/users/:userId/improvements", async (c) => {
    try {
      const suggestions = await deps.feedback.improvementSuggestions(c.req.param("userId"));
      return c.json(suggestions);
    } catch (err) {
      return handleRouteError(c, err, "Feedback");
    }
  });

  feedback.get("/items/:itemId", async (c) => {
    try {
      const summary = await deps.feedback.itemSummary(c.req.param("itemId"));
      return c.json(summary);
    } catch (err) {
      return handleRouteError(c, err, "Feedback");
    }
  });

  feedback.get("/patterns", async (c) => {
    try {
      return c.json(await deps.feedback.feedbackPatterns());
    } catch (err) {
      return handleRouteError(c, err, "Feedback");
    }
  });

  return feedback;
}

export function createTrendingRoutes(deps: AppDeps) {
  const trending = new Hono();

  /**
   * GET /trending?limit= - Catalog items ranked by summed feedback importance
   */
  trending.get("/", async (c) => {
    try {
      const limit = queryNumber(c.req.query("limit"), DEFAULT_TRENDING_LIMIT, MAX_TRENDING_LIMIT);
      const items = await deps.feedback.trendingItems(limit);
      return c.json({ items, count: items.length });
    } catch (err) {
      return handleRouteError(c, err, "Trending");
    }
  });

  return trending;
}
