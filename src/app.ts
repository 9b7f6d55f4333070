import { Hono, type Context } from "hono";
import { logger } from "hono/logger";
import { prettyJSON } from "hono/pretty-json";
import { cors } from "hono/cors";
import * as Sentry from "@sentry/node";

import { rebuildPreferences } from "./jobs/rebuildPreferences.js";
import { snapshotTrending } from "./jobs/trendingSnapshot.js";
import { createAnalyzeRoutes } from "./routes/analyze.js";
import { createCatalogRoutes } from "./routes/catalog.js";
import { createFeedbackRoutes, createTrendingRoutes } from "./routes/feedback.js";
import { createRecommendationRoutes } from "./routes/recommendations.js";
import stylesRoutes from "./routes/styles.js";
import type { BodyShapeAnalyzer } from "./services/ai/bodyShapeAnalysis.js";
import type { CatalogService } from "./services/catalog.js";
import type { DocumentStore } from "./services/documentStore.js";
import type { FeedbackService } from "./services/feedback.js";
import { errorMessage } from "./utils/errors.js";

export const APP_NAME = "Outfit Rank API";
export const APP_VERSION = "1.0.0";

export interface AppDeps {
  store: DocumentStore;
  catalog: CatalogService;
  feedback: FeedbackService;
  /** Vision analyzer for /api/analyze; defaults to the OpenRouter one */
  analyzer?: BodyShapeAnalyzer;
  /** Bearer secret for /cron endpoints; the endpoints answer 503 without one */
  cronSecret?: string;
  /** Feedback writes allowed per client per minute */
  feedbackRateLimit?: number;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  // Global middleware
  app.use("*", logger());
  app.use("*", prettyJSON());
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
    })
  );

  // Security headers
  app.use("*", async (c, next) => {
    await next();
    c.header("X-Content-Type-Options", "nosniff");
    c.header("X-Frame-Options", "DENY");
    c.header("Referrer-Policy", "strict-origin-when-cross-origin");
    if (process.env.NODE_ENV === "production") {
      c.header("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
    }
  });

  app.get("/", (c) => {
    return c.json({
      name: APP_NAME,
      version: APP_VERSION,
      status: "running",
    });
  });

  app.get("/health", (c) => {
    return c.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  // Cron endpoints (protected by secret)
  async function runCronJob<T extends object>(c: Context, name: string, job: () => Promise<T>) {
    if (!deps.cronSecret) {
      return c.json({ error: "Cron triggers disabled" }, 503);
    }
    if (c.req.header("authorization") !== `Bearer ${deps.cronSecret}`) {
      return c.json({ error: "Unauthorized" }, 401);
    }

    console.log(`[Cron] Starting ${name} via HTTP trigger`);

    try {
      const result = await job();
      return c.json({ message: `${name} completed`, ...result });
    } catch (error) {
      console.error(`[Cron] ${name} failed:`, error);
      Sentry.captureException(error, { tags: { job: name } });
      return c.json(
        {
          success: false,
          error: `${name} failed`,
          message: errorMessage(error),
        },
        500
      );
    }
  }

  app.get("/cron/trending-snapshot", (c) =>
    runCronJob(c, "Trending snapshot", () => snapshotTrending(deps.store, deps.feedback))
  );

  app.get("/cron/rebuild-preferences", (c) =>
    runCronJob(c, "Preference rebuild", () => rebuildPreferences(deps.feedback))
  );

  const api = new Hono();
  api.route("/analyze", createAnalyzeRoutes(deps));
  api.route("/recommendations", createRecommendationRoutes(deps));
  api.route("/catalog", createCatalogRoutes(deps));
  api.route("/styles", stylesRoutes);
  api.route("/feedback", createFeedbackRoutes(deps));
  api.route("/trending", createTrendingRoutes(deps));

  app.route("/api", api);

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: "Not found" }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    console.error("Unhandled error:", err);
    Sentry.captureException(err);
    return c.json(
      {
        error: "Internal server error",
        message: process.env.NODE_ENV === "development" ? err.message : undefined,
      },
      500
    );
  });

  return app;
}
