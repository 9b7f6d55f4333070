import "dotenv/config";
import { serve } from "@hono/node-server";
import cron from "node-cron";
import * as Sentry from "@sentry/node";

import { APP_NAME, createApp } from "./app.js";
import { rebuildPreferences } from "./jobs/rebuildPreferences.js";
import { snapshotTrending } from "./jobs/trendingSnapshot.js";
import { CatalogService } from "./services/catalog.js";
import { MemoryDocumentStore, SupabaseDocumentStore, type DocumentStore } from "./services/documentStore.js";
import { FeedbackService } from "./services/feedback.js";
import { getSupabaseAdmin, isSupabaseConfigured } from "./services/supabase.js";
import { initSentry } from "./utils/sentry.js";

initSentry();

const CRON_SECRET = process.env.CRON_SECRET;

// A short secret is a misconfiguration; a missing one only disables the HTTP triggers
if (CRON_SECRET !== undefined && CRON_SECRET.length < 32) {
  console.error("FATAL: CRON_SECRET must be at least 32 characters");
  process.exit(1);
}
if (!CRON_SECRET) {
  console.warn("CRON_SECRET not set - /cron endpoints disabled");
}

const store: DocumentStore = isSupabaseConfigured()
  ? new SupabaseDocumentStore(getSupabaseAdmin())
  : new MemoryDocumentStore();
const catalog = new CatalogService(store);
const feedback = new FeedbackService(store, catalog);

/**
 * Nightly maintenance jobs, run in-process with node-cron
 */
function initializeCronJobs() {
  console.log("[Cron] Initializing internal cron jobs...");

  // Rebuild the preference projection at 3:00 AM UTC
  cron.schedule(
    "0 3 * * *",
    async () => {
      console.log("[Cron] Starting preference rebuild...");
      try {
        const result = await rebuildPreferences(feedback);
        console.log(`[Cron] Preference rebuild completed: ${result.users} users`);
      } catch (error) {
        console.error("[Cron] Preference rebuild failed:", error);
        Sentry.captureException(error, { tags: { job: "rebuild-preferences" } });
      }
    },
    { timezone: "UTC" }
  );

  // Trending snapshot at 3:30 AM UTC
  cron.schedule(
    "30 3 * * *",
    async () => {
      console.log("[Cron] Starting trending snapshot...");
      try {
        const result = await snapshotTrending(store, feedback);
        console.log(`[Cron] Trending snapshot completed: ${result.items} items`);
      } catch (error) {
        console.error("[Cron] Trending snapshot failed:", error);
        Sentry.captureException(error, { tags: { job: "trending-snapshot" } });
      }
    },
    { timezone: "UTC" }
  );

  console.log("[Cron] All cron jobs initialized:");
  console.log("  - Preference rebuild: 3:00 AM UTC daily");
  console.log("  - Trending snapshot: 3:30 AM UTC daily");
}

const app = createApp({ store, catalog, feedback, cronSecret: CRON_SECRET });

// Start server
const port = parseInt(process.env.PORT ?? "3000");

console.log(`Starting ${APP_NAME} on port ${port}...`);

serve({
  fetch: app.fetch,
  port,
});

console.log(`${APP_NAME} running at http://localhost:${port}`);

initializeCronJobs();
