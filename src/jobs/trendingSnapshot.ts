import { DOCUMENT_KEYS, type DocumentStore } from "../services/documentStore.js";
import type { FeedbackService } from "../services/feedback.js";
import type { TrendingItem } from "../services/models.js";

export interface TrendingSnapshot {
  generated_at: string;
  items: TrendingItem[];
}

interface TrendingSnapshotResult {
  success: boolean;
  items: number;
  duration_ms: number;
}

/**
 * Stores the current trending list under `trending_snapshot` so clients can
 * read a stable nightly ranking.
 */
export async function snapshotTrending(
  store: DocumentStore,
  feedback: FeedbackService,
  now: () => Date = () => new Date()
): Promise<TrendingSnapshotResult> {
  const startTime = Date.now();

  const items = await feedback.trendingItems();
  const snapshot: TrendingSnapshot = { generated_at: now().toISOString(), items };
  await store.save(DOCUMENT_KEYS.trendingSnapshot, snapshot);

  console.log(`[TrendingSnapshot] Stored ${items.length} trending items`);

  return { success: true, items: items.length, duration_ms: Date.now() - startTime };
}
