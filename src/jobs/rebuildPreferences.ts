import type { FeedbackService } from "../services/feedback.js";

interface RebuildPreferencesResult {
  success: boolean;
  users: number;
  duration_ms: number;
}

/**
 * Replays the feedback log into the preference projection
 */
export async function rebuildPreferences(feedback: FeedbackService): Promise<RebuildPreferencesResult> {
  const startTime = Date.now();
  const users = await feedback.rebuildPreferences();
  return { success: true, users, duration_ms: Date.now() - startTime };
}
