/**
 * Feedback Service
 * Append-only feedback log plus everything derived from it: per-user and
 * per-item summaries, trending items, improvement suggestions and the
 * liked/disliked/saved preference projection.
 *
 * The log is the source of truth. The preference projection is written after
 * the append and can lag or fail independently; rebuildPreferences() replays
 * the log to repair it.
 */

import { randomUUID } from "node:crypto";
import * as Sentry from "@sentry/node";
import { FEEDBACK_KINDS, FEEDBACK_WEIGHTS, isFeedbackKind, type FeedbackKind } from "../constants/scoring.js";
import { InvalidArgumentError, NotFoundError, errorMessage } from "../utils/errors.js";
import { clampScore, mean, roundTo } from "../utils/numbers.js";
import { addBreadcrumb } from "../utils/sentry.js";
import type { CatalogSource } from "./catalog.js";
import { DOCUMENT_KEYS, type DocumentStore } from "./documentStore.js";
import type { FeedbackSignals } from "./itemScorer.js";
import type {
  ActivityEntry,
  FeedbackBreakdown,
  FeedbackEvent,
  FeedbackSummary,
  ItemFeedbackSummary,
  TrendingItem,
  UserPreferences,
} from "./models.js";

export const DEFAULT_TRENDING_LIMIT = 10;

const MIN_EVENTS_FOR_SUGGESTIONS = 3;
const GOOD_QUALITY_EVENTS = 10;
const POPULARITY_SCALE = 20;

const NEED_MORE_FEEDBACK_PROMPTS = [
  "Like or dislike more items to improve recommendations",
  "Save items you're interested in",
  "Try different styles to expand your preferences",
];

export type PreferenceProjection = Record<string, UserPreferences>;

export interface ImprovementSuggestions {
  needs_more_feedback: boolean;
  suggestions: string[];
  feedback_quality?: "good" | "improving";
}

export interface FeedbackPatterns {
  totalEvents: number;
  distribution: FeedbackBreakdown;
  mostPopularKind: FeedbackKind | "none";
  averageImportance: number;
}

export interface FeedbackServiceOptions {
  now?: () => Date;
  generateId?: () => string;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

function breakdownOf(events: readonly FeedbackEvent[]): FeedbackBreakdown {
  const breakdown: FeedbackBreakdown = {};
  for (const event of events) {
    breakdown[event.feedback_type] = (breakdown[event.feedback_type] ?? 0) + 1;
  }
  return breakdown;
}

function emptyPreferences(updatedAt: string): UserPreferences {
  return { liked_items: [], disliked_items: [], saved_items: [], updated_at: updatedAt };
}

/**
 * Fold one event into a user's preference sets. Liked and disliked stay mutually exclusive.
 */
export function applyFeedbackToPreferences(
  preferences: UserPreferences,
  itemId: string,
  kind: FeedbackKind,
  updatedAt: string
): UserPreferences {
  const liked = new Set(preferences.liked_items);
  const disliked = new Set(preferences.disliked_items);
  const saved = new Set(preferences.saved_items);

  switch (kind) {
    case "like":
      liked.add(itemId);
      disliked.delete(itemId);
      break;
    case "dislike":
      disliked.add(itemId);
      liked.delete(itemId);
      break;
    case "save":
      saved.add(itemId);
      break;
    default:
      // share and view do not change preferences
      return preferences;
  }

  return {
    liked_items: [...liked],
    disliked_items: [...disliked],
    saved_items: [...saved],
    updated_at: updatedAt,
  };
}

export function summarizeUserFeedback(events: readonly FeedbackEvent[]): FeedbackSummary {
  if (events.length === 0) {
    return { total_feedback: 0, feedback_breakdown: {}, engagement_score: 0, last_feedback: null };
  }

  return {
    total_feedback: events.length,
    feedback_breakdown: breakdownOf(events),
    engagement_score: roundTo(
      events.reduce((sum, event) => sum + event.importance, 0),
      2
    ),
    last_feedback: events[events.length - 1].timestamp,
  };
}

export function summarizeItemFeedback(events: readonly FeedbackEvent[]): ItemFeedbackSummary {
  if (events.length === 0) {
    return { total_feedback: 0, feedback_breakdown: {}, popularity_score: 0 };
  }

  const popularity = clampScore(mean(events.map((event) => event.importance)) * POPULARITY_SCALE);

  return {
    total_feedback: events.length,
    feedback_breakdown: breakdownOf(events),
    popularity_score: roundTo(popularity, 1),
  };
}

/**
 * Cumulative importance per item, highest first; ties keep first appearance in the log
 */
export function rankItemsByImportance(events: readonly FeedbackEvent[]): [string, number][] {
  const totals = new Map<string, number>();
  for (const event of events) {
    if (!event.item_id) continue;
    totals.set(event.item_id, (totals.get(event.item_id) ?? 0) + event.importance);
  }
  return [...totals.entries()].sort((a, b) => b[1] - a[1]);
}

export function suggestImprovements(summary: FeedbackSummary): ImprovementSuggestions {
  if (summary.total_feedback < MIN_EVENTS_FOR_SUGGESTIONS) {
    return { needs_more_feedback: true, suggestions: [...NEED_MORE_FEEDBACK_PROMPTS] };
  }

  const likes = summary.feedback_breakdown.like ?? 0;
  const dislikes = summary.feedback_breakdown.dislike ?? 0;
  const suggestions: string[] = [];

  if (dislikes > likes * 2) {
    suggestions.push("Consider exploring different style categories");
    suggestions.push("Try items with different silhouettes");
  }

  if (likes > 0 && dislikes === 0) {
    suggestions.push("Great! Your preferences are clear");
    suggestions.push("Try saving items you love for future reference");
  }

  return {
    needs_more_feedback: false,
    suggestions,
    feedback_quality: summary.total_feedback >= GOOD_QUALITY_EVENTS ? "good" : "improving",
  };
}

// ============================================================================
// SERVICE
// ============================================================================

export class FeedbackService {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly store: DocumentStore,
    private readonly catalog: CatalogSource,
    options: FeedbackServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  private async loadEvents(): Promise<FeedbackEvent[]> {
    return this.store.load<FeedbackEvent[]>(DOCUMENT_KEYS.feedback, []);
  }

  // Keyed by raw user ids, so the stored record is only read through its own entries
  private async loadProjection(): Promise<Map<string, UserPreferences>> {
    const stored = await this.store.load<PreferenceProjection>(DOCUMENT_KEYS.preferences, {});
    return new Map(Object.entries(stored));
  }

  private async saveProjection(projection: ReadonlyMap<string, UserPreferences>): Promise<void> {
    const record: PreferenceProjection = Object.fromEntries(projection);
    await this.store.save(DOCUMENT_KEYS.preferences, record);
  }

  async recordFeedback(
    userId: string,
    itemId: string,
    kind: string,
    additionalData: Record<string, unknown> = {}
  ): Promise<FeedbackEvent> {
    if (!userId.trim() || !itemId.trim()) {
      throw new InvalidArgumentError("user_id and item_id are required");
    }

    if (!isFeedbackKind(kind)) {
      throw new InvalidArgumentError(`Invalid feedback type. Must be one of: ${FEEDBACK_KINDS.join(", ")}`);
    }

    const timestamp = this.now().toISOString();
    const event: FeedbackEvent = {
      id: this.generateId(),
      user_id: userId,
      item_id: itemId,
      feedback_type: kind,
      importance: FEEDBACK_WEIGHTS[kind],
      timestamp,
      additional_data: additionalData,
    };

    // Append failures propagate: nothing was recorded
    await this.store.append(DOCUMENT_KEYS.feedback, event);

    addBreadcrumb("feedback", `Recorded ${kind}`, { userId, itemId });

    try {
      await this.updatePreferences(userId, itemId, kind, timestamp);

      const entry: ActivityEntry = {
        timestamp,
        activity: "feedback_recorded",
        data: { user_id: userId, item_id: itemId, feedback_type: kind },
      };
      await this.store.append(DOCUMENT_KEYS.activityLog, entry);
    } catch (err) {
      // The event is durable; the projection is repaired by rebuildPreferences()
      console.error(`[Feedback] Projection update failed for user ${userId}: ${errorMessage(err)}`);
      Sentry.captureException(err, { tags: { component: "feedback-projection" } });
    }

    console.log(`[Feedback] Recorded ${kind} for item ${itemId} by user ${userId}`);
    return event;
  }

  private async updatePreferences(userId: string, itemId: string, kind: FeedbackKind, timestamp: string) {
    const projection = await this.loadProjection();
    const current = projection.get(userId) ?? emptyPreferences(timestamp);
    projection.set(userId, applyFeedbackToPreferences(current, itemId, kind, timestamp));
    await this.saveProjection(projection);
  }

  async userPreferences(userId: string): Promise<UserPreferences> {
    const projection = await this.loadProjection();
    const preferences = projection.get(userId);
    if (!preferences) {
      throw new NotFoundError(`No preferences recorded for user ${userId}`);
    }
    return preferences;
  }

  /**
   * Replay the whole log into a fresh projection; returns the number of users
   */
  async rebuildPreferences(): Promise<number> {
    const events = await this.loadEvents();
    const projection = new Map<string, UserPreferences>();

    for (const event of events) {
      const current = projection.get(event.user_id) ?? emptyPreferences(event.timestamp);
      projection.set(
        event.user_id,
        applyFeedbackToPreferences(current, event.item_id, event.feedback_type, event.timestamp)
      );
    }

    await this.saveProjection(projection);

    const users = projection.size;
    console.log(`[Feedback] Rebuilt preferences for ${users} users from ${events.length} events`);
    return users;
  }

  async userFeedbackSummary(userId: string): Promise<FeedbackSummary> {
    const events = await this.loadEvents();
    return summarizeUserFeedback(events.filter((event) => event.user_id === userId));
  }

  async itemSummary(itemId: string): Promise<ItemFeedbackSummary> {
    const events = await this.loadEvents();
    return summarizeItemFeedback(events.filter((event) => event.item_id === itemId));
  }

  async trendingItems(limit: number = DEFAULT_TRENDING_LIMIT): Promise<TrendingItem[]> {
    const events = await this.loadEvents();
    const top = rankItemsByImportance(events).slice(0, Math.max(0, limit));
    if (top.length === 0) return [];

    const catalogById = new Map((await this.catalog.getAll()).map((item) => [item.id, item]));

    const trending: TrendingItem[] = [];
    for (const [itemId, score] of top) {
      const item = catalogById.get(itemId);
      if (item) {
        trending.push({ ...item, trending_score: roundTo(score, 2) });
      }
    }

    return trending;
  }

  async improvementSuggestions(userId: string): Promise<ImprovementSuggestions> {
    return suggestImprovements(await this.userFeedbackSummary(userId));
  }

  async feedbackPatterns(): Promise<FeedbackPatterns> {
    const events = await this.loadEvents();

    if (events.length === 0) {
      return { totalEvents: 0, distribution: {}, mostPopularKind: "none", averageImportance: 0 };
    }

    const distribution = breakdownOf(events);
    let mostPopularKind: FeedbackKind | "none" = "none";
    let mostPopularCount = 0;
    for (const kind of FEEDBACK_KINDS) {
      const count = distribution[kind] ?? 0;
      if (count > mostPopularCount) {
        mostPopularKind = kind;
        mostPopularCount = count;
      }
    }

    return {
      totalEvents: events.length,
      distribution,
      mostPopularKind,
      averageImportance: roundTo(mean(events.map((event) => event.importance)), 2),
    };
  }

  /**
   * Scoring signals for one user: their preference sets plus every item's popularity
   */
  async feedbackSignals(userId: string): Promise<FeedbackSignals> {
    const [events, projection] = await Promise.all([this.loadEvents(), this.loadProjection()]);
    const preferences = projection.get(userId);

    const byItem = new Map<string, FeedbackEvent[]>();
    for (const event of events) {
      const list = byItem.get(event.item_id);
      if (list) {
        list.push(event);
      } else {
        byItem.set(event.item_id, [event]);
      }
    }

    const itemPopularity = new Map<string, number>();
    for (const [itemId, itemEvents] of byItem) {
      itemPopularity.set(itemId, summarizeItemFeedback(itemEvents).popularity_score);
    }

    return {
      likedItemIds: new Set(preferences?.liked_items ?? []),
      dislikedItemIds: new Set(preferences?.disliked_items ?? []),
      savedItemIds: new Set(preferences?.saved_items ?? []),
      itemPopularity,
    };
  }
}
