/**
 * Ranker
 * Filters a catalog for a profile, scores every surviving item and returns the top N
 */

import { DEFAULT_RECOMMENDATION_LIMIT } from "../constants/scoring.js";
import { mean, roundTo } from "../utils/numbers.js";
import { filterWithFallback } from "./itemFilter.js";
import { scoreItem, type FeedbackSignals, type ScoredItem } from "./itemScorer.js";
import type { CatalogItem, UserProfile } from "./models.js";

export interface RankOptions {
  signals?: FeedbackSignals;
  now?: Date;
}

export interface RecommendationSummary {
  count: number;
  averageScore: number;
  topCategories: string[];
  scoreRange: { min: number; max: number } | null;
}

export function filterAndRank(
  profile: UserProfile,
  catalog: readonly CatalogItem[],
  limit: number = DEFAULT_RECOMMENDATION_LIMIT,
  options: RankOptions = {}
): ScoredItem[] {
  if (catalog.length === 0) return [];

  console.log(`[Ranker] Ranking ${catalog.length} items for ${profile.body_shape} body shape`);

  const recommendedAt = (options.now ?? new Date()).toISOString();
  const candidates = filterWithFallback(profile, catalog);

  const scored: ScoredItem[] = candidates.map((item) => ({
    ...item,
    ...scoreItem(profile, item, options.signals),
    recommended_at: recommendedAt,
  }));

  // Array#sort is stable: equal scores keep catalog order
  scored.sort((a, b) => b.overall_score - a.overall_score);

  return scored.slice(0, Math.max(0, limit));
}

export function recommendationSummary(items: readonly ScoredItem[]): RecommendationSummary {
  if (items.length === 0) {
    return { count: 0, averageScore: 0, topCategories: [], scoreRange: null };
  }

  const scores = items.map((item) => item.overall_score);

  const categoryCounts = new Map<string, number>();
  for (const item of items) {
    categoryCounts.set(item.category, (categoryCounts.get(item.category) ?? 0) + 1);
  }

  const topCategories = [...categoryCounts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, 3)
    .map(([category]) => category);

  return {
    count: items.length,
    averageScore: roundTo(mean(scores), 1),
    topCategories,
    scoreRange: { min: Math.min(...scores), max: Math.max(...scores) },
  };
}
