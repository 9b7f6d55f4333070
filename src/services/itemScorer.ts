/**
 * Item Scorer
 * Weighted multi-factor compatibility score for one (profile, item) pair.
 * Pure: output depends only on the tables, the profile, the item and the
 * optional feedback signals.
 */

import {
  BODY_SHAPE_TIPS,
  CATEGORY_TIPS,
  DEFAULT_FIT_SCORE,
  FIT_COMPATIBILITY,
  FIT_KEYWORD_BONUS,
  FIT_KEYWORDS,
  MAX_STYLING_TIPS,
  STYLE_KEYWORDS,
  tableEntry,
} from "../constants/compatibility.js";
import {
  ENGAGEMENT_WEIGHTS,
  EXPLANATION_TIERS,
  FALLBACK_EXPLANATION,
  FEEDBACK_SIGNAL_SCORES,
  NEUTRAL_SCORE,
  SCORE_WEIGHTS,
  STYLE_SCORES,
  TREND_BANDS,
  TREND_FLOOR,
} from "../constants/scoring.js";
import { clampScore, roundTo } from "../utils/numbers.js";
import type { CatalogItem, UserProfile } from "./models.js";

// ============================================================================
// TYPES
// ============================================================================

export interface ItemScore {
  fit_score: number;
  style_score: number;
  trend_score: number;
  feedback_score: number;
  overall_score: number;
  explanation: string;
  styling_tips: string[];
}

export type ScoredItem = CatalogItem & ItemScore & { recommended_at: string };

/**
 * Per-user feedback projection plus per-item popularity.
 * Omitted entirely, the feedback component stays at the neutral 75.
 */
export interface FeedbackSignals {
  likedItemIds: ReadonlySet<string>;
  dislikedItemIds: ReadonlySet<string>;
  savedItemIds: ReadonlySet<string>;
  itemPopularity?: ReadonlyMap<string, number>;
}

type ScoringProfile = Pick<UserProfile, "body_shape" | "preferred_style">;

// ============================================================================
// COMPONENT SCORES
// ============================================================================

export function calculateFitScore(profile: ScoringProfile, item: CatalogItem): number {
  const shapeRow = tableEntry(FIT_COMPATIBILITY, profile.body_shape);
  const base = (shapeRow && tableEntry(shapeRow, item.category)) ?? DEFAULT_FIT_SCORE;

  const text = `${item.title}\n${item.description}`.toLowerCase();
  const keywords = tableEntry(FIT_KEYWORDS, profile.body_shape) ?? [];
  const bonus = keywords.filter((keyword) => text.includes(keyword)).length * FIT_KEYWORD_BONUS;

  return clampScore(base + bonus);
}

export function calculateStyleScore(profile: ScoringProfile, item: CatalogItem): number {
  const userStyle = profile.preferred_style.toLowerCase().trim();
  if (!userStyle) return STYLE_SCORES.neutral;

  const itemStyle = item.style.toLowerCase();
  if (itemStyle.includes(userStyle) || userStyle.includes(itemStyle)) {
    return STYLE_SCORES.directMatch;
  }

  const title = item.title.toLowerCase();
  const description = item.description.toLowerCase();
  const keywords = STYLE_KEYWORDS.get(userStyle) ?? [];
  const hits = keywords.filter(
    (keyword) => itemStyle.includes(keyword) || title.includes(keyword) || description.includes(keyword)
  ).length;

  if (hits > 0) {
    return STYLE_SCORES.keywordBase + hits * STYLE_SCORES.perKeyword;
  }

  return STYLE_SCORES.noMatch;
}

export function calculateEngagement(item: Pick<CatalogItem, "likes" | "saves">): number {
  return item.likes * ENGAGEMENT_WEIGHTS.likes + item.saves * ENGAGEMENT_WEIGHTS.saves;
}

export function calculateTrendScore(item: CatalogItem): number {
  const engagement = calculateEngagement(item);
  const band = TREND_BANDS.find((b) => engagement >= b.minEngagement);
  return band ? band.score : TREND_FLOOR;
}

export function calculateFeedbackScore(item: CatalogItem, signals?: FeedbackSignals): number {
  if (!signals) return NEUTRAL_SCORE;

  if (signals.dislikedItemIds.has(item.id)) return FEEDBACK_SIGNAL_SCORES.disliked;
  if (signals.likedItemIds.has(item.id)) return FEEDBACK_SIGNAL_SCORES.liked;
  if (signals.savedItemIds.has(item.id)) return FEEDBACK_SIGNAL_SCORES.saved;

  // Popularity is 0-20 (mean importance x 20), lifted from the neutral score
  const popularity = signals.itemPopularity?.get(item.id);
  return popularity === undefined ? NEUTRAL_SCORE : NEUTRAL_SCORE + popularity;
}

// ============================================================================
// EXPLANATION & TIPS
// ============================================================================

export function explainScore(overallScore: number): string {
  const tier = EXPLANATION_TIERS.find((t) => overallScore >= t.minScore);
  return tier ? tier.text : FALLBACK_EXPLANATION;
}

export function stylingTips(profile: ScoringProfile, item: CatalogItem): string[] {
  const tips = [
    ...(tableEntry(CATEGORY_TIPS, item.category) ?? []),
    ...(tableEntry(BODY_SHAPE_TIPS, profile.body_shape) ?? []),
  ];
  return tips.slice(0, MAX_STYLING_TIPS);
}

// ============================================================================
// MAIN
// ============================================================================

export function scoreItem(profile: ScoringProfile, item: CatalogItem, signals?: FeedbackSignals): ItemScore {
  const fit = clampScore(calculateFitScore(profile, item));
  const style = clampScore(calculateStyleScore(profile, item));
  const trend = clampScore(calculateTrendScore(item));
  const feedback = clampScore(calculateFeedbackScore(item, signals));

  const overall = roundTo(
    fit * SCORE_WEIGHTS.fit +
      style * SCORE_WEIGHTS.style +
      trend * SCORE_WEIGHTS.trend +
      feedback * SCORE_WEIGHTS.feedback,
    1
  );

  return {
    fit_score: roundTo(fit, 1),
    style_score: roundTo(style, 1),
    trend_score: roundTo(trend, 1),
    feedback_score: roundTo(feedback, 1),
    overall_score: overall,
    explanation: explainScore(overall),
    styling_tips: stylingTips(profile, item),
  };
}
