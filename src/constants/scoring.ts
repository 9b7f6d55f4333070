// Component weights for overall_score (sum to 1.0)
export const SCORE_WEIGHTS = {
  fit: 0.4,
  style: 0.3,
  trend: 0.2,
  feedback: 0.1,
} as const;

export const NEUTRAL_SCORE = 75;

export const STYLE_SCORES = {
  neutral: 75,
  directMatch: 90,
  keywordBase: 70,
  perKeyword: 5,
  noMatch: 60,
} as const;

// Engagement = likes * 0.7 + saves * 1.3, banded rather than continuous
export const ENGAGEMENT_WEIGHTS = {
  likes: 0.7,
  saves: 1.3,
} as const;

export const TREND_BANDS: readonly { minEngagement: number; score: number }[] = [
  { minEngagement: 1000, score: 100 },
  { minEngagement: 500, score: 80 },
  { minEngagement: 100, score: 60 },
];

export const TREND_FLOOR = 40;

export const EXPLANATION_TIERS: readonly { minScore: number; text: string }[] = [
  { minScore: 85, text: "Excellent match! This item perfectly complements your style and body type." },
  { minScore: 75, text: "Great choice! This item works well with your preferences and body shape." },
  { minScore: 65, text: "Good option! This item has potential with some styling adjustments." },
];

export const FALLBACK_EXPLANATION = "Consider alternatives. This item may not be the best fit for your style.";

// Feedback-driven component when signals are supplied
export const FEEDBACK_SIGNAL_SCORES = {
  disliked: 20,
  liked: 95,
  saved: 90,
} as const;

export const FEEDBACK_KINDS = ["like", "dislike", "save", "share", "view"] as const;

export type FeedbackKind = (typeof FEEDBACK_KINDS)[number];

// Importance per feedback kind
export const FEEDBACK_WEIGHTS: Readonly<Record<FeedbackKind, number>> = {
  like: 1.0,
  dislike: -0.8,
  save: 0.9,
  share: 0.7,
  view: 0.3,
};

export function isFeedbackKind(value: unknown): value is FeedbackKind {
  return typeof value === "string" && FEEDBACK_KINDS.some((kind) => kind === value);
}

export const DEFAULT_RECOMMENDATION_LIMIT = 10;
export const MAX_OUTFITS = 5;
