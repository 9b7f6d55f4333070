import type { ScoredItem } from "../src/services/itemScorer.js";
import type { CatalogItem, UserProfile } from "../src/services/models.js";

export function makeItem(overrides: Partial<CatalogItem> = {}): CatalogItem {
  return {
    id: "item-1",
    title: "Plain item",
    style: "",
    category: "top",
    colors: [],
    description: "",
    likes: 0,
    saves: 0,
    price_range: null,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    id: "user-1",
    preferred_style: "vintage",
    body_shape: "hourglass",
    height_category: "average",
    features_to_emphasize: [],
    features_to_minimize: [],
    recommended_silhouettes: [],
    recommended_colors: [],
    confidence_score: 60,
    ...overrides,
  };
}

export function makeScored(overrides: Partial<ScoredItem> = {}): ScoredItem {
  return {
    ...makeItem(),
    fit_score: 75,
    style_score: 75,
    trend_score: 40,
    feedback_score: 75,
    overall_score: 70,
    explanation: "",
    styling_tips: [],
    recommended_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function sequentialIds(prefix = "evt"): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
