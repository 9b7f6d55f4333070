import type { BodyShape, ItemCategory } from "../constants/compatibility.js";
import type { FeedbackKind } from "../constants/scoring.js";

// Type definitions for stored documents and request snapshots

export type HeightCategory = "petite" | "average" | "tall";

export interface UserProfile {
  id: string;
  preferred_style: string;
  body_shape: BodyShape;
  height_category: HeightCategory;
  features_to_emphasize: string[];
  features_to_minimize: string[];
  recommended_silhouettes: string[];
  recommended_colors: string[];
  confidence_score: number;
}

export interface CatalogItem {
  id: string;
  title: string;
  style: string;
  category: ItemCategory;
  colors: string[];
  description: string;
  likes: number;
  saves: number;
  price_range: string | null;
  image_url?: string | null;
  source_url?: string | null;
  brand?: string | null;
  sizes?: string[];
  tags?: string[];
  created_at?: string | null;
}

export interface FeedbackEvent {
  id: string;
  user_id: string;
  item_id: string;
  feedback_type: FeedbackKind;
  importance: number;
  timestamp: string;
  additional_data: Record<string, unknown>;
}

export type FeedbackBreakdown = Partial<Record<FeedbackKind, number>>;

export interface FeedbackSummary {
  total_feedback: number;
  feedback_breakdown: FeedbackBreakdown;
  engagement_score: number;
  last_feedback: string | null;
}

export interface ItemFeedbackSummary {
  total_feedback: number;
  feedback_breakdown: FeedbackBreakdown;
  popularity_score: number;
}

export interface UserPreferences {
  liked_items: string[];
  disliked_items: string[];
  saved_items: string[];
  updated_at: string;
}

export interface ActivityEntry {
  timestamp: string;
  activity: string;
  data: Record<string, unknown>;
}

export type TrendingItem = CatalogItem & { trending_score: number };
