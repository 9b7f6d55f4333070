/**
 * Profile Service
 * Builds the UserProfile snapshot a recommendation request runs against.
 * Vision analysis is best-effort: any upstream failure falls back to a
 * deterministic profile derived from the style string.
 */

import { randomUUID } from "node:crypto";
import type { BodyShape } from "../constants/compatibility.js";
import { UpstreamUnavailableError, errorMessage } from "../utils/errors.js";
import { addBreadcrumb } from "../utils/sentry.js";
import { parseUserProfile } from "../utils/validation.js";
import { analyzeBodyShape, type BodyShapeAnalyzer } from "./ai/bodyShapeAnalysis.js";
import type { HeightCategory, UserProfile } from "./models.js";

interface ProfilePreset {
  body_shape: BodyShape;
  height_category: HeightCategory;
  features_to_emphasize: string[];
  recommended_silhouettes: string[];
  recommended_colors: string[];
  confidence_score: number;
}

// First preset whose key appears in the style string wins
const STYLE_PRESETS: readonly [string, ProfilePreset][] = [
  [
    "vintage",
    {
      body_shape: "hourglass",
      height_category: "average",
      features_to_emphasize: ["waist", "curves"],
      recommended_silhouettes: ["fitted", "wrap", "belted", "a-line"],
      recommended_colors: ["black", "navy", "burgundy", "emerald", "cream"],
      confidence_score: 60,
    },
  ],
  [
    "streetwear",
    {
      body_shape: "rectangle",
      height_category: "average",
      features_to_emphasize: ["shoulders", "legs"],
      recommended_silhouettes: ["oversized", "relaxed", "structured"],
      recommended_colors: ["black", "white", "gray", "navy", "olive"],
      confidence_score: 60,
    },
  ],
  [
    "formal",
    {
      body_shape: "hourglass",
      height_category: "average",
      features_to_emphasize: ["waist", "shoulders"],
      recommended_silhouettes: ["fitted", "structured", "tailored"],
      recommended_colors: ["black", "navy", "gray", "white", "burgundy"],
      confidence_score: 60,
    },
  ],
  [
    "casual",
    {
      body_shape: "rectangle",
      height_category: "average",
      features_to_emphasize: ["comfort", "versatility"],
      recommended_silhouettes: ["relaxed", "comfortable", "easy"],
      recommended_colors: ["blue", "white", "gray", "beige", "black"],
      confidence_score: 60,
    },
  ],
];

const GENERIC_PRESET: ProfilePreset = {
  body_shape: "hourglass",
  height_category: "average",
  features_to_emphasize: ["waist"],
  recommended_silhouettes: ["fitted", "comfortable"],
  recommended_colors: ["black", "navy", "white"],
  confidence_score: 50,
};

export interface ProfileRequest {
  userId?: string;
  style: string;
  image?: Buffer | null;
}

export interface ProfileResult {
  profile: UserProfile;
  source: "analysis" | "default";
}

export function defaultProfileForStyle(style: string, userId: string): UserProfile {
  const lower = style.toLowerCase();
  const preset = STYLE_PRESETS.find(([key]) => lower.includes(key))?.[1] ?? GENERIC_PRESET;

  return {
    id: userId,
    preferred_style: style,
    body_shape: preset.body_shape,
    height_category: preset.height_category,
    features_to_emphasize: [...preset.features_to_emphasize],
    features_to_minimize: [],
    recommended_silhouettes: [...preset.recommended_silhouettes],
    recommended_colors: [...preset.recommended_colors],
    confidence_score: preset.confidence_score,
  };
}

export async function analyzeProfile(
  request: ProfileRequest,
  analyzer: BodyShapeAnalyzer = analyzeBodyShape
): Promise<ProfileResult> {
  const userId = request.userId || randomUUID();

  if (!request.image) {
    console.log(`[Profile] No image provided, using default profile for "${request.style}"`);
    return { profile: defaultProfileForStyle(request.style, userId), source: "default" };
  }

  try {
    const analysis = await analyzer(request.image, request.style).catch((err: unknown) => {
      throw new UpstreamUnavailableError(`Body shape analysis failed: ${errorMessage(err)}`, err);
    });

    const profile = parseUserProfile({ ...analysis, id: userId, preferred_style: request.style });
    console.log(`[Profile] Body shape detected: ${profile.body_shape}`);
    return { profile, source: "analysis" };
  } catch (err) {
    console.warn(`[Profile] Falling back to default profile: ${errorMessage(err)}`);
    addBreadcrumb("profile", "Default profile fallback", { userId, reason: errorMessage(err) });
    return { profile: defaultProfileForStyle(request.style, userId), source: "default" };
  }
}
