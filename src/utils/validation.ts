/**
 * Narrowing helpers for request bodies and stored documents.
 * Required fields throw InvalidArgumentError; optional ones fall back to empty/neutral values.
 */

import { normalizeBodyShape, normalizeCategory } from "../constants/compatibility.js";
import type { ScoredItem } from "../services/itemScorer.js";
import type { CatalogItem, HeightCategory, UserProfile } from "../services/models.js";
import { InvalidArgumentError } from "./errors.js";
import { clampScore } from "./numbers.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function optionalString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

export function optionalNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

export function stringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}

export function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidArgumentError(`${field} is required`);
  }
  return value;
}

function normalizeHeight(value: unknown): HeightCategory {
  const height = optionalString(value).toLowerCase().trim();
  if (height === "petite" || height === "short") return "petite";
  if (height === "tall") return "tall";
  return "average";
}

export function parseCatalogItem(input: unknown): CatalogItem {
  if (!isRecord(input)) {
    throw new InvalidArgumentError("Catalog item must be an object");
  }

  const id = input.id;
  if (typeof id !== "string" && typeof id !== "number") {
    throw new InvalidArgumentError("Catalog item id is required");
  }

  return {
    id: String(id),
    title: requireString(input.title, "Catalog item title"),
    style: optionalString(input.style),
    category: normalizeCategory(optionalString(input.category)),
    colors: stringArray(input.colors),
    description: optionalString(input.description),
    likes: Math.max(0, optionalNumber(input.likes)),
    saves: Math.max(0, optionalNumber(input.saves)),
    price_range: typeof input.price_range === "string" ? input.price_range : null,
    image_url: typeof input.image_url === "string" ? input.image_url : null,
    source_url: typeof input.source_url === "string" ? input.source_url : null,
    brand: typeof input.brand === "string" ? input.brand : null,
    sizes: stringArray(input.sizes),
    tags: stringArray(input.tags),
    created_at: typeof input.created_at === "string" ? input.created_at : null,
  };
}

export function parseCatalogItems(input: unknown): CatalogItem[] {
  if (!Array.isArray(input)) {
    throw new InvalidArgumentError("items must be an array");
  }
  return input.map(parseCatalogItem);
}

export function parseUserProfile(input: unknown): UserProfile {
  if (!isRecord(input)) {
    throw new InvalidArgumentError("Profile must be an object");
  }

  return {
    id: requireString(input.id, "Profile id"),
    preferred_style: optionalString(input.preferred_style),
    body_shape: normalizeBodyShape(optionalString(input.body_shape)),
    height_category: normalizeHeight(input.height_category),
    features_to_emphasize: stringArray(input.features_to_emphasize),
    features_to_minimize: stringArray(input.features_to_minimize),
    recommended_silhouettes: stringArray(input.recommended_silhouettes),
    recommended_colors: stringArray(input.recommended_colors),
    confidence_score: clampScore(optionalNumber(input.confidence_score, 50)),
  };
}

export function parseScoredItem(input: unknown): ScoredItem {
  const item = parseCatalogItem(input);
  if (!isRecord(input)) {
    throw new InvalidArgumentError("Scored item must be an object");
  }
  const source = input;

  return {
    ...item,
    fit_score: clampScore(optionalNumber(source.fit_score)),
    style_score: clampScore(optionalNumber(source.style_score)),
    trend_score: clampScore(optionalNumber(source.trend_score)),
    feedback_score: clampScore(optionalNumber(source.feedback_score)),
    overall_score: clampScore(optionalNumber(source.overall_score)),
    explanation: optionalString(source.explanation),
    styling_tips: stringArray(source.styling_tips),
    recommended_at: optionalString(source.recommended_at, new Date().toISOString()),
  };
}

export function parseScoredItems(input: unknown): ScoredItem[] {
  if (!Array.isArray(input)) {
    throw new InvalidArgumentError("items must be an array");
  }
  return input.map(parseScoredItem);
}
