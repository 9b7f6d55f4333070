/**
 * Style query helpers: input validation, keyword extraction and suggestions
 */

import { detectImageMime } from "./ai/bodyShapeAnalysis.js";

export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

const STYLE_VOCABULARY = [
  "vintage", "retro", "classic", "timeless",
  "streetwear", "urban", "casual", "cool",
  "formal", "elegant", "sophisticated",
  "bohemian", "boho", "free-spirited",
  "minimalist", "clean", "simple",
  "romantic", "feminine", "girly",
  "edgy", "alternative", "punk",
  "preppy", "academic", "ivy",
  "sporty", "athletic", "active",
  "artistic", "creative", "unique",
];

const KNOWN_STYLES = [
  "vintage streetwear",
  "minimalist chic",
  "bohemian",
  "athleisure",
  "cottagecore",
  "dark academia",
  "y2k",
  "normcore",
  "preppy",
  "grunge",
  "romantic",
  "edgy",
  "casual chic",
  "business casual",
  "evening wear",
];

export const TRENDING_STYLES = KNOWN_STYLES.slice(0, 8);

export type ValidationResult = { valid: true } | { valid: false; error: string };

export function validateStyleInput(style: string | null | undefined): ValidationResult {
  if (!style || !style.trim()) {
    return { valid: false, error: "Style preference is required" };
  }

  if (style.length < 2) {
    return { valid: false, error: "Style preference must be at least 2 characters" };
  }

  if (style.length > 100) {
    return { valid: false, error: "Style preference must be less than 100 characters" };
  }

  if (!/^[\p{L}\p{N} &-]+$/u.test(style)) {
    return { valid: false, error: "Style preference contains invalid characters" };
  }

  return { valid: true };
}

export function validateImage(image: Buffer): ValidationResult {
  if (image.length > MAX_IMAGE_BYTES) {
    return { valid: false, error: `Image too large. Maximum size is ${MAX_IMAGE_BYTES / (1024 * 1024)}MB` };
  }

  if (!detectImageMime(image)) {
    return { valid: false, error: "Invalid image data" };
  }

  return { valid: true };
}

export function extractStyleKeywords(style: string): string[] {
  const lower = style.toLowerCase();
  return STYLE_VOCABULARY.filter((keyword) => lower.includes(keyword));
}

export function styleSuggestions(partial: string, limit = 5): string[] {
  const lower = partial.toLowerCase();
  return KNOWN_STYLES.filter((style) => style.includes(lower)).slice(0, limit);
}
