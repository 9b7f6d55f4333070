import { describe, expect, it } from "vitest";

import {
  MAX_IMAGE_BYTES,
  extractStyleKeywords,
  styleSuggestions,
  validateImage,
  validateStyleInput,
} from "../../src/services/styleQuery.js";

describe("validateStyleInput", () => {
  it("rejects empty, short, long and symbol-laden input", () => {
    expect(validateStyleInput("")).toEqual({ valid: false, error: "Style preference is required" });
    expect(validateStyleInput("a")).toEqual({ valid: false, error: "Style preference must be at least 2 characters" });
    expect(validateStyleInput("x".repeat(101))).toEqual({
      valid: false,
      error: "Style preference must be less than 100 characters",
    });
    expect(validateStyleInput("vintage!")).toEqual({
      valid: false,
      error: "Style preference contains invalid characters",
    });
  });

  it("accepts letters, digits, spaces, ampersands and hyphens", () => {
    expect(validateStyleInput("Vintage & Boho-chic 90s")).toEqual({ valid: true });
  });
});

describe("validateImage", () => {
  it("accepts known image signatures", () => {
    expect(validateImage(Buffer.from([0xff, 0xd8, 0xff, 0x00]))).toEqual({ valid: true });
  });

  it("rejects other bytes", () => {
    expect(validateImage(Buffer.from("hello"))).toEqual({ valid: false, error: "Invalid image data" });
  });

  it("rejects oversized images", () => {
    expect(validateImage(Buffer.alloc(MAX_IMAGE_BYTES + 1))).toEqual({
      valid: false,
      error: "Image too large. Maximum size is 10MB",
    });
  });
});

describe("extractStyleKeywords", () => {
  it("returns vocabulary words in vocabulary order", () => {
    expect(extractStyleKeywords("Cool vintage streetwear")).toEqual(["vintage", "streetwear", "cool"]);
  });
});

describe("styleSuggestions", () => {
  it("matches known styles by substring", () => {
    expect(styleSuggestions("Casual")).toEqual(["casual chic", "business casual"]);
  });

  it("limits the results", () => {
    expect(styleSuggestions("", 3)).toEqual(["vintage streetwear", "minimalist chic", "bohemian"]);
  });
});
