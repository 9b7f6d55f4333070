import { describe, expect, it } from "vitest";

import { InvalidArgumentError } from "../../src/utils/errors.js";
import { optionalNumber, parseCatalogItem, parseScoredItem, parseUserProfile } from "../../src/utils/validation.js";

describe("parseCatalogItem", () => {
  it("fills defaults and normalizes the category", () => {
    expect(parseCatalogItem({ id: 42, title: "Wrap dress", category: "Dress", likes: -3 })).toEqual({
      id: "42",
      title: "Wrap dress",
      style: "",
      category: "other",
      colors: [],
      description: "",
      likes: 0,
      saves: 0,
      price_range: null,
      image_url: null,
      source_url: null,
      brand: null,
      sizes: [],
      tags: [],
      created_at: null,
    });
  });

  it("requires an id and a title", () => {
    expect(() => parseCatalogItem({ title: "No id" })).toThrow("Catalog item id is required");
    expect(() => parseCatalogItem({ id: "a" })).toThrow("Catalog item title is required");
    expect(() => parseCatalogItem("nope")).toThrow(InvalidArgumentError);
  });
});

describe("parseUserProfile", () => {
  it("normalizes shape, height and confidence", () => {
    const profile = parseUserProfile({
      id: "u1",
      body_shape: "Inverted_Triangle",
      height_category: "short",
      confidence_score: -5,
      recommended_colors: ["black", 3],
    });

    expect(profile).toMatchObject({
      body_shape: "inverted-triangle",
      height_category: "petite",
      confidence_score: 0,
      recommended_colors: ["black"],
    });
  });

  it("marks unrecognized shapes as unknown", () => {
    expect(parseUserProfile({ id: "u1", body_shape: "triangle" }).body_shape).toBe("unknown");
  });
});

describe("parseScoredItem", () => {
  it("clamps scores", () => {
    const item = parseScoredItem({ id: "a", title: "A", category: "top", overall_score: 140, fit_score: "80" });
    expect(item.overall_score).toBe(100);
    expect(item.fit_score).toBe(80);
    expect(item.style_score).toBe(0);
  });
});

describe("optionalNumber", () => {
  it("parses numeric strings", () => {
    expect(optionalNumber("12")).toBe(12);
    expect(optionalNumber("abc", 5)).toBe(5);
    expect(optionalNumber(Number.NaN, 7)).toBe(7);
  });
});
