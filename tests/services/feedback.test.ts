import { beforeEach, describe, expect, it } from "vitest";

import { CatalogService } from "../../src/services/catalog.js";
import { DOCUMENT_KEYS, MemoryDocumentStore } from "../../src/services/documentStore.js";
import { FeedbackService, suggestImprovements } from "../../src/services/feedback.js";
import { InvalidArgumentError, NotFoundError } from "../../src/utils/errors.js";
import { makeItem, sequentialIds } from "../helpers.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

class PreferencesDownStore extends MemoryDocumentStore {
  override async save<T>(key: string, value: T): Promise<void> {
    if (key === DOCUMENT_KEYS.preferences) {
      throw new Error("disk full");
    }
    return super.save(key, value);
  }
}

describe("FeedbackService", () => {
  let store: MemoryDocumentStore;
  let catalog: CatalogService;
  let service: FeedbackService;

  beforeEach(async () => {
    store = new MemoryDocumentStore();
    catalog = new CatalogService(store);
    await catalog.upsert([makeItem({ id: "i1", title: "One" }), makeItem({ id: "i2", title: "Two" })]);
    service = new FeedbackService(store, catalog, { now: () => NOW, generateId: sequentialIds() });
  });

  describe("recordFeedback", () => {
    it("appends an event with the kind's importance", async () => {
      const event = await service.recordFeedback("u1", "i1", "save", { source: "feed" });

      expect(event).toEqual({
        id: "evt-1",
        user_id: "u1",
        item_id: "i1",
        feedback_type: "save",
        importance: 0.9,
        timestamp: "2026-03-01T12:00:00.000Z",
        additional_data: { source: "feed" },
      });
      expect(await store.load(DOCUMENT_KEYS.feedback, [])).toEqual([event]);
    });

    it("rejects unknown kinds", async () => {
      await expect(service.recordFeedback("u1", "i1", "love")).rejects.toThrow(
        "Invalid feedback type. Must be one of: like, dislike, save, share, view"
      );
      await expect(service.recordFeedback("u1", "i1", "love")).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it("requires user and item ids", async () => {
      await expect(service.recordFeedback("", "i1", "like")).rejects.toThrow("user_id and item_id are required");
      await expect(service.recordFeedback("u1", " ", "like")).rejects.toThrow("user_id and item_id are required");
    });

    it("logs activity", async () => {
      await service.recordFeedback("u1", "i1", "view");

      expect(await store.load(DOCUMENT_KEYS.activityLog, [])).toEqual([
        {
          timestamp: "2026-03-01T12:00:00.000Z",
          activity: "feedback_recorded",
          data: { user_id: "u1", item_id: "i1", feedback_type: "view" },
        },
      ]);
    });

    it("keeps the event when the preference projection fails", async () => {
      const downStore = new PreferencesDownStore();
      const downService = new FeedbackService(downStore, new CatalogService(downStore), { now: () => NOW });

      await downService.recordFeedback("u1", "i1", "like");

      expect(await downService.userFeedbackSummary("u1")).toMatchObject({ total_feedback: 1 });
      await expect(downService.userPreferences("u1")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("preferences", () => {
    it("keeps liked and disliked mutually exclusive", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u1", "i1", "dislike");

      expect(await service.userPreferences("u1")).toEqual({
        liked_items: [],
        disliked_items: ["i1"],
        saved_items: [],
        updated_at: "2026-03-01T12:00:00.000Z",
      });
    });

    it("ignores share and view", async () => {
      await service.recordFeedback("u1", "i1", "save");
      await service.recordFeedback("u1", "i2", "share");

      const preferences = await service.userPreferences("u1");
      expect(preferences.saved_items).toEqual(["i1"]);
      expect(preferences.liked_items).toEqual([]);
    });

    it("stores user ids named like object members", async () => {
      await service.recordFeedback("__proto__", "i1", "like");
      await service.recordFeedback("constructor", "i2", "save");

      expect((await service.userPreferences("__proto__")).liked_items).toEqual(["i1"]);
      expect((await service.userPreferences("constructor")).saved_items).toEqual(["i2"]);
      expect(await service.rebuildPreferences()).toBe(2);
      expect((await service.userPreferences("__proto__")).liked_items).toEqual(["i1"]);
    });

    it("does not resolve inherited members as users", async () => {
      await expect(service.userPreferences("constructor")).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.userPreferences("toString")).rejects.toBeInstanceOf(NotFoundError);

      const signals = await service.feedbackSignals("constructor");
      expect(signals.likedItemIds.size).toBe(0);
      expect(signals.savedItemIds.size).toBe(0);
    });

    it("throws NotFound for users without feedback", async () => {
      await expect(service.userPreferences("nobody")).rejects.toThrow("No preferences recorded for user nobody");
    });

    it("rebuilds the projection from the log", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u2", "i2", "save");
      await store.save(DOCUMENT_KEYS.preferences, {});

      expect(await service.rebuildPreferences()).toBe(2);
      expect((await service.userPreferences("u1")).liked_items).toEqual(["i1"]);
      expect((await service.userPreferences("u2")).saved_items).toEqual(["i2"]);
    });
  });

  describe("summaries", () => {
    it("sums importance into the engagement score", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u1", "i2", "like");
      await service.recordFeedback("u1", "i1", "dislike");
      await service.recordFeedback("u2", "i1", "save");

      expect(await service.userFeedbackSummary("u1")).toEqual({
        total_feedback: 3,
        feedback_breakdown: { like: 2, dislike: 1 },
        engagement_score: 1.2,
        last_feedback: "2026-03-01T12:00:00.000Z",
      });
    });

    it("returns an empty summary for a new user", async () => {
      expect(await service.userFeedbackSummary("u9")).toEqual({
        total_feedback: 0,
        feedback_breakdown: {},
        engagement_score: 0,
        last_feedback: null,
      });
    });

    it("scales item popularity to 0-20", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u2", "i1", "save");

      expect(await service.itemSummary("i1")).toEqual({
        total_feedback: 2,
        feedback_breakdown: { like: 1, save: 1 },
        popularity_score: 19,
      });
    });

    it("asks for more feedback below three events", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u1", "i2", "like");

      expect(await service.improvementSuggestions("u1")).toEqual({
        needs_more_feedback: true,
        suggestions: [
          "Like or dislike more items to improve recommendations",
          "Save items you're interested in",
          "Try different styles to expand your preferences",
        ],
      });
    });

    it("confirms clear preferences from three likes", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u1", "i2", "like");
      await service.recordFeedback("u1", "i3", "like");

      expect(await service.improvementSuggestions("u1")).toEqual({
        needs_more_feedback: false,
        suggestions: ["Great! Your preferences are clear", "Try saving items you love for future reference"],
        feedback_quality: "improving",
      });
    });
  });

  describe("mixed feedback", () => {
    it("needs no more feedback but has no suggestions for a like, dislike and view", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u1", "i2", "dislike");
      await service.recordFeedback("u1", "i3", "view");

      expect(await service.improvementSuggestions("u1")).toEqual({
        needs_more_feedback: false,
        suggestions: [],
        feedback_quality: "improving",
      });
    });
  });

  describe("trending", () => {
    it("ranks by summed importance and drops items missing from the catalog", async () => {
      await service.recordFeedback("u1", "i2", "like");
      await service.recordFeedback("u1", "i1", "view");
      await service.recordFeedback("u2", "i2", "save");
      await service.recordFeedback("u3", "ghost", "like");

      const trending = await service.trendingItems();
      expect(trending.map((item) => [item.id, item.trending_score])).toEqual([
        ["i2", 1.9],
        ["i1", 0.3],
      ]);
    });

    it("applies the limit before hydrating", async () => {
      await service.recordFeedback("u1", "i2", "like");
      await service.recordFeedback("u1", "i2", "save");
      await service.recordFeedback("u3", "ghost", "like");
      await service.recordFeedback("u1", "i1", "view");

      expect((await service.trendingItems(2)).map((item) => item.id)).toEqual(["i2"]);
    });

    it("is stable across calls on the same log", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u2", "i2", "like");
      await service.recordFeedback("u3", "i1", "view");
      await service.recordFeedback("u3", "i2", "view");

      const first = await service.trendingItems(5);
      const second = await service.trendingItems(5);

      expect(first.map((item) => item.id)).toEqual(["i1", "i2"]);
      expect(second).toEqual(first);
    });

    it("returns nothing without feedback", async () => {
      expect(await service.trendingItems()).toEqual([]);
    });
  });

  describe("feedbackPatterns", () => {
    it("reports an empty log", async () => {
      expect(await service.feedbackPatterns()).toEqual({
        totalEvents: 0,
        distribution: {},
        mostPopularKind: "none",
        averageImportance: 0,
      });
    });

    it("breaks ties by kind order", async () => {
      await service.recordFeedback("u1", "i1", "save");
      await service.recordFeedback("u1", "i2", "save");
      await service.recordFeedback("u2", "i1", "like");
      await service.recordFeedback("u2", "i2", "like");
      await service.recordFeedback("u3", "i1", "view");

      expect(await service.feedbackPatterns()).toEqual({
        totalEvents: 5,
        distribution: { save: 2, like: 2, view: 1 },
        mostPopularKind: "like",
        averageImportance: 0.82,
      });
    });
  });

  describe("feedbackSignals", () => {
    it("combines the user's sets with item popularity", async () => {
      await service.recordFeedback("u1", "i1", "like");
      await service.recordFeedback("u2", "i2", "dislike");

      const signals = await service.feedbackSignals("u1");

      expect([...signals.likedItemIds]).toEqual(["i1"]);
      expect(signals.dislikedItemIds.size).toBe(0);
      expect(signals.itemPopularity?.get("i1")).toBe(20);
      expect(signals.itemPopularity?.get("i2")).toBe(0);
    });
  });
});

describe("suggestImprovements", () => {
  it("suggests new styles when dislikes dominate", () => {
    expect(
      suggestImprovements({
        total_feedback: 12,
        feedback_breakdown: { like: 1, dislike: 5, view: 6 },
        engagement_score: 0,
        last_feedback: null,
      })
    ).toEqual({
      needs_more_feedback: false,
      suggestions: ["Consider exploring different style categories", "Try items with different silhouettes"],
      feedback_quality: "good",
    });
  });
});
