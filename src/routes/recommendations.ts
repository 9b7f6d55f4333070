import { Hono } from "hono";
import { DEFAULT_RECOMMENDATION_LIMIT } from "../constants/scoring.js";
import type { AppDeps } from "../app.js";
import { DEFAULT_SEARCH_LIMIT } from "../services/catalog.js";
import type { FeedbackSignals } from "../services/itemScorer.js";
import type { UserProfile } from "../services/models.js";
import { assembleOutfits } from "../services/outfitAssembler.js";
import { analyzeProfile } from "../services/profile.js";
import { filterAndRank, recommendationSummary } from "../services/ranker.js";
import { validateStyleInput } from "../services/styleQuery.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { handleRouteError, readJsonBody } from "../utils/http.js";
import { SeededRandom, type RandomSource } from "../utils/random.js";
import {
  isRecord,
  optionalNumber,
  optionalString,
  parseCatalogItems,
  parseScoredItems,
  parseUserProfile,
} from "../utils/validation.js";

const MAX_LIMIT = 50;

function randomFromSeed(seed: unknown): RandomSource | undefined {
  if (typeof seed === "number" || typeof seed === "string") {
    return new SeededRandom(seed);
  }
  return undefined;
}

export function createRecommendationRoutes(deps: AppDeps) {
  const recommendations = new Hono();

  async function resolveProfile(body: Record<string, unknown>): Promise<UserProfile> {
    if (body.profile !== undefined) {
      return parseUserProfile(body.profile);
    }

    const style = optionalString(body.style);
    const validation = validateStyleInput(style);
    if (!validation.valid) {
      throw new InvalidArgumentError(validation.error);
    }

    const { profile } = await analyzeProfile(
      { userId: optionalString(body.user_id) || undefined, style },
      deps.analyzer
    );
    return profile;
  }

  /**
   * POST / - Rank catalog items for a profile and bundle them into outfits
   * Body:
   *   - profile: UserProfile, or style (+ optional user_id) for a default profile
   *   - items: CatalogItem[] to rank instead of searching the catalog
   *   - keyword / max_items: catalog search (defaults to the profile's style)
   *   - limit, seed, use_feedback
   */
  recommendations.post("/", async (c) => {
    try {
      const body = await readJsonBody(c);
      if (!isRecord(body)) {
        throw new InvalidArgumentError("Request body must be a JSON object");
      }

      const profile = await resolveProfile(body);

      const items =
        body.items !== undefined
          ? parseCatalogItems(body.items)
          : await deps.catalog.search(
              optionalString(body.keyword, profile.preferred_style),
              optionalNumber(body.max_items, DEFAULT_SEARCH_LIMIT)
            );

      const limit = Math.min(optionalNumber(body.limit, DEFAULT_RECOMMENDATION_LIMIT), MAX_LIMIT);

      let signals: FeedbackSignals | undefined;
      if (body.use_feedback === true) {
        signals = await deps.feedback.feedbackSignals(profile.id);
      }

      const ranked = filterAndRank(profile, items, limit, { signals });
      const outfits = assembleOutfits(ranked, { random: randomFromSeed(body.seed) });

      console.log(`[Recommendations] ${ranked.length} items, ${outfits.length} outfits for user ${profile.id}`);

      return c.json({
        user_id: profile.id,
        profile,
        recommendations: ranked,
        outfits,
        summary: recommendationSummary(ranked),
      });
    } catch (err) {
      return handleRouteError(c, err, "Recommendations");
    }
  });

  /**
   * POST /outfits - Assemble outfits from already-scored items
   */
  recommendations.post("/outfits", async (c) => {
    try {
      const body = await readJsonBody(c);
      if (!isRecord(body)) {
        throw new InvalidArgumentError("Request body must be a JSON object");
      }

      const items = parseScoredItems(body.items);
      const outfits = assembleOutfits(items, { random: randomFromSeed(body.seed) });

      return c.json({ outfits, count: outfits.length });
    } catch (err) {
      return handleRouteError(c, err, "Recommendations");
    }
  });

  return recommendations;
}
