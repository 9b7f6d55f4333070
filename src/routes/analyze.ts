import { Hono } from "hono";
import type { AppDeps } from "../app.js";
import { analyzeProfile } from "../services/profile.js";
import { extractStyleKeywords, validateImage, validateStyleInput } from "../services/styleQuery.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { handleRouteError, readJsonBody } from "../utils/http.js";
import { isRecord, optionalString } from "../utils/validation.js";

function decodeImage(value: unknown): Buffer | null {
  const encoded = optionalString(value).replace(/^data:[^;]+;base64,/, "");
  if (!encoded) return null;

  const image = Buffer.from(encoded, "base64");
  const validation = validateImage(image);
  if (!validation.valid) {
    throw new InvalidArgumentError(validation.error);
  }
  return image;
}

export function createAnalyzeRoutes(deps: AppDeps) {
  const analyze = new Hono();

  /**
   * POST / - Build a user profile from a style and an optional body photo
   * Body: { style: string, user_id?: string, image_base64?: base64 or data URL }
   */
  analyze.post("/", async (c) => {
    try {
      const body = await readJsonBody(c);
      if (!isRecord(body)) {
        throw new InvalidArgumentError("Request body must be a JSON object");
      }

      const style = optionalString(body.style).trim();
      const validation = validateStyleInput(style);
      if (!validation.valid) {
        throw new InvalidArgumentError(validation.error);
      }

      const image = decodeImage(body.image_base64);
      const { profile, source } = await analyzeProfile(
        { userId: optionalString(body.user_id) || undefined, style, image },
        deps.analyzer
      );

      return c.json({
        profile,
        source,
        style_keywords: extractStyleKeywords(style),
      });
    } catch (err) {
      return handleRouteError(c, err, "Analyze");
    }
  });

  return analyze;
}
