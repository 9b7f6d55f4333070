import { isRecord } from "../../utils/validation.js";
import { callOpenRouterWithFallback, isOpenRouterAvailable, parseJsonFromLLMResponse } from "./openrouter.js";

/**
 * Raw body-shape analysis as returned by the vision model, before normalization
 */
export type BodyShapeAnalysis = Record<string, unknown>;

export type BodyShapeAnalyzer = (image: Buffer, style: string) => Promise<BodyShapeAnalysis>;

const IMAGE_SIGNATURES: { bytes: number[]; mime: string }[] = [
  { bytes: [0xff, 0xd8, 0xff], mime: "image/jpeg" },
  { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], mime: "image/png" },
  { bytes: [0x52, 0x49, 0x46, 0x46], mime: "image/webp" },
  { bytes: [0x47, 0x49, 0x46, 0x38], mime: "image/gif" },
];

/**
 * MIME type from the file signature, null when the bytes are not a supported image
 */
export function detectImageMime(image: Buffer): string | null {
  const match = IMAGE_SIGNATURES.find(({ bytes }) => bytes.every((byte, i) => image[i] === byte));
  return match ? match.mime : null;
}

function buildPrompt(style: string): string {
  return `Analyze this person's body shape for fashion recommendations.
User's preferred style: ${style}

Identify:
1. Body shape type (apple, pear, hourglass, rectangle, inverted triangle)
2. Height category (petite, average, tall)
3. Key features to emphasize or minimize
4. Recommended clothing silhouettes
5. Colors that would work well

Respond with ONLY a JSON object with these fields:
- body_shape: string
- height_category: string
- features_to_emphasize: array of strings
- features_to_minimize: array of strings
- recommended_silhouettes: array of strings
- recommended_colors: array of strings
- confidence_score: number (0-100)`;
}

/**
 * Analyze a body photo with a vision model via OpenRouter
 */
export async function analyzeBodyShape(image: Buffer, style: string): Promise<BodyShapeAnalysis> {
  if (!isOpenRouterAvailable()) {
    throw new Error("OPENROUTER_API_KEY not configured");
  }

  const mime = detectImageMime(image);
  if (!mime) {
    throw new Error("Unsupported image data");
  }

  console.log(`[AI] Analyzing body shape (${mime}, ${image.length} bytes)`);

  const content = await callOpenRouterWithFallback(
    [
      {
        role: "user",
        content: [
          { type: "text", text: buildPrompt(style) },
          { type: "image_url", image_url: { url: `data:${mime};base64,${image.toString("base64")}` } },
        ],
      },
    ],
    { max_tokens: 800, temperature: 0.2 }
  );

  const parsed = parseJsonFromLLMResponse(content);
  if (!isRecord(parsed)) {
    throw new Error("Body shape analysis did not return a JSON object");
  }

  return parsed;
}
