/**
 * OpenRouter API Client
 * Chat completions (text and vision) with model fallback
 */

const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";

// Vision-capable models, tried in order
const PRIMARY_MODEL = "google/gemini-2.0-flash-001";
const FALLBACK_MODELS = ["google/gemini-2.0-flash-lite-001", "openai/gpt-4o-mini"];

const MAX_RETRIES = 2;
const TIMEOUT_MS = 30000;

export type OpenRouterContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface OpenRouterMessage {
  role: "user" | "assistant" | "system";
  content: string | OpenRouterContentPart[];
}

export interface OpenRouterRequest {
  model?: string;
  messages: OpenRouterMessage[];
  max_tokens?: number;
  temperature?: number;
}

/**
 * Pull choices[0].message.content out of an untyped completion body
 */
function extractContent(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("choices" in body)) return null;
  const choices = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;

  const first: unknown = choices[0];
  if (typeof first !== "object" || first === null || !("message" in first)) return null;
  const message = first.message;
  if (typeof message !== "object" || message === null || !("content" in message)) return null;

  return typeof message.content === "string" ? message.content : null;
}

function getApiKey(): string | undefined {
  return process.env.OPENROUTER_API_KEY;
}

/**
 * Check if OpenRouter is available
 */
export function isOpenRouterAvailable(): boolean {
  return !!getApiKey();
}

/**
 * Call OpenRouter API with a specific model
 */
export async function callOpenRouter(request: OpenRouterRequest): Promise<string> {
  const apiKey = getApiKey();
  if (!apiKey) {
    throw new Error("OPENROUTER_API_KEY not configured");
  }

  const model = request.model || PRIMARY_MODEL;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), TIMEOUT_MS);

  try {
    const response = await fetch(OPENROUTER_API_URL, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
        "X-Title": "Outfit Rank API",
      },
      body: JSON.stringify({
        model,
        messages: request.messages,
        max_tokens: request.max_tokens || 1000,
        temperature: request.temperature ?? 0.3,
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenRouter API error ${response.status}: ${errorText}`);
    }

    const content = extractContent(await response.json());

    if (!content) {
      throw new Error("OpenRouter returned empty content");
    }

    return content;
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new Error(`OpenRouter request timed out after ${TIMEOUT_MS}ms`);
    }

    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call OpenRouter with automatic fallback to alternative models
 */
export async function callOpenRouterWithFallback(
  messages: OpenRouterMessage[],
  options?: {
    max_tokens?: number;
    temperature?: number;
  }
): Promise<string> {
  if (!isOpenRouterAvailable()) {
    throw new Error("OPENROUTER_API_KEY not configured");
  }

  const allModels = [PRIMARY_MODEL, ...FALLBACK_MODELS];

  for (const model of allModels) {
    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      try {
        console.log(`[OpenRouter] Trying ${model} (attempt ${attempt + 1}/${MAX_RETRIES})`);

        const response = await callOpenRouter({
          model,
          messages,
          max_tokens: options?.max_tokens,
          temperature: options?.temperature,
        });

        console.log(`[OpenRouter] Success with ${model}`);
        return response;
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : "Unknown error";
        console.warn(`[OpenRouter] ${model} attempt ${attempt + 1} failed: ${errorMessage}`);

        // Don't retry on timeout, move to next model
        if (err instanceof Error && err.message.includes("timed out")) {
          break;
        }
      }
    }
  }

  throw new Error("All OpenRouter models failed");
}

/**
 * Parse JSON from a potentially messy LLM response
 * Handles markdown code blocks and extra text
 */
export function parseJsonFromLLMResponse(content: string): unknown {
  const jsonMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonMatch) {
    return JSON.parse(jsonMatch[1].trim());
  }

  const trimmed = content.trim();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    return JSON.parse(trimmed);
  }

  const objectMatch = content.match(/\{[\s\S]*\}/);
  if (objectMatch) {
    return JSON.parse(objectMatch[0]);
  }

  throw new Error("Could not parse JSON from LLM response");
}
