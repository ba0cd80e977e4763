import { z } from "zod";

const taggingResponseSchema = z.object({
  tags: z.array(z.union([z.string(), z.number()])),
  confidence: z.union([z.number(), z.string()]).optional(),
  reasoning: z.string().optional(),
});

const tagArraySchema = z.array(z.union([z.string(), z.number()]));

export const ARRAY_FALLBACK_CONFIDENCE = 0.5;

export interface ParsedTaggingResponse {
  tags: string[];
  confidence: number;
  reasoning: string | null;
}

/**
 * Model confidences arrive as 0-1 floats, percentages or strings. Only whole
 * numbers from 2 to 100 read as percentages; anything else above 1 clamps to 1.
 */
export function clampConfidence(value: unknown): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  const isPercentage = Number.isInteger(parsed) && parsed >= 2 && parsed <= 100;
  const scaled = isPercentage ? parsed / 100 : parsed;
  return Math.max(0, Math.min(1, scaled));
}

function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?/gi, "").trim();
}

function tryParseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

function sliceBetween(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

function toTagStrings(values: Array<string | number>): string[] {
  return values.map((value) => String(value).trim()).filter((value) => value.length > 0);
}

/**
 * Reads `{tags, confidence, reasoning}` out of free model text. Falls back to
 * the first JSON array, which is taken at a fixed 0.5 confidence.
 */
export function parseTaggingResponse(text: string): ParsedTaggingResponse | null {
  const cleaned = stripCodeFences(text);

  const objectText = sliceBetween(cleaned, "{", "}");
  if (objectText) {
    const parsed = taggingResponseSchema.safeParse(tryParseJson(objectText));
    if (parsed.success) {
      return {
        tags: toTagStrings(parsed.data.tags),
        confidence: clampConfidence(parsed.data.confidence),
        reasoning: parsed.data.reasoning?.trim() || null,
      };
    }
  }

  const arrayText = sliceBetween(cleaned, "[", "]");
  if (arrayText) {
    const parsed = tagArraySchema.safeParse(tryParseJson(arrayText));
    if (parsed.success) {
      return {
        tags: toTagStrings(parsed.data),
        confidence: ARRAY_FALLBACK_CONFIDENCE,
        reasoning: null,
      };
    }
  }

  return null;
}
