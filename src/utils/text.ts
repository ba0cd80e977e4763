import slugifyModule from "slugify";

export function normalizeText(value: string | undefined): string {
  if (!value) {
    return "";
  }

  return value
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    // 1,000mg -> 1000mg
    .replace(/(\d),(?=\d{3}(?!\d))/g, "$1")
    .replace(/[^\p{L}\p{N}\s./%:+-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

/**
 * Text form used for keyword matching: hyphens become spaces so that
 * "full-spectrum" and "full spectrum" compare equal.
 */
export function normalizeForMatch(value: string | undefined): string {
  return normalizeText(value)
    .replace(/(?<=\p{L})-|-(?=\p{L})/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const keywordPatternCache = new Map<string, RegExp>();

/** Whole-word match of an already-normalized keyword inside normalized text. */
export function containsKeyword(normalizedText: string, keyword: string): boolean {
  if (!keyword) {
    return false;
  }

  let pattern = keywordPatternCache.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(keyword)}(?:$|[^\\p{L}\\p{N}])`, "u");
    keywordPatternCache.set(keyword, pattern);
  }
  return pattern.test(normalizedText);
}

export function containsAnyKeyword(normalizedText: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => containsKeyword(normalizedText, keyword));
}

export function makeSlug(input: string): string {
  const slugify = slugifyModule as unknown as (
    value: string,
    options?: {
      lower?: boolean;
      strict?: boolean;
      trim?: boolean;
    },
  ) => string;

  const slug = slugify(input, {
    lower: true,
    strict: true,
    trim: true,
  });

  return slug.length > 0 ? slug.slice(0, 96) : "untitled-product";
}

/** Number rendered the way tags carry it: 3 -> "3", 1.50 -> "1.5". */
export function formatTagNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(3)));
}

export function trimToEmpty(value: string | undefined): string {
  return value?.trim() ?? "";
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "unknown_error");
}
