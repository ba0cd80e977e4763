import type { ApprovedTagSchema, RangeDimension, TagDimension } from "../types.js";

const NUMERIC_TAG_PATTERN = /^(\d+(?:\.\d+)?)([a-z]+)$/;

export const NICOTINE_LIMIT_FAILURE = "nicotine exceeds legal maximum";

export function dimensionsFor(schema: ApprovedTagSchema, category: string): TagDimension[] {
  return schema.dimensions.filter((dimension) => dimension.appliesTo.includes(category));
}

export function findDimension(schema: ApprovedTagSchema, name: string): TagDimension | undefined {
  return schema.dimensions.find((dimension) => dimension.name === name);
}

export function appliesTo(schema: ApprovedTagSchema, dimensionName: string, category: string): boolean {
  return findDimension(schema, dimensionName)?.appliesTo.includes(category) ?? false;
}

export function parseNumericTag(tag: string): { value: number; unit: string } | null {
  const match = NUMERIC_TAG_PATTERN.exec(tag);
  if (!match) {
    return null;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) ? { value, unit: match[2] } : null;
}

/**
 * Dimensions that own `tag` for `category`. Enumerated membership wins over
 * numeric ownership so "50ml" in e-liquid belongs to bottle_size only.
 */
export function owningDimensions(
  schema: ApprovedTagSchema,
  tag: string,
  category: string,
): TagDimension[] {
  const applicable = dimensionsFor(schema, category);
  const enumOwners = applicable.filter(
    (dimension) => dimension.kind === "enum" && dimension.tags.includes(tag),
  );
  if (enumOwners.length > 0) {
    return enumOwners;
  }

  const numeric = parseNumericTag(tag);
  if (!numeric) {
    return [];
  }
  return applicable.filter(
    (dimension) => dimension.kind === "range" && dimension.unit === numeric.unit,
  );
}

export function isWithinRange(dimension: RangeDimension, value: number): boolean {
  return value >= dimension.min && value <= dimension.max;
}

export function rangeFailureMessage(dimension: RangeDimension, value: number): string {
  if (dimension.name === "nicotine_strength" && value > dimension.max) {
    return NICOTINE_LIMIT_FAILURE;
  }
  return `${dimension.name} value out of range`;
}

export function isNicotineBearing(schema: ApprovedTagSchema, category: string): boolean {
  return appliesTo(schema, "nicotine_strength", category);
}

/**
 * Canonical spelling of a tag proposed by a model: lowercase, "20 mg" -> "20mg",
 * remaining spaces -> underscores. Category names keep their declared case.
 */
export function canonicalizeTag(schema: ApprovedTagSchema, raw: string): string {
  const trimmed = raw.trim();
  const category = schema.categories.find(
    (candidate) => candidate.toLowerCase() === trimmed.toLowerCase(),
  );
  if (category) {
    return category;
  }

  return trimmed
    .toLowerCase()
    .replace(/(\d)\s+(mg|ml|ohm)\b/g, "$1$2")
    .replace(/\s*\/\s*/g, "/")
    .replace(/\s+/g, "_");
}
