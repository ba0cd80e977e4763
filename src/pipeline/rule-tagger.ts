import {
  UNKNOWN_CATEGORY,
  type ApprovedTagSchema,
  type EnumDimension,
  type KeywordDimensionRules,
  type Product,
  type RangeDimension,
  type TagDimension,
} from "../types.js";
import {
  appliesTo,
  dimensionsFor,
  isWithinRange,
  rangeFailureMessage,
} from "../taxonomy/schema.js";
import { uniqueStrings } from "../utils/collections.js";
import { containsAnyKeyword, containsKeyword, formatTagNumber, normalizeForMatch } from "../utils/text.js";
import { buildProductText, textsForScope, type ProductText } from "./product-text.js";

export interface RuleTaggingResult {
  tags: string[];
  /** Free-text flavour notes; never part of final tags. */
  secondaryTags: string[];
  failures: string[];
}

interface Extraction {
  tags: string[];
  failures: string[];
}

const EMPTY_EXTRACTION: Extraction = { tags: [], failures: [] };

const ZERO_NICOTINE_PHRASES = [
  "nicotine free",
  "nic free",
  "zero nicotine",
  "no nicotine",
  "0 nicotine",
  "without nicotine",
].map((phrase) => normalizeForMatch(phrase));

const LABELLED_RATIO_PATTERNS: Array<{ pattern: RegExp; vgFirst: boolean }> = [
  { pattern: /(\d{1,3})\s*%?\s*vg\s*[/:\s-]\s*(\d{1,3})\s*%?\s*pg\b/, vgFirst: true },
  { pattern: /(\d{1,3})\s*%?\s*pg\s*[/:\s-]\s*(\d{1,3})\s*%?\s*vg\b/, vgFirst: false },
  { pattern: /\bvg\s*[/:]\s*pg\s*:?\s*(\d{1,3})\s*[/:-]\s*(\d{1,3})\b/, vgFirst: true },
  { pattern: /\bpg\s*[/:]\s*vg\s*:?\s*(\d{1,3})\s*[/:-]\s*(\d{1,3})\b/, vgFirst: false },
];
const SINGLE_VG_PATTERN = /(?<![\d.])(\d{2,3})\s*%?\s*vg\b/;
const BARE_RATIO_PATTERN = /(?<![\d./])(\d{1,3})\s*\/\s*(\d{1,3})(?![\d./])/g;

const SHORTFILL_KEYWORDS = ["shortfill", "short fill", "shortfills"];
const NIC_SHOT_KEYWORDS = ["nic shot", "nicotine shot", "nic shots"];

function numberPattern(unit: string): RegExp {
  return new RegExp(`(?<![\\d.])(\\d+(?:\\.\\d+)?)\\s*${unit}\\b`, "g");
}

function extractNumbers(text: string, pattern: RegExp): number[] {
  return [...text.matchAll(pattern)]
    .map((match) => Number(match[1]))
    .filter((value) => Number.isFinite(value));
}

function extractKeywordTags(rules: KeywordDimensionRules, text: ProductText): string[] {
  for (const candidate of textsForScope(text, rules.scope)) {
    const matched: string[] = [];
    for (const rule of rules.rules) {
      if (!containsAnyKeyword(candidate, rule.includeAny)) {
        continue;
      }
      if (containsAnyKeyword(candidate, rule.excludeAny)) {
        continue;
      }
      matched.push(rule.tag);
      if (rules.mode === "first") {
        break;
      }
    }
    if (matched.length > 0) {
      return matched;
    }
  }
  return [];
}

function ratioTag(vg: number, pg: number): string | null {
  if (vg + pg !== 100) {
    return null;
  }
  return `${vg}/${pg}`;
}

function extractVgRatio(text: string): string | null {
  for (const { pattern, vgFirst } of LABELLED_RATIO_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const first = Number(match[1]);
      const second = Number(match[2]);
      return vgFirst ? ratioTag(first, second) : ratioTag(second, first);
    }
  }

  const single = SINGLE_VG_PATTERN.exec(text);
  if (single) {
    const vg = Number(single[1]);
    return vg <= 100 ? ratioTag(vg, 100 - vg) : null;
  }

  for (const match of text.matchAll(BARE_RATIO_PATTERN)) {
    const first = Number(match[1]);
    const second = Number(match[2]);
    if (first + second === 100) {
      return ratioTag(Math.max(first, second), Math.min(first, second));
    }
  }

  return null;
}

/**
 * Deterministic tag extraction. Only dimensions whose applies-to set contains
 * the category are consulted, and enumerated output outside the approved
 * vocabulary is dropped.
 */
export class RuleTagger {
  constructor(private readonly schema: ApprovedTagSchema) {}

  tag(product: Product, category: string): RuleTaggingResult {
    if (category === UNKNOWN_CATEGORY || !this.schema.categories.includes(category)) {
      return { tags: [], secondaryTags: [], failures: [] };
    }

    const text = buildProductText(product);
    const tags: string[] = [];
    const failures: string[] = [];

    for (const dimension of dimensionsFor(this.schema, category)) {
      const extraction = this.extract(dimension, text);
      tags.push(...extraction.tags);
      failures.push(...extraction.failures);
    }

    const secondaryTags = appliesTo(this.schema, "flavour_type", category)
      ? this.extractSecondaryFlavours(text)
      : [];

    return {
      tags: uniqueStrings(tags),
      secondaryTags,
      failures: uniqueStrings(failures),
    };
  }

  private extract(dimension: TagDimension, text: ProductText): Extraction {
    if (dimension.kind === "range") {
      return this.extractRange(dimension, text);
    }

    const keywordRules = this.schema.keywordRules[dimension.name];
    if (keywordRules) {
      return { tags: extractKeywordTags(keywordRules, text), failures: [] };
    }

    switch (dimension.name) {
      case "vg_ratio":
        return this.approvedOnly(dimension, this.firstFromScope(text, extractVgRatio));
      case "bottle_size":
        return this.approvedOnly(dimension, this.extractBottleSizes(text));
      case "coil_ohm":
        return this.approvedOnly(dimension, this.extractCoilResistance(text));
      default:
        return EMPTY_EXTRACTION;
    }
  }

  private approvedOnly(dimension: EnumDimension, candidates: Array<string | null>): Extraction {
    return {
      tags: candidates.filter(
        (candidate): candidate is string => candidate !== null && dimension.tags.includes(candidate),
      ),
      failures: [],
    };
  }

  private firstFromScope(text: ProductText, extractor: (value: string) => string | null): string[] {
    for (const candidate of textsForScope(text, "title_then_body")) {
      const value = extractor(candidate);
      if (value !== null) {
        return [value];
      }
    }
    return [];
  }

  private extractRange(dimension: RangeDimension, text: ProductText): Extraction {
    const rule = this.schema.numericRules[dimension.name] ?? { mode: "all", scope: "title_then_body" };

    if (dimension.name === "nicotine_strength" && containsAnyKeyword(text.full, ZERO_NICOTINE_PHRASES)) {
      return { tags: [`0${dimension.unit}`], failures: [] };
    }

    const pattern = numberPattern(dimension.unit);
    let values: number[] = [];
    for (const candidate of textsForScope(text, rule.scope)) {
      values = extractNumbers(candidate, pattern);
      if (values.length > 0) {
        break;
      }
    }
    if (rule.mode === "first") {
      values = values.slice(0, 1);
    }

    const tags: string[] = [];
    const failures: string[] = [];
    for (const value of values) {
      if (isWithinRange(dimension, value)) {
        tags.push(`${formatTagNumber(value)}${dimension.unit}`);
      } else {
        failures.push(rangeFailureMessage(dimension, value));
      }
    }
    return { tags, failures };
  }

  private extractBottleSizes(text: ProductText): string[] {
    const sizes: string[] = [];
    for (const candidate of textsForScope(text, "title_then_body")) {
      const values = extractNumbers(candidate, numberPattern("ml"));
      if (values.length > 0) {
        sizes.push(...values.map((value) => `${formatTagNumber(value)}ml`));
        break;
      }
    }

    if (
      containsAnyKeyword(text.full, SHORTFILL_KEYWORDS) &&
      !containsAnyKeyword(text.title, NIC_SHOT_KEYWORDS)
    ) {
      sizes.push("shortfill");
    }
    return sizes;
  }

  private extractCoilResistance(text: ProductText): string[] {
    for (const candidate of textsForScope(text, "title_then_body")) {
      const values = extractNumbers(candidate, /(?<![\d.])(\d+(?:\.\d+)?)\s*(?:ohms?|ω)/g);
      if (values.length > 0) {
        return values.map((value) =>
          Number.isInteger(value) ? `${value.toFixed(1)}ohm` : `${formatTagNumber(value)}ohm`,
        );
      }
    }
    return [];
  }

  private extractSecondaryFlavours(text: ProductText): string[] {
    for (const candidate of textsForScope(text, "title_then_body")) {
      const matched = this.schema.secondaryFlavours.filter((keyword) => containsKeyword(candidate, keyword));
      if (matched.length > 0) {
        return uniqueStrings(matched.map((keyword) => keyword.replace(/\s+/g, "_")));
      }
    }
    return [];
  }
}
