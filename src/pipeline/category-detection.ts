import { UNKNOWN_CATEGORY, type ApprovedTagSchema, type CategoryDetectionRule, type Product } from "../types.js";
import { containsAnyKeyword } from "../utils/text.js";
import { buildProductText } from "./product-text.js";

export const CATEGORY_NOT_DETECTED = "category not detected";

function ruleMatches(rule: CategoryDetectionRule, text: string): boolean {
  if (!text) {
    return false;
  }

  const included =
    containsAnyKeyword(text, rule.includeAny) || rule.patterns.some((pattern) => pattern.test(text));
  if (!included) {
    return false;
  }

  return !containsAnyKeyword(text, rule.excludeAny);
}

/**
 * Infers the primary category of a product. Title and handle are scanned
 * first across every category in schema order; body, type and existing tags
 * are only consulted when the title matched nothing. The first category to
 * match wins, so earlier-declared categories win ties.
 */
export class CategoryDetector {
  constructor(private readonly schema: ApprovedTagSchema) {}

  detect(product: Product): string {
    const text = buildProductText(product);

    for (const candidate of [text.title, text.body]) {
      for (const rule of this.schema.detectionRules) {
        if (ruleMatches(rule, candidate)) {
          return rule.category;
        }
      }
    }

    return UNKNOWN_CATEGORY;
  }
}
