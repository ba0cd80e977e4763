import type { KeywordScope, Product } from "../types.js";
import { normalizeForMatch } from "../utils/text.js";

export interface ProductText {
  /** Title, then the handle. */
  title: string;
  /** Body, existing type and existing tags. */
  body: string;
  full: string;
}

export function buildProductText(product: Product): ProductText {
  const title = normalizeForMatch(`${product.title} ${product.handle.replace(/-/g, " ")}`);
  const body = normalizeForMatch(
    [product.body, product.existingType, product.existingTags].filter(Boolean).join(" "),
  );
  return {
    title,
    body,
    full: [title, body].filter(Boolean).join(" "),
  };
}

/** Candidate texts to scan, in order, for a given scope. */
export function textsForScope(text: ProductText, scope: KeywordScope): string[] {
  if (scope === "title") {
    return [text.title];
  }
  if (scope === "all") {
    return [text.full];
  }
  return [text.title, text.body];
}
