import type { ApprovedTagSchema, Product, TagDimension } from "../types.js";
import { dimensionsFor, isNicotineBearing } from "../taxonomy/schema.js";

const MAX_BODY_CHARS = 1_200;

const DEVICE_CATEGORIES = new Set(["device", "pod_system", "tank", "coil"]);

function describeDimension(dimension: TagDimension): string {
  if (dimension.kind === "range") {
    return `- ${dimension.name}: a number followed by "${dimension.unit}" between ${dimension.min} and ${dimension.max} (e.g. ${dimension.min}${dimension.unit})`;
  }
  return `- ${dimension.name}: ${dimension.tags.join(", ")}`;
}

function productBlock(product: Product): string[] {
  const body = product.body.length > MAX_BODY_CHARS ? `${product.body.slice(0, MAX_BODY_CHARS)}…` : product.body;
  return [
    `Title: ${product.title}`,
    `Vendor: ${product.vendor || "unknown"}`,
    `Existing type: ${product.existingType || "none"}`,
    `Description: ${body || "none"}`,
  ];
}

function categoryGuidance(schema: ApprovedTagSchema, category: string): string[] {
  const required = schema.requiredDimensions[category] ?? [];
  const lines: string[] = [];

  if (category === "CBD") {
    lines.push(
      "This is a CBD product. You MUST return at least one tag from EACH of cbd_strength, cbd_form and cbd_type.",
      "cbd_strength is the total CBD content such as 1000mg. Never return nicotine tags for CBD products.",
    );
  } else if (required.length > 0) {
    lines.push(`Every ${category} product must carry tags for: ${required.join(", ")}.`);
  }

  if (isNicotineBearing(schema, category)) {
    lines.push(
      "Nicotine strength is legally capped at 20mg. Never return a nicotine strength above 20mg.",
      "Use nic_salt or freebase_nicotine for the nicotine type, the VG/PG ratio as VG/PG (e.g. 70/30) and flavour types from the approved list.",
    );
  }

  if (DEVICE_CATEGORIES.has(category)) {
    lines.push("For hardware describe the device style, the power supply and the vaping style (mouth-to-lung or direct-to-lung).");
  }

  return lines;
}

const CONFIDENCE_GUIDE = [
  "Confidence guide:",
  "0.95 every tag is stated explicitly in the title or description",
  "0.85 most tags are explicit and the rest are strongly implied",
  "0.70 some tags are inferred from context",
  "0.50 the product text is vague and tags are best guesses",
];

/** Category-aware tagging prompt shared by every cascade tier. */
export function buildTaggingPrompt(input: {
  schema: ApprovedTagSchema;
  product: Product;
  category: string;
  ruleTags: readonly string[];
}): string {
  const dimensions = dimensionsFor(input.schema, input.category);

  return [
    "You tag vape and CBD products for an online store using ONLY an approved vocabulary.",
    `Product category: ${input.category}`,
    ...productBlock(input.product),
    "",
    "Approved tags for this category:",
    ...dimensions.map(describeDimension),
    "",
    ...categoryGuidance(input.schema, input.category),
    `Tags already found by pattern rules: ${input.ruleTags.length > 0 ? input.ruleTags.join(", ") : "none"}`,
    "Return only tags from the approved lists. Do not invent tags.",
    "",
    ...CONFIDENCE_GUIDE,
    "",
    'Respond with JSON only: {"tags": ["..."], "confidence": 0.0, "reasoning": "..."}',
  ].join("\n");
}

/** Corrective prompt used once after validation fails. */
export function buildRecoveryPrompt(input: {
  schema: ApprovedTagSchema;
  product: Product;
  category: string;
  failedTags: readonly string[];
  failureReasons: readonly string[];
}): string {
  const dimensions = dimensionsFor(input.schema, input.category);

  return [
    "A previous tagging attempt for this product failed validation. Produce a corrected tag set.",
    `Product category: ${input.category}`,
    ...productBlock(input.product),
    "",
    `Previously suggested tags: ${input.failedTags.length > 0 ? input.failedTags.join(", ") : "none"}`,
    "Validation failures:",
    ...input.failureReasons.map((reason) => `- ${reason}`),
    "",
    "Approved tags for this category:",
    ...dimensions.map(describeDimension),
    "",
    ...categoryGuidance(input.schema, input.category),
    "Rules:",
    "- use only approved tags listed above",
    "- fix every validation failure",
    "- drop tags that do not apply to this category",
    "Because this is a correction, report a confidence between 0.6 and 0.8.",
    'Respond with JSON only: {"tags": ["..."], "confidence": 0.7, "reasoning": "..."}',
  ].join("\n");
}
