import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type {
  ApprovedTagSchema,
  CategoryDetectionRule,
  KeywordDimensionRules,
  NumericExtractionRule,
  TagDimension,
} from "../types.js";
import { normalizeForMatch } from "../utils/text.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const MANDATORY_CBD_DIMENSIONS = ["cbd_strength", "cbd_form", "cbd_type"] as const;

const dimensionSchema = z
  .object({
    tags: z.array(z.string().min(1)).min(1).optional(),
    range: z
      .object({
        min: z.number(),
        max: z.number(),
        unit: z.string().regex(/^[a-z]+$/),
      })
      .strict()
      .optional(),
    applies_to: z.array(z.string().min(1)).min(1),
  })
  .strict()
  .refine((value) => (value.tags === undefined) !== (value.range === undefined), {
    message: "dimension must declare exactly one of tags or range",
  })
  .refine((value) => value.range === undefined || value.range.min <= value.range.max, {
    message: "range min must be <= max",
  });

const approvedTagsFileSchema = z
  .object({
    schema_version: z.string().min(1),
    categories: z.array(z.string().min(1)).min(1),
    dimensions: z.record(z.string().regex(/^[a-z][a-z0-9_]*$/), dimensionSchema),
    required_dimensions: z.record(z.string(), z.array(z.string().min(1))).default({}),
  })
  .strict();

const categoryRulesFileSchema = z.object({
  schema_version: z.string().min(1),
  categories: z.array(
    z
      .object({
        category: z.string().min(1),
        include_any: z.array(z.string().min(1)).default([]),
        exclude_any: z.array(z.string().min(1)).default([]),
        patterns: z.array(z.string().min(1)).default([]),
      })
      .strict(),
  ),
});

const scopeSchema = z.enum(["title", "title_then_body", "all"]);

const keywordTagsFileSchema = z.object({
  schema_version: z.string().min(1),
  keyword_dimensions: z.record(
    z.string(),
    z
      .object({
        mode: z.enum(["first", "all"]),
        scope: scopeSchema,
        rules: z.array(
          z
            .object({
              tag: z.string().min(1),
              include_any: z.array(z.string().min(1)).min(1),
              exclude_any: z.array(z.string().min(1)).default([]),
            })
            .strict(),
        ),
      })
      .strict(),
  ),
  numeric_dimensions: z.record(
    z.string(),
    z.object({ mode: z.enum(["first", "all"]), scope: scopeSchema }).strict(),
  ),
  secondary_flavours: z.array(z.string().min(1)).default([]),
});

export interface SchemaFilePaths {
  approvedTagsPath?: string;
  categoryRulesPath?: string;
  keywordTagsPath?: string;
}

function readJsonFile(filePath: string): unknown {
  const content = readFileSync(filePath, "utf8");
  return JSON.parse(content);
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${label}:${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid approved tag schema: ${errors}`);
  }
  return parsed.data;
}

function schemaError(message: string): Error {
  return new Error(`Invalid approved tag schema: ${message}`);
}

export function defaultSchemaPath(fileName: string): string {
  return path.join(__dirname, fileName);
}

/**
 * Builds the frozen schema value from already-parsed JSON documents.
 * Every cross-reference (categories, dimensions, tags) is checked here so
 * tagging code never meets an unknown dimension at use time.
 */
export function buildApprovedTagSchema(input: {
  approvedTags: unknown;
  categoryRules: unknown;
  keywordTags: unknown;
}): ApprovedTagSchema {
  const approved = parseOrThrow(approvedTagsFileSchema, input.approvedTags, "approved_tags");
  const categoryRulesFile = parseOrThrow(categoryRulesFileSchema, input.categoryRules, "category_rules");
  const keywordFile = parseOrThrow(keywordTagsFileSchema, input.keywordTags, "keyword_tags");

  const categories = approved.categories;
  const categorySet = new Set(categories);
  if (categorySet.size !== categories.length) {
    throw schemaError("categories must be unique");
  }

  const dimensions: TagDimension[] = [];
  for (const [name, spec] of Object.entries(approved.dimensions)) {
    for (const category of spec.applies_to) {
      if (!categorySet.has(category)) {
        throw schemaError(`dimension ${name} applies to unknown category ${category}`);
      }
    }

    if (spec.range) {
      dimensions.push({
        kind: "range",
        name,
        min: spec.range.min,
        max: spec.range.max,
        unit: spec.range.unit,
        appliesTo: Object.freeze([...spec.applies_to]),
      });
    } else {
      dimensions.push({
        kind: "enum",
        name,
        tags: Object.freeze([...(spec.tags ?? [])]),
        appliesTo: Object.freeze([...spec.applies_to]),
      });
    }
  }

  const dimensionsByName = new Map(dimensions.map((dimension) => [dimension.name, dimension]));

  for (const category of categories) {
    const units = new Set<string>();
    for (const dimension of dimensions) {
      if (dimension.kind !== "range" || !dimension.appliesTo.includes(category)) {
        continue;
      }
      if (units.has(dimension.unit)) {
        throw schemaError(
          `category ${category} has more than one numeric dimension with unit ${dimension.unit}`,
        );
      }
      units.add(dimension.unit);
    }
  }

  const requiredDimensions: Record<string, readonly string[]> = {};
  for (const [category, required] of Object.entries(approved.required_dimensions)) {
    if (!categorySet.has(category)) {
      throw schemaError(`required_dimensions references unknown category ${category}`);
    }
    for (const name of required) {
      const dimension = dimensionsByName.get(name);
      if (!dimension) {
        throw schemaError(`required dimension ${name} for ${category} does not exist`);
      }
      if (!dimension.appliesTo.includes(category)) {
        throw schemaError(`required dimension ${name} does not apply to ${category}`);
      }
    }
    requiredDimensions[category] = Object.freeze([...required]);
  }

  if (categorySet.has("CBD")) {
    const cbdRequired = requiredDimensions.CBD ?? [];
    const missing = MANDATORY_CBD_DIMENSIONS.filter((name) => !cbdRequired.includes(name));
    if (missing.length > 0) {
      throw schemaError(`CBD must require ${missing.join(", ")}`);
    }
  }

  const rulesByCategory = new Map<string, CategoryDetectionRule>();
  for (const rule of categoryRulesFile.categories) {
    if (!categorySet.has(rule.category)) {
      throw schemaError(`category rule references unknown category ${rule.category}`);
    }
    rulesByCategory.set(rule.category, {
      category: rule.category,
      includeAny: Object.freeze(rule.include_any.map((keyword) => normalizeForMatch(keyword))),
      excludeAny: Object.freeze(rule.exclude_any.map((keyword) => normalizeForMatch(keyword))),
      patterns: Object.freeze(rule.patterns.map((pattern) => new RegExp(pattern, "i"))),
    });
  }

  // Detection order is the declaration order of `categories`, not the rules file order.
  const detectionRules = categories
    .map((category) => rulesByCategory.get(category))
    .filter((rule): rule is CategoryDetectionRule => rule !== undefined);

  const keywordRules: Record<string, KeywordDimensionRules> = {};
  for (const [name, spec] of Object.entries(keywordFile.keyword_dimensions)) {
    const dimension = dimensionsByName.get(name);
    if (!dimension || dimension.kind !== "enum") {
      throw schemaError(`keyword rules reference unknown enumerated dimension ${name}`);
    }
    for (const rule of spec.rules) {
      if (!dimension.tags.includes(rule.tag)) {
        throw schemaError(`keyword rule tag ${rule.tag} is not approved for ${name}`);
      }
    }
    keywordRules[name] = {
      mode: spec.mode,
      scope: spec.scope,
      rules: Object.freeze(
        spec.rules.map((rule) => ({
          tag: rule.tag,
          includeAny: Object.freeze(rule.include_any.map((keyword) => normalizeForMatch(keyword))),
          excludeAny: Object.freeze(rule.exclude_any.map((keyword) => normalizeForMatch(keyword))),
        })),
      ),
    };
  }

  const numericRules: Record<string, NumericExtractionRule> = {};
  for (const [name, spec] of Object.entries(keywordFile.numeric_dimensions)) {
    const dimension = dimensionsByName.get(name);
    if (!dimension || dimension.kind !== "range") {
      throw schemaError(`numeric rules reference unknown numeric dimension ${name}`);
    }
    numericRules[name] = { mode: spec.mode, scope: spec.scope };
  }

  return Object.freeze({
    version: approved.schema_version,
    categories: Object.freeze([...categories]),
    dimensions: Object.freeze(dimensions.map((dimension) => Object.freeze(dimension))),
    requiredDimensions: Object.freeze(requiredDimensions),
    detectionRules: Object.freeze(detectionRules),
    keywordRules: Object.freeze(keywordRules),
    numericRules: Object.freeze(numericRules),
    secondaryFlavours: Object.freeze(
      keywordFile.secondary_flavours.map((keyword) => normalizeForMatch(keyword)),
    ),
  });
}

export function loadApprovedTagSchema(paths: SchemaFilePaths = {}): ApprovedTagSchema {
  return buildApprovedTagSchema({
    approvedTags: readJsonFile(paths.approvedTagsPath ?? defaultSchemaPath("approved_tags.json")),
    categoryRules: readJsonFile(paths.categoryRulesPath ?? defaultSchemaPath("category_rules.json")),
    keywordTags: readJsonFile(paths.keywordTagsPath ?? defaultSchemaPath("keyword_tags.json")),
  });
}
