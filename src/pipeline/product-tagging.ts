import type { RunLogger } from "../logging/run-logger.js";
import { UNKNOWN_CATEGORY, type ModelUsed, type Product, type TaggingAttempt } from "../types.js";
import { uniqueStrings } from "../utils/collections.js";
import { toErrorMessage } from "../utils/text.js";
import type { AICascade } from "./ai-cascade.js";
import { CATEGORY_NOT_DETECTED, type CategoryDetector } from "./category-detection.js";
import type { RecoveryAdvisor } from "./recovery.js";
import type { RuleTagger } from "./rule-tagger.js";
import type { TagValidator } from "./tag-validation.js";

export interface ProductTaggerOptions {
  detector: CategoryDetector;
  ruleTagger: RuleTagger;
  validator: TagValidator;
  /** Null when AI tagging is disabled. */
  cascade: AICascade | null;
  recovery: RecoveryAdvisor | null;
  skipAiWhenRulesSufficient: boolean;
  ruleSufficientMinTags: number;
  logger?: RunLogger;
}

export interface TagProductOptions {
  /** Re-attempt passes always go through the cascade. */
  forceAi: boolean;
}

export function emptyAttempt(overrides: Partial<TaggingAttempt> = {}): TaggingAttempt {
  return {
    detectedCategory: null,
    ruleTags: [],
    aiTags: [],
    secondaryTags: [],
    confidence: null,
    modelUsed: "none",
    validationFailures: [],
    finalTags: [],
    needsManualReview: false,
    reasoning: null,
    ...overrides,
  };
}

/**
 * Runs one product through detect, rule-tag, cascade, validate and recover,
 * producing a fresh attempt each call.
 */
export class ProductTagger {
  constructor(private readonly options: ProductTaggerOptions) {}

  async tagProduct(product: Product, tagOptions: TagProductOptions): Promise<TaggingAttempt> {
    const { detector, ruleTagger, validator, cascade, recovery } = this.options;

    const category = detector.detect(product);
    if (category === UNKNOWN_CATEGORY) {
      return emptyAttempt({
        detectedCategory: UNKNOWN_CATEGORY,
        validationFailures: [CATEGORY_NOT_DETECTED],
        needsManualReview: true,
      });
    }

    const rules = ruleTagger.tag(product, category);
    const ruleValidation = validator.validate(uniqueStrings([category, ...rules.tags]), category);
    const rulesSufficient =
      this.options.skipAiWhenRulesSufficient &&
      !tagOptions.forceAi &&
      rules.failures.length === 0 &&
      ruleValidation.ok &&
      rules.tags.length >= this.options.ruleSufficientMinTags;

    let aiTags: string[] = [];
    let confidence: number | null = null;
    let modelUsed: ModelUsed = "none";
    let needsManualReview = false;
    let reasoning: string | null = null;

    if (!rulesSufficient) {
      if (cascade && cascade.tierCount > 0) {
        const generated = await cascade.generate(product, category, rules.tags);
        aiTags = generated.modelUsed === "none" ? [] : generated.tags;
        confidence = generated.confidence;
        modelUsed = generated.modelUsed;
        needsManualReview = generated.needsManualReview;
        reasoning = generated.reasoning;
      } else {
        needsManualReview = true;
      }
    }

    let finalTags = uniqueStrings([category, ...rules.tags, ...aiTags]);
    const validation = validator.validate(finalTags, category);
    const failures = [...rules.failures, ...validation.failures];

    if (!validation.ok) {
      needsManualReview = true;
      const recovered = recovery
        ? await recovery.recover(product, category, finalTags, validation.failures)
        : null;

      if (recovered?.succeeded) {
        finalTags = recovered.tags;
        modelUsed = "recovery";
        confidence = recovered.confidence;
        reasoning = recovered.reasoning;
      } else {
        finalTags = [];
      }
    }

    if (failures.length > 0) {
      needsManualReview = true;
    }

    return {
      detectedCategory: category,
      ruleTags: rules.tags,
      aiTags,
      secondaryTags: rules.secondaryTags,
      confidence,
      modelUsed,
      validationFailures: uniqueStrings(failures),
      finalTags,
      needsManualReview,
      reasoning,
    };
  }

  /** Per-product errors become failure entries instead of escaping the worker. */
  async tagProductSafely(product: Product, tagOptions: TagProductOptions): Promise<TaggingAttempt> {
    try {
      return await this.tagProduct(product, tagOptions);
    } catch (error) {
      const message = toErrorMessage(error);
      this.options.logger?.error("tagging", "product.failed", "Product tagging raised an error.", {
        handle: product.handle,
        error_message: message,
      });
      return emptyAttempt({
        validationFailures: [`processing error: ${message}`],
        needsManualReview: true,
      });
    }
  }
}
