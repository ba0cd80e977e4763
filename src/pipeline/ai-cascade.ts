import type { RunLogger } from "../logging/run-logger.js";
import type {
  ApprovedTagSchema,
  ModelTier,
  ModelTierClient,
  ModelUsed,
  Product,
} from "../types.js";
import { canonicalizeTag } from "../taxonomy/schema.js";
import { withTimeout } from "../utils/async.js";
import { uniqueStrings } from "../utils/collections.js";
import { toErrorMessage } from "../utils/text.js";
import { clampConfidence, parseTaggingResponse } from "./model-response.js";
import { buildTaggingPrompt } from "./prompts.js";

export const CASCADE_TEMPERATURE = 0.3;

export interface CascadeResult {
  tags: string[];
  confidence: number;
  modelUsed: ModelUsed;
  needsManualReview: boolean;
  reasoning: string | null;
}

interface TierOutcome {
  tier: ModelTier;
  tags: string[];
  confidence: number;
  reasoning: string | null;
}

interface AICascadeOptions {
  schema: ApprovedTagSchema;
  tiers: ModelTierClient[];
  confidenceThreshold: number;
  tierTimeoutMs: number;
  logger?: RunLogger;
}

/**
 * Ordered model fallback. Each tier is tried once; the first response at or
 * above the threshold is accepted. The last tier's response is accepted
 * whatever its confidence. A tier that times out, errors or returns
 * unparsable text scores 0 and the loop moves on. When the last tier gives
 * no usable response the rule tags come back with model "none", even if an
 * earlier tier answered below the threshold.
 */
export class AICascade {
  private readonly schema: ApprovedTagSchema;
  private readonly tiers: ModelTierClient[];
  private readonly threshold: number;
  private readonly tierTimeoutMs: number;
  private readonly logger?: RunLogger;

  constructor(options: AICascadeOptions) {
    this.schema = options.schema;
    this.tiers = [...options.tiers];
    this.threshold = options.confidenceThreshold;
    this.tierTimeoutMs = options.tierTimeoutMs;
    this.logger = options.logger;
  }

  get tierCount(): number {
    return this.tiers.length;
  }

  async generate(product: Product, category: string, ruleTags: readonly string[]): Promise<CascadeResult> {
    const prompt = buildTaggingPrompt({ schema: this.schema, product, category, ruleTags });
    for (let index = 0; index < this.tiers.length; index += 1) {
      const entry = this.tiers[index];
      const isLastTier = index === this.tiers.length - 1;
      const outcome = await this.callTier(entry, prompt, product.handle);
      if (!outcome) {
        continue;
      }

      if (outcome.confidence >= this.threshold || isLastTier) {
        return this.accept(outcome);
      }
    }

    this.logger?.warn("cascade", "cascade.exhausted", "No model tier was accepted; using rule tags only.", {
      handle: product.handle,
      tier_count: this.tiers.length,
    });

    return {
      tags: [...ruleTags],
      confidence: 0,
      modelUsed: "none",
      needsManualReview: true,
      reasoning: null,
    };
  }

  private accept(outcome: TierOutcome): CascadeResult {
    return {
      tags: outcome.tags,
      confidence: outcome.confidence,
      modelUsed: outcome.tier,
      needsManualReview: outcome.confidence < this.threshold,
      reasoning: outcome.reasoning,
    };
  }

  private async callTier(entry: ModelTierClient, prompt: string, handle: string): Promise<TierOutcome | null> {
    const startedAt = Date.now();
    try {
      const completion = await withTimeout(
        entry.client.complete(prompt, { temperature: CASCADE_TEMPERATURE }),
        this.tierTimeoutMs,
        `model_tier_timeout:${entry.tier}`,
      );
      const parsed = parseTaggingResponse(completion.text);
      if (!parsed) {
        this.logger?.warn("cascade", "cascade.tier.unparsable", "Model response had no readable tags.", {
          handle,
          tier: entry.tier,
          model: entry.client.name,
        });
        return null;
      }

      const confidence = clampConfidence(completion.confidence);
      this.logger?.debug("cascade", "cascade.tier.responded", "Model tier responded.", {
        handle,
        tier: entry.tier,
        model: entry.client.name,
        confidence,
        elapsed_ms: Date.now() - startedAt,
      });

      return {
        tier: entry.tier,
        tags: uniqueStrings(parsed.tags.map((tag) => canonicalizeTag(this.schema, tag))),
        confidence,
        reasoning: parsed.reasoning,
      };
    } catch (error) {
      this.logger?.warn("cascade", "cascade.tier.failed", "Model tier failed; moving to next tier.", {
        handle,
        tier: entry.tier,
        model: entry.client.name,
        elapsed_ms: Date.now() - startedAt,
        error_message: toErrorMessage(error),
      });
      return null;
    }
  }
}
