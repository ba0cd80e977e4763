import type { RunLogger } from "../logging/run-logger.js";
import type { ApprovedTagSchema, ModelClient, Product } from "../types.js";
import { canonicalizeTag } from "../taxonomy/schema.js";
import { withTimeout } from "../utils/async.js";
import { uniqueStrings } from "../utils/collections.js";
import { toErrorMessage } from "../utils/text.js";
import { clampConfidence, parseTaggingResponse } from "./model-response.js";
import { buildRecoveryPrompt } from "./prompts.js";
import type { TagValidator } from "./tag-validation.js";

export const RECOVERY_TEMPERATURE = 0.5;

export interface RecoveryResult {
  tags: string[];
  succeeded: boolean;
  confidence: number | null;
  reasoning: string | null;
  /** Failures of the recovered tag set; empty when recovery succeeded. */
  failures: string[];
}

interface RecoveryAdvisorOptions {
  schema: ApprovedTagSchema;
  validator: TagValidator;
  /** Tertiary model client; recovery always fails without one. */
  client: ModelClient | null;
  timeoutMs: number;
  logger?: RunLogger;
}

export class RecoveryAdvisor {
  private readonly schema: ApprovedTagSchema;
  private readonly validator: TagValidator;
  private readonly client: ModelClient | null;
  private readonly timeoutMs: number;
  private readonly logger?: RunLogger;

  constructor(options: RecoveryAdvisorOptions) {
    this.schema = options.schema;
    this.validator = options.validator;
    this.client = options.client;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  async recover(
    product: Product,
    category: string,
    failedTags: readonly string[],
    failureReasons: readonly string[],
  ): Promise<RecoveryResult> {
    if (!this.client) {
      return { tags: [], succeeded: false, confidence: null, reasoning: null, failures: [...failureReasons] };
    }

    const prompt = buildRecoveryPrompt({
      schema: this.schema,
      product,
      category,
      failedTags,
      failureReasons,
    });

    try {
      const completion = await withTimeout(
        this.client.complete(prompt, { temperature: RECOVERY_TEMPERATURE }),
        this.timeoutMs,
        "recovery_timeout",
      );
      const parsed = parseTaggingResponse(completion.text);
      if (!parsed || parsed.tags.length === 0) {
        this.logger?.warn("recovery", "recovery.unparsable", "Recovery response had no readable tags.", {
          handle: product.handle,
        });
        return { tags: [], succeeded: false, confidence: null, reasoning: null, failures: [...failureReasons] };
      }

      const tags = uniqueStrings([
        category,
        ...parsed.tags.map((tag) => canonicalizeTag(this.schema, tag)),
      ]);
      const validation = this.validator.validate(tags, category);

      this.logger?.info("recovery", validation.ok ? "recovery.succeeded" : "recovery.rejected", "Recovery attempt validated.", {
        handle: product.handle,
        tag_count: tags.length,
        failures: validation.failures,
      });

      return {
        tags,
        succeeded: validation.ok,
        confidence: clampConfidence(completion.confidence),
        reasoning: parsed.reasoning,
        failures: validation.failures,
      };
    } catch (error) {
      this.logger?.warn("recovery", "recovery.failed", "Recovery model call failed.", {
        handle: product.handle,
        error_message: toErrorMessage(error),
      });
      return { tags: [], succeeded: false, confidence: null, reasoning: null, failures: [...failureReasons] };
    }
  }
}
