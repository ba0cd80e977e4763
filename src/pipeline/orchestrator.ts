import pLimit from "p-limit";
import { isAccurate, type AuditStore } from "../db/audit-store.js";
import type { RunLogger } from "../logging/run-logger.js";
import type { AccuracyReport, AuditRecord, Product, RunStatus } from "../types.js";
import { toErrorMessage } from "../utils/text.js";
import type { ProductTagger } from "./product-tagging.js";

export const BODY_EXCERPT_CHARS = 500;

export type OrchestratorState = "INIT" | "TAGGING" | "EVALUATING" | "DONE";

export type StopReason = "target_met" | "max_iterations" | "budget_exhausted" | "nothing_to_retry";

export interface StateTransition {
  state: OrchestratorState;
  passNumber: number | null;
  at: string;
}

export interface PassSummary {
  passNumber: number;
  attempted: number;
  skippedForBudget: number;
  accuracy: AccuracyReport;
  elapsedMs: number;
}

export interface BucketEntry {
  product: Product;
  record: AuditRecord;
}

export interface TaggingBuckets {
  clean: BucketEntry[];
  review: BucketEntry[];
  untagged: BucketEntry[];
}

export interface OrchestratorResult {
  runId: string;
  stateTrace: StateTransition[];
  passes: PassSummary[];
  stopReason: StopReason;
  targetMet: boolean;
  finalAccuracy: AccuracyReport;
  buckets: TaggingBuckets;
}

export interface AutonomousOrchestratorOptions {
  store: AuditStore;
  tagger: ProductTagger;
  accuracyTarget: number;
  maxIterations: number;
  concurrency: number;
  /** Wall-clock budget for the whole run; unlimited when absent. */
  budgetMs?: number;
  logger?: RunLogger;
  now?: () => number;
}

export function needsRetry(record: AuditRecord): boolean {
  return record.needsManualReview || record.validationFailures.length > 0;
}

export function splitBuckets(
  records: readonly AuditRecord[],
  productsByHandle: ReadonlyMap<string, Product>,
): TaggingBuckets {
  const buckets: TaggingBuckets = { clean: [], review: [], untagged: [] };
  for (const record of records) {
    const product = productsByHandle.get(record.handle);
    if (!product) {
      continue;
    }
    const entry = { product, record };
    if (record.finalTags.length === 0) {
      buckets.untagged.push(entry);
    } else if (isAccurate(record)) {
      buckets.clean.push(entry);
    } else {
      buckets.review.push(entry);
    }
  }
  return buckets;
}

/**
 * Drives a batch through repeated tagging passes. Pass 0 covers every
 * product; later passes re-tag only the unresolved subset with the model
 * cascade forced, until the accuracy target, the pass limit or the budget
 * stops the loop.
 */
export class AutonomousOrchestrator {
  private readonly options: AutonomousOrchestratorOptions;
  private readonly now: () => number;

  constructor(options: AutonomousOrchestratorOptions) {
    this.options = options;
    this.now = options.now ?? (() => Date.now());
  }

  async run(runId: string, products: readonly Product[]): Promise<OrchestratorResult> {
    const { store, logger } = this.options;
    try {
      const result = await this.execute(runId, products);
      const status: RunStatus = result.targetMet ? "completed" : "target_missed";
      await store.completeRun(runId, status, {
        stop_reason: result.stopReason,
        target_met: result.targetMet,
        pass_count: result.passes.length,
        overall_accuracy: result.finalAccuracy.overall,
        per_category_accuracy: result.finalAccuracy.perCategory,
        clean_count: result.buckets.clean.length,
        review_count: result.buckets.review.length,
        untagged_count: result.buckets.untagged.length,
      });
      return result;
    } catch (error) {
      logger?.error("orchestrator", "run.failed", "Tagging run aborted.", {
        error_message: toErrorMessage(error),
      });
      try {
        await store.completeRun(runId, "failed", { error_message: toErrorMessage(error) });
      } catch (completeError) {
        logger?.error("orchestrator", "run.complete.failed", "Could not mark run as failed.", {
          error_message: toErrorMessage(completeError),
        });
      }
      throw error;
    }
  }

  private async execute(runId: string, products: readonly Product[]): Promise<OrchestratorResult> {
    const { store, logger, accuracyTarget, maxIterations } = this.options;
    const startedAt = this.now();
    const deadline = this.options.budgetMs === undefined ? null : startedAt + this.options.budgetMs;
    const budgetExhausted = () => deadline !== null && this.now() >= deadline;

    const productsByHandle = new Map<string, Product>();
    for (const product of products) {
      if (!productsByHandle.has(product.handle)) {
        productsByHandle.set(product.handle, product);
      }
    }

    const stateTrace: StateTransition[] = [];
    const enter = (state: OrchestratorState, passNumber: number | null) => {
      stateTrace.push({ state, passNumber, at: new Date(this.now()).toISOString() });
      logger?.debug("orchestrator", "state.entered", `Entered ${state}.`, { state, pass_number: passNumber });
    };

    enter("INIT", null);

    const passes: PassSummary[] = [];
    let batch = [...productsByHandle.values()];
    let passNumber = 0;
    let stopReason: StopReason;
    let accuracy: AccuracyReport;

    for (;;) {
      enter("TAGGING", passNumber);
      const passStartedAt = this.now();
      const { attempted, skippedForBudget } = await this.runPass(runId, passNumber, batch, budgetExhausted);

      enter("EVALUATING", passNumber);
      accuracy = await store.latestAccuracy(runId);
      passes.push({
        passNumber,
        attempted,
        skippedForBudget,
        accuracy,
        elapsedMs: this.now() - passStartedAt,
      });
      logger?.info("orchestrator", "pass.completed", "Tagging pass completed.", {
        pass_number: passNumber,
        attempted,
        skipped_for_budget: skippedForBudget,
        overall_accuracy: accuracy.overall,
        per_category_accuracy: accuracy.perCategory,
      });

      if (accuracy.overall >= accuracyTarget) {
        stopReason = "target_met";
        break;
      }
      if (passNumber + 1 >= maxIterations) {
        stopReason = "max_iterations";
        break;
      }
      if (budgetExhausted()) {
        stopReason = "budget_exhausted";
        break;
      }

      const retryHandles = (await store.latestRecords(runId)).filter(needsRetry).map((record) => record.handle);
      batch = retryHandles.flatMap((handle) => {
        const product = productsByHandle.get(handle);
        return product ? [product] : [];
      });
      if (batch.length === 0) {
        stopReason = "nothing_to_retry";
        break;
      }

      passNumber += 1;
    }

    enter("DONE", null);

    const buckets = splitBuckets(await store.latestRecords(runId), productsByHandle);
    const targetMet = accuracy.overall >= accuracyTarget;

    logger?.info("orchestrator", "run.done", "Tagging run finished.", {
      stop_reason: stopReason,
      target_met: targetMet,
      pass_count: passes.length,
      clean_count: buckets.clean.length,
      review_count: buckets.review.length,
      untagged_count: buckets.untagged.length,
    });

    return {
      runId,
      stateTrace,
      passes,
      stopReason,
      targetMet,
      finalAccuracy: accuracy,
      buckets,
    };
  }

  private async runPass(
    runId: string,
    passNumber: number,
    batch: readonly Product[],
    budgetExhausted: () => boolean,
  ): Promise<{ attempted: number; skippedForBudget: number }> {
    const { store, tagger, logger } = this.options;
    const limiter = pLimit(Math.max(1, Math.floor(this.options.concurrency)));
    const isRetryPass = passNumber > 0;
    let attempted = 0;
    let skippedForBudget = 0;

    logger?.info("orchestrator", "pass.started", "Tagging pass started.", {
      pass_number: passNumber,
      product_count: batch.length,
    });

    // Once an audit write fails, tasks still queued return without work.
    const auditFailures: unknown[] = [];

    await Promise.allSettled(
      batch.map((product) =>
        limiter(async () => {
          if (auditFailures.length > 0) {
            return;
          }
          if (isRetryPass && budgetExhausted()) {
            skippedForBudget += 1;
            return;
          }
          attempted += 1;
          const attempt = await tagger.tagProductSafely(product, { forceAi: isRetryPass });
          if (auditFailures.length > 0) {
            return;
          }
          try {
            await store.append({
              runId,
              handle: product.handle,
              passNumber,
              attempt,
              title: product.title,
              bodyExcerpt: product.body.slice(0, BODY_EXCERPT_CHARS),
            });
          } catch (error) {
            auditFailures.push(error);
          }
        }),
      ),
    );

    if (auditFailures.length > 0) {
      logger?.error("orchestrator", "pass.aborted", "Audit write failed; pass stopped.", {
        pass_number: passNumber,
        attempted,
        error_message: toErrorMessage(auditFailures[0]),
      });
      throw auditFailures[0];
    }

    return { attempted, skippedForBudget };
  }
}
