import path from "node:path";
import { getConfig, toConfigSnapshot, type AppConfig } from "../config.js";
import type { AuditStore } from "../db/audit-store.js";
import { openAuditStore } from "../db/open-audit-store.js";
import { RunLogger } from "../logging/run-logger.js";
import { OpenAIModelClient } from "../services/openai.js";
import { loadApprovedTagSchema } from "../taxonomy/load.js";
import type { ModelTier, ModelTierClient } from "../types.js";
import { toErrorMessage } from "../utils/text.js";
import { AICascade } from "./ai-cascade.js";
import { CategoryDetector } from "./category-detection.js";
import { writeBucketExports, type BucketExportPaths } from "./export.js";
import { readCatalogFile } from "./ingest.js";
import { AutonomousOrchestrator, type PassSummary, type StopReason } from "./orchestrator.js";
import { ProductTagger } from "./product-tagging.js";
import { RecoveryAdvisor } from "./recovery.js";
import { RuleTagger } from "./rule-tagger.js";
import { TagValidator } from "./tag-validation.js";

export interface RunTaggingInput {
  inputPath: string;
  outputDir?: string;
  accuracyTarget?: number;
  maxIterations?: number;
  aiEnabled?: boolean;
  /** Injected in tests; otherwise opened from configuration and closed afterwards. */
  store?: AuditStore;
  /** Injected in tests; otherwise built from the MODEL_* settings. */
  modelTiers?: ModelTierClient[];
  now?: () => Date;
}

export interface TaggingRunSummary {
  runId: string;
  inputFileName: string;
  productCount: number;
  stopReason: StopReason;
  targetMet: boolean;
  accuracyTarget: number;
  overallAccuracy: number;
  perCategoryAccuracy: Record<string, number>;
  passes: Array<Pick<PassSummary, "passNumber" | "attempted" | "skippedForBudget"> & { overall: number }>;
  counts: { clean: number; review: number; untagged: number };
  exports: BucketExportPaths;
}

export function createModelTiers(config: AppConfig, logger: RunLogger): ModelTierClient[] {
  const models: Array<[ModelTier, string]> = [
    ["primary", config.MODEL_PRIMARY],
    ["secondary", config.MODEL_SECONDARY],
    ["tertiary", config.MODEL_TERTIARY],
  ];

  return models.map(([tier, model]) => ({
    tier,
    client: new OpenAIModelClient({
      model,
      baseURL: config.MODEL_BASE_URL,
      apiKey: config.MODEL_API_KEY,
      timeoutMs: config.MODEL_TIMEOUT_MS,
      maxRetries: config.MODEL_MAX_RETRIES,
      retryBaseMs: config.MODEL_RETRY_BASE_MS,
      retryMaxMs: config.MODEL_RETRY_MAX_MS,
      telemetry: (event) => logger.log(event.level, event.stage, event.event, event.message, event.payload),
    }),
  }));
}

export async function runTaggingPipeline(input: RunTaggingInput): Promise<TaggingRunSummary> {
  const config = getConfig();
  const now = input.now ?? (() => new Date());
  const accuracyTarget = input.accuracyTarget ?? config.ACCURACY_TARGET;
  const maxIterations = input.maxIterations ?? config.MAX_ITERATIONS;
  const aiEnabled = input.aiEnabled ?? config.AI_ENABLED;
  const outputDir = input.outputDir ?? config.OUTPUT_DIR;
  const inputFileName = path.basename(input.inputPath);

  const schema = loadApprovedTagSchema({
    approvedTagsPath: config.APPROVED_TAGS_PATH,
    categoryRulesPath: config.CATEGORY_RULES_PATH,
    keywordTagsPath: config.KEYWORD_TAGS_PATH,
  });

  const catalog = await readCatalogFile(input.inputPath);

  const ownsStore = !input.store;
  const store = input.store ?? openAuditStore(config);

  try {
    const runId = await store.startRun({
      ...toConfigSnapshot(config),
      accuracy_target: accuracyTarget,
      max_iterations: maxIterations,
      ai_enabled: aiEnabled,
      input_file_name: inputFileName,
      schema_version: schema.version,
    });

    const logger = new RunLogger({
      runId,
      retentionHours: config.TRACE_RETENTION_HOURS,
      flushBatchSize: config.TRACE_FLUSH_BATCH_SIZE,
      insertBatch: (rows) => store.insertRunLogs(rows),
      now,
    });

    try {
      logger.info("pipeline", "run.started", "Tagging run started.", {
        input_file_name: inputFileName,
        product_count: catalog.products.length,
        accuracy_target: accuracyTarget,
        max_iterations: maxIterations,
        ai_enabled: aiEnabled,
        schema_version: schema.version,
      });

      if (catalog.products.length === 0) {
        logger.warn("pipeline", "catalog.empty", "No valid products found in the input file.", {
          input_file_name: inputFileName,
        });
      }

      const purged = await store.purgeExpiredLogs();
      if (purged > 0) {
        logger.debug("pipeline", "logs.purged", "Expired run logs removed.", { deleted_count: purged });
      }

      const tiers = aiEnabled ? input.modelTiers ?? createModelTiers(config, logger) : [];
      const validator = new TagValidator(schema);
      const cascade =
        tiers.length > 0
          ? new AICascade({
              schema,
              tiers,
              confidenceThreshold: config.AI_CONFIDENCE_THRESHOLD,
              tierTimeoutMs: config.MODEL_TIER_TIMEOUT_MS,
              logger,
            })
          : null;
      const recoveryClient = tiers.find((entry) => entry.tier === "tertiary")?.client ?? tiers.at(-1)?.client;
      const recovery =
        config.RECOVERY_ENABLED && aiEnabled
          ? new RecoveryAdvisor({
              schema,
              validator,
              client: recoveryClient ?? null,
              timeoutMs: config.MODEL_TIER_TIMEOUT_MS,
              logger,
            })
          : null;

      const tagger = new ProductTagger({
        detector: new CategoryDetector(schema),
        ruleTagger: new RuleTagger(schema),
        validator,
        cascade,
        recovery,
        skipAiWhenRulesSufficient: config.AI_SKIP_WHEN_RULES_SUFFICIENT,
        ruleSufficientMinTags: config.RULE_SUFFICIENT_MIN_TAGS,
        logger,
      });

      const orchestrator = new AutonomousOrchestrator({
        store,
        tagger,
        accuracyTarget,
        maxIterations,
        concurrency: config.CONCURRENCY,
        budgetMs: config.RUN_BUDGET_MS,
        logger,
        now: () => now().getTime(),
      });

      const result = await orchestrator.run(runId, catalog.products);

      const exports = await writeBucketExports({
        outputDir,
        sourceColumns: catalog.columns,
        buckets: result.buckets,
        generatedAt: now(),
      });

      logger.info("pipeline", "exports.written", "Bucket exports written.", { ...exports });
      await logger.flush();

      return {
        runId,
        inputFileName,
        productCount: catalog.products.length,
        stopReason: result.stopReason,
        targetMet: result.targetMet,
        accuracyTarget,
        overallAccuracy: result.finalAccuracy.overall,
        perCategoryAccuracy: result.finalAccuracy.perCategory,
        passes: result.passes.map((pass) => ({
          passNumber: pass.passNumber,
          attempted: pass.attempted,
          skippedForBudget: pass.skippedForBudget,
          overall: pass.accuracy.overall,
        })),
        counts: {
          clean: result.buckets.clean.length,
          review: result.buckets.review.length,
          untagged: result.buckets.untagged.length,
        },
        exports,
      };
    } catch (error) {
      logger.error("pipeline", "run.failed", "Tagging run failed.", {
        error_message: toErrorMessage(error),
      });
      await logger.flush();
      throw error;
    }
  } finally {
    if (ownsStore) {
      await store.close();
    }
  }
}
