import "dotenv/config";
import { z } from "zod";

function envBoolean(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (typeof value !== "string") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
      return false;
    }
    return value;
  }, z.boolean().default(defaultValue));
}

const envSchema = z.object({
  AUDIT_STORE_DRIVER: z.enum(["sqlite", "postgres"]).default("sqlite"),
  AUDIT_DB_PATH: z.string().min(1).default("outputs/tag_audit.db"),
  DATABASE_URL: z.string().min(1).optional(),
  APPROVED_TAGS_PATH: z.string().min(1).optional(),
  CATEGORY_RULES_PATH: z.string().min(1).optional(),
  KEYWORD_TAGS_PATH: z.string().min(1).optional(),
  MODEL_BASE_URL: z.string().url().optional(),
  MODEL_API_KEY: z.string().min(1).optional(),
  MODEL_PRIMARY: z.string().min(1).default("mistral:latest"),
  MODEL_SECONDARY: z.string().min(1).default("gpt-oss:latest"),
  MODEL_TERTIARY: z.string().min(1).default("llama3.1:latest"),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  MODEL_TIER_TIMEOUT_MS: z.coerce.number().int().positive().default(150_000),
  MODEL_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),
  MODEL_RETRY_BASE_MS: z.coerce.number().int().positive().default(750),
  MODEL_RETRY_MAX_MS: z.coerce.number().int().positive().default(6_000),
  AI_ENABLED: envBoolean(true),
  AI_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  AI_SKIP_WHEN_RULES_SUFFICIENT: envBoolean(true),
  RULE_SUFFICIENT_MIN_TAGS: z.coerce.number().int().nonnegative().default(2),
  RECOVERY_ENABLED: envBoolean(true),
  ACCURACY_TARGET: z.coerce.number().min(0).max(1).default(0.9),
  MAX_ITERATIONS: z.coerce.number().int().positive().default(3),
  CONCURRENCY: z.coerce.number().int().positive().default(4),
  RUN_BUDGET_MS: z.coerce.number().int().positive().optional(),
  AUDIT_WRITE_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
  AUDIT_WRITE_RETRY_MS: z.coerce.number().int().positive().default(250),
  OUTPUT_DIR: z.string().min(1).default("outputs"),
  TRACE_RETENTION_HOURS: z.coerce.number().int().positive().default(24),
  TRACE_FLUSH_BATCH_SIZE: z.coerce.number().int().positive().default(25),
});

export type AppConfig = z.infer<typeof envSchema>;

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${errors}`);
  }

  if (parsed.data.AUDIT_STORE_DRIVER === "postgres" && !parsed.data.DATABASE_URL) {
    throw new Error(
      "Invalid environment configuration: DATABASE_URL is required when AUDIT_STORE_DRIVER is postgres",
    );
  }

  if (parsed.data.MODEL_RETRY_BASE_MS > parsed.data.MODEL_RETRY_MAX_MS) {
    throw new Error(
      `Invalid environment configuration: MODEL_RETRY_BASE_MS (${parsed.data.MODEL_RETRY_BASE_MS}) must be <= MODEL_RETRY_MAX_MS (${parsed.data.MODEL_RETRY_MAX_MS})`,
    );
  }

  if (parsed.data.MODEL_TIMEOUT_MS > parsed.data.MODEL_TIER_TIMEOUT_MS) {
    throw new Error(
      `Invalid environment configuration: MODEL_TIMEOUT_MS (${parsed.data.MODEL_TIMEOUT_MS}) must be <= MODEL_TIER_TIMEOUT_MS (${parsed.data.MODEL_TIER_TIMEOUT_MS})`,
    );
  }

  if (parsed.data.MAX_ITERATIONS > 10) {
    throw new Error(
      `Invalid environment configuration: MAX_ITERATIONS (${parsed.data.MAX_ITERATIONS}) must be <= 10.`,
    );
  }

  cachedConfig = parsed.data;
  return parsed.data;
}

/** Thresholds and targets recorded on the run row for reproducibility. */
export function toConfigSnapshot(config: AppConfig): Record<string, unknown> {
  return {
    audit_store_driver: config.AUDIT_STORE_DRIVER,
    ai_enabled: config.AI_ENABLED,
    models: {
      primary: config.MODEL_PRIMARY,
      secondary: config.MODEL_SECONDARY,
      tertiary: config.MODEL_TERTIARY,
    },
    model_timeout_ms: config.MODEL_TIMEOUT_MS,
    model_tier_timeout_ms: config.MODEL_TIER_TIMEOUT_MS,
    ai_confidence_threshold: config.AI_CONFIDENCE_THRESHOLD,
    ai_skip_when_rules_sufficient: config.AI_SKIP_WHEN_RULES_SUFFICIENT,
    rule_sufficient_min_tags: config.RULE_SUFFICIENT_MIN_TAGS,
    recovery_enabled: config.RECOVERY_ENABLED,
    accuracy_target: config.ACCURACY_TARGET,
    max_iterations: config.MAX_ITERATIONS,
    concurrency: config.CONCURRENCY,
    run_budget_ms: config.RUN_BUDGET_MS ?? null,
  };
}
