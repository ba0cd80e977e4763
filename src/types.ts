export type RunLogLevel = "debug" | "info" | "warn" | "error";

export interface RunLogRow {
  runId: string;
  seq: number;
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload: Record<string, unknown>;
  timestamp: string;
  expiresAt: string;
}

export const UNKNOWN_CATEGORY = "UNKNOWN";

export type ModelTier = "primary" | "secondary" | "tertiary";
export type ModelUsed = "none" | ModelTier | "recovery";

export interface EnumDimension {
  kind: "enum";
  name: string;
  tags: readonly string[];
  appliesTo: readonly string[];
}

export interface RangeDimension {
  kind: "range";
  name: string;
  min: number;
  max: number;
  unit: string;
  appliesTo: readonly string[];
}

export type TagDimension = EnumDimension | RangeDimension;

export type KeywordScope = "title" | "title_then_body" | "all";

export interface KeywordRule {
  tag: string;
  includeAny: readonly string[];
  excludeAny: readonly string[];
}

export interface KeywordDimensionRules {
  mode: "first" | "all";
  scope: KeywordScope;
  rules: readonly KeywordRule[];
}

export interface NumericExtractionRule {
  mode: "first" | "all";
  scope: KeywordScope;
}

export interface CategoryDetectionRule {
  category: string;
  includeAny: readonly string[];
  excludeAny: readonly string[];
  patterns: readonly RegExp[];
}

export interface ApprovedTagSchema {
  version: string;
  categories: readonly string[];
  dimensions: readonly TagDimension[];
  requiredDimensions: Readonly<Record<string, readonly string[]>>;
  detectionRules: readonly CategoryDetectionRule[];
  keywordRules: Readonly<Record<string, KeywordDimensionRules>>;
  numericRules: Readonly<Record<string, NumericExtractionRule>>;
  secondaryFlavours: readonly string[];
}

export interface Product {
  readonly handle: string;
  readonly title: string;
  readonly body: string;
  readonly vendor: string;
  readonly existingType: string;
  readonly existingTags: string;
  readonly source: Readonly<Record<string, string>>;
}

export interface TaggingAttempt {
  detectedCategory: string | null;
  ruleTags: string[];
  aiTags: string[];
  secondaryTags: string[];
  confidence: number | null;
  modelUsed: ModelUsed;
  validationFailures: string[];
  finalTags: string[];
  needsManualReview: boolean;
  reasoning: string | null;
}

export interface AuditRecord extends TaggingAttempt {
  runId: string;
  handle: string;
  passNumber: number;
  title: string;
  bodyExcerpt: string;
  processedAt: string;
}

export interface AccuracyReport {
  overall: number;
  perCategory: Record<string, number>;
  total: number;
  accurate: number;
}

export type RunStatus = "running" | "completed" | "target_missed" | "failed";

export interface RunRecord {
  runId: string;
  startedAt: string;
  completedAt: string | null;
  status: RunStatus;
  configSnapshot: Record<string, unknown>;
  summary: Record<string, unknown>;
}

export interface ModelCompletion {
  text: string;
  confidence: number;
}

export interface ModelCompletionOptions {
  temperature?: number;
}

/** Adapter over one model-serving endpoint. */
export interface ModelClient {
  readonly name: string;
  complete(prompt: string, options?: ModelCompletionOptions): Promise<ModelCompletion>;
}

export interface ModelTierClient {
  tier: ModelTier;
  client: ModelClient;
}
