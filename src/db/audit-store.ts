import {
  UNKNOWN_CATEGORY,
  type AccuracyReport,
  type AuditRecord,
  type ModelUsed,
  type RunLogRow,
  type RunRecord,
  type RunStatus,
  type TaggingAttempt,
} from "../types.js";
import { backoffDelayMs, delay } from "../utils/async.js";
import { toErrorMessage } from "../utils/text.js";

export interface AppendInput {
  runId: string;
  handle: string;
  passNumber: number;
  attempt: TaggingAttempt;
  title: string;
  bodyExcerpt: string;
}

/**
 * Durable, append-only log of tagging decisions. Rows are keyed by
 * (run_id, handle, pass_number) and never updated; readers always use the
 * highest pass per handle.
 */
export interface AuditStore {
  startRun(configSnapshot: Record<string, unknown>): Promise<string>;
  append(input: AppendInput): Promise<void>;
  latestAccuracy(runId: string): Promise<AccuracyReport>;
  latestRecords(runId: string): Promise<AuditRecord[]>;
  completeRun(runId: string, status: RunStatus, summary: Record<string, unknown>): Promise<void>;
  getRun(runId: string): Promise<RunRecord | null>;
  insertRunLogs(rows: RunLogRow[]): Promise<void>;
  /** Deletes run log rows past their retention; returns the count removed. */
  purgeExpiredLogs(): Promise<number>;
  close(): Promise<void>;
}

export class AuditWriteError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuditWriteError";
    this.attempts = attempts;
  }
}

export interface WriteRetryPolicy {
  maxRetries: number;
  retryBaseMs: number;
}

export async function withWriteRetry<T>(
  label: string,
  policy: WriteRetryPolicy,
  operation: () => Promise<T>,
): Promise<T> {
  const totalAttempts = policy.maxRetries + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < totalAttempts) {
        await delay(backoffDelayMs(attempt, policy.retryBaseMs, policy.retryBaseMs * 8));
      }
    }
  }

  throw new AuditWriteError(
    `${label} failed after ${totalAttempts} attempt(s): ${toErrorMessage(lastError)}`,
    totalAttempts,
    { cause: lastError },
  );
}

export function isAccurate(record: TaggingAttempt): boolean {
  return (
    record.finalTags.length > 0 && !record.needsManualReview && record.validationFailures.length === 0
  );
}

export function computeAccuracy(latestRecords: readonly AuditRecord[]): AccuracyReport {
  const totals = new Map<string, { total: number; accurate: number }>();
  let accurate = 0;

  for (const record of latestRecords) {
    const category = record.detectedCategory ?? UNKNOWN_CATEGORY;
    const bucket = totals.get(category) ?? { total: 0, accurate: 0 };
    bucket.total += 1;
    if (isAccurate(record)) {
      bucket.accurate += 1;
      accurate += 1;
    }
    totals.set(category, bucket);
  }

  const perCategory: Record<string, number> = {};
  for (const [category, bucket] of [...totals.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    perCategory[category] = bucket.total > 0 ? bucket.accurate / bucket.total : 0;
  }

  return {
    overall: latestRecords.length > 0 ? accurate / latestRecords.length : 0,
    perCategory,
    total: latestRecords.length,
    accurate,
  };
}

const MODEL_USED_VALUES: readonly ModelUsed[] = ["none", "primary", "secondary", "tertiary", "recovery"];

function parseStringArray(value: unknown): string[] {
  const decoded: unknown = typeof value === "string" ? JSON.parse(value) : value;
  if (!Array.isArray(decoded)) {
    return [];
  }
  return decoded.filter((entry): entry is string => typeof entry === "string");
}

export function parseJsonObject(value: unknown): Record<string, unknown> {
  const decoded: unknown = typeof value === "string" ? JSON.parse(value) : value;
  if (typeof decoded === "object" && decoded !== null && !Array.isArray(decoded)) {
    return Object.fromEntries(Object.entries(decoded));
  }
  return {};
}

function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toIsoString(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value ?? "");
}

function toModelUsed(value: unknown): ModelUsed {
  return MODEL_USED_VALUES.find((candidate) => candidate === value) ?? "none";
}

/** Row shape shared by both SQL drivers before column decoding. */
export interface ProductAuditRow {
  run_id: string;
  handle: string;
  pass_number: number | string;
  title: string | null;
  body_excerpt: string | null;
  category: string | null;
  rule_tags_json: unknown;
  ai_tags_json: unknown;
  secondary_tags_json: unknown;
  final_tags_json: unknown;
  confidence: unknown;
  model_used: unknown;
  needs_manual_review: boolean | number;
  failure_reasons_json: unknown;
  reasoning: string | null;
  processed_at: unknown;
}

export function mapProductAuditRow(row: ProductAuditRow): AuditRecord {
  return {
    runId: row.run_id,
    handle: row.handle,
    passNumber: Number(row.pass_number),
    title: row.title ?? "",
    bodyExcerpt: row.body_excerpt ?? "",
    detectedCategory: row.category,
    ruleTags: parseStringArray(row.rule_tags_json),
    aiTags: parseStringArray(row.ai_tags_json),
    secondaryTags: parseStringArray(row.secondary_tags_json),
    finalTags: parseStringArray(row.final_tags_json),
    confidence: toNullableNumber(row.confidence),
    modelUsed: toModelUsed(row.model_used),
    needsManualReview: row.needs_manual_review === true || row.needs_manual_review === 1,
    validationFailures: parseStringArray(row.failure_reasons_json),
    reasoning: row.reasoning,
    processedAt: toIsoString(row.processed_at),
  };
}

export const RUN_STATUSES: readonly RunStatus[] = ["running", "completed", "target_missed", "failed"];

export function toRunStatus(value: unknown): RunStatus {
  return RUN_STATUSES.find((candidate) => candidate === value) ?? "running";
}
