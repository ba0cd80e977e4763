import type { AccuracyReport, AuditRecord, RunLogRow, RunRecord, RunStatus } from "../types.js";
import {
  computeAccuracy,
  mapProductAuditRow,
  parseJsonObject,
  toIsoString,
  toRunStatus,
  withWriteRetry,
  type AppendInput,
  type AuditStore,
  type ProductAuditRow,
  type WriteRetryPolicy,
} from "./audit-store.js";
import { closePool, getPool } from "./client.js";

interface RunRow {
  run_id: string;
  started_at: Date | string;
  completed_at: Date | string | null;
  status: string;
  config_jsonb: unknown;
  summary_jsonb: unknown;
}

/** Shared audit store for multi-host deployments; tables come from the migrate CLI. */
export class PostgresAuditStore implements AuditStore {
  constructor(private readonly retryPolicy: WriteRetryPolicy) {}

  private get pool() {
    return getPool();
  }

  async startRun(configSnapshot: Record<string, unknown>): Promise<string> {
    return withWriteRetry("startRun", this.retryPolicy, async () => {
      const result = await this.pool.query<{ run_id: string }>(
        `
          INSERT INTO tagging_runs (status, config_jsonb)
          VALUES ('running', $1::jsonb)
          RETURNING run_id
        `,
        [JSON.stringify(configSnapshot)],
      );
      return result.rows[0].run_id;
    });
  }

  async append(input: AppendInput): Promise<void> {
    const { attempt } = input;
    await withWriteRetry(`append ${input.handle}#${input.passNumber}`, this.retryPolicy, async () => {
      await this.pool.query(
        `
          INSERT INTO tagged_products (
            run_id, handle, pass_number, title, body_excerpt, category,
            rule_tags_json, ai_tags_json, secondary_tags_json, final_tags_json,
            confidence, model_used, needs_manual_review, failure_reasons_json, reasoning
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb, $9::jsonb, $10::jsonb, $11, $12, $13, $14::jsonb, $15)
        `,
        [
          input.runId,
          input.handle,
          input.passNumber,
          input.title,
          input.bodyExcerpt,
          attempt.detectedCategory,
          JSON.stringify(attempt.ruleTags),
          JSON.stringify(attempt.aiTags),
          JSON.stringify(attempt.secondaryTags),
          JSON.stringify(attempt.finalTags),
          attempt.confidence,
          attempt.modelUsed,
          attempt.needsManualReview,
          JSON.stringify(attempt.validationFailures),
          attempt.reasoning,
        ],
      );
    });
  }

  async latestRecords(runId: string): Promise<AuditRecord[]> {
    const result = await this.pool.query<ProductAuditRow>(
      `
        SELECT DISTINCT ON (handle) *
        FROM tagged_products
        WHERE run_id = $1
        ORDER BY handle, pass_number DESC
      `,
      [runId],
    );
    return result.rows.map(mapProductAuditRow);
  }

  async latestAccuracy(runId: string): Promise<AccuracyReport> {
    return computeAccuracy(await this.latestRecords(runId));
  }

  async completeRun(runId: string, status: RunStatus, summary: Record<string, unknown>): Promise<void> {
    await withWriteRetry("completeRun", this.retryPolicy, async () => {
      await this.pool.query(
        `
          UPDATE tagging_runs
          SET status = $2,
              completed_at = NOW(),
              summary_jsonb = $3::jsonb
          WHERE run_id = $1
        `,
        [runId, status, JSON.stringify(summary)],
      );
    });
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    const result = await this.pool.query<RunRow>("SELECT * FROM tagging_runs WHERE run_id = $1", [runId]);
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      runId: row.run_id,
      startedAt: toIsoString(row.started_at),
      completedAt: row.completed_at === null ? null : toIsoString(row.completed_at),
      status: toRunStatus(row.status),
      configSnapshot: parseJsonObject(row.config_jsonb),
      summary: parseJsonObject(row.summary_jsonb),
    };
  }

  async insertRunLogs(rows: RunLogRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    const values: unknown[] = [];
    const placeholders: string[] = [];
    let position = 1;
    for (const row of rows) {
      values.push(
        row.runId,
        row.seq,
        row.level,
        row.stage,
        row.event,
        row.message,
        JSON.stringify(row.payload),
        row.timestamp,
        row.expiresAt,
      );
      placeholders.push(
        `($${position}, $${position + 1}, $${position + 2}, $${position + 3}, $${position + 4}, $${position + 5}, $${position + 6}::jsonb, $${position + 7}, $${position + 8})`,
      );
      position += 9;
    }

    await this.pool.query(
      `
        INSERT INTO tagging_run_logs (
          run_id, seq, level, stage, event, message, payload_jsonb, created_at, expires_at
        )
        VALUES ${placeholders.join(", ")}
        ON CONFLICT (run_id, seq) DO NOTHING
      `,
      values,
    );
  }

  async purgeExpiredLogs(): Promise<number> {
    const result = await this.pool.query("DELETE FROM tagging_run_logs WHERE expires_at < NOW()");
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await closePool();
  }
}
