import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { AccuracyReport, AuditRecord, RunLogRow, RunRecord, RunStatus } from "../types.js";
import {
  computeAccuracy,
  mapProductAuditRow,
  parseJsonObject,
  toRunStatus,
  withWriteRetry,
  type AppendInput,
  type AuditStore,
  type ProductAuditRow,
  type WriteRetryPolicy,
} from "./audit-store.js";
import { runSqliteMigrations } from "./migrate.js";

interface RunRow {
  run_id: string;
  started_at: string;
  completed_at: string | null;
  status: string;
  config_json: string;
  summary_json: string;
}

const LATEST_PRODUCTS_SQL = `
  SELECT p.*
  FROM products p
  JOIN (
    SELECT handle, MAX(pass_number) AS pass_number
    FROM products
    WHERE run_id = ?
    GROUP BY handle
  ) latest ON latest.handle = p.handle AND latest.pass_number = p.pass_number
  WHERE p.run_id = ?
  ORDER BY p.handle
`;

/** Embedded audit store backed by a single SQLite file (or ":memory:"). */
export class SqliteAuditStore implements AuditStore {
  readonly appliedMigrations: string[];

  private constructor(
    private readonly db: Database.Database,
    private readonly retryPolicy: WriteRetryPolicy,
    private readonly now: () => Date,
  ) {
    this.appliedMigrations = runSqliteMigrations(db);
  }

  static open(
    filePath: string,
    retryPolicy: WriteRetryPolicy,
    now: () => Date = () => new Date(),
  ): SqliteAuditStore {
    if (filePath !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    const db = new Database(filePath);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    return new SqliteAuditStore(db, retryPolicy, now);
  }

  async startRun(configSnapshot: Record<string, unknown>): Promise<string> {
    const runId = randomUUID();
    await withWriteRetry("startRun", this.retryPolicy, async () => {
      this.db
        .prepare("INSERT INTO runs (run_id, started_at, status, config_json) VALUES (?, ?, 'running', ?)")
        .run(runId, this.now().toISOString(), JSON.stringify(configSnapshot));
    });
    return runId;
  }

  async append(input: AppendInput): Promise<void> {
    const { attempt } = input;
    await withWriteRetry(`append ${input.handle}#${input.passNumber}`, this.retryPolicy, async () => {
      this.db
        .prepare(
          `
            INSERT INTO products (
              run_id, handle, pass_number, title, body_excerpt, category,
              rule_tags_json, ai_tags_json, secondary_tags_json, final_tags_json,
              confidence, model_used, needs_manual_review, failure_reasons_json,
              reasoning, processed_at
            )
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          `,
        )
        .run(
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
          attempt.needsManualReview ? 1 : 0,
          JSON.stringify(attempt.validationFailures),
          attempt.reasoning,
          this.now().toISOString(),
        );
    });
  }

  async latestRecords(runId: string): Promise<AuditRecord[]> {
    return this.db
      .prepare<[string, string], ProductAuditRow>(LATEST_PRODUCTS_SQL)
      .all(runId, runId)
      .map(mapProductAuditRow);
  }

  async latestAccuracy(runId: string): Promise<AccuracyReport> {
    return computeAccuracy(await this.latestRecords(runId));
  }

  async completeRun(runId: string, status: RunStatus, summary: Record<string, unknown>): Promise<void> {
    await withWriteRetry("completeRun", this.retryPolicy, async () => {
      this.db
        .prepare("UPDATE runs SET status = ?, completed_at = ?, summary_json = ? WHERE run_id = ?")
        .run(status, this.now().toISOString(), JSON.stringify(summary), runId);
    });
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    if (!row) {
      return null;
    }
    return {
      runId: row.run_id,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      status: toRunStatus(row.status),
      configSnapshot: parseJsonObject(row.config_json),
      summary: parseJsonObject(row.summary_json),
    };
  }

  async insertRunLogs(rows: RunLogRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const insert = this.db.prepare(
      `
        INSERT OR IGNORE INTO run_logs (
          run_id, seq, level, stage, event, message, payload_json, created_at, expires_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
    );
    const insertAll = this.db.transaction((batch: RunLogRow[]) => {
      for (const row of batch) {
        insert.run(
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
      }
    });
    insertAll(rows);
  }

  async purgeExpiredLogs(): Promise<number> {
    return this.db.prepare("DELETE FROM run_logs WHERE expires_at < ?").run(this.now().toISOString()).changes;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
