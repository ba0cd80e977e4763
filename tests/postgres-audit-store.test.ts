import { beforeEach, describe, expect, it, vi } from "vitest";

const mockState = vi.hoisted(() => {
  const queries: Array<{ text: string; values: unknown[] }> = [];
  const productRows: Array<Record<string, unknown>> = [];
  const runRows: Array<Record<string, unknown>> = [];
  return { queries, failNextInserts: 0, productRows, runRows, closed: 0 };
});

vi.mock("../src/db/client.js", () => ({
  getPool: () => ({
    query: async (text: string, values: unknown[] = []) => {
      mockState.queries.push({ text, values });

      if (text.includes("INSERT INTO tagging_runs")) {
        return { rows: [{ run_id: "run-123" }], rowCount: 1 };
      }
      if (text.includes("INSERT INTO tagged_products")) {
        if (mockState.failNextInserts > 0) {
          mockState.failNextInserts -= 1;
          throw new Error("connection terminated unexpectedly");
        }
        return { rows: [], rowCount: 1 };
      }
      if (text.includes("FROM tagged_products")) {
        return { rows: mockState.productRows, rowCount: mockState.productRows.length };
      }
      if (text.includes("FROM tagging_runs")) {
        return { rows: mockState.runRows, rowCount: mockState.runRows.length };
      }
      if (text.includes("DELETE FROM tagging_run_logs")) {
        return { rows: [], rowCount: 3 };
      }
      return { rows: [], rowCount: 0 };
    },
  }),
  closePool: async () => {
    mockState.closed += 1;
  },
}));

import { PostgresAuditStore } from "../src/db/postgres-audit-store.js";
import { emptyAttempt } from "../src/pipeline/product-tagging.js";

describe("PostgresAuditStore", () => {
  beforeEach(() => {
    mockState.queries = [];
    mockState.failNextInserts = 0;
    mockState.productRows = [];
    mockState.runRows = [];
    mockState.closed = 0;
  });

  it("creates runs and returns the generated id", async () => {
    const store = new PostgresAuditStore({ maxRetries: 0, retryBaseMs: 1 });

    const runId = await store.startRun({ accuracy_target: 0.9 });

    expect(runId).toBe("run-123");
    expect(mockState.queries[0].values).toEqual(['{"accuracy_target":0.9}']);
  });

  it("retries a failed product insert", async () => {
    mockState.failNextInserts = 1;
    const store = new PostgresAuditStore({ maxRetries: 1, retryBaseMs: 1 });

    await store.append({
      runId: "run-123",
      handle: "disposable-vape-25mg",
      passNumber: 0,
      attempt: emptyAttempt({
        detectedCategory: "disposable",
        finalTags: ["disposable"],
        validationFailures: ["nicotine exceeds legal maximum"],
        needsManualReview: true,
      }),
      title: "Disposable Vape 25mg",
      bodyExcerpt: "",
    });

    const inserts = mockState.queries.filter((entry) => entry.text.includes("INSERT INTO tagged_products"));
    expect(inserts).toHaveLength(2);
    expect(inserts[1].values.slice(0, 3)).toEqual(["run-123", "disposable-vape-25mg", 0]);
    expect(inserts[1].values[12]).toBe(true);
    expect(inserts[1].values[13]).toBe('["nicotine exceeds legal maximum"]');
  });

  it("reads the latest pass per handle with DISTINCT ON", async () => {
    mockState.productRows = [
      {
        run_id: "run-123",
        handle: "strawberry-ice-50ml-shortfill",
        pass_number: 1,
        title: "Strawberry Ice 50ml Shortfill 70/30",
        body_excerpt: "",
        category: "e-liquid",
        rule_tags_json: ["70/30", "50ml"],
        ai_tags_json: ["fruity"],
        secondary_tags_json: ["strawberry"],
        final_tags_json: ["e-liquid", "70/30", "50ml", "fruity"],
        confidence: 0.91,
        model_used: "primary",
        needs_manual_review: false,
        failure_reasons_json: [],
        reasoning: "explicit in title",
        processed_at: new Date("2026-03-01T10:00:00.000Z"),
      },
    ];
    const store = new PostgresAuditStore({ maxRetries: 0, retryBaseMs: 1 });

    const accuracy = await store.latestAccuracy("run-123");

    expect(mockState.queries[0].text).toContain("SELECT DISTINCT ON (handle) *");
    expect(mockState.queries[0].values).toEqual(["run-123"]);
    expect(accuracy).toEqual({ overall: 1, perCategory: { "e-liquid": 1 }, total: 1, accurate: 1 });
  });

  it("writes run logs as one multi-row insert", async () => {
    const store = new PostgresAuditStore({ maxRetries: 0, retryBaseMs: 1 });
    const row = {
      runId: "run-123",
      level: "info" as const,
      stage: "pipeline",
      event: "run.started",
      message: "Tagging run started.",
      payload: { product_count: 2 },
      timestamp: "2026-03-01T10:00:00.000Z",
      expiresAt: "2026-03-02T10:00:00.000Z",
    };

    await store.insertRunLogs([
      { ...row, seq: 1 },
      { ...row, seq: 2 },
    ]);

    expect(mockState.queries).toHaveLength(1);
    expect(mockState.queries[0].text).toContain("($10, $11, $12, $13, $14, $15, $16::jsonb, $17, $18)");
    expect(mockState.queries[0].text).toContain("ON CONFLICT (run_id, seq) DO NOTHING");
    expect(mockState.queries[0].values).toHaveLength(18);
    expect(mockState.queries[0].values[6]).toBe('{"product_count":2}');
  });

  it("maps run rows and reports purge counts", async () => {
    mockState.runRows = [
      {
        run_id: "run-123",
        started_at: new Date("2026-03-01T10:00:00.000Z"),
        completed_at: null,
        status: "completed",
        config_jsonb: { accuracy_target: 0.9 },
        summary_jsonb: {},
      },
    ];
    const store = new PostgresAuditStore({ maxRetries: 0, retryBaseMs: 1 });

    expect(await store.getRun("run-123")).toEqual({
      runId: "run-123",
      startedAt: "2026-03-01T10:00:00.000Z",
      completedAt: null,
      status: "completed",
      configSnapshot: { accuracy_target: 0.9 },
      summary: {},
    });
    expect(await store.purgeExpiredLogs()).toBe(3);

    await store.close();
    expect(mockState.closed).toBe(1);
  });
});
