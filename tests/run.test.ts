import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteAuditStore } from "../src/db/sqlite-audit-store.js";
import { runTaggingPipeline } from "../src/pipeline/run.js";
import { ScriptedModelClient, tagResponse } from "./support.js";

const GENERATED_AT = new Date("2026-03-04T05:06:07.890Z");

const CATALOG = [
  "Handle,Title,Vendor",
  "cbd-gummies-1000mg,CBD Gummies 1000mg Full Spectrum,Leafy",
  "strawberry-ice-50ml-shortfill,Strawberry Ice 50ml Shortfill 70/30,Cloudco",
  "disposable-vape-25mg,Disposable Vape 25mg,Puffco",
  "gift-card,Gift Card,",
].join("\n");

describe("runTaggingPipeline", () => {
  let store: SqliteAuditStore;
  let workDir: string;

  beforeEach(async () => {
    store = SqliteAuditStore.open(":memory:", { maxRetries: 0, retryBaseMs: 1 }, () => GENERATED_AT);
    workDir = await mkdtemp(path.join(os.tmpdir(), "tag-run-"));
  });

  afterEach(async () => {
    await store.close();
  });

  it("tags a catalog, audits every pass and writes the buckets", async () => {
    const inputPath = path.join(workDir, "catalog.csv");
    await writeFile(inputPath, CATALOG, "utf8");
    const primary = new ScriptedModelClient("primary-model", [tagResponse(["20mg"], 0.9)]);

    const summary = await runTaggingPipeline({
      inputPath,
      outputDir: path.join(workDir, "out"),
      accuracyTarget: 0.9,
      maxIterations: 2,
      aiEnabled: true,
      store,
      modelTiers: [{ tier: "primary", client: primary }],
      now: () => GENERATED_AT,
    });

    expect(summary).toMatchObject({
      inputFileName: "catalog.csv",
      productCount: 4,
      stopReason: "max_iterations",
      targetMet: false,
      accuracyTarget: 0.9,
      overallAccuracy: 0.5,
      perCategoryAccuracy: { CBD: 1, "e-liquid": 1, disposable: 0, UNKNOWN: 0 },
      passes: [
        { passNumber: 0, attempted: 4, skippedForBudget: 0, overall: 0.5 },
        { passNumber: 1, attempted: 2, skippedForBudget: 0, overall: 0.5 },
      ],
      counts: { clean: 2, review: 1, untagged: 1 },
    });
    expect(primary.calls).toHaveLength(2);

    const run = await store.getRun(summary.runId);
    expect(run?.status).toBe("target_missed");
    expect(run?.configSnapshot).toMatchObject({ input_file_name: "catalog.csv", max_iterations: 2 });

    expect(summary.exports.review).toBe(path.join(workDir, "out", "20260304_050607_tagged_review.csv"));
    expect(await readFile(summary.exports.review, "utf8")).toBe(
      [
        "Handle,Title,Vendor,Final Tags,Category,Needs Manual Review,AI Confidence,Model Used,Failure Reasons",
        'disposable-vape-25mg,Disposable Vape 25mg,Puffco,"disposable, 20mg",disposable,YES,0.90,primary,nicotine exceeds legal maximum',
      ].join("\n"),
    );
    expect(await readFile(summary.exports.untagged, "utf8")).toBe(
      ["Handle,Title,Vendor,Failure Reasons", "gift-card,Gift Card,,category not detected"].join("\n"),
    );
  });

  it("runs rules only when AI is disabled", async () => {
    const inputPath = path.join(workDir, "catalog.csv");
    await writeFile(inputPath, CATALOG, "utf8");
    const primary = new ScriptedModelClient("primary-model", [tagResponse(["20mg"], 0.9)]);

    const summary = await runTaggingPipeline({
      inputPath,
      outputDir: path.join(workDir, "out"),
      maxIterations: 1,
      aiEnabled: false,
      store,
      modelTiers: [{ tier: "primary", client: primary }],
      now: () => GENERATED_AT,
    });

    expect(primary.calls).toHaveLength(0);
    expect(summary.passes).toHaveLength(1);
    expect(summary.counts).toEqual({ clean: 2, review: 1, untagged: 1 });

    const latest = await store.latestRecords(summary.runId);
    const disposable = latest.find((record) => record.handle === "disposable-vape-25mg");
    expect(disposable?.finalTags).toEqual(["disposable"]);
    expect(disposable?.modelUsed).toBe("none");
  });

  it("writes header-only exports for a catalog without products", async () => {
    const inputPath = path.join(workDir, "empty.csv");
    await writeFile(inputPath, "Handle,Title\n", "utf8");

    const summary = await runTaggingPipeline({
      inputPath,
      outputDir: path.join(workDir, "out"),
      accuracyTarget: 0.9,
      maxIterations: 3,
      aiEnabled: false,
      store,
      now: () => GENERATED_AT,
    });

    expect(summary).toMatchObject({
      productCount: 0,
      stopReason: "nothing_to_retry",
      targetMet: false,
      overallAccuracy: 0,
      counts: { clean: 0, review: 0, untagged: 0 },
    });
    expect((await store.getRun(summary.runId))?.status).toBe("target_missed");
    expect(await readFile(summary.exports.clean, "utf8")).toBe("Handle,Title,Final Tags,Category");
    expect(await readFile(summary.exports.review, "utf8")).toBe(
      "Handle,Title,Final Tags,Category,Needs Manual Review,AI Confidence,Model Used,Failure Reasons",
    );
    expect(await readFile(summary.exports.untagged, "utf8")).toBe("Handle,Title,Failure Reasons");
  });
});
