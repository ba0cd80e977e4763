import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { BucketEntry, TaggingBuckets } from "./orchestrator.js";

export const FAILURE_REASON_SEPARATOR = "; ";

export interface BucketExportPaths {
  clean: string;
  review: string;
  untagged: string;
}

export function escapeCsv(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyCsv(headers: readonly string[], rows: ReadonlyArray<Record<string, string>>): string {
  const lines = rows.map((row) => headers.map((header) => escapeCsv(row[header] ?? "")).join(","));
  return [headers.map(escapeCsv).join(","), ...lines].join("\n");
}

/** 2026-03-04T05:06:07.890Z -> 20260304_050607 */
export function exportTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d+Z$/, "")
    .replace(/[-:]/g, "")
    .replace("T", "_");
}

function withAddedColumns(sourceColumns: readonly string[], added: readonly string[]): string[] {
  return [...sourceColumns.filter((column) => !added.includes(column)), ...added];
}

function formatConfidence(confidence: number | null): string {
  return confidence === null ? "" : confidence.toFixed(2);
}

const CLEAN_COLUMNS = ["Final Tags", "Category"];
const REVIEW_COLUMNS = [
  "Final Tags",
  "Category",
  "Needs Manual Review",
  "AI Confidence",
  "Model Used",
  "Failure Reasons",
];
const UNTAGGED_COLUMNS = ["Failure Reasons"];

function cleanRow({ product, record }: BucketEntry): Record<string, string> {
  return {
    ...product.source,
    "Final Tags": record.finalTags.join(", "),
    Category: record.detectedCategory ?? "",
  };
}

function reviewRow({ product, record }: BucketEntry): Record<string, string> {
  return {
    ...product.source,
    "Final Tags": record.finalTags.join(", "),
    Category: record.detectedCategory ?? "",
    "Needs Manual Review": "YES",
    "AI Confidence": formatConfidence(record.confidence),
    "Model Used": record.modelUsed,
    "Failure Reasons": record.validationFailures.join(FAILURE_REASON_SEPARATOR),
  };
}

function untaggedRow({ product, record }: BucketEntry): Record<string, string> {
  return {
    ...product.source,
    "Failure Reasons": record.validationFailures.join(FAILURE_REASON_SEPARATOR),
  };
}

/** Writes all three bucket files, empty ones included. */
export async function writeBucketExports(input: {
  outputDir: string;
  sourceColumns: readonly string[];
  buckets: TaggingBuckets;
  generatedAt: Date;
}): Promise<BucketExportPaths> {
  await mkdir(input.outputDir, { recursive: true });
  const prefix = exportTimestamp(input.generatedAt);

  const paths: BucketExportPaths = {
    clean: path.join(input.outputDir, `${prefix}_tagged_clean.csv`),
    review: path.join(input.outputDir, `${prefix}_tagged_review.csv`),
    untagged: path.join(input.outputDir, `${prefix}_untagged.csv`),
  };

  await Promise.all([
    writeFile(
      paths.clean,
      stringifyCsv(withAddedColumns(input.sourceColumns, CLEAN_COLUMNS), input.buckets.clean.map(cleanRow)),
      "utf8",
    ),
    writeFile(
      paths.review,
      stringifyCsv(withAddedColumns(input.sourceColumns, REVIEW_COLUMNS), input.buckets.review.map(reviewRow)),
      "utf8",
    ),
    writeFile(
      paths.untagged,
      stringifyCsv(
        withAddedColumns(input.sourceColumns, UNTAGGED_COLUMNS),
        input.buckets.untagged.map(untaggedRow),
      ),
      "utf8",
    ),
  ]);

  return paths;
}
