import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { isAccurate } from "../db/audit-store.js";
import type { AuditRecord } from "../types.js";
import { stringifyCsv } from "./export.js";

export const TRAINING_COLUMNS = [
  "handle",
  "input_text",
  "expected_tags",
  "category",
  "confidence",
  "rule_tags",
  "ai_tags",
] as const;

export interface TrainingExample {
  handle: string;
  inputText: string;
  expectedTags: string[];
  category: string;
  confidence: number | null;
  ruleTags: string[];
  aiTags: string[];
}

export function buildInputText(record: Pick<AuditRecord, "title" | "bodyExcerpt">): string {
  const lines = [`Title: ${record.title}`];
  if (record.bodyExcerpt) {
    lines.push(`Description: ${record.bodyExcerpt}`);
  }
  return lines.join("\n");
}

/**
 * Accurate latest-pass records become supervised examples. Rule-only records
 * carry no model confidence and always pass the confidence floor.
 */
export function selectTrainingExamples(
  latestRecords: readonly AuditRecord[],
  minConfidence = 0,
): TrainingExample[] {
  const seen = new Set<string>();
  const examples: TrainingExample[] = [];

  for (const record of latestRecords) {
    if (seen.has(record.handle) || !isAccurate(record) || !record.detectedCategory) {
      continue;
    }
    if (record.confidence !== null && record.confidence < minConfidence) {
      continue;
    }
    seen.add(record.handle);
    examples.push({
      handle: record.handle,
      inputText: buildInputText(record),
      expectedTags: record.finalTags,
      category: record.detectedCategory,
      confidence: record.confidence,
      ruleTags: record.ruleTags,
      aiTags: record.aiTags,
    });
  }

  return examples;
}

export function trainingExamplesToCsv(examples: readonly TrainingExample[]): string {
  return stringifyCsv(
    TRAINING_COLUMNS,
    examples.map((example) => ({
      handle: example.handle,
      input_text: example.inputText,
      expected_tags: example.expectedTags.join(", "),
      category: example.category,
      confidence: example.confidence === null ? "" : example.confidence.toFixed(2),
      rule_tags: example.ruleTags.join(", "),
      ai_tags: example.aiTags.join(", "),
    })),
  );
}

export async function writeTrainingExport(filePath: string, examples: readonly TrainingExample[]): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, trainingExamplesToCsv(examples), "utf8");
}
