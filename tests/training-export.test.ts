import { describe, expect, it } from "vitest";
import {
  buildInputText,
  selectTrainingExamples,
  trainingExamplesToCsv,
} from "../src/pipeline/training-export.js";
import { makeRecord } from "./support.js";

const accurateRuleOnly = makeRecord({
  handle: "cbd-gummies-1000mg",
  title: "CBD Gummies 1000mg",
  bodyExcerpt: "Full spectrum",
  detectedCategory: "CBD",
  ruleTags: ["1000mg", "gummy", "full_spectrum"],
  finalTags: ["CBD", "1000mg", "gummy", "full_spectrum"],
});

const accurateModel = makeRecord({
  handle: "blue-razz-3500puffs",
  title: "Blue Razz 3500puffs",
  detectedCategory: "disposable",
  aiTags: ["20mg", "fruity"],
  finalTags: ["disposable", "20mg", "fruity"],
  confidence: 0.75,
  modelUsed: "primary",
});

const review = makeRecord({
  handle: "disposable-vape-25mg",
  detectedCategory: "disposable",
  finalTags: ["disposable"],
  needsManualReview: true,
  validationFailures: ["nicotine exceeds legal maximum"],
});

describe("training export", () => {
  it("builds the model input from title and excerpt", () => {
    expect(buildInputText({ title: "CBD Gummies 1000mg", bodyExcerpt: "Full spectrum" })).toBe(
      "Title: CBD Gummies 1000mg\nDescription: Full spectrum",
    );
    expect(buildInputText({ title: "Gift Card", bodyExcerpt: "" })).toBe("Title: Gift Card");
  });

  it("keeps accurate records above the confidence floor", () => {
    const examples = selectTrainingExamples([accurateRuleOnly, accurateModel, review, accurateRuleOnly], 0.8);

    expect(examples.map((example) => example.handle)).toEqual(["cbd-gummies-1000mg"]);
    expect(selectTrainingExamples([accurateModel, review]).map((example) => example.handle)).toEqual([
      "blue-razz-3500puffs",
    ]);
  });

  it("renders examples as CSV", () => {
    const csv = trainingExamplesToCsv(selectTrainingExamples([accurateRuleOnly, accurateModel]));

    expect(csv.split("\n")).toEqual([
      "handle,input_text,expected_tags,category,confidence,rule_tags,ai_tags",
      'cbd-gummies-1000mg,"Title: CBD Gummies 1000mg',
      'Description: Full spectrum","CBD, 1000mg, gummy, full_spectrum",CBD,,"1000mg, gummy, full_spectrum",',
      'blue-razz-3500puffs,Title: Blue Razz 3500puffs,"disposable, 20mg, fruity",disposable,0.75,,"20mg, fruity"',
    ]);
  });
});
