import { describe, expect, it } from "vitest";
import { RECOVERY_TEMPERATURE, RecoveryAdvisor } from "../src/pipeline/recovery.js";
import { TagValidator } from "../src/pipeline/tag-validation.js";
import { loadApprovedTagSchema } from "../src/taxonomy/load.js";
import type { ModelClient } from "../src/types.js";
import { ScriptedModelClient, makeProduct, tagResponse } from "./support.js";

const schema = loadApprovedTagSchema();
const validator = new TagValidator(schema);
const product = makeProduct({ title: "Disposable Vape 25mg" });
const reasons = ["nicotine exceeds legal maximum"];

function advisor(client: ModelClient | null) {
  return new RecoveryAdvisor({ schema, validator, client, timeoutMs: 25 });
}

describe("RecoveryAdvisor", () => {
  it("accepts a corrected tag set that passes validation", async () => {
    const client = new ScriptedModelClient("tertiary-model", [tagResponse(["20mg", "Fruity"], 0.7, "capped at the legal limit")]);

    const result = await advisor(client).recover(product, "disposable", ["disposable", "25mg"], reasons);

    expect(result).toEqual({
      tags: ["disposable", "20mg", "fruity"],
      succeeded: true,
      confidence: 0.7,
      reasoning: "capped at the legal limit",
      failures: [],
    });
    expect(client.calls[0].options).toEqual({ temperature: RECOVERY_TEMPERATURE });
    expect(client.calls[0].prompt).toContain("- nicotine exceeds legal maximum");
    expect(client.calls[0].prompt).toContain("Previously suggested tags: disposable, 25mg");
  });

  it("reports the remaining failures when the correction still fails", async () => {
    const client = new ScriptedModelClient("tertiary-model", [tagResponse(["25mg"], 0.65)]);

    const result = await advisor(client).recover(product, "disposable", ["disposable", "25mg"], reasons);

    expect(result.succeeded).toBe(false);
    expect(result.tags).toEqual(["disposable", "25mg"]);
    expect(result.failures).toEqual(["nicotine exceeds legal maximum"]);
  });

  it("fails without a model client", async () => {
    const result = await advisor(null).recover(product, "disposable", ["disposable", "25mg"], reasons);

    expect(result).toEqual({
      tags: [],
      succeeded: false,
      confidence: null,
      reasoning: null,
      failures: ["nicotine exceeds legal maximum"],
    });
  });

  it("fails on unreadable or timed out responses", async () => {
    const unreadable = new ScriptedModelClient("tertiary-model", [{ text: "cannot help", confidence: 0 }]);
    const hanging = new ScriptedModelClient("tertiary-model", ["hang"]);

    const first = await advisor(unreadable).recover(product, "disposable", [], reasons);
    const second = await advisor(hanging).recover(product, "disposable", [], reasons);

    expect(first.succeeded).toBe(false);
    expect(first.failures).toEqual(reasons);
    expect(second.succeeded).toBe(false);
    expect(second.tags).toEqual([]);
  });
});
