import { emptyAttempt } from "../src/pipeline/product-tagging.js";
import type { AuditRecord, ModelClient, ModelCompletion, ModelCompletionOptions, Product } from "../src/types.js";

export function makeProduct(overrides: Partial<Product> & { title: string }): Product {
  return {
    handle: overrides.handle ?? overrides.title.toLowerCase().replace(/[^a-z0-9]+/g, "-"),
    title: overrides.title,
    body: overrides.body ?? "",
    vendor: overrides.vendor ?? "",
    existingType: overrides.existingType ?? "",
    existingTags: overrides.existingTags ?? "",
    source: overrides.source ?? { Handle: overrides.handle ?? "", Title: overrides.title },
  };
}

type ScriptStep = ModelCompletion | Error | "hang";

/** Replays a fixed list of responses; the last step repeats once the script runs out. */
export class ScriptedModelClient implements ModelClient {
  readonly calls: Array<{ prompt: string; options?: ModelCompletionOptions }> = [];
  private index = 0;

  constructor(
    readonly name: string,
    private readonly steps: ScriptStep[],
  ) {}

  async complete(prompt: string, options?: ModelCompletionOptions): Promise<ModelCompletion> {
    this.calls.push({ prompt, options });
    const step = this.steps[Math.min(this.index, this.steps.length - 1)];
    this.index += 1;
    if (step === "hang") {
      return new Promise<ModelCompletion>(() => {
        // never settles
      });
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export function tagResponse(tags: string[], confidence: number, reasoning?: string): ModelCompletion {
  return {
    text: JSON.stringify({ tags, confidence, ...(reasoning ? { reasoning } : {}) }),
    confidence,
  };
}

export function makeRecord(overrides: Partial<AuditRecord> & { handle: string }): AuditRecord {
  return {
    runId: "run-1",
    passNumber: 0,
    title: overrides.handle,
    bodyExcerpt: "",
    processedAt: "2026-03-04T05:06:07.890Z",
    ...emptyAttempt(),
    ...overrides,
  };
}
