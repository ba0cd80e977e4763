import { describe, expect, it } from "vitest";
import { TagValidator } from "../src/pipeline/tag-validation.js";
import { loadApprovedTagSchema } from "../src/taxonomy/load.js";

const validator = new TagValidator(loadApprovedTagSchema());

describe("TagValidator", () => {
  it("accepts a complete e-liquid tag set", () => {
    const result = validator.validate(["e-liquid", "70/30", "50ml", "shortfill", "fruity", "ice"], "e-liquid");

    expect(result).toEqual({ ok: true, failures: [] });
  });

  it("flags tags whose dimension does not apply to the category", () => {
    const result = validator.validate(["e-liquid", "gummy", "CBD"], "e-liquid");

    expect(result.failures).toEqual([
      "tag 'gummy' does not apply to category 'e-liquid'",
      "tag 'CBD' does not apply to category 'e-liquid'",
    ]);
  });

  it("reports nicotine above the legal maximum", () => {
    const result = validator.validate(["disposable", "25mg"], "disposable");

    expect(result).toEqual({ ok: false, failures: ["nicotine exceeds legal maximum"] });
  });

  it("reports other numeric dimensions out of range", () => {
    const result = validator.validate(["pod", "12ml"], "pod");

    expect(result.failures).toEqual(["capacity value out of range"]);
  });

  it("lists every missing required CBD dimension", () => {
    expect(validator.validate(["CBD"], "CBD").failures).toEqual([
      "CBD product missing required dimension(s): cbd_strength, cbd_form, cbd_type",
    ]);
    expect(validator.validate(["CBD", "1000mg", "gummy"], "CBD").failures).toEqual([
      "CBD product missing required dimension(s): cbd_type",
    ]);
  });

  it("does not count an out-of-range strength towards a required dimension", () => {
    const result = validator.validate(["CBD", "60000mg", "gummy", "isolate"], "CBD");

    expect(result.failures).toEqual([
      "cbd_strength value out of range",
      "CBD product missing required dimension(s): cbd_strength",
    ]);
  });

  it("runs the rules in a fixed order and checks VG/PG sums", () => {
    const result = validator.validate(["e-liquid", "60/30"], "e-liquid");

    expect(result.failures).toEqual([
      "tag '60/30' does not apply to category 'e-liquid'",
      "vg_ratio '60/30' must be two non-negative integers summing to 100",
    ]);
  });

  it("is deterministic and leaves its input untouched", () => {
    const tags = Object.freeze(["CBD", "gummy"]);

    const first = validator.validate(tags, "CBD");
    const second = validator.validate(tags, "CBD");

    expect(first).toEqual(second);
    expect(tags).toEqual(["CBD", "gummy"]);
  });
});
