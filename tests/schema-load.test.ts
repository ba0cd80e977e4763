import { describe, expect, it } from "vitest";
import { buildApprovedTagSchema, loadApprovedTagSchema } from "../src/taxonomy/load.js";
import { canonicalizeTag, owningDimensions } from "../src/taxonomy/schema.js";

function fixture() {
  return {
    approvedTags: {
      schema_version: "t1",
      categories: ["e-liquid", "CBD"],
      dimensions: {
        nicotine_strength: { range: { min: 0, max: 20, unit: "mg" }, applies_to: ["e-liquid"] },
        flavour_type: { tags: ["fruity"], applies_to: ["e-liquid"] },
        cbd_strength: { range: { min: 0, max: 50000, unit: "mg" }, applies_to: ["CBD"] },
        cbd_form: { tags: ["oil"], applies_to: ["CBD"] },
        cbd_type: { tags: ["isolate"], applies_to: ["CBD"] },
      },
      required_dimensions: { CBD: ["cbd_strength", "cbd_form", "cbd_type"] },
    },
    categoryRules: {
      schema_version: "t1",
      categories: [
        { category: "CBD", include_any: ["cbd"] },
        { category: "e-liquid", include_any: ["liquid"] },
      ],
    },
    keywordTags: {
      schema_version: "t1",
      keyword_dimensions: {
        flavour_type: {
          mode: "all",
          scope: "title_then_body",
          rules: [{ tag: "fruity", include_any: ["mango"] }],
        },
      },
      numeric_dimensions: {},
    },
  };
}

describe("approved tag schema loading", () => {
  it("loads the bundled vocabulary", () => {
    const schema = loadApprovedTagSchema();

    expect(schema.version).toBe("2024.1");
    expect(schema.categories).toHaveLength(10);
    expect(schema.detectionRules.map((rule) => rule.category)).toEqual(schema.categories);
    expect(schema.requiredDimensions.CBD).toEqual(["cbd_strength", "cbd_form", "cbd_type"]);
    expect(Object.isFrozen(schema)).toBe(true);
  });

  it("orders detection rules by category declaration, not by rules file order", () => {
    const schema = buildApprovedTagSchema(fixture());

    expect(schema.detectionRules.map((rule) => rule.category)).toEqual(["e-liquid", "CBD"]);
    expect(schema.secondaryFlavours).toEqual([]);
  });

  it("rejects a schema where CBD does not require its three dimensions", () => {
    const input = fixture();
    input.approvedTags.required_dimensions = { CBD: ["cbd_strength"] };

    expect(() => buildApprovedTagSchema(input)).toThrow(
      "Invalid approved tag schema: CBD must require cbd_form, cbd_type",
    );
  });

  it("rejects a dimension that applies to an undeclared category", () => {
    const input = fixture();
    input.approvedTags.dimensions.flavour_type.applies_to = ["e-liquid", "candle"];

    expect(() => buildApprovedTagSchema(input)).toThrow(
      "Invalid approved tag schema: dimension flavour_type applies to unknown category candle",
    );
  });

  it("rejects a dimension declaring both tags and a range", () => {
    const input = fixture();
    const dimensions: Record<string, unknown> = { ...input.approvedTags.dimensions };
    dimensions.cbd_form = { tags: ["oil"], range: { min: 0, max: 1, unit: "mg" }, applies_to: ["CBD"] };

    expect(() =>
      buildApprovedTagSchema({ ...input, approvedTags: { ...input.approvedTags, dimensions } }),
    ).toThrow(/dimension must declare exactly one of tags or range/);
  });

  it("rejects two numeric dimensions sharing a unit within one category", () => {
    const input = fixture();
    input.approvedTags.dimensions.cbd_strength.applies_to = ["CBD", "e-liquid"];

    expect(() => buildApprovedTagSchema(input)).toThrow(
      "Invalid approved tag schema: category e-liquid has more than one numeric dimension with unit mg",
    );
  });

  it("rejects keyword rules that emit unapproved tags", () => {
    const input = fixture();
    input.keywordTags.keyword_dimensions.flavour_type.rules = [{ tag: "tropical", include_any: ["mango"] }];

    expect(() => buildApprovedTagSchema(input)).toThrow(
      "Invalid approved tag schema: keyword rule tag tropical is not approved for flavour_type",
    );
  });
});

describe("schema helpers", () => {
  const schema = loadApprovedTagSchema();

  it("gives enumerated ownership precedence over numeric ownership", () => {
    expect(owningDimensions(schema, "50ml", "e-liquid").map((dimension) => dimension.name)).toEqual([
      "bottle_size",
    ]);
    expect(owningDimensions(schema, "5ml", "pod").map((dimension) => dimension.name)).toEqual(["capacity"]);
    expect(owningDimensions(schema, "1000mg", "CBD").map((dimension) => dimension.name)).toEqual([
      "cbd_strength",
    ]);
  });

  it("canonicalizes model spellings", () => {
    expect(canonicalizeTag(schema, " 20 MG ")).toBe("20mg");
    expect(canonicalizeTag(schema, "Full Spectrum")).toBe("full_spectrum");
    expect(canonicalizeTag(schema, "70 / 30")).toBe("70/30");
    expect(canonicalizeTag(schema, "cbd")).toBe("CBD");
  });
});
