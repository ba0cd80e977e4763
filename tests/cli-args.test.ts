import { describe, expect, it } from "vitest";
import {
  booleanFlag,
  fractionFlag,
  optionalFlag,
  parseFlags,
  positiveIntFlag,
  requiredFlag,
} from "../src/cli/args.js";

describe("CLI flags", () => {
  it("reads spaced, inline and bare flags", () => {
    expect(
      parseFlags(["tag", "--input", "catalog.csv", "--target=0.85", "--no-ai", "--max-iterations", "2"]),
    ).toEqual({
      input: "catalog.csv",
      target: "0.85",
      "no-ai": true,
      "max-iterations": "2",
    });
  });

  it("treats a flag followed by another flag as bare", () => {
    const flags = parseFlags(["--no-ai", "--input", "catalog.csv"]);

    expect(booleanFlag(flags, "no-ai")).toBe(true);
    expect(booleanFlag(flags, "input")).toBe(false);
    expect(optionalFlag(flags, "no-ai")).toBeUndefined();
  });

  it("requires non-blank values", () => {
    const flags = parseFlags(["--run", "  ", "--out"]);

    expect(() => requiredFlag(flags, "run")).toThrow("Missing required argument --run");
    expect(() => requiredFlag(flags, "out")).toThrow("Missing required argument --out");
    expect(requiredFlag(parseFlags(["--run", "run-1"]), "run")).toBe("run-1");
  });

  it("validates numeric flags", () => {
    const flags = parseFlags(["--target", "0.9", "--min-confidence", "1.5", "--max-iterations", "0"]);

    expect(fractionFlag(flags, "target")).toBe(0.9);
    expect(fractionFlag(flags, "missing")).toBeUndefined();
    expect(() => fractionFlag(flags, "min-confidence")).toThrow(
      "Invalid --min-confidence value. Use a number between 0 and 1.",
    );
    expect(() => positiveIntFlag(flags, "max-iterations")).toThrow(
      "Invalid --max-iterations value. Use a positive integer.",
    );
    expect(positiveIntFlag(parseFlags(["--max-iterations", "3"]), "max-iterations")).toBe(3);
  });
});
