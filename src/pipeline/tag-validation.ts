import type { ApprovedTagSchema, RangeDimension } from "../types.js";
import {
  appliesTo,
  isWithinRange,
  owningDimensions,
  parseNumericTag,
  rangeFailureMessage,
} from "../taxonomy/schema.js";
import { uniqueStrings } from "../utils/collections.js";

export interface ValidationResult {
  ok: boolean;
  failures: string[];
}

const RATIO_SHAPE = /^\s*(-?\d+)\s*\/\s*(-?\d+)\s*$/;

/**
 * Checks candidate tags against the approved schema. Rules run in a fixed
 * order (applies-to, numeric range, required dimensions, VG/PG ratio) and each
 * rule walks the tags in input order, so identical input always yields the
 * same failure list. Never mutates its input.
 */
export class TagValidator {
  constructor(private readonly schema: ApprovedTagSchema) {}

  validate(tags: readonly string[], category: string): ValidationResult {
    const failures: string[] = [];

    for (const tag of tags) {
      if (tag === category) {
        continue;
      }
      if (owningDimensions(this.schema, tag, category).length === 0) {
        failures.push(`tag '${tag}' does not apply to category '${category}'`);
      }
    }

    for (const tag of tags) {
      const numeric = parseNumericTag(tag);
      if (!numeric) {
        continue;
      }
      const rangeOwners = owningDimensions(this.schema, tag, category).filter(
        (dimension): dimension is RangeDimension => dimension.kind === "range",
      );
      for (const dimension of rangeOwners) {
        if (!isWithinRange(dimension, numeric.value)) {
          failures.push(rangeFailureMessage(dimension, numeric.value));
        }
      }
    }

    const required = this.schema.requiredDimensions[category] ?? [];
    if (required.length > 0) {
      const present = new Set<string>();
      for (const tag of tags) {
        for (const dimension of owningDimensions(this.schema, tag, category)) {
          if (dimension.kind === "range") {
            const numeric = parseNumericTag(tag);
            if (!numeric || !isWithinRange(dimension, numeric.value)) {
              continue;
            }
          }
          present.add(dimension.name);
        }
      }
      const missing = required.filter((name) => !present.has(name));
      if (missing.length > 0) {
        failures.push(`${category} product missing required dimension(s): ${missing.join(", ")}`);
      }
    }

    if (appliesTo(this.schema, "vg_ratio", category)) {
      for (const tag of tags) {
        const match = RATIO_SHAPE.exec(tag);
        if (!match) {
          continue;
        }
        const vg = Number(match[1]);
        const pg = Number(match[2]);
        if (vg < 0 || pg < 0 || vg + pg !== 100) {
          failures.push(`vg_ratio '${tag}' must be two non-negative integers summing to 100`);
        }
      }
    }

    const unique = uniqueStrings(failures);
    return { ok: unique.length === 0, failures: unique };
  }
}
