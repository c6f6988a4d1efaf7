import { z } from "zod";
import { DEFAULT_LEVEL_THRESHOLDS } from "../config/combo-config";
import { COMBO_LEVELS, type ComboLevel, type LevelThreshold } from "../types";
import { ComboConfigError } from "./errors";

export function levelRank(level: ComboLevel): number {
  return COMBO_LEVELS.indexOf(level);
}

export function compareLevels(a: ComboLevel, b: ComboLevel): number {
  return levelRank(a) - levelRank(b);
}

const ThresholdSchema = z.object({
  minCount: z.number().int().nonnegative(),
  level: z.enum(COMBO_LEVELS)
});

/**
 * A threshold table starts at `(0, none)`, has its second row at `minCount` 1 and rises
 * strictly in both count and level, so only a count of 0 classifies as `none`.
 * Each row covers counts up to the next row's `minCount`; the last row is open-ended.
 */
export const ThresholdTableSchema = z
  .array(ThresholdSchema)
  .min(1)
  .superRefine((table, ctx) => {
    const first = table[0];
    if (first && (first.minCount !== 0 || first.level !== "none")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [0],
        message: "table must start with minCount 0 at level none"
      });
    }
    const second = table.length > 1 ? table[1] : undefined;
    if (table.length > 0 && second?.minCount !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [1, "minCount"],
        message: "a level above none must start at minCount 1"
      });
    }
    for (let i = 1; i < table.length; i += 1) {
      const previous = table[i - 1];
      const entry = table[i];
      if (entry.minCount <= previous.minCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "minCount"],
          message: `must be greater than ${previous.minCount}`
        });
      }
      if (levelRank(entry.level) <= levelRank(previous.level)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "level"],
          message: `must rank above ${previous.level}`
        });
      }
    }
  });

export function formatIssues(error: z.ZodError, prefix: string[] = []): string[] {
  return error.issues.map((issue) => {
    const path = [...prefix, ...issue.path.map(String)].join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseThresholds(input: unknown): LevelThreshold[] {
  const result = ThresholdTableSchema.safeParse(input);
  if (!result.success) {
    throw new ComboConfigError(formatIssues(result.error));
  }
  return result.data.map((entry) => ({ minCount: entry.minCount, level: entry.level }));
}

export class LevelClassifier {
  private readonly table: readonly LevelThreshold[];

  constructor(thresholds: readonly LevelThreshold[] = DEFAULT_LEVEL_THRESHOLDS) {
    this.table = Object.freeze(parseThresholds(thresholds));
  }

  get thresholds(): readonly LevelThreshold[] {
    return this.table;
  }

  /** Negative or non-numeric counts classify as `none`. */
  classify(count: number): ComboLevel {
    for (let i = this.table.length - 1; i > 0; i -= 1) {
      if (count >= this.table[i].minCount) {
        return this.table[i].level;
      }
    }
    return this.table[0].level;
  }
}
