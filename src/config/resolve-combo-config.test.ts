import { describe, expect, it } from "vitest";
import { ComboConfigError } from "../combo/errors";
import { DEFAULT_LEVEL_THRESHOLDS } from "./combo-config";
import { resolveComboConfig } from "./resolve-combo-config";

function issuesOf(input: unknown): string[] {
  try {
    resolveComboConfig(input);
  } catch (error) {
    if (error instanceof ComboConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("resolve-combo-config", () => {
  it("returns defaults for an empty override", () => {
    expect(resolveComboConfig()).toEqual({
      decayWindowMs: 1500,
      thresholds: DEFAULT_LEVEL_THRESHOLDS
    });
    expect(resolveComboConfig(null).decayWindowMs).toBe(1500);
  });

  it("merges a partial override", () => {
    const config = resolveComboConfig({ decayWindowMs: 2000 });
    expect(config.decayWindowMs).toBe(2000);
    expect(config.thresholds).toEqual(DEFAULT_LEVEL_THRESHOLDS);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects a non-positive window", () => {
    const issues = issuesOf({ decayWindowMs: 0 });
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^decayWindowMs: /);
  });

  it("rejects a window longer than a timer can wait", () => {
    const issues = issuesOf({ decayWindowMs: 30 * 24 * 60 * 60 * 1000 });
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^decayWindowMs: /);
    expect(resolveComboConfig({ decayWindowMs: 2_147_483_647 }).decayWindowMs).toBe(2_147_483_647);
  });

  it("reports threshold issues with their path", () => {
    expect(
      issuesOf({
        thresholds: [
          { minCount: 0, level: "none" },
          { minCount: 5, level: "warm" },
          { minCount: 3, level: "normal" }
        ]
      })
    ).toEqual([
      "thresholds.1.minCount: a level above none must start at minCount 1",
      "thresholds.2.minCount: must be greater than 5",
      "thresholds.2.level: must rank above warm"
    ]);
  });

  it("rejects unknown keys", () => {
    expect(issuesOf({ window: 5 })).toEqual(["Unrecognized key(s) in object: 'window'"]);
  });
});
