import { z } from "zod";
import { ComboConfigError } from "../combo/errors";
import { formatIssues, ThresholdTableSchema } from "../combo/level-classifier";
import type { ComboConfig, LevelThreshold } from "../types";
import { COMBO_RULES, DEFAULT_LEVEL_THRESHOLDS } from "./combo-config";

const ComboConfigOverrideSchema = z
  .object({
    decayWindowMs: z.number().finite().positive().max(COMBO_RULES.maxDecayWindowMs).optional(),
    thresholds: ThresholdTableSchema.optional()
  })
  .strict();

type ComboConfigOverride = z.infer<typeof ComboConfigOverrideSchema>;

export const defaultComboConfig: ComboConfig = Object.freeze({
  decayWindowMs: COMBO_RULES.decayWindowMs,
  thresholds: DEFAULT_LEVEL_THRESHOLDS
});

export function resolveComboConfig(input: unknown = {}): ComboConfig {
  const result = ComboConfigOverrideSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ComboConfigError(formatIssues(result.error));
  }
  const override: ComboConfigOverride = result.data;
  const thresholds: readonly LevelThreshold[] = override.thresholds ?? defaultComboConfig.thresholds;
  return Object.freeze({
    decayWindowMs: override.decayWindowMs ?? defaultComboConfig.decayWindowMs,
    thresholds: Object.freeze(thresholds.map((entry) => ({ minCount: entry.minCount, level: entry.level })))
  });
}
