import type { ComboLevel, HapticPulse, LevelThreshold } from "../types";

export const COMBO_RULES = {
  decayWindowMs: 1500,
  // Largest delay setTimeout honours; longer ones fire after 1ms.
  maxDecayWindowMs: 2_147_483_647
};

export const DEFAULT_LEVEL_THRESHOLDS: readonly LevelThreshold[] = [
  { minCount: 0, level: "none" },
  { minCount: 1, level: "normal" },
  { minCount: 5, level: "warm" },
  { minCount: 10, level: "hot" },
  { minCount: 20, level: "fire" }
];

export const HAPTIC_PROFILES: Record<ComboLevel, HapticPulse> = {
  none: { durationMs: 20, amplitude: 50 },
  normal: { durationMs: 25, amplitude: 80 },
  warm: { durationMs: 30, amplitude: 120 },
  hot: { durationMs: 40, amplitude: 180 },
  fire: { durationMs: 50, amplitude: 255 }
};

export const HAPTIC_AMPLITUDE_RANGE = {
  min: 1,
  max: 255
};

export const LOG_TAG = "[sort-combo]";
