export const COMBO_LEVELS = ["none", "normal", "warm", "hot", "fire"] as const;

export type ComboLevel = (typeof COMBO_LEVELS)[number];
export type SortAction = "keep" | "trash" | "maybe";

export interface ComboState {
  readonly count: number;
  readonly level: ComboLevel;
  readonly isActive: boolean;
  readonly lastActionAt: number;
  readonly maxCount: number;
}

export interface LevelThreshold {
  minCount: number;
  level: ComboLevel;
}

export interface ComboConfig {
  decayWindowMs: number;
  thresholds: readonly LevelThreshold[];
}

export interface HapticPulse {
  durationMs: number;
  amplitude: number;
}

export type SortTally = Record<SortAction, number>;
