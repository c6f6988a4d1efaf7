export { COMBO_RULES, DEFAULT_LEVEL_THRESHOLDS, HAPTIC_PROFILES } from "./config/combo-config";
export { defaultComboConfig, resolveComboConfig } from "./config/resolve-combo-config";
export { StateStore } from "./core/state";
export type { StateListener } from "./core/state";
export { systemClock, systemTimers } from "./core/timers";
export type { Clock, TimerHost } from "./core/timers";
export { ComboSession, createComboSession } from "./combo/combo-session";
export type { ComboSessionOptions, LevelChangeListener } from "./combo/combo-session";
export { ComboTracker } from "./combo/combo-tracker";
export type { ComboTrackerOptions } from "./combo/combo-tracker";
export { DecayScheduler } from "./combo/decay-scheduler";
export type { DecaySchedulerOptions } from "./combo/decay-scheduler";
export { ComboConfigError, SessionClosedError } from "./combo/errors";
export { compareLevels, LevelClassifier, levelRank, parseThresholds } from "./combo/level-classifier";
export { hapticProfileFor, hapticPulseForState } from "./feedback/haptic-profile";
export { COMBO_LEVELS } from "./types";
export type {
  ComboConfig,
  ComboLevel,
  ComboState,
  HapticPulse,
  LevelThreshold,
  SortAction,
  SortTally
} from "./types";
