import { HAPTIC_AMPLITUDE_RANGE, HAPTIC_PROFILES } from "../config/combo-config";
import type { ComboLevel, ComboState, HapticPulse } from "../types";
import { clamp } from "../util/math";

export function hapticProfileFor(level: ComboLevel): HapticPulse {
  const profile = HAPTIC_PROFILES[level];
  return {
    durationMs: Math.max(0, Math.round(profile.durationMs)),
    amplitude: clamp(Math.round(profile.amplitude), HAPTIC_AMPLITUDE_RANGE.min, HAPTIC_AMPLITUDE_RANGE.max)
  };
}

/** Pulse for the swipe that produced `state`; inactive states get the resting pulse. */
export function hapticPulseForState(state: ComboState): HapticPulse {
  return hapticProfileFor(state.isActive ? state.level : "none");
}
