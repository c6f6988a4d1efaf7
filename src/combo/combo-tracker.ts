import { COMBO_RULES, LOG_TAG } from "../config/combo-config";
import { StateStore, type StateListener } from "../core/state";
import { systemClock, type Clock } from "../core/timers";
import type { ComboState } from "../types";
import { ComboConfigError } from "./errors";
import { LevelClassifier } from "./level-classifier";

export interface ComboTrackerOptions {
  decayWindowMs?: number;
  classifier?: LevelClassifier;
  clock?: Clock;
}

export class ComboTracker {
  readonly decayWindowMs: number;
  private readonly classifier: LevelClassifier;
  private readonly clock: Clock;
  private readonly store: StateStore<ComboState>;

  constructor(options: ComboTrackerOptions = {}) {
    const decayWindowMs = options.decayWindowMs ?? COMBO_RULES.decayWindowMs;
    if (!Number.isFinite(decayWindowMs) || decayWindowMs <= 0 || decayWindowMs > COMBO_RULES.maxDecayWindowMs) {
      throw new ComboConfigError([
        `decayWindowMs: must be positive and at most ${COMBO_RULES.maxDecayWindowMs}, got ${decayWindowMs}`
      ]);
    }
    this.decayWindowMs = decayWindowMs;
    this.classifier = options.classifier ?? new LevelClassifier();
    this.clock = options.clock ?? systemClock;
    this.store = new StateStore(this.createState(0, false, 0, 0));
  }

  currentState(): ComboState {
    return this.store.current;
  }

  subscribe(listener: StateListener<ComboState>): () => void {
    return this.store.onChange(listener);
  }

  /**
   * Counts one completed sort action. The streak continues only when the previous
   * action is still live and `now` falls within `[lastActionAt, lastActionAt + decayWindowMs]`;
   * otherwise it restarts at 1.
   */
  recordAction(now: number = this.clock.now()): ComboState {
    const previous = this.store.current;
    const finite = Number.isFinite(now);
    let timestamp = now;
    if (!finite) {
      console.warn(`${LOG_TAG} Ignoring non-finite action timestamp, restarting streak`, now);
      timestamp = this.clock.now();
    }

    const elapsed = timestamp - previous.lastActionAt;
    if (previous.isActive && elapsed < 0) {
      console.warn(`${LOG_TAG} Action timestamp precedes the last action by ${-elapsed}ms, restarting streak`);
    }
    const continues =
      finite && previous.isActive && elapsed >= 0 && elapsed <= this.decayWindowMs;
    const count = continues ? previous.count + 1 : 1;

    const next = this.createState(count, true, timestamp, Math.max(previous.maxCount, count));
    this.store.set(next);
    return next;
  }

  /** Ends the streak. The session best survives; a second reset returns the same state. */
  reset(): ComboState {
    const previous = this.store.current;
    if (!previous.isActive && previous.count === 0) {
      return previous;
    }
    const next = this.createState(0, false, this.clock.now(), previous.maxCount);
    this.store.set(next);
    return next;
  }

  dispose(): void {
    this.store.clear();
  }

  private createState(count: number, isActive: boolean, lastActionAt: number, maxCount: number): ComboState {
    return Object.freeze({
      count,
      level: this.classifier.classify(count),
      isActive,
      lastActionAt,
      maxCount
    });
  }
}
