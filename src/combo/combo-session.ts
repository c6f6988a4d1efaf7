import { resolveComboConfig } from "../config/resolve-combo-config";
import type { StateListener } from "../core/state";
import { systemClock, systemTimers, type Clock, type TimerHost } from "../core/timers";
import type { ComboConfig, ComboLevel, ComboState, SortAction, SortTally } from "../types";
import { ComboTracker } from "./combo-tracker";
import { DecayScheduler } from "./decay-scheduler";
import { SessionClosedError } from "./errors";
import { LevelClassifier } from "./level-classifier";

export interface ComboSessionOptions {
  config?: Partial<ComboConfig>;
  clock?: Clock;
  timers?: TimerHost;
}

export type LevelChangeListener = (level: ComboLevel, state: ComboState, previousLevel: ComboLevel) => void;

/**
 * One sorting session's combo engine. Calls are expected from a single event loop:
 * actions, resets and decay timers all run there, so transitions apply in call order.
 */
export class ComboSession {
  readonly config: ComboConfig;
  readonly classifier: LevelClassifier;
  private readonly tracker: ComboTracker;
  private readonly scheduler: DecayScheduler;
  private readonly tally: SortTally = { keep: 0, trash: 0, maybe: 0 };
  private closed = false;

  constructor(options: ComboSessionOptions = {}) {
    const clock = options.clock ?? systemClock;
    this.config = resolveComboConfig(options.config);
    this.classifier = new LevelClassifier(this.config.thresholds);
    this.tracker = new ComboTracker({
      decayWindowMs: this.config.decayWindowMs,
      classifier: this.classifier,
      clock
    });
    this.scheduler = new DecayScheduler({
      tracker: this.tracker,
      timers: options.timers ?? systemTimers
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get decayArmed(): boolean {
    return this.scheduler.armed;
  }

  currentState(): ComboState {
    return this.tracker.currentState();
  }

  getSortTally(): SortTally {
    return { ...this.tally };
  }

  recordAction(now?: number): ComboState {
    this.assertOpen("record an action");
    return this.tracker.recordAction(now);
  }

  /** Every sort outcome advances the streak the same way. */
  onSort(kind: SortAction, now?: number): ComboState {
    this.assertOpen("record a sort");
    this.tally[kind] += 1;
    return this.tracker.recordAction(now);
  }

  reset(): ComboState {
    this.assertOpen("reset");
    return this.tracker.reset();
  }

  subscribe(listener: StateListener<ComboState>): () => void {
    if (this.closed) {
      return () => undefined;
    }
    return this.tracker.subscribe(listener);
  }

  onLevelChange(listener: LevelChangeListener): () => void {
    return this.subscribe((next, prev) => {
      if (next.level !== prev.level) {
        listener(next.level, next, prev.level);
      }
    });
  }

  dispose(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.scheduler.dispose();
    this.tracker.dispose();
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(operation);
    }
  }
}

export function createComboSession(options?: ComboSessionOptions): ComboSession {
  return new ComboSession(options);
}
