import { systemTimers, type TimerHost } from "../core/timers";
import type { ComboState } from "../types";
import type { ComboTracker } from "./combo-tracker";

export interface DecaySchedulerOptions {
  tracker: ComboTracker;
  timers?: TimerHost;
}

/**
 * Keeps a single idle timer per session. Every published active state re-arms it for a
 * full `decayWindowMs`, counted on the timer host from the moment the state is published,
 * so action timestamps never have to share the host's time base. An inactive state
 * disarms it. A callback left over from a superseded arming finds a stale generation
 * and does nothing.
 */
export class DecayScheduler {
  private readonly tracker: ComboTracker;
  private readonly timers: TimerHost;
  private readonly unsubscribe: () => void;
  private cancelPending: (() => void) | null = null;
  private generation = 0;
  private disposed = false;

  constructor(options: DecaySchedulerOptions) {
    this.tracker = options.tracker;
    this.timers = options.timers ?? systemTimers;
    this.unsubscribe = this.tracker.subscribe(this.onState);
    this.onState(this.tracker.currentState());
  }

  get armed(): boolean {
    return this.cancelPending !== null;
  }

  cancel(): void {
    this.generation += 1;
    if (this.cancelPending) {
      this.cancelPending();
      this.cancelPending = null;
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.cancel();
    this.unsubscribe();
    this.disposed = true;
  }

  private onState = (state: ComboState): void => {
    this.cancel();
    if (this.disposed || !state.isActive) {
      return;
    }
    const generation = this.generation;
    this.cancelPending = this.timers.schedule(() => this.fire(generation), this.tracker.decayWindowMs);
  };

  private fire(generation: number): void {
    if (this.disposed || generation !== this.generation) {
      return;
    }
    this.cancelPending = null;
    this.tracker.reset();
  }
}
