import { LOG_TAG } from "../config/combo-config";

export type StateListener<T> = (nextState: T, prevState: T) => void;

/**
 * Holds one authoritative value and publishes each replacement to its listeners.
 * Replacements made from inside a listener are queued, so every listener sees
 * transitions in the order they were applied.
 */
export class StateStore<T> {
  private state: T;
  private readonly listeners = new Set<StateListener<T>>();
  private readonly pending: Array<{ next: T; prev: T }> = [];
  private publishing = false;

  constructor(initialState: T) {
    this.state = initialState;
  }

  get current(): T {
    return this.state;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  set(nextState: T): void {
    if (nextState === this.state) {
      return;
    }
    const previous = this.state;
    this.state = nextState;
    this.pending.push({ next: nextState, prev: previous });
    if (this.publishing) {
      return;
    }
    this.publishing = true;
    try {
      this.drain();
    } finally {
      this.publishing = false;
    }
  }

  onChange(listener: StateListener<T>): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  clear(): void {
    this.listeners.clear();
    this.pending.length = 0;
  }

  private drain(): void {
    let transition = this.pending.shift();
    while (transition) {
      const { next, prev } = transition;
      [...this.listeners].forEach((listener) => {
        try {
          listener(next, prev);
        } catch (error) {
          console.warn(`${LOG_TAG} State listener failed`, error);
        }
      });
      transition = this.pending.shift();
    }
  }
}
