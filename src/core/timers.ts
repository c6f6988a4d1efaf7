export interface Clock {
  now: () => number;
}

export interface TimerHost {
  /** Returns a function that cancels the scheduled callback. */
  schedule: (callback: () => void, delayMs: number) => () => void;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

export const systemTimers: TimerHost = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  }
};
