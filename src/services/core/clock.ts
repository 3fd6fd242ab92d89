import { TIMINGS } from '../../constants/timings';

/** Periodic tick source. `listener` receives the elapsed milliseconds since the previous tick. */
export interface Clock {
  start(listener: (dt: number) => void): void;
  stop(): void;
}

/**
 * Clock backed by `setInterval`. Only runs while started, so an idle
 * scheduler keeps no timer alive.
 */
export class IntervalClock implements Clock {
  private timer: ReturnType<typeof setInterval> | null = null;
  private last = 0;

  constructor(private readonly interval: number = TIMINGS.CLOCK_INTERVAL) {}

  start(listener: (dt: number) => void): void {
    if (this.timer) { return; }
    this.last = performance.now();
    this.timer = setInterval(() => {
      const now = performance.now();
      const dt  = now - this.last;
      this.last = now;
      listener(dt);
    }, this.interval);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

/** Deterministic clock advanced by hand (tests, headless hosts). */
export class ManualClock implements Clock {
  private listener: ((dt: number) => void) | null = null;

  get running(): boolean {
    return this.listener !== null;
  }

  start(listener: (dt: number) => void): void {
    this.listener = listener;
  }

  stop(): void {
    this.listener = null;
  }

  /** Delivers one tick of `dt` ms, if started. */
  advance(dt: number): void {
    this.listener?.(dt);
  }

  /** Delivers ticks of `step` ms until `total` ms have elapsed or the clock stops. */
  advanceBy(total: number, step: number = TIMINGS.CLOCK_INTERVAL): void {
    let remaining = total;
    while (remaining > 0 && this.listener) {
      const dt = Math.min(step, remaining);
      this.advance(dt);
      remaining -= dt;
    }
  }
}
