import { Logger } from '../../utils/logger';

// Integer animations round every value; fractional ones keep full precision.
export type AnimationKind = 'integer' | 'fractional';

// Globally singular animations: a new one on the same channel replaces the live one.
export type AnimationChannel = 'scroll' | 'move';

export interface AnimationOptions {
  duration : number;
  from     : number;
  to       : number;
  kind     : AnimationKind;
  onTick   : (value: number, animation: Animation) => void;
  channel? : AnimationChannel;
}

/** Unit of work driven by the scheduler's clock. */
export interface SchedulerTask {
  /** Advances by `dt` ms. Returns `true` once the task is finished. */
  advance(dt: number): boolean;
  /** Ends the task right away. */
  cancel(): void;
}

export function lerp(ratio: number, from: number, to: number): number {
  return from + (to - from) * ratio;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * One interpolation from `from` to `to` over `duration` ms.
 * `onTick` fires on every advance with `running === true`, then exactly once
 * more with `running === false` (on completion or on `cancel()`).
 */
export class Animation implements SchedulerTask {
  private static nextId = 1;

  readonly id       : number;
  readonly duration : number;
  readonly from     : number;
  readonly to       : number;
  readonly kind     : AnimationKind;
  readonly channel  : AnimationChannel | undefined;

  running = true;
  elapsed = 0;
  value   : number;

  private readonly onTick: AnimationOptions['onTick'];

  constructor(options: AnimationOptions) {
    this.id       = Animation.nextId++;
    this.duration = options.duration;
    this.from     = options.from;
    this.to       = options.to;
    this.kind     = options.kind;
    this.channel  = options.channel;
    this.onTick   = options.onTick;
    this.value    = this.valueAt(0);
  }

  /** Interpolated value after `elapsed` ms. */
  valueAt(elapsed: number): number {
    const ratio = this.duration > 0 ? clamp(elapsed / this.duration, 0, 1) : 1;
    const value = lerp(ratio, this.from, this.to);
    return this.kind === 'integer' ? Math.round(value) : value;
  }

  /** Immediate tick at ratio 0, before the first clock pulse. */
  begin(): void {
    this.fire(this.value);
  }

  advance(dt: number): boolean {
    if (!this.running) { return true; }

    this.elapsed += dt;

    if (this.elapsed >= this.duration) {
      this.value   = this.valueAt(this.duration);
      this.running = false;
      this.fire(this.value);
      return true;
    }

    this.value = this.valueAt(this.elapsed);
    this.fire(this.value);
    return !this.running;
  }

  /** Final callback with the last computed value. No-op once finished. */
  cancel(): void {
    if (!this.running) { return; }
    this.running = false;
    this.fire(this.value);
  }

  private fire(value: number): void {
    try {
      this.onTick(value, this);
    } catch (error) {
      Logger.error(`[Tabstrip] Animation ${this.id} callback failed; stopping it`, error);
      this.running = false;
    }
  }
}

/** Starts an animation once `delay` ms have elapsed on the scheduler clock. */
export class DelayedStart implements SchedulerTask {
  private remaining : number;
  private cancelled = false;
  private _animation: Animation | undefined;

  constructor(delay: number, private readonly launch: () => Animation) {
    this.remaining = delay;
  }

  /** The animation, once launched. */
  get animation(): Animation | undefined {
    return this._animation;
  }

  advance(dt: number): boolean {
    if (this.cancelled) { return true; }
    this.remaining -= dt;
    if (this.remaining > 0) { return false; }
    this._animation = this.launch();
    return true;
  }

  cancel(): void {
    this.cancelled = true;
  }
}
