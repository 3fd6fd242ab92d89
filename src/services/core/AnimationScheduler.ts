import { Animation, DelayedStart } from './Animation';
import type { AnimationChannel, AnimationOptions, SchedulerTask } from './Animation';
import type { Clock } from './clock';

/**
 * Autoridad única de animación: registra tareas y las avanza en cada pulso
 * del reloj inyectado. Nunca crea hilos ni difiere trabajo por su cuenta.
 * - Las animaciones de ancho (abrir/cerrar) son independientes por tab.
 * - `scroll` y `move` son canales singulares: la nueva detiene a la anterior.
 */
export class AnimationScheduler {
  private tasks    : SchedulerTask[]                      = [];
  private channels : Map<AnimationChannel, Animation>     = new Map();
  private clockRunning                                    = false;

  constructor(private readonly clock: Clock) {}

  /** Registers an animation and ticks it once at ratio 0. */
  start(options: AnimationOptions): Animation {
    if (options.channel) {
      const live = this.channels.get(options.channel);
      if (live) { this.stop(live); }
    }

    const animation = new Animation(options);
    this.register(animation);
    if (options.channel) { this.channels.set(options.channel, animation); }

    animation.begin();
    if (!animation.running) { this.deregister(animation); }

    return animation;
  }

  /** Registers an animation that starts after `delay` ms of clock time. */
  startAfter(delay: number, options: AnimationOptions): DelayedStart {
    const task = new DelayedStart(delay, () => this.start(options));
    this.register(task);
    return task;
  }

  /** Synchronous cancellation: runs the final callback, then forgets the task. */
  stop(task: SchedulerTask): void {
    this.deregister(task);
    task.cancel();
    if (task instanceof DelayedStart && task.animation) {
      this.stop(task.animation);
    }
  }

  /** Live animation on `channel`, if any. */
  getChannel(channel: AnimationChannel): Animation | undefined {
    return this.channels.get(channel);
  }

  /** Advances every registered task by `dt` ms. */
  tick(dt: number): void {
    for (const task of [...this.tasks]) {
      // A previous callback may have stopped it
      if (!this.tasks.includes(task)) { continue; }
      if (task.advance(dt)) { this.deregister(task); }
    }
  }

  get size(): number {
    return this.tasks.length;
  }

  /** Cancels everything and releases the clock. */
  dispose(): void {
    for (const task of [...this.tasks]) {
      this.stop(task);
    }
  }

  //- Private helpers

  private register(task: SchedulerTask): void {
    this.tasks.push(task);
    if (!this.clockRunning) {
      this.clockRunning = true;
      this.clock.start(dt => this.tick(dt));
    }
  }

  private deregister(task: SchedulerTask): void {
    const index = this.tasks.indexOf(task);
    if (index !== -1) { this.tasks.splice(index, 1); }

    if (task instanceof Animation && task.channel && this.channels.get(task.channel) === task) {
      this.channels.delete(task.channel);
    }

    if (this.tasks.length === 0 && this.clockRunning) {
      this.clockRunning = false;
      this.clock.stop();
    }
  }
}
