/**
 * @file AnimationScheduler.test.ts
 * @description Tests for animations, delayed starts and the scheduler driven by a manual clock
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Animation, lerp } from '../../../services/core/Animation';
import type { AnimationOptions } from '../../../services/core/Animation';
import { AnimationScheduler } from '../../../services/core/AnimationScheduler';
import { ManualClock } from '../../../services/core/clock';
import { Logger, MemoryOutputChannel } from '../../../utils/logger';

type Tick = [value: number, running: boolean];

/** Options whose ticks are recorded with the `running` flag seen at call time. */
function recorded(overrides: Partial<AnimationOptions> = {}): { options: AnimationOptions; ticks: Tick[] } {
  const ticks: Tick[] = [];
  return {
    ticks,
    options: {
      duration : 150,
      from     : 0,
      to       : 100,
      kind     : 'integer',
      onTick   : (value, animation) => { ticks.push([value, animation.running]); },
      ...overrides,
    },
  };
}

describe('lerp', () => {
  it('interpolates linearly', () => {
    expect(lerp(0, 10, 20)).toBe(10);
    expect(lerp(0.5, 10, 20)).toBe(15);
    expect(lerp(1, 10, 20)).toBe(20);
  });
});

describe('Animation', () => {
  it('rounds integer animations and clamps the ratio', () => {
    const animation = new Animation(recorded({ from: 0, to: 1 }).options);
    expect(animation.valueAt(75)).toBe(1);
    expect(animation.valueAt(-10)).toBe(0);
    expect(animation.valueAt(1000)).toBe(1);
  });

  it('keeps fractional values', () => {
    const animation = new Animation(recorded({ to: 1, kind: 'fractional' }).options);
    expect(animation.valueAt(75)).toBe(0.5);
  });

  it('ends right away when the duration is zero', () => {
    const { options, ticks } = recorded({ duration: 0 });
    const animation = new Animation(options);
    expect(animation.advance(0)).toBe(true);
    expect(ticks).toEqual([[100, false]]);
  });
});

describe('AnimationScheduler', () => {
  let clock: ManualClock;
  let scheduler: AnimationScheduler;

  beforeEach(() => {
    Logger.initialize(new MemoryOutputChannel());
    clock     = new ManualClock();
    scheduler = new AnimationScheduler(clock);
  });

  it('ticks at ratio 0 on start, halfway at 75 ms and finishes exactly once', () => {
    const { options, ticks } = recorded();
    const animation = scheduler.start(options);

    expect(ticks).toEqual([[0, true]]);

    clock.advance(75);
    expect(ticks[1]).toEqual([50, true]);

    clock.advance(75);
    clock.advance(16);

    expect(ticks).toEqual([[0, true], [50, true], [100, false]]);
    expect(animation.value).toBe(100);
    expect(animation.running).toBe(false);
  });

  it('only holds the clock while it owns tasks', () => {
    expect(clock.running).toBe(false);

    scheduler.start(recorded().options);
    expect(clock.running).toBe(true);
    expect(scheduler.size).toBe(1);

    clock.advanceBy(150);
    expect(scheduler.size).toBe(0);
    expect(clock.running).toBe(false);
  });

  it('stops the live animation when another starts on the same channel', () => {
    const first  = recorded({ channel: 'scroll' });
    const second = recorded({ channel: 'scroll', from: 10, to: 20 });

    const a = scheduler.start(first.options);
    clock.advance(30);
    const b = scheduler.start(second.options);

    expect(a.running).toBe(false);
    expect(first.ticks).toEqual([[0, true], [20, true], [20, false]]);
    expect(second.ticks).toEqual([[10, true]]);
    expect(scheduler.getChannel('scroll')).toBe(b);
    expect(scheduler.size).toBe(1);
  });

  it('runs independent animations side by side', () => {
    const first  = recorded();
    const second = recorded({ from: 100, to: 0 });

    scheduler.start(first.options);
    scheduler.start(second.options);
    clock.advance(75);

    expect(first.ticks[1]).toEqual([50, true]);
    expect(second.ticks[1]).toEqual([50, true]);
  });

  it('stop() fires the final callback with the last value once', () => {
    const { options, ticks } = recorded();
    const animation = scheduler.start(options);
    clock.advance(30);

    scheduler.stop(animation);
    scheduler.stop(animation);

    expect(ticks).toEqual([[0, true], [20, true], [20, false]]);
    expect(scheduler.size).toBe(0);
  });

  it('startAfter() launches once the delay has elapsed', () => {
    const { options, ticks } = recorded();
    scheduler.startAfter(50, options);

    clock.advance(40);
    expect(ticks).toEqual([]);

    clock.advance(10);
    expect(ticks).toEqual([[0, true]]);

    clock.advance(150);
    expect(ticks).toEqual([[0, true], [100, false]]);
    expect(scheduler.size).toBe(0);
  });

  it('stopping a delayed start before it launches cancels it silently', () => {
    const { options, ticks } = recorded();
    const task = scheduler.startAfter(50, options);

    scheduler.stop(task);
    clock.advance(100);

    expect(ticks).toEqual([]);
    expect(scheduler.size).toBe(0);
  });

  it('stopping a launched delayed start stops its animation', () => {
    const { options, ticks } = recorded();
    const task = scheduler.startAfter(10, options);
    clock.advance(10);

    scheduler.stop(task);

    expect(ticks).toEqual([[0, true], [0, false]]);
    expect(task.animation?.running).toBe(false);
  });

  it('stops an animation whose callback throws and keeps the others running', () => {
    const channel = new MemoryOutputChannel();
    Logger.initialize(channel);

    const healthy = recorded();
    const broken  = scheduler.start({
      duration : 150,
      from     : 0,
      to       : 1,
      kind     : 'integer',
      onTick   : () => { throw new Error('tick failed'); },
    });
    scheduler.start(healthy.options);

    clock.advance(75);

    expect(broken.running).toBe(false);
    expect(healthy.ticks[1]).toEqual([50, true]);
    expect(channel.getLines()[0]).toMatch(/ERROR: \[Tabstrip\] Animation \d+ callback failed; stopping it$/);
  });

  it('dispose() cancels everything', () => {
    const { options, ticks } = recorded();
    scheduler.start(options);
    scheduler.startAfter(50, recorded().options);

    scheduler.dispose();

    expect(ticks).toEqual([[0, true], [0, false]]);
    expect(scheduler.size).toBe(0);
    expect(clock.running).toBe(false);
  });
});
