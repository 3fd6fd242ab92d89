/**
 * Constantes de timing para animaciones y el reloj del scheduler.
 * Centraliza valores hardcodeados de tiempo.
 */

export const TIMINGS = {
  // Animation durations (ms)
  ANIMATION_OPEN_DURATION: 150,
  ANIMATION_CLOSE_DURATION: 150,
  ANIMATION_SCROLL_DURATION: 200,
  ANIMATION_MOVE_DURATION: 150,

  // Delay before a newly opened tab starts growing (ms)
  ANIMATION_OPEN_DELAY: 50,

  // Interval of the default clock (ms), roughly one frame at 60 Hz
  CLOCK_INTERVAL: 16,
} as const;
