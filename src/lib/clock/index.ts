import type { Clock, Instant } from './types.js';

export type { Clock, Instant } from './types.js';
export {
  formatDuration,
  formatClockMinute,
  formatClockSecond,
  formatTimeOfDay,
} from './format.js';

/** Clock backed by `performance.now()` and the system wall clock. */
export const systemClock: Clock = {
  now(): Instant {
    return { mono: performance.now(), wall: new Date() };
  },
};

/** Monotonic milliseconds from `fromMono` to `now`. Never negative. */
export function monoSinceMs(fromMono: number, now: Instant): number {
  return Math.max(0, now.mono - fromMono);
}
