/**
 * Wrapping millisecond clock
 *
 * All timestamps in the controller are readings of an unsigned 32-bit
 * millisecond counter that wraps to 0 roughly every 49.7 days. Intervals are
 * always computed with unsigned subtraction, never by comparing two absolute
 * readings, so the wrap is invisible as long as an interval is shorter than
 * one full period.
 */

import type { ClockValue } from '$types/common';
import type { Clock } from '$types/hardware';
import { monotonicMs } from '@utils/time';

/**
 * Length of one counter period in ms (2^32)
 */
export const CLOCK_PERIOD_MS = 0x100000000;

/**
 * Fold a non-negative millisecond reading into the counter range
 * @param ms - Milliseconds, any magnitude
 * @returns Counter value in [0, 2^32)
 */
export function toClockValue(ms: number): ClockValue {
  return Math.floor(ms) >>> 0;
}

/**
 * Elapsed time between two counter readings
 *
 * Correct across a wrap: elapsed(5, 2^32 - 5) is 10.
 *
 * @param now - Current counter reading
 * @param start - Earlier counter reading
 * @returns Milliseconds from start to now
 */
export function elapsed(now: ClockValue, start: ClockValue): number {
  return (now - start) >>> 0;
}

/**
 * Create a counter clock over a monotonic millisecond source
 *
 * @param source - Monotonic ms source (defaults to performance.now())
 * @param offsetMs - Added to every reading; lets a simulator start close to the wrap
 * @returns Clock whose millis() wraps at 2^32
 *
 * @example
 * ```typescript
 * const clock = createClock();
 * const start = clock.millis();
 * // ... later
 * if (elapsed(clock.millis(), start) > 250) { ... }
 * ```
 */
export function createClock(source: () => number = monotonicMs, offsetMs = 0): Clock {
  return {
    millis: function() {
      return toClockValue(source() + offsetMs);
    },
  };
}
