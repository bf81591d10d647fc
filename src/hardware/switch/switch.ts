/**
 * Debounced switch
 *
 * A raw level only becomes the steady level after it has held for the
 * debounce time. A press is reported for exactly one loop() call, the one in
 * which the steady level became active.
 */

import type { ClockValue } from '$types/common';
import type { GateSensor } from '$types/hardware';
import { elapsed } from '@core/clock';

import type { LevelReader } from './types';

/**
 * Create a debounced switch
 *
 * The level read at creation is the initial steady level, so a switch that
 * is already active at startup reports no press.
 *
 * @param readLevel - Raw level source
 * @param debounceMs - Time a level must hold before it counts
 * @param now - Clock reading at creation
 */
export function createDebouncedSwitch(readLevel: LevelReader, debounceMs: number, now: ClockValue): GateSensor {
  const initial = readLevel();
  let flickerLevel = initial;
  let lastFlickerTime = now;
  let steadyLevel = initial;
  let previousSteadyLevel = initial;

  function loop(current: ClockValue): void {
    const level = readLevel();

    if (level !== flickerLevel) {
      flickerLevel = level;
      lastFlickerTime = current;
    }

    previousSteadyLevel = steadyLevel;
    if (elapsed(current, lastFlickerTime) >= debounceMs) {
      steadyLevel = flickerLevel;
    }
  }

  return {
    loop: loop,
    isPressed: function() {
      return !previousSteadyLevel && steadyLevel;
    },
  };
}
