/**
 * Time utility functions
 */

import { performance } from 'perf_hooks';

import type { TimerAPI } from '$types/hardware';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Get a monotonic timestamp in milliseconds
 * Unaffected by wall-clock adjustments; origin is process start.
 * @returns Milliseconds since process start
 */
export function monotonicMs(): number {
  return performance.now();
}

/**
 * Create a TimerAPI backed by Node's setInterval/setTimeout
 *
 * Handles are plain numbers so callers never hold on to Node's Timeout objects.
 * One-shot timers forget their handle once they fire.
 *
 * @returns TimerAPI for sinks and the poll loop
 */
export function createNodeTimer(): TimerAPI {
  const timers = new Map<number, NodeJS.Timeout>();
  let nextHandle = 1;

  function set(intervalMs: number, repeat: boolean, callback: () => void): number {
    const handle = nextHandle++;
    if (repeat) {
      timers.set(handle, setInterval(callback, intervalMs));
    } else {
      timers.set(handle, setTimeout(function() {
        timers.delete(handle);
        callback();
      }, intervalMs));
    }
    return handle;
  }

  function clear(handle: number): void {
    const timer = timers.get(handle);
    if (timer === undefined) {
      return;
    }
    clearInterval(timer);
    timers.delete(handle);
  }

  return { set: set, clear: clear };
}
