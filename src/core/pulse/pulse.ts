/**
 * Pulse scheduler
 *
 * Evaluates the phase of a pulse cycle from the wrapping clock. Instead of
 * taking the elapsed time modulo the cycle length, a cycle that has run its
 * full length is restarted at the current reading. A long gap between polls
 * therefore costs at most one cycle of drift and never accumulates.
 */

import type { ClockValue } from '$types/common';
import { PulseValidationError } from '$types/errors';
import { elapsed } from '@core/clock';
import { isInteger } from '@utils/number';

import type { PulseTimer } from './types';

/**
 * Create an idle pulse timer
 * @param onDurationMs - On time per cycle, positive integer ms
 * @param offDurationMs - Off time per cycle, positive integer ms
 * @throws {PulseValidationError} If either duration is not a positive integer
 */
export function createPulseTimer(onDurationMs: number, offDurationMs: number): PulseTimer {
  if (!isInteger(onDurationMs) || onDurationMs <= 0) {
    throw new PulseValidationError('onDurationMs must be a positive integer, got ' + onDurationMs);
  }
  if (!isInteger(offDurationMs) || offDurationMs <= 0) {
    throw new PulseValidationError('offDurationMs must be a positive integer, got ' + offDurationMs);
  }

  return {
    onDurationMs: onDurationMs,
    offDurationMs: offDurationMs,
    cycleStartTime: null,
  };
}

/**
 * Start (or restart) the cycle at now; the output is on immediately
 */
export function startPulse(timer: PulseTimer, now: ClockValue): void {
  timer.cycleStartTime = now;
}

/**
 * Stop the cycle; the output is forced off
 */
export function stopPulse(timer: PulseTimer): void {
  timer.cycleStartTime = null;
}

/**
 * Whether the timer has a running cycle
 */
export function isPulseActive(timer: PulseTimer): boolean {
  return timer.cycleStartTime !== null;
}

/**
 * Evaluate the output level of a pulse cycle
 *
 * With on=1500, off=1000 and a cycle started at T:
 * - [T, T+1500): on
 * - [T+1500, T+2500): off
 * - T+2500 or later: cycle restarts at now, on
 *
 * May move `cycleStartTime` forward (resynchronisation), so it must be
 * called with the same timer every poll rather than on a copy.
 *
 * @param now - Current clock reading
 * @param timer - Pulse timer to evaluate
 * @returns true when the output should be high
 */
export function isPulseOn(now: ClockValue, timer: PulseTimer): boolean {
  if (timer.cycleStartTime === null) {
    return false;
  }

  const sinceStart = elapsed(now, timer.cycleStartTime);

  if (sinceStart >= timer.onDurationMs + timer.offDurationMs) {
    timer.cycleStartTime = now;
    return true;
  }

  return sinceStart < timer.onDurationMs;
}

/**
 * Evaluate the heartbeat LED
 *
 * While the alarm is suspended the heartbeat is lit continuously, so an
 * operator can tell a suspended alarm from an idle one at a glance.
 *
 * @param now - Current clock reading
 * @param timer - Heartbeat pulse timer
 * @param suspended - Whether any suspension (timed or indefinite) is active
 * @returns true when the heartbeat LED should be high
 */
export function heartbeatLevel(now: ClockValue, timer: PulseTimer, suspended: boolean): boolean {
  if (suspended) {
    return true;
  }
  return isPulseOn(now, timer);
}
