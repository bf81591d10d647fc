/**
 * Suspension manager
 *
 * Digits typed on the keypad build up a delay in minutes. '#' commits it:
 * a positive value starts a timed suspension, 0 cancels any suspension and
 * '#' without digits suspends the alarm until the next reset.
 *
 * All functions are pure; the controller assigns the returned states.
 */

import type { ClockValue } from '$types/common';
import { KeypadValidationError } from '$types/errors';
import { elapsed } from '@core/clock';
import { isInteger } from '@utils/number';
import { TIME_CONSTANTS } from '@utils/constants';

import type { DigitEntryState, SuspensionState } from './types';

export const SUSPENSION_OFF: SuspensionState = { kind: 'off' };
export const ENTRY_IDLE: DigitEntryState = { kind: 'idle' };

/**
 * Whether any suspension (timed or indefinite) is active
 */
export function isSuspended(suspension: SuspensionState): boolean {
  return suspension.kind !== 'off';
}

/**
 * Append a digit to the entry
 *
 * The value saturates at maxValue instead of growing without bound, so
 * holding a key down cannot overflow the accumulator.
 *
 * @param entry - Current digit entry
 * @param digit - Digit 0-9
 * @param maxValue - Largest value the entry may hold (minutes)
 * @returns New digit entry, always accumulating
 * @throws {KeypadValidationError} If digit is not an integer 0-9
 */
export function appendDigit(entry: DigitEntryState, digit: number, maxValue: number): DigitEntryState {
  if (!isInteger(digit) || digit < 0 || digit > 9) {
    throw new KeypadValidationError('digit must be an integer 0-9, got ' + digit);
  }

  const previous = entry.kind === 'accumulating' ? entry.value : 0;
  return { kind: 'accumulating', value: Math.min(previous * 10 + digit, maxValue) };
}

/**
 * Turn the entry into a suspension
 *
 * - idle → indefinite
 * - accumulating(0) → off
 * - accumulating(v) → timed for v minutes from now
 *
 * @param entry - Digit entry at the moment '#' was pressed
 * @param now - Current clock reading
 * @returns Suspension to apply; the entry goes back to idle in every case
 */
export function commitEntry(entry: DigitEntryState, now: ClockValue): SuspensionState {
  if (entry.kind === 'idle') {
    return { kind: 'indefinite' };
  }

  if (entry.value === 0) {
    return SUSPENSION_OFF;
  }

  return {
    kind: 'timed',
    durationMs: entry.value * TIME_CONSTANTS.MS_PER_MINUTE,
    startTime: now,
  };
}

/**
 * Time left in a timed suspension
 * @param suspension - Current suspension
 * @param now - Current clock reading
 * @returns Remaining ms (0 once elapsed), or null when not timed
 */
export function remainingMs(suspension: SuspensionState, now: ClockValue): number | null {
  if (suspension.kind !== 'timed') {
    return null;
  }
  return Math.max(0, suspension.durationMs - elapsed(now, suspension.startTime));
}

/**
 * Whether a timed suspension has run out
 *
 * Uses strictly greater than: a 1 minute suspension committed at T is still
 * active at T+60000 and expires at T+60001.
 */
export function hasExpired(suspension: SuspensionState, now: ClockValue): boolean {
  if (suspension.kind !== 'timed') {
    return false;
  }
  return elapsed(now, suspension.startTime) > suspension.durationMs;
}

/**
 * Describe a suspension for log output
 */
export function describeSuspension(suspension: SuspensionState): string {
  switch (suspension.kind) {
    case 'off':
      return 'off';
    case 'indefinite':
      return 'indefinite';
    case 'timed':
      return 'timed ' + suspension.durationMs / TIME_CONSTANTS.MS_PER_MINUTE + ' min';
  }
}
