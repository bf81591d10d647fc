/**
 * Suspension type definitions
 */

import type { ClockValue } from '$types/common';

/**
 * No suspension: the alarm sounds whenever the gate is open
 */
export interface SuspensionOff {
  kind: 'off';
}

/**
 * Suspension for a fixed delay entered on the keypad
 */
export interface SuspensionTimed {
  kind: 'timed';

  /** Length of the suspension window (ms), always > 0 */
  durationMs: number;

  /** Clock reading when the window was committed */
  startTime: ClockValue;
}

/**
 * Suspension until the next reset; never expires
 */
export interface SuspensionIndefinite {
  kind: 'indefinite';
}

export type SuspensionState = SuspensionOff | SuspensionTimed | SuspensionIndefinite;

/**
 * Digit entry state of the keypad
 */
export type DigitEntryState =
  | { kind: 'idle' }
  | { kind: 'accumulating'; value: number };
