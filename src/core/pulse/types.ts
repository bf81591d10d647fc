/**
 * Pulse cycle type definitions
 *
 * A pulse cycle is a repeating on/off duty cycle applied to an output to make
 * it beep or flash. The buzzer, the alarm LED and the heartbeat LED each own
 * one timer with their own durations and share a single evaluation rule.
 */

import type { ClockValue } from '$types/common';

/**
 * State of one pulsed output
 */
export interface PulseTimer {
  /** Time the output is on in each cycle (ms) */
  readonly onDurationMs: number;

  /** Time the output is off in each cycle (ms) */
  readonly offDurationMs: number;

  /** Start of the current cycle, or null when the output is idle (forced off) */
  cycleStartTime: ClockValue | null;
}
