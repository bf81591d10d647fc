/**
 * Gate alarm type definitions
 */

import type { PulseTimer } from '@core/pulse';
import type { DigitEntryState, SuspensionState } from '@core/suspension';

export type GateState = 'closed' | 'open';

export type AlarmState = 'silent' | 'sounding';

/**
 * The part of the controller state the alarm logic reads and writes
 *
 * Invariants:
 * - alarm 'sounding' only while the gate is open and no suspension is active
 * - buzzerPulse runs exactly while the alarm is sounding
 * - alarmLedPulse runs exactly while the gate is open
 */
export interface GateAlarmCoreState {
  gate: GateState;
  alarm: AlarmState;
  buzzerPulse: PulseTimer;
  alarmLedPulse: PulseTimer;
  suspension: SuspensionState;
  digitEntry: DigitEntryState;
}
