/**
 * Gate alarm state machine
 *
 * The gate is latched open by the first sensor edge and only closes again on
 * a reset from the keypad. While it is open and no suspension is active the
 * buzzer pulses; the alarm LED flashes for as long as the gate is open,
 * suspended or not.
 *
 * Operations mutate the state in place and return whether anything changed,
 * so the caller can log transitions.
 */

import type { ClockValue } from '$types/common';
import { InvariantViolationError } from '$types/errors';
import { startPulse, stopPulse, isPulseActive } from '@core/pulse';
import { SUSPENSION_OFF, ENTRY_IDLE, isSuspended, hasExpired } from '@core/suspension';
import type { SuspensionState } from '@core/suspension';

import type { GateAlarmCoreState } from './types';

/**
 * Start the alarm (MUTABLE)
 *
 * No-op when the gate is closed or the alarm already sounds, so repeated
 * calls never restart the buzzer cycle.
 *
 * @returns true if the alarm started
 */
export function activateAlarm(state: GateAlarmCoreState, now: ClockValue): boolean {
  if (state.gate !== 'open' || state.alarm === 'sounding') {
    return false;
  }

  startPulse(state.buzzerPulse, now);
  state.alarm = 'sounding';
  return true;
}

/**
 * Stop the alarm (MUTABLE)
 * @returns true if the alarm was sounding
 */
export function silenceAlarm(state: GateAlarmCoreState): boolean {
  if (state.alarm === 'silent') {
    return false;
  }

  stopPulse(state.buzzerPulse);
  state.alarm = 'silent';
  return true;
}

/**
 * Handle a gate-opened edge from the sensor (MUTABLE)
 *
 * Idempotent: a second edge while the gate is already open changes nothing.
 *
 * @returns true if the gate was closed before
 */
export function onGateOpened(state: GateAlarmCoreState, now: ClockValue): boolean {
  if (state.gate === 'open') {
    return false;
  }

  state.gate = 'open';
  startPulse(state.alarmLedPulse, now);

  if (!isSuspended(state.suspension)) {
    activateAlarm(state, now);
  }
  return true;
}

/**
 * Reset everything to the startup state (MUTABLE)
 *
 * The only way the gate returns to closed.
 */
export function resetGateAlarm(state: GateAlarmCoreState): void {
  state.gate = 'closed';
  state.suspension = SUSPENSION_OFF;
  state.digitEntry = ENTRY_IDLE;
  silenceAlarm(state);
  stopPulse(state.alarmLedPulse);
}

/**
 * Apply a committed suspension (MUTABLE)
 *
 * An active suspension silences the alarm; cancelling it re-arms the alarm
 * if the gate is still open.
 */
export function applySuspension(state: GateAlarmCoreState, next: SuspensionState, now: ClockValue): void {
  state.suspension = next;
  state.digitEntry = ENTRY_IDLE;

  if (isSuspended(next)) {
    silenceAlarm(state);
  } else {
    activateAlarm(state, now);
  }
}

/**
 * End a timed suspension that has run out (MUTABLE)
 * @returns true if the suspension expired on this call
 */
export function expireSuspension(state: GateAlarmCoreState, now: ClockValue): boolean {
  if (!hasExpired(state.suspension, now)) {
    return false;
  }

  state.suspension = SUSPENSION_OFF;
  activateAlarm(state, now);
  return true;
}

/**
 * List broken invariants of the alarm state
 * @returns Violation descriptions, empty when the state is consistent
 */
export function checkInvariants(state: GateAlarmCoreState): string[] {
  const violations: string[] = [];
  const sounding = state.alarm === 'sounding';

  if (sounding && state.gate === 'closed') {
    violations.push('alarm sounding while gate closed');
  }
  if (sounding && isSuspended(state.suspension)) {
    violations.push('alarm sounding while suspended');
  }
  if (sounding !== isPulseActive(state.buzzerPulse)) {
    violations.push('buzzer pulse ' + (sounding ? 'stopped' : 'running') + ' while alarm ' + state.alarm);
  }
  if ((state.gate === 'open') !== isPulseActive(state.alarmLedPulse)) {
    violations.push('alarm LED pulse ' + (state.gate === 'open' ? 'stopped' : 'running') + ' while gate ' + state.gate);
  }
  if (state.suspension.kind === 'timed' && state.suspension.durationMs <= 0) {
    violations.push('timed suspension with duration ' + state.suspension.durationMs);
  }

  return violations;
}

/**
 * Throw if the alarm state is inconsistent
 * @throws {InvariantViolationError} Listing every broken invariant
 */
export function assertInvariants(state: GateAlarmCoreState): void {
  const violations = checkInvariants(state);
  if (violations.length > 0) {
    throw new InvariantViolationError(violations);
  }
}
