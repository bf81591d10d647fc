/**
 * State management functions
 * Provides the initial state structure for the gate alarm controller
 */

import type { ClockValue } from '$types/common';
import type { GateAlarmConfig } from '$types/config';
import { createPulseTimer, startPulse } from '@core/pulse';
import { SUSPENSION_OFF, ENTRY_IDLE } from '@core/suspension';
import { createBacklightTimer } from '@core/display';

import type { GateAlarmState } from './types';

export * from './types';

/**
 * Create initial controller state
 *
 * One state object lives for the whole run. Reset puts it back to these
 * values in place; it is never reallocated.
 *
 * - gate closed, alarm silent, no suspension, no digits entered
 * - buzzer and alarm LED pulses idle
 * - heartbeat pulse running from startup
 * - backlight lit for the splash screen
 *
 * @param now - Clock reading at startup
 * @param config - Complete gate alarm configuration (USER_CONFIG + APP_CONSTANTS)
 * @returns Initial GateAlarmState with all fields populated
 *
 * @example
 * ```typescript
 * const clock = createClock();
 * const state = createInitialState(clock.millis(), CONFIG);
 * ```
 */
export function createInitialState(now: ClockValue, config: GateAlarmConfig): GateAlarmState {
  const heartbeatPulse = createPulseTimer(config.HEARTBEAT_ON_MS, config.HEARTBEAT_OFF_MS);
  startPulse(heartbeatPulse, now);

  return {
    // ═══════════════════════════════════════════════════════════════
    // CORE: GATE, ALARM, SUSPENSION
    // The gate latches open on the first sensor edge and only closes
    // on reset. The alarm sounds while open and not suspended.
    // ═══════════════════════════════════════════════════════════════

    gate: 'closed',
    alarm: 'silent',
    buzzerPulse: createPulseTimer(config.BUZZER_ON_MS, config.BUZZER_OFF_MS),
    alarmLedPulse: createPulseTimer(config.ALARM_LED_ON_MS, config.ALARM_LED_OFF_MS),
    suspension: SUSPENSION_OFF,
    digitEntry: ENTRY_IDLE,

    // ═══════════════════════════════════════════════════════════════
    // CORE: HEARTBEAT
    // Short blink every few seconds to show the loop is alive; held
    // on while the alarm is suspended.
    // ═══════════════════════════════════════════════════════════════

    heartbeatPulse: heartbeatPulse,

    // ═══════════════════════════════════════════════════════════════
    // CORE: DISPLAY
    // The splash is on screen until SPLASH_MS has passed; after that
    // frames render on the DISPLAY_UPDATE_MS cadence.
    // ═══════════════════════════════════════════════════════════════

    backlight: createBacklightTimer(config.BACKLIGHT_TIMEOUT_MS, now),
    lastFrame: null,           // Nothing rendered yet, first frame always writes
    lastRenderTime: now,
    splashActive: true,
    backlightApplied: true,    // Init lights the backlight with the splash

    // ═══════════════════════════════════════════════════════════════
    // CORE: OUTPUTS
    // ═══════════════════════════════════════════════════════════════

    lastOutputs: null,         // First poll writes every pin

    // ═══════════════════════════════════════════════════════════════
    // CORE: TIMING
    // ═══════════════════════════════════════════════════════════════

    startTime: now,
    pollCount: 0,

    // ═══════════════════════════════════════════════════════════════
    // CORE: ERROR TRACKING
    // ═══════════════════════════════════════════════════════════════

    consecutiveErrors: 0,
    lastErrorTime: 0,
  };
}
