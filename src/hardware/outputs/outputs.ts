/**
 * Indicator output writer
 */

import type { IndicatorPins } from '$types/hardware';

import type { OutputLevels } from './types';

/**
 * Write output levels, touching only pins whose level changed
 *
 * @param pins - Buzzer and LED outputs
 * @param next - Levels computed for this poll
 * @param previous - Levels written last time, or null to write every pin
 * @returns The levels now on the pins
 */
export function writeOutputs(pins: IndicatorPins, next: OutputLevels, previous: OutputLevels | null): OutputLevels {
  if (previous === null || previous.buzzer !== next.buzzer) {
    pins.buzzer.write(next.buzzer);
  }
  if (previous === null || previous.alarmLed !== next.alarmLed) {
    pins.alarmLed.write(next.alarmLed);
  }
  if (previous === null || previous.heartbeatLed !== next.heartbeatLed) {
    pins.heartbeatLed.write(next.heartbeatLed);
  }
  return next;
}

/**
 * Format levels as a compact string for debug logs, e.g. "BZ:1 AL:0 HB:1"
 */
export function describeOutputs(levels: OutputLevels): string {
  return 'BZ:' + (levels.buzzer ? 1 : 0) + ' AL:' + (levels.alarmLed ? 1 : 0) + ' HB:' + (levels.heartbeatLed ? 1 : 0);
}

/**
 * Levels written on shutdown
 */
export const ALL_OUTPUTS_OFF: OutputLevels = { buzzer: false, alarmLed: false, heartbeatLed: false };
