/**
 * Output type definitions
 */

import type { OutputLevel } from '$types/common';

/**
 * Levels of the three pulsed outputs for one poll
 */
export interface OutputLevels {
  readonly buzzer: OutputLevel;
  readonly alarmLed: OutputLevel;
  readonly heartbeatLed: OutputLevel;
}
