/**
 * Boot type definitions
 */

import type { Clock, DisplayPort, IndicatorPins, TimerAPI } from '$types/hardware';
import type { LevelReader } from '@hardware/switch';
import type { ConsoleAPI } from '@logging';

export type { InitMessage } from '@logging';

// Re-export Controller from control module
export type { Controller } from '@system/control/types';

/**
 * Everything initialize() wires into the controller
 */
export interface InitDependencies {
  display: DisplayPort;
  pins: IndicatorPins;
  /** Raw gate sensor level, debounced by the controller */
  readGateLevel: LevelReader;
  clock: Clock;
  timerApi: TimerAPI;
  consoleApi: ConsoleAPI;
  /** Seconds source for log auto-demotion (defaults to wall time) */
  timeSource?: () => number;
}
