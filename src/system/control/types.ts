/**
 * Control module type definitions
 */

import type { GateAlarmConfig } from '$types/config';
import type { Clock, Hardware } from '$types/hardware';
import type { InputInbox } from '@events';
import type { Logger } from '@logging';
import type { GateAlarmState } from '@system/state/types';

export interface Controller {
  state: GateAlarmState;
  logger: Logger;
  hardware: Hardware;
  inbox: InputInbox;
  clock: Clock;
  config: GateAlarmConfig;
  isDebug: boolean;
}

/**
 * Handle on a running poll loop
 */
export interface LoopHandle {
  /** Stop polling; safe to call more than once */
  stop(): void;
  isRunning(): boolean;
}
