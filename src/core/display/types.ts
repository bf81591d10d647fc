/**
 * Display type definitions
 */

import type { ClockValue } from '$types/common';
import type { GateState } from '@core/gate-alarm';
import type { DigitEntryState, SuspensionState } from '@core/suspension';

/**
 * Two lines of text for a 16x2 character display
 */
export interface DisplayFrame {
  readonly line1: string;
  readonly line2: string;
}

/**
 * The state a frame is rendered from
 */
export interface DisplayView {
  readonly gate: GateState;
  readonly suspension: SuspensionState;
  readonly digitEntry: DigitEntryState;
}

/**
 * Backlight auto-off timer
 */
export interface BacklightTimer {
  /** Time the backlight stays on after the last activation (ms) */
  readonly timeoutMs: number;

  /** Clock reading of the last activation */
  lastActivationTime: ClockValue;

  /** Whether the backlight is currently lit */
  on: boolean;
}
