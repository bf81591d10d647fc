/**
 * Type definitions for the collaborators around the alarm core
 *
 * The core never talks to a device directly. Everything that reads a switch,
 * lights a LED or draws on the character display sits behind these ports, so
 * the same controller runs against the terminal simulator and against test fakes.
 */

import type { ClockValue, OutputLevel } from './common';

/**
 * Timer API interface
 * Thin shape over setInterval/setTimeout so sinks and the poll loop can be driven by fakes
 */
export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   * @returns Timer handle for clear()
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): number;

  /**
   * Cancel a timer created by set()
   * @param handle - Handle returned by set()
   */
  clear(handle: number): void;
}

/**
 * Monotonic millisecond clock
 */
export interface Clock {
  /** Current counter value, wraps at 2^32 */
  millis(): ClockValue;
}

/**
 * Single digital output (buzzer, LED)
 */
export interface OutputPin {
  write(level: OutputLevel): void;
}

/**
 * The three pulsed outputs driven by the controller
 */
export interface IndicatorPins {
  buzzer: OutputPin;
  alarmLed: OutputPin;
  heartbeatLed: OutputPin;
}

/**
 * Two-line character display
 * Centering and the bus protocol are the adapter's concern.
 */
export interface DisplayPort {
  /** Replace both lines of the display */
  writeLines(line1: string, line2: string): void;
  /** Switch the backlight on or off */
  setBacklight(on: boolean): void;
}

/**
 * Debounced gate sensor
 * Mirrors the loop()/isPressed() contract of a debounced push button.
 */
export interface GateSensor {
  /** Sample the raw input; must be called once per poll */
  loop(now: ClockValue): void;
  /** True exactly once per debounced transition into the active level */
  isPressed(): boolean;
}

/**
 * Everything the controller drives or samples
 */
export interface Hardware {
  display: DisplayPort;
  pins: IndicatorPins;
  gateSensor: GateSensor;
}
