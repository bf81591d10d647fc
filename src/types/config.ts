/**
 * Type definition for Gate Alarm configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for timing, feedback and observability
 */
export interface GateAlarmUserConfig {
  // ───────── LOOP & INPUTS ─────────
  readonly POLL_PERIOD_MS: number;
  readonly DEBOUNCE_MS: number;
  readonly MAX_SUSPEND_MINUTES: number;

  // ───────── PULSE CYCLES ─────────
  readonly BUZZER_ON_MS: number;
  readonly BUZZER_OFF_MS: number;
  readonly ALARM_LED_ON_MS: number;
  readonly ALARM_LED_OFF_MS: number;
  readonly HEARTBEAT_ON_MS: number;
  readonly HEARTBEAT_OFF_MS: number;

  // ───────── DISPLAY ─────────
  readonly DISPLAY_UPDATE_MS: number;
  readonly BACKLIGHT_TIMEOUT_MS: number;
  readonly SPLASH_MS: number;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;
  readonly CONSOLE_COLOR: boolean;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface GateAlarmAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── APPLICATION CONSTANTS ─────────
  readonly MAX_CONSECUTIVE_ERRORS: number;
  readonly INBOX_CAPACITY: number;

  // ───────── HARDWARE CONSTANTS ─────────
  readonly LCD_WIDTH: number;
  readonly KEYPAD_LAYOUT: readonly string[];
  readonly SPLASH_LINE_1: string;
  readonly SPLASH_LINE_2: string;
}

/**
 * Complete Gate Alarm configuration
 * Combines user config and app constants
 */
export type GateAlarmConfig = GateAlarmUserConfig & GateAlarmAppConstants;

/**
 * Overrides for user settings, from the environment or the command line
 */
export type UserConfigOverrides = {
  -readonly [K in keyof GateAlarmUserConfig]?: GateAlarmUserConfig[K];
};
