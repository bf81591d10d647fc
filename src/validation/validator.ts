/**
 * Configuration validator
 *
 * Checks every user setting against the ranges documented in
 * boot/config.ts. Run on the built configuration before anything
 * starts; a single error prevents startup.
 */

import type { GateAlarmConfig } from '$types/config';

import {
  createReport,
  addWarning,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateLineLength
} from './helpers';
import type { ValidationResult } from './types';

const PULSE_RANGE = { min: 1, max: 60000 };

/**
 * Validate a complete configuration
 * @returns Errors and warnings per field
 */
export function validateConfig(config: GateAlarmConfig): ValidationResult {
  const report = createReport();

  // Loop & inputs
  validateIntegerRange(config.POLL_PERIOD_MS, 'POLL_PERIOD_MS', { min: 1, max: 100, recommendedMin: 1, recommendedMax: 20 }, report);
  validateIntegerRange(config.DEBOUNCE_MS, 'DEBOUNCE_MS', { min: 1, max: 1000, recommendedMin: 10, recommendedMax: 200 }, report);
  validateIntegerRange(config.MAX_SUSPEND_MINUTES, 'MAX_SUSPEND_MINUTES', { min: 1, max: 9999 }, report);

  if (config.POLL_PERIOD_MS >= config.DEBOUNCE_MS) {
    addWarning(
      report,
      'POLL_PERIOD_MS',
      `POLL_PERIOD_MS (${config.POLL_PERIOD_MS}) should be below DEBOUNCE_MS (${config.DEBOUNCE_MS}) or sensor edges are delayed`
    );
  }

  // Pulse cycles
  validateIntegerRange(config.BUZZER_ON_MS, 'BUZZER_ON_MS', PULSE_RANGE, report);
  validateIntegerRange(config.BUZZER_OFF_MS, 'BUZZER_OFF_MS', PULSE_RANGE, report);
  validateIntegerRange(config.ALARM_LED_ON_MS, 'ALARM_LED_ON_MS', PULSE_RANGE, report);
  validateIntegerRange(config.ALARM_LED_OFF_MS, 'ALARM_LED_OFF_MS', PULSE_RANGE, report);
  validateIntegerRange(config.HEARTBEAT_ON_MS, 'HEARTBEAT_ON_MS', PULSE_RANGE, report);
  validateIntegerRange(config.HEARTBEAT_OFF_MS, 'HEARTBEAT_OFF_MS', PULSE_RANGE, report);

  // Display
  validateIntegerRange(config.DISPLAY_UPDATE_MS, 'DISPLAY_UPDATE_MS', { min: 10, max: 5000, recommendedMin: 50, recommendedMax: 1000 }, report);
  validateIntegerRange(config.BACKLIGHT_TIMEOUT_MS, 'BACKLIGHT_TIMEOUT_MS', { min: 1000, max: 600000 }, report);
  validateIntegerRange(config.SPLASH_MS, 'SPLASH_MS', { min: 0, max: 10000 }, report);
  validateLineLength(config.SPLASH_LINE_1, 'SPLASH_LINE_1', config.LCD_WIDTH, report);
  validateLineLength(config.SPLASH_LINE_2, 'SPLASH_LINE_2', config.LCD_WIDTH, report);

  // Console
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', report);
  validateLogLevel(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', config.LOG_LEVELS, report);
  validateIntegerRange(config.CONSOLE_BUFFER_SIZE, 'CONSOLE_BUFFER_SIZE', { min: 10, max: 1000 }, report);
  validateIntegerRange(config.CONSOLE_INTERVAL_MS, 'CONSOLE_INTERVAL_MS', { min: 1, max: 200 }, report);
  validateBoolean(config.CONSOLE_COLOR, 'CONSOLE_COLOR', report);

  // Global logging
  validateLogLevel(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', config.LOG_LEVELS, report);
  validateIntegerRange(config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', { min: 0, max: 720 }, report);

  return {
    valid: report.errors.length === 0,
    errors: report.errors,
    warnings: report.warnings,
  };
}
