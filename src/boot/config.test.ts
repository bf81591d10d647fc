/**
 * Tests for configuration module
 */

import { validateConfig } from '@validation';

import CONFIG, { USER_CONFIG, APP_CONSTANTS, buildConfig } from './config';

describe('Configuration', () => {
  describe('USER_CONFIG', () => {
    it('should use the documented pulse timings', () => {
      expect([USER_CONFIG.BUZZER_ON_MS, USER_CONFIG.BUZZER_OFF_MS]).toEqual([1500, 1000]);
      expect([USER_CONFIG.ALARM_LED_ON_MS, USER_CONFIG.ALARM_LED_OFF_MS]).toEqual([250, 250]);
      expect([USER_CONFIG.HEARTBEAT_ON_MS, USER_CONFIG.HEARTBEAT_OFF_MS]).toEqual([100, 8000]);
    });

    it('should use the documented display timings', () => {
      expect(USER_CONFIG.DISPLAY_UPDATE_MS).toBe(250);
      expect(USER_CONFIG.BACKLIGHT_TIMEOUT_MS).toBe(10000);
      expect(USER_CONFIG.SPLASH_MS).toBe(2000);
    });

    it('should poll well inside the debounce time', () => {
      expect(USER_CONFIG.POLL_PERIOD_MS).toBeLessThan(USER_CONFIG.DEBOUNCE_MS);
    });

    it('should allow four-digit suspension delays', () => {
      expect(USER_CONFIG.MAX_SUSPEND_MINUTES).toBe(9999);
    });
  });

  describe('APP_CONSTANTS', () => {
    it('should describe a 16-column display', () => {
      expect(APP_CONSTANTS.LCD_WIDTH).toBe(16);
    });

    it('should lay out a 4x3 keypad', () => {
      expect(APP_CONSTANTS.KEYPAD_LAYOUT).toEqual(['123', '456', '789', '*0#']);
    });

    it('should fit the splash on the display', () => {
      expect(APP_CONSTANTS.SPLASH_LINE_1.length).toBeLessThanOrEqual(APP_CONSTANTS.LCD_WIDTH);
      expect(APP_CONSTANTS.SPLASH_LINE_2.length).toBeLessThanOrEqual(APP_CONSTANTS.LCD_WIDTH);
    });
  });

  describe('buildConfig', () => {
    it('should combine user settings and constants', () => {
      expect(CONFIG.BUZZER_ON_MS).toBe(USER_CONFIG.BUZZER_ON_MS);
      expect(CONFIG.LOG_LEVELS).toBe(APP_CONSTANTS.LOG_LEVELS);
    });

    it('should apply overrides without touching the defaults', () => {
      const config = buildConfig({ BUZZER_ON_MS: 800, CONSOLE_COLOR: false });

      expect(config.BUZZER_ON_MS).toBe(800);
      expect(config.CONSOLE_COLOR).toBe(false);
      expect(config.BUZZER_OFF_MS).toBe(1000);
      expect(USER_CONFIG.BUZZER_ON_MS).toBe(1500);
    });

    it('should produce a valid default configuration', () => {
      expect(validateConfig(CONFIG).valid).toBe(true);
    });
  });
});
