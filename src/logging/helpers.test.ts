/**
 * Unit tests for logging helper functions
 */

import chalk from 'chalk';

import { formatLogMessage, shouldLog, colorize, fmtDuration } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  test('should format DEBUG level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS)).toBe('[DEBUG]    test message');
  });

  test('should format INFO level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS)).toBe('[INFO]     test message');
  });

  test('should format WARNING level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS)).toBe('[WARNING]  test message');
  });

  test('should format CRITICAL level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS)).toBe('[CRITICAL] test message');
  });

  test('should handle empty message', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('[INFO]     ');
  });

  test('should preserve newlines', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, 'a\nb', LOG_LEVELS)).toBe('[INFO]     a\nb');
  });
});

describe('colorize', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 1;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  test('should make CRITICAL red and bold', () => {
    expect(colorize(LOG_LEVELS.CRITICAL, 'x', LOG_LEVELS)).toBe(chalk.red.bold('x'));
  });

  test('should make WARNING yellow', () => {
    expect(colorize(LOG_LEVELS.WARNING, 'x', LOG_LEVELS)).toBe(chalk.yellow('x'));
  });

  test('should make DEBUG gray', () => {
    expect(colorize(LOG_LEVELS.DEBUG, 'x', LOG_LEVELS)).toBe(chalk.gray('x'));
  });

  test('should leave INFO unstyled', () => {
    expect(colorize(LOG_LEVELS.INFO, 'x', LOG_LEVELS)).toBe('x');
  });

  test('should emit escape codes', () => {
    expect(colorize(LOG_LEVELS.WARNING, 'x', LOG_LEVELS)).toBe('\u001b[33mx\u001b[39m');
  });
});

describe('fmtDuration', () => {
  test('should show milliseconds below a second', () => {
    expect(fmtDuration(0)).toBe('0ms');
    expect(fmtDuration(250)).toBe('250ms');
  });

  test('should show tenths of seconds below a minute', () => {
    expect(fmtDuration(1000)).toBe('1s');
    expect(fmtDuration(4500)).toBe('4.5s');
    expect(fmtDuration(59940)).toBe('59.9s');
  });

  test('should show minutes and seconds', () => {
    expect(fmtDuration(60000)).toBe('1m 0s');
    expect(fmtDuration(720000)).toBe('12m 0s');
    expect(fmtDuration(61999)).toBe('1m 1s');
  });
});

describe('shouldLog', () => {
  describe('basic level filtering', () => {
    test('should log when level equals current log level', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    test('should not log when level below current log level', () => {
      expect(shouldLog(LOG_LEVELS.DEBUG, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(false);
    });

    test('should log when level above current log level', () => {
      expect(shouldLog(LOG_LEVELS.CRITICAL, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    test('should only log CRITICAL when current level is CRITICAL', () => {
      const context = { currentLevel: LOG_LEVELS.CRITICAL, uptime: 100, demoteHours: 24 };
      expect(shouldLog(LOG_LEVELS.WARNING, context, LOG_LEVELS)).toBe(false);
      expect(shouldLog(LOG_LEVELS.CRITICAL, context, LOG_LEVELS)).toBe(true);
    });
  });

  describe('auto-demotion of INFO logs', () => {
    const hours = 24;
    const threshold = hours * 3600;

    test('should demote INFO logs after uptime threshold', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: threshold + 1, demoteHours: hours }, LOG_LEVELS)).toBe(false);
    });

    test('should keep INFO logs at the exact threshold', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: threshold, demoteHours: hours }, LOG_LEVELS)).toBe(true);
    });

    test('should not demote INFO logs in DEBUG mode', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.DEBUG, uptime: threshold + 1, demoteHours: hours }, LOG_LEVELS)).toBe(true);
    });

    test('should not demote when demoteHours is 0', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: threshold * 10, demoteHours: 0 }, LOG_LEVELS)).toBe(true);
    });

    test('should not demote WARNING logs', () => {
      expect(shouldLog(LOG_LEVELS.WARNING, { currentLevel: LOG_LEVELS.INFO, uptime: threshold + 1, demoteHours: hours }, LOG_LEVELS)).toBe(true);
    });
  });
});
