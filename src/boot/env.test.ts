/**
 * Tests for environment overrides
 */

import CONFIG from './config';
import { loadEnvOverrides, parseInteger, parseLogLevel } from './env';

const LEVELS = CONFIG.LOG_LEVELS;

describe('parseInteger', () => {
  it('should parse whole numbers', () => {
    expect(parseInteger('250')).toBe(250);
    expect(parseInteger(' 42 ')).toBe(42);
    expect(parseInteger('-3')).toBe(-3);
  });

  it('should reject anything else', () => {
    expect(parseInteger('2.5')).toBeNull();
    expect(parseInteger('1e3')).toBeNull();
    expect(parseInteger('ten')).toBeNull();
    expect(parseInteger('')).toBeNull();
  });
});

describe('parseLogLevel', () => {
  it('should accept names in any case', () => {
    expect(parseLogLevel('debug', LEVELS)).toBe(0);
    expect(parseLogLevel('Info', LEVELS)).toBe(1);
    expect(parseLogLevel('WARN', LEVELS)).toBe(2);
    expect(parseLogLevel('critical', LEVELS)).toBe(3);
  });

  it('should accept level numbers', () => {
    expect(parseLogLevel('2', LEVELS)).toBe(2);
  });

  it('should reject unknown levels', () => {
    expect(parseLogLevel('verbose', LEVELS)).toBeNull();
    expect(parseLogLevel('4', LEVELS)).toBeNull();
  });
});

describe('loadEnvOverrides', () => {
  it('should return nothing for an empty environment', () => {
    expect(loadEnvOverrides({}, LEVELS)).toEqual({ overrides: {}, errors: [] });
  });

  it('should read prefixed settings of every kind', () => {
    const result = loadEnvOverrides({
      GATE_ALARM_BUZZER_ON_MS: '800',
      GATE_ALARM_CONSOLE_COLOR: 'off',
      GATE_ALARM_GLOBAL_LOG_LEVEL: 'debug',
      BUZZER_ON_MS: '1',
    }, LEVELS);

    expect(result).toEqual({
      overrides: { BUZZER_ON_MS: 800, CONSOLE_COLOR: false, GLOBAL_LOG_LEVEL: 0 },
      errors: [],
    });
  });

  it('should skip empty variables', () => {
    expect(loadEnvOverrides({ GATE_ALARM_SPLASH_MS: '  ' }, LEVELS).overrides).toEqual({});
  });

  it('should report unparseable values by variable name', () => {
    const result = loadEnvOverrides({
      GATE_ALARM_DEBOUNCE_MS: 'fast',
      GATE_ALARM_CONSOLE_ENABLED: 'maybe',
      GATE_ALARM_CONSOLE_LOG_LEVEL: 'loud',
    }, LEVELS);

    expect(result.overrides).toEqual({});
    expect(result.errors).toEqual([
      { level: 'CRITICAL', field: 'GATE_ALARM_DEBOUNCE_MS', message: 'GATE_ALARM_DEBOUNCE_MS must be an integer (got "fast")' },
      { level: 'CRITICAL', field: 'GATE_ALARM_CONSOLE_ENABLED', message: 'GATE_ALARM_CONSOLE_ENABLED must be true or false (got "maybe")' },
      {
        level: 'CRITICAL',
        field: 'GATE_ALARM_CONSOLE_LOG_LEVEL',
        message: 'GATE_ALARM_CONSOLE_LOG_LEVEL must be DEBUG, INFO, WARNING or CRITICAL (got "loud")',
      },
    ]);
  });

  it('should leave range checks to the validator', () => {
    expect(loadEnvOverrides({ GATE_ALARM_POLL_PERIOD_MS: '-5' }, LEVELS).overrides).toEqual({ POLL_PERIOD_MS: -5 });
  });
});
