/**
 * Environment overrides
 *
 * Any user setting can be overridden with a GATE_ALARM_<NAME> variable,
 * e.g. GATE_ALARM_BUZZER_ON_MS=800. Variables are read from the process
 * environment after dotenv has loaded the .env file. Values are parsed
 * here and range-checked later by validateConfig().
 */

import * as dotenv from 'dotenv';

import type { GateAlarmUserConfig, UserConfigOverrides } from '$types/config';
import type { LogLevel, LogLevels } from '@logging';
import type { ConfigIssue } from '@validation';

export const ENV_PREFIX = 'GATE_ALARM_';

type NumericKey = {
  [K in keyof GateAlarmUserConfig]-?: number extends GateAlarmUserConfig[K] ? K : never
}[keyof GateAlarmUserConfig];

type BooleanKey = {
  [K in keyof GateAlarmUserConfig]-?: GateAlarmUserConfig[K] extends boolean ? K : never
}[keyof GateAlarmUserConfig];

type LogLevelKey = {
  [K in keyof GateAlarmUserConfig]-?: GateAlarmUserConfig[K] extends LogLevel ? K : never
}[keyof GateAlarmUserConfig];

const NUMERIC_KEYS: readonly NumericKey[] = [
  'POLL_PERIOD_MS',
  'DEBOUNCE_MS',
  'MAX_SUSPEND_MINUTES',
  'BUZZER_ON_MS',
  'BUZZER_OFF_MS',
  'ALARM_LED_ON_MS',
  'ALARM_LED_OFF_MS',
  'HEARTBEAT_ON_MS',
  'HEARTBEAT_OFF_MS',
  'DISPLAY_UPDATE_MS',
  'BACKLIGHT_TIMEOUT_MS',
  'SPLASH_MS',
  'CONSOLE_BUFFER_SIZE',
  'CONSOLE_INTERVAL_MS',
  'GLOBAL_LOG_AUTO_DEMOTE_HOURS',
];

const BOOLEAN_KEYS: readonly BooleanKey[] = ['CONSOLE_ENABLED', 'CONSOLE_COLOR'];

const LOG_LEVEL_KEYS: readonly LogLevelKey[] = ['CONSOLE_LOG_LEVEL', 'GLOBAL_LOG_LEVEL'];

export interface EnvOverrides {
  overrides: UserConfigOverrides;
  errors: ConfigIssue[];
}

/**
 * Parse a log level given by name (case-insensitive) or by number
 * @returns Level, or null if the text names no level
 */
export function parseLogLevel(text: string, levels: LogLevels): LogLevel | null {
  switch (text.trim().toUpperCase()) {
    case 'DEBUG':
    case '0':
      return levels.DEBUG;
    case 'INFO':
    case '1':
      return levels.INFO;
    case 'WARNING':
    case 'WARN':
    case '2':
      return levels.WARNING;
    case 'CRITICAL':
    case '3':
      return levels.CRITICAL;
    default:
      return null;
  }
}

/**
 * Parse a whole decimal number
 * @returns Number, or null for anything but an optionally signed run of digits
 */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : null;
}

function parseBoolean(text: string): boolean | null {
  switch (text.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      return null;
  }
}

function invalid(name: string, expected: string, raw: string): ConfigIssue {
  return { level: 'CRITICAL', field: name, message: `${name} must be ${expected} (got "${raw}")` };
}

/**
 * Read GATE_ALARM_* overrides from an environment
 *
 * Unset and empty variables are skipped.
 *
 * @param env - Variables to read, normally process.env
 * @param levels - Log level codes
 */
export function loadEnvOverrides(env: NodeJS.ProcessEnv, levels: LogLevels): EnvOverrides {
  const overrides: UserConfigOverrides = {};
  const errors: ConfigIssue[] = [];

  function read(key: string): string | null {
    const raw = env[ENV_PREFIX + key];
    return raw === undefined || raw.trim() === '' ? null : raw;
  }

  NUMERIC_KEYS.forEach(function(key) {
    const raw = read(key);
    if (raw === null) return;
    const value = parseInteger(raw);
    if (value === null) {
      errors.push(invalid(ENV_PREFIX + key, 'an integer', raw));
    } else {
      overrides[key] = value;
    }
  });

  BOOLEAN_KEYS.forEach(function(key) {
    const raw = read(key);
    if (raw === null) return;
    const value = parseBoolean(raw);
    if (value === null) {
      errors.push(invalid(ENV_PREFIX + key, 'true or false', raw));
    } else {
      overrides[key] = value;
    }
  });

  LOG_LEVEL_KEYS.forEach(function(key) {
    const raw = read(key);
    if (raw === null) return;
    const value = parseLogLevel(raw, levels);
    if (value === null) {
      errors.push(invalid(ENV_PREFIX + key, 'DEBUG, INFO, WARNING or CRITICAL', raw));
    } else {
      overrides[key] = value;
    }
  });

  return { overrides: overrides, errors: errors };
}

/**
 * Load a .env file into process.env
 *
 * A missing default .env is normal. A file named explicitly must exist.
 *
 * @param path - File to load, or undefined for ./.env
 * @returns Error message, or null when loaded or not needed
 */
export function loadEnvFile(path?: string): string | null {
  const result = path === undefined ? dotenv.config() : dotenv.config({ path: path });
  if (result.error && path !== undefined) {
    return 'Cannot load ' + path + ': ' + result.error.message;
  }
  return null;
}
