/**
 * Controller initialization
 */

import type { GateAlarmConfig } from '$types/config';
import { createDebouncedSwitch } from '@hardware/switch';
import { createInputInbox } from '@events';
import { createLogger, createConsoleSink, fmtDuration } from '@logging';
import type { SinkWithLevel } from '@logging';
import { createInitialState } from '@system/state';
import { now } from '@utils/time';
import { validateConfig, describeIssue } from '@validation';

import type { Controller, InitDependencies } from './types';

export const VERSION = '1.0.0';

/**
 * Validate the configuration and wire up the controller
 *
 * Shows the splash screen with the backlight on. Nothing polls yet;
 * pass the result to startLoop().
 *
 * @param config - Complete configuration, overrides applied
 * @param deps - Hardware, clock, timers and console
 * @returns Controller, or null if the configuration is invalid
 */
export async function initialize(config: GateAlarmConfig, deps: InitDependencies): Promise<Controller | null> {
  const validation = validateConfig(config);

  if (!validation.valid) {
    deps.consoleApi.warn('INIT FAIL: Invalid configuration');
    validation.errors.forEach(function(err) {
      deps.consoleApi.warn('  [' + err.field + ']: ' + err.message);
    });
    return null;
  }

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    const consoleSink = createConsoleSink(deps.timerApi, deps.consoleApi, {
      bufferSize: config.CONSOLE_BUFFER_SIZE,
      drainInterval: config.CONSOLE_INTERVAL_MS,
      color: config.CONSOLE_COLOR,
    }, config.LOG_LEVELS);
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }

  const logger = createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS,
  }, {
    timeSource: deps.timeSource !== undefined ? deps.timeSource : now,
    sinks: sinks,
  }, config.LOG_LEVELS);

  const messages = await logger.initialize();

  logger.info('Gate Alarm v' + VERSION);
  logger.info(
    'Buzzer ' + config.BUZZER_ON_MS + '/' + config.BUZZER_OFF_MS + 'ms' +
    ' | LED ' + config.ALARM_LED_ON_MS + '/' + config.ALARM_LED_OFF_MS + 'ms' +
    ' | Backlight ' + fmtDuration(config.BACKLIGHT_TIMEOUT_MS) +
    ' | Max delay ' + config.MAX_SUSPEND_MINUTES + ' min'
  );

  // Sink failures after the title, successes are not worth a line
  messages.forEach(function(msg) {
    if (!msg.success) {
      logger.warning(msg.message);
    }
  });
  validation.warnings.forEach(function(warn) {
    logger.warning('Config ' + describeIssue(warn));
  });

  const startTime = deps.clock.millis();

  deps.display.writeLines(config.SPLASH_LINE_1, config.SPLASH_LINE_2);
  deps.display.setBacklight(true);

  const hardware = {
    display: deps.display,
    pins: deps.pins,
    gateSensor: createDebouncedSwitch(deps.readGateLevel, config.DEBOUNCE_MS, startTime),
  };

  return {
    state: createInitialState(startTime, config),
    logger: logger,
    hardware: hardware,
    inbox: createInputInbox(config.INBOX_CAPACITY),
    clock: deps.clock,
    config: config,
    isDebug: config.GLOBAL_LOG_LEVEL <= config.LOG_LEVELS.DEBUG,
  };
}
