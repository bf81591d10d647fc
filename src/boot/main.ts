#!/usr/bin/env node
/**
 * Gate alarm terminal simulator
 *
 * Runs the controller against a terminal: the display is drawn as a
 * panel, 0-9 # * go to the keypad, g toggles the gate sensor and q quits.
 */

import { Command, InvalidArgumentError } from 'commander';

import type { UserConfigOverrides } from '$types/config';
import { createClock, CLOCK_PERIOD_MS } from '@core/clock';
import { writeOutputs, ALL_OUTPUTS_OFF } from '@hardware/outputs';
import { createTerminalDisplay, createTerminalPins, attachTerminalKeys } from '@hardware/terminal';
import type { LogLevel } from '@logging';
import { startLoop } from '@system/control';
import { createNodeTimer, monotonicMs } from '@utils/time';

import { APP_CONSTANTS, buildConfig } from './config';
import { loadEnvFile, loadEnvOverrides, parseInteger, parseLogLevel } from './env';
import { initialize, VERSION } from './init';
import type { Controller } from './types';

export interface CliOptions {
  pollMs?: number;
  logLevel?: LogLevel;
  color: boolean;
  env?: string;
  wrapIn?: number;
}

function integerOption(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === null || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function logLevelOption(value: string): LogLevel {
  const level = parseLogLevel(value, APP_CONSTANTS.LOG_LEVELS);
  if (level === null) {
    throw new InvalidArgumentError('Use debug, info, warning or critical.');
  }
  return level;
}

/**
 * Build the command-line parser
 */
export function createProgram(): Command {
  return new Command()
    .name('gate-alarm')
    .description('Gate alarm controller running in a terminal')
    .version(VERSION)
    .option('--poll-ms <ms>', 'poll period in ms', integerOption)
    .option('--log-level <level>', 'log level: debug, info, warning or critical', logLevelOption)
    .option('--no-color', 'plain output without ANSI colours')
    .option('--env <file>', 'load GATE_ALARM_* settings from this file instead of .env')
    .option('--wrap-in <ms>', 'start the clock this many ms before the counter wraps', integerOption);
}

/**
 * Settings given on the command line
 */
export function cliOverrides(options: CliOptions): UserConfigOverrides {
  const overrides: UserConfigOverrides = {};
  if (options.pollMs !== undefined) {
    overrides.POLL_PERIOD_MS = options.pollMs;
  }
  if (options.logLevel !== undefined) {
    overrides.GLOBAL_LOG_LEVEL = options.logLevel;
    overrides.CONSOLE_LOG_LEVEL = options.logLevel;
  }
  if (!options.color) {
    overrides.CONSOLE_COLOR = false;
  }
  return overrides;
}

/**
 * Drive every output low and flush the logs
 */
export function shutdownController(controller: Controller): void {
  const state = controller.state;
  state.lastOutputs = writeOutputs(controller.hardware.pins, ALL_OUTPUTS_OFF, state.lastOutputs);
  controller.logger.info('Shutting down');
  controller.logger.dispose();
}

/**
 * Run the simulator until quit
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const options = createProgram().parse(argv).opts<CliOptions>();

  const envError = loadEnvFile(options.env);
  if (envError !== null) {
    console.error(envError);
    return 1;
  }

  const env = loadEnvOverrides(process.env, APP_CONSTANTS.LOG_LEVELS);
  if (env.errors.length > 0) {
    console.error('INIT FAIL: Invalid environment');
    env.errors.forEach(function(err) {
      console.error('  [' + err.field + ']: ' + err.message);
    });
    return 1;
  }

  const config = buildConfig({ ...env.overrides, ...cliOverrides(options) });
  const display = createTerminalDisplay(process.stdout, { width: config.LCD_WIDTH, color: config.CONSOLE_COLOR });
  const pins = createTerminalPins(process.stdout, true);
  const timerApi = createNodeTimer();
  const clock = options.wrapIn !== undefined
    ? createClock(monotonicMs, CLOCK_PERIOD_MS - monotonicMs() - options.wrapIn)
    : createClock();
  let gateLevel = false;

  const initialized = await initialize(config, {
    display: display,
    pins: pins,
    readGateLevel: function() {
      return gateLevel;
    },
    clock: clock,
    timerApi: timerApi,
    consoleApi: console,
  });

  if (initialized === null) {
    return 1;
  }

  const controller: Controller = initialized;

  const logger = controller.logger;
  logger.info('Keys: 0-9 # * keypad | g gate sensor | q quit');

  return new Promise<number>(function(resolve) {
    let finished = false;

    function shutdown(code: number): void {
      if (finished) {
        return;
      }
      finished = true;

      loop.stop();
      detach();
      process.removeListener('SIGINT', onSigint);

      shutdownController(controller);
      resolve(code);
    }

    function onSigint(): void {
      shutdown(0);
    }

    const detach = attachTerminalKeys(process.stdin, {
      onKey: function(key: string) {
        if (!controller.inbox.push({ kind: 'key', key: key })) {
          logger.warning('Input inbox full, key dropped');
        }
      },
      onToggleGate: function() {
        gateLevel = !gateLevel;
        logger.debug('Gate sensor ' + (gateLevel ? 'triggered' : 'released'));
      },
      onQuit: function() {
        shutdown(0);
      },
    });

    const loop = startLoop(controller, timerApi, function() {
      shutdown(1);
    });

    process.on('SIGINT', onSigint);
  });
}

if (require.main === module) {
  main(process.argv).then(function(code) {
    process.exitCode = code;
  }, function(err: unknown) {
    console.error('Fatal: ' + String(err));
    process.exitCode = 1;
  });
}
