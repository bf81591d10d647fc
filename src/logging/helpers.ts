/**
 * Logging helper functions
 */

import chalk from 'chalk';

import { TIME_CONSTANTS } from '@utils/constants';
import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a duration for log output
 * @param ms - Duration in milliseconds
 * @returns e.g. "250ms", "4.5s", "12m 0s"
 */
export function fmtDuration(ms: number): string {
  if (ms < TIME_CONSTANTS.MS_PER_SECOND) {
    return Math.round(ms) + 'ms';
  }
  if (ms < TIME_CONSTANTS.MS_PER_MINUTE) {
    return (Math.round(ms / 100) / 10) + 's';
  }
  const minutes = Math.floor(ms / TIME_CONSTANTS.MS_PER_MINUTE);
  const seconds = Math.floor((ms % TIME_CONSTANTS.MS_PER_MINUTE) / TIME_CONSTANTS.MS_PER_SECOND);
  return minutes + 'm ' + seconds + 's';
}

/**
 * Format log message with level tag
 *
 * Adds a fixed-width prefix tag:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "[INFO]     "
 * - WARNING: "[WARNING]  "
 * - CRITICAL: "[CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = '[INFO]     ';
  if (level === logLevels.WARNING) tag = '[WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '[CRITICAL] ';

  return tag + msg;
}

/**
 * Colour a formatted line by level
 *
 * INFO keeps the terminal default colour.
 *
 * @param level - Level the line was logged at
 * @param line - Formatted log line
 * @param logLevels - Log level constants object
 */
export function colorize(level: LogLevel, line: string, logLevels: LogLevels): string {
  if (level === logLevels.CRITICAL) return chalk.red.bold(line);
  if (level === logLevels.WARNING) return chalk.yellow(line);
  if (level === logLevels.DEBUG) return chalk.gray(line);
  return line;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Message level must be >= current level
 * 2. INFO logs are suppressed after demoteHours of uptime
 *    (not in DEBUG mode, and only when demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * TIME_CONSTANTS.SECONDS_PER_HOUR) {
      return false;
    }
  }

  return true;
}
