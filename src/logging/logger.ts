/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Auto-demotion of INFO logs after configurable uptime
 * - Per-sink minimum level
 * - Runtime level adjustment
 * - Async sink initialization
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level and auto-demotion rules
 * 2. Formatted with a level tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: now,
 *     sinks: [{ sink: consoleSink, minLevel: LOG_LEVELS.INFO }]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info('Gate opened');
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startTime = timeSource();

  function log(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours,
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage, level);
      } catch (err) {
        // A failing sink must not take the others down with it
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks
   *
   * A sink that rejects is reported as a failed message instead of failing
   * the whole logger.
   */
  async function initialize(): Promise<InitMessage[]> {
    const pending: Promise<InitMessage>[] = [];

    for (let i = 0; i < sinks.length; i++) {
      const sink = sinks[i].sink;
      if (sink.initialize) {
        pending.push(sink.initialize().catch(function(err: unknown): InitMessage {
          return { success: false, message: 'Sink initialization failed: ' + String(err) };
        }));
      }
    }

    return Promise.all(pending);
  }

  function dispose(): void {
    for (let i = 0; i < sinks.length; i++) {
      const sink = sinks[i].sink;
      if (sink.dispose) {
        sink.dispose();
      }
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize,
    dispose: dispose,
  };
}
