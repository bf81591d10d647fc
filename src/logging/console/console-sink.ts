/**
 * Console output sink with rate-limited buffering
 *
 * Messages are buffered up to a limit and drained one at a time on a timer,
 * so a burst of transitions cannot flood the terminal the simulator draws
 * its display in. When the buffer is full new messages are dropped with a
 * warning.
 */

import type { TimerAPI } from '$types';
import { colorize } from '../helpers';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, InitMessage, LogLevel, LogLevels } from '../types';

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling the drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, drainInterval, color)
 * @param logLevels - Log level constants, used to colour lines
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimer(), console, {
 *   bufferSize: 150,
 *   drainInterval: 10,
 *   color: true
 * }, LOG_LEVELS);
 * await consoleSink.initialize();
 * consoleSink.write('[INFO]     Hello', LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  logLevels: LogLevels
): ConsoleSink {
  const buffer: string[] = [];
  let drainHandle: number | null = null;

  function drain(): void {
    const next = buffer.shift();
    if (next !== undefined) {
      consoleApi.log(next);
    }
  }

  function write(formattedMessage: string, level: LogLevel): void {
    const line = config.color ? colorize(level, formattedMessage, logLevels) : formattedMessage;
    if (buffer.length < config.bufferSize) {
      buffer.push(line);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function flush(): void {
    while (buffer.length > 0) {
      drain();
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Start the drain timer (idempotent)
   */
  function initialize(): Promise<InitMessage> {
    if (drainHandle === null) {
      drainHandle = timerApi.set(config.drainInterval, true, drain);
    }
    return Promise.resolve({ success: true, message: 'Console sink initialized' });
  }

  function dispose(): void {
    flush();
    if (drainHandle !== null) {
      timerApi.clear(drainHandle);
      drainHandle = null;
    }
  }

  return {
    write: write,
    initialize: initialize,
    flush: flush,
    dispose: dispose,
    getBufferSize: getBufferSize,
  };
}
