/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering and colour (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, colorize, fmtDuration } from './helpers';
export { createConsoleSink } from './console';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FilterContext,
  InitMessage
} from './types';
