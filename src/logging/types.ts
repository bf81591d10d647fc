/**
 * Logging type definitions
 *
 * Types for the logging system:
 * - Logger interface and configuration
 * - Sink interfaces
 * - Filter context
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 */
export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Initialize all sinks; resolves with one message per sink that needed it */
  initialize(): Promise<InitMessage[]>;
  /** Write out anything sinks still hold and stop their timers */
  dispose(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 */
export interface SinkWithLevel {
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called; the
 * level is passed along so a sink can style the line.
 */
export interface LogSink {
  write(formattedMessage: string, level: LogLevel): void;
  initialize?(): Promise<InitMessage>;
  dispose?(): void;
}

/**
 * Console sink interface
 * Buffers messages and drains them at a fixed interval
 */
export interface ConsoleSink extends LogSink {
  initialize(): Promise<InitMessage>;
  /** Write every buffered message now */
  flush(): void;
  /** Flush and stop the drain timer */
  dispose(): void;
  getBufferSize(): number;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Maximum messages in buffer before dropping */
  bufferSize: number;
  /** Interval between draining messages (ms) */
  drainInterval: number;
  /** Colour lines by level with chalk */
  color: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** System uptime in seconds */
  uptime: number;
  /** Hours after which to demote INFO logs */
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 */
export interface InitMessage {
  success: boolean;
  message: string;
}
