/**
 * Debounced switch type definitions
 */

/**
 * Reads the raw switch level; true is the active (triggered) level
 */
export type LevelReader = () => boolean;
