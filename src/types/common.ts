/**
 * Common type definitions used throughout the project
 */

/**
 * Reading of the wrapping millisecond counter.
 * Unsigned 32-bit integer, wraps back to 0 after 2^32 - 1.
 */
export type ClockValue = number;

/**
 * Level written to a digital output (true = HIGH)
 */
export type OutputLevel = boolean;
