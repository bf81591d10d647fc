/**
 * Number guards shared by validation and the core
 */

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

