/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_MINUTE: 60,
  MS_PER_MINUTE: 60000,
  SECONDS_PER_HOUR: 3600,
} as const;
