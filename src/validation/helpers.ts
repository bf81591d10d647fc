/**
 * Validation helper functions
 * Field-level checks shared by validateConfig() and the env loader
 */

import type { LogLevels } from '@logging';
import { isInteger } from '@utils/number';

import type { ConfigIssue, IntegerRange, ValidationReport } from './types';

// ═══════════════════════════════════════════════════════════════
// REPORT BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Create an empty report
 */
export function createReport(): ValidationReport {
  return { errors: [], warnings: [] };
}

/**
 * Record an issue that prevents startup
 */
export function addError(report: ValidationReport, field: string, message: string): void {
  report.errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Record an issue that is reported but tolerated
 */
export function addWarning(report: ValidationReport, field: string, message: string): void {
  report.warnings.push({ level: 'WARNING', field: field, message: message });
}

/**
 * Format an issue for the log
 * @returns e.g. "POLL_PERIOD_MS: POLL_PERIOD_MS must be between 1 and 100 (got 0)"
 */
export function describeIssue(issue: ConfigIssue): string {
  return issue.field + ': ' + issue.message;
}

// ═══════════════════════════════════════════════════════════════
// FIELD VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 */
export function validateBoolean(value: unknown, field: string, report: ValidationReport): void {
  if (typeof value !== 'boolean') {
    addError(report, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Validate an integer against hard and recommended bounds
 *
 * Outside [min, max] is an error. Outside the recommended bounds, when
 * both are given, is a warning.
 */
export function validateIntegerRange(
  value: unknown,
  field: string,
  range: IntegerRange,
  report: ValidationReport
): void {
  if (!isInteger(value)) {
    addError(report, field, `${field} must be an integer (got ${String(value)})`);
    return;
  }

  if (value < range.min || value > range.max) {
    addError(report, field, `${field} must be between ${range.min} and ${range.max} (got ${value})`);
    return;
  }

  if (range.recommendedMin === undefined || range.recommendedMax === undefined) {
    return;
  }
  if (value < range.recommendedMin || value > range.recommendedMax) {
    addWarning(
      report,
      field,
      `${field} is outside recommended range ${range.recommendedMin}-${range.recommendedMax} (got ${value})`
    );
  }
}

/**
 * Validate that a value is one of the LOG_LEVELS codes
 */
export function validateLogLevel(value: unknown, field: string, levels: LogLevels, report: ValidationReport): void {
  const allowed: number[] = [levels.DEBUG, levels.INFO, levels.WARNING, levels.CRITICAL];
  if (typeof value !== 'number' || allowed.indexOf(value) === -1) {
    addError(report, field, `${field} must be one of ${allowed.join(', ')} (got ${String(value)})`);
  }
}

/**
 * Validate that a text fits on one display line
 */
export function validateLineLength(value: string, field: string, width: number, report: ValidationReport): void {
  if (value.length > width) {
    addError(report, field, `${field} must be at most ${width} characters (got ${value.length})`);
  }
}
