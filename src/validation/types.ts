/**
 * Validation type definitions
 */

/**
 * One problem found in a configuration
 * CRITICAL issues prevent startup, WARNING issues are only reported.
 */
export interface ConfigIssue {
  level: 'CRITICAL' | 'WARNING';
  field: string;
  message: string;
}

/**
 * Accumulator passed through the field validators
 */
export interface ValidationReport {
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
}

export interface ValidationResult extends ValidationReport {
  valid: boolean;
}

/**
 * Hard and recommended bounds of an integer setting
 */
export interface IntegerRange {
  min: number;
  max: number;
  recommendedMin?: number;
  recommendedMax?: number;
}
