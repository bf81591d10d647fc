export { validateConfig } from './validator';
export { describeIssue, validateIntegerRange, validateLogLevel, validateBoolean } from './helpers';
export type { ConfigIssue, IntegerRange, ValidationReport, ValidationResult } from './types';
