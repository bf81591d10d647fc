/**
 * Unit tests for validation helper functions
 */

import CONFIG from '@boot/config';

import {
  createReport,
  addError,
  addWarning,
  describeIssue,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateLineLength
} from './helpers';

describe('Validation Helpers', () => {
  describe('addError / addWarning', () => {
    it('should tag issues with their level', () => {
      const report = createReport();

      addError(report, 'A', 'bad');
      addWarning(report, 'B', 'odd');

      expect(report.errors).toEqual([{ level: 'CRITICAL', field: 'A', message: 'bad' }]);
      expect(report.warnings).toEqual([{ level: 'WARNING', field: 'B', message: 'odd' }]);
    });

    it('should describe an issue as field and message', () => {
      expect(describeIssue({ level: 'CRITICAL', field: 'A', message: 'bad' })).toBe('A: bad');
    });
  });

  describe('validateBoolean', () => {
    it('should accept booleans', () => {
      const report = createReport();
      validateBoolean(false, 'FLAG', report);
      expect(report.errors).toHaveLength(0);
    });

    it('should reject other types', () => {
      const report = createReport();
      validateBoolean('yes', 'FLAG', report);
      expect(report.errors[0].message).toBe('FLAG must be a boolean (got string)');
    });
  });

  describe('validateIntegerRange', () => {
    const range = { min: 1, max: 100, recommendedMin: 5, recommendedMax: 50 };

    it('should accept values inside the recommended range', () => {
      const report = createReport();
      validateIntegerRange(20, 'X', range, report);
      expect(report).toEqual({ errors: [], warnings: [] });
    });

    it('should accept the hard bounds', () => {
      const report = createReport();
      validateIntegerRange(1, 'X', { min: 1, max: 100 }, report);
      validateIntegerRange(100, 'X', { min: 1, max: 100 }, report);
      expect(report.errors).toHaveLength(0);
    });

    it('should reject non-integers', () => {
      const report = createReport();
      validateIntegerRange(2.5, 'X', range, report);
      validateIntegerRange(NaN, 'X', range, report);
      validateIntegerRange('7', 'X', range, report);

      expect(report.errors.map((e) => e.message)).toEqual([
        'X must be an integer (got 2.5)',
        'X must be an integer (got NaN)',
        'X must be an integer (got 7)',
      ]);
    });

    it('should reject values outside the hard bounds', () => {
      const report = createReport();
      validateIntegerRange(0, 'X', range, report);
      expect(report.errors[0].message).toBe('X must be between 1 and 100 (got 0)');
      expect(report.warnings).toHaveLength(0);
    });

    it('should warn outside the recommended range', () => {
      const report = createReport();
      validateIntegerRange(80, 'X', range, report);
      expect(report.errors).toHaveLength(0);
      expect(report.warnings[0].message).toBe('X is outside recommended range 5-50 (got 80)');
    });
  });

  describe('validateLogLevel', () => {
    it('should accept every level code', () => {
      const report = createReport();
      [0, 1, 2, 3].forEach((level) => validateLogLevel(level, 'L', CONFIG.LOG_LEVELS, report));
      expect(report.errors).toHaveLength(0);
    });

    it('should reject unknown codes', () => {
      const report = createReport();
      validateLogLevel(4, 'L', CONFIG.LOG_LEVELS, report);
      expect(report.errors[0].message).toBe('L must be one of 0, 1, 2, 3 (got 4)');
    });
  });

  describe('validateLineLength', () => {
    it('should allow a full line', () => {
      const report = createReport();
      validateLineLength('x'.repeat(16), 'LINE', 16, report);
      expect(report.errors).toHaveLength(0);
    });

    it('should reject a longer line', () => {
      const report = createReport();
      validateLineLength('x'.repeat(17), 'LINE', 16, report);
      expect(report.errors[0].message).toBe('LINE must be at most 16 characters (got 17)');
    });
  });
});
