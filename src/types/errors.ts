/**
 * Global error types for the gate alarm
 * Custom errors for validation failures and broken state invariants
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when pulse timing parameters are invalid
 */
export class PulseValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'PulseValidationError';
  }
}

/**
 * Error thrown when a keypad digit is outside 0-9
 */
export class KeypadValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'KeypadValidationError';
  }
}

/**
 * Error thrown when the controller reaches a state that must be unreachable,
 * e.g. the alarm sounding while the gate is closed.
 * Always fatal: the poll loop stops instead of repairing the state.
 */
export class InvariantViolationError extends Error {
  readonly violations: readonly string[];

  constructor(violations: readonly string[]) {
    super('Invariant violated: ' + violations.join('; '));
    this.name = 'InvariantViolationError';
    this.violations = violations;
  }
}
