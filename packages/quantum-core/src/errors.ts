/**
 * Error types
 *
 * Every error raised by qclearn packages for a broken call contract
 * extends QclearnError, so callers can tell them apart from runtime faults.
 */

/**
 * Machine-readable error codes
 */
export type QclearnErrorCode =
  | 'DIMENSION_MISMATCH'
  | 'INVALID_REFERENCE'
  | 'UNSUPPORTED_AXIS'
  | 'INVALID_CONFIGURATION';

/**
 * Base class for qclearn contract violations
 */
export class QclearnError extends Error {
  readonly code: QclearnErrorCode;

  constructor(code: QclearnErrorCode, message: string) {
    super(message);
    this.name = 'QclearnError';
    this.code = code;
  }
}

/**
 * A vector, matrix or sample does not have the length the callee expects.
 */
export class DimensionMismatchError extends QclearnError {
  readonly expected: number;
  readonly actual: number;

  constructor(subject: string, expected: number, actual: number) {
    super('DIMENSION_MISMATCH', `${subject}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A slot refers to a parameter or position that does not exist
 * or cannot be used for the requested role.
 */
export class InvalidReferenceError extends QclearnError {
  readonly reference: number;

  constructor(reference: number, message: string) {
    super('INVALID_REFERENCE', message);
    this.name = 'InvalidReferenceError';
    this.reference = reference;
  }
}

/**
 * A rotation or Pauli tag outside {X, Y, Z}
 */
export class UnsupportedAxisError extends QclearnError {
  readonly axis: string;

  constructor(axis: string) {
    super('UNSUPPORTED_AXIS', `Unsupported axis '${axis}': expected one of X, Y, Z`);
    this.name = 'UnsupportedAxisError';
    this.axis = axis;
  }
}

/**
 * Options rejected by validation
 */
export class ConfigurationError extends QclearnError {
  readonly issues: readonly string[];

  constructor(subject: string, issues: readonly string[]) {
    super('INVALID_CONFIGURATION', `Invalid ${subject}: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
