/**
 * @arch propweave.common.errors
 *
 * Error types and codes for propweave.
 * This is the error contract - all errors should extend PropweaveError.
 */

/**
 * Base error class for all propweave errors.
 */
export class PropweaveError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PropweaveError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PropweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * One problem recorded against a property name during a build.
 * `code` is P001 for a convention violation and P002 for a duplicate member.
 */
export interface BuildProblem {
  readonly code: ErrorCode;
  readonly message: string;
}

/**
 * A registry build failed. Carries every problem found during the walk,
 * grouped by property name.
 * Error code: P000
 */
export class PropertyBuildError extends PropweaveError {
  constructor(
    message: string,
    public readonly typeName: string,
    public readonly problems: ReadonlyMap<string, readonly BuildProblem[]>
  ) {
    super(ErrorCodes.PROPERTY_BUILD_FAILED, message, {
      type: typeName,
      problems: Object.fromEntries(problems),
    });
    this.name = 'PropertyBuildError';
  }
}

/**
 * A member name could not be turned into a property name.
 * Error code: P001
 */
export class ConventionViolationError extends PropweaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.CONVENTION_VIOLATION, message, details);
    this.name = 'ConventionViolationError';
  }
}

/**
 * Lookup errors (unknown property, incompatible requested type).
 * Error codes: L001-L002
 */
export class PropertyLookupError extends PropweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PropertyLookupError';
  }
}

/**
 * Access errors raised while reading or writing a property on an instance.
 * Error codes: A001-A003
 */
export class PropertyAccessError extends PropweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, details, options);
    this.name = 'PropertyAccessError';
  }
}

/**
 * Errors from the host model (unknown type, foreign handle).
 * Error codes: H001-H002
 */
export class HostModelError extends PropweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'HostModelError';
  }
}

/**
 * System errors (parse errors, broken engine state).
 * Error codes: S001-S003
 */
export class SystemError extends PropweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Build errors (P000-P002)
  PROPERTY_BUILD_FAILED: 'P000',
  CONVENTION_VIOLATION: 'P001',
  DUPLICATE_MEMBER: 'P002',

  // Lookup errors (L001-L002)
  PROPERTY_NOT_FOUND: 'L001',
  TYPE_MISMATCH: 'L002',

  // Access errors (A001-A003)
  READ_ONLY: 'A001',
  WRITE_ONLY: 'A002',
  INVOCATION_FAILURE: 'A003',

  // Host model errors (H001-H002)
  TYPE_NOT_FOUND: 'H001',
  FOREIGN_TYPE: 'H002',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  INVALID_CONFIG: 'S002',
  ENGINE_STATE: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
