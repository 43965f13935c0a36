/**
 * Error taxonomy for the epistemic engine
 */
import type { ZodError } from 'zod';

function valueAtPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = input;
  for (const segment of path) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Malformed observation or identifier. The observation is discarded and no
 * vector is changed.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError, input: unknown, label: string): ValidationError {
    const issue = error.issues[0];
    if (!issue) {
      return new ValidationError(`Invalid ${label}`, label, input);
    }
    const field = issue.path.length > 0 ? issue.path.join('.') : label;
    return new ValidationError(
      `Invalid ${label}: ${field}: ${issue.message}`,
      field,
      valueAtPath(input, issue.path),
    );
  }
}

/**
 * A claim identity that has never been observed. Returned as a value from
 * lookups, not thrown.
 */
export class UnknownClaimError extends Error {
  constructor(public readonly claimKey: string) {
    super(`No truth vector for claim ${claimKey}`);
    this.name = 'UnknownClaimError';
  }
}

/**
 * A merge produced a vector that breaks a model invariant. This is a bug;
 * the merge is not persisted.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly vectorId: string,
  ) {
    super(`Invariant violated on ${vectorId}: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(`Configuration validation error: ${message}`);
    this.name = 'ConfigValidationError';
  }

  static fromZodError(error: ZodError, label: string): ConfigValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return new ConfigValidationError(`${label}: ${issues.join('; ')}`, issues);
  }
}
