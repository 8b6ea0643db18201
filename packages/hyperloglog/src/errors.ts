export enum ErrorKind {
  InvalidPrecision = 'InvalidPrecision',
  PrecisionMismatch = 'PrecisionMismatch',
  MalformedInput = 'MalformedInput',
}

/**
 * Base class for every error the sketches throw. None of them are retryable:
 * they indicate a programming error or corrupt data.
 */
export class SketchError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.name = 'SketchError';
  }
}

export class InvalidPrecisionError extends SketchError {
  readonly precision: number;

  constructor(precision: number, min: number, max: number) {
    super(
      ErrorKind.InvalidPrecision,
      `Precision must be an integer between ${min} and ${max}, got ${precision}`,
    );
    this.name = 'InvalidPrecisionError';
    this.precision = precision;
  }
}

export class PrecisionMismatchError extends SketchError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      ErrorKind.PrecisionMismatch,
      `Cannot merge sketches with different precision: ${expected} !== ${actual}`,
    );
    this.name = 'PrecisionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class MalformedInputError extends SketchError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorKind.MalformedInput, message, options);
    this.name = 'MalformedInputError';
  }
}
