/**
 * Error raised by the decision layer when a value is missing, non-numeric,
 * negative where it must not be, or non-positive where it must be positive.
 *
 * @example
 * throw new InvalidInputError('cycleTimeSeconds must be greater than 0', 'cycleTimeSeconds');
 */
export class InvalidInputError extends Error {
  readonly name = 'InvalidInputError' as const;
  readonly code = 'INVALID_INPUT' as const;
  readonly field: string | null;
  readonly details: unknown;

  constructor(message: string, field: string | null = null, details: unknown = null) {
    super(message);
    this.field = field;
    this.details = details;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

export function isInvalidInputError(err: unknown): err is InvalidInputError {
  return err instanceof InvalidInputError;
}
