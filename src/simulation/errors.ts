/**
 * Error classes raised by the engine.
 *
 * Validation failures are never thrown; they come back as `{ valid: false, errors }`.
 */

/**
 * A validated action could not be resolved. The phase pipeline catches it and
 * returns `{ success: false, error }` with no changes.
 */
export class ProcessingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProcessingError';
  }
}

/**
 * Malformed state or a broken engine invariant. Always fatal for the action.
 */
export class IntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntegrityError';
  }
}

export function assertIntegrity(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new IntegrityError(message);
  }
}
