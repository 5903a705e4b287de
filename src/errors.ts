/**
 * Error taxonomy shared by the managers and the HTTP router.
 *
 * Validation, duplicate and capacity failures are reported to API clients as
 * `{ status: 'error', message }` with HTTP 200; malformed requests as 400.
 */

export type ErrorKind = 'validation' | 'duplicate' | 'capacity' | 'not-found' | 'malformed-request';

export class CasefileError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends CasefileError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class DuplicateError extends CasefileError {
  constructor(message: string) {
    super('duplicate', message);
  }
}

export class CapacityError extends CasefileError {
  constructor(message: string) {
    super('capacity', message);
  }
}

export class NotFoundError extends CasefileError {
  constructor(message = 'Not found') {
    super('not-found', message);
  }
}

export class MalformedRequestError extends CasefileError {
  constructor(message: string) {
    super('malformed-request', message);
  }
}

/**
 * Errors a caller can fix by changing the request payload.
 */
export function isRecoverable(err: unknown): err is ValidationError | DuplicateError | CapacityError {
  return (
    err instanceof ValidationError || err instanceof DuplicateError || err instanceof CapacityError
  );
}
