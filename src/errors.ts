/**
 * Error taxonomy for the shortener.
 *
 * Every error the HTTP layer can report carries a stable code and the
 * status it maps to. Anything that is not an AppError becomes a 500.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Malformed, too long or self-referential destination */
export class InvalidUrlError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_URL', 400);
    this.name = 'InvalidUrlError';
  }
}

/** Destination scheme other than http/https */
export class UnsupportedSchemeError extends AppError {
  constructor(public readonly scheme: string) {
    super(`Unsupported URL scheme "${scheme}". Only http and https are allowed.`, 'UNSUPPORTED_SCHEME', 422);
    this.name = 'UnsupportedSchemeError';
  }
}

export class InvalidCodeError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_CODE', 400);
    this.name = 'InvalidCodeError';
  }
}

export class InvalidRequestError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 400);
    this.name = 'InvalidRequestError';
  }
}

/** Raised by the store's uniqueness constraint, never by a pre-check */
export class ConflictError extends AppError {
  constructor(public readonly shortCode: string) {
    super(`Code "${shortCode}" is already in use`, 'CODE_IN_USE', 409);
    this.name = 'ConflictError';
  }
}

export class UnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'UNAVAILABLE', 503);
    this.name = 'UnavailableError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** A generated code collided twice; the sequence or the table is corrupt */
export class InvariantViolationError extends AppError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION', 500);
    this.name = 'InvariantViolationError';
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
