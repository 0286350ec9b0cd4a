export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public readonly code: string;
  public readonly status: number;
  public readonly details?: ErrorDetails;
  public readonly cause?: Error;

  constructor(message: string, code: string, status: number, details?: ErrorDetails, cause?: Error) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
    this.details = details;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    if (cause && cause.stack) {
      this.stack += `\nCaused by: ${cause.stack}`;
    }
  }
}

/** Malformed or contradictory input. */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string, code: 'UNAUTHORIZED' | 'INVALID_TOKEN' | 'INVALID_CREDENTIALS' = 'UNAUTHORIZED') {
    super(message, code, 401);
    this.name = 'UnauthorizedError';
  }
}

/** A role or ownership rule was violated. */
export class PermissionError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'FORBIDDEN', 403, details);
    this.name = 'PermissionError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: 'USER_EXISTS' | 'PUBLISHER_EXISTS') {
    super(message, code, 409);
    this.name = 'ConflictError';
  }
}

/** A transition was attempted from the wrong state. */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'INVALID_STATE', 409, details);
    this.name = 'InvalidStateError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
