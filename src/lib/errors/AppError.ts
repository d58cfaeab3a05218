/**
 * Failure kinds visible outside the persistence core.
 * Transport mapping lives in `http.ts` and depends on the kind only.
 */
export type ErrorKind =
  | 'NOT_FOUND'
  | 'BAD_REQUEST'
  | 'INTERNAL'
  | 'FORBIDDEN'
  | 'UNAUTHORIZED';

export class AppError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly cause?: unknown;

  constructor(
    message: string,
    code = 'APP_ERROR',
    kind: ErrorKind = 'INTERNAL',
    cause?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.kind = kind;
    this.cause = cause;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code = 'NOT_FOUND') {
    super(message, code, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code = 'BAD_REQUEST') {
    super(message, code, 'BAD_REQUEST');
    this.name = 'BadRequestError';
  }
}

export class InternalServerError extends AppError {
  constructor(message: string, code = 'INTERNAL_SERVER_ERROR', cause?: unknown) {
    super(message, code, 'INTERNAL', cause);
    this.name = 'InternalServerError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, code = 'FORBIDDEN') {
    super(message, code, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string, code = 'UNAUTHORIZED') {
    super(message, code, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}
