import { ForbiddenError, UnauthorizedError } from './AppError';

/**
 * Bad, tampered or expired token. Kept on the FORBIDDEN kind so clients
 * keep seeing 403 for it.
 */
export class InvalidTokenError extends ForbiddenError {
  constructor(readonly reason: string) {
    super(`Invalid access token: ${reason}`, 'AUTH_INVALID_TOKEN');
  }
}

export class MissingCredentialsError extends UnauthorizedError {
  constructor() {
    super('Missing or malformed Authorization header', 'AUTH_MISSING_CREDENTIALS');
  }
}

export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('Invalid email or password', 'AUTH_INVALID_CREDENTIALS');
  }
}
