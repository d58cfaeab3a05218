import {
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { AppError, type ErrorKind } from './AppError';
import { MongoActionError } from './MongoActionError';

const logger = new Logger('HttpErrorMapping');

const STATUS_BY_KIND: Readonly<Record<ErrorKind, HttpStatus>> = {
  NOT_FOUND: HttpStatus.NOT_FOUND,
  BAD_REQUEST: HttpStatus.BAD_REQUEST,
  INTERNAL: HttpStatus.INTERNAL_SERVER_ERROR,
  FORBIDDEN: HttpStatus.FORBIDDEN,
  UNAUTHORIZED: HttpStatus.UNAUTHORIZED,
};

export function httpStatusFor(kind: ErrorKind): HttpStatus {
  return STATUS_BY_KIND[kind];
}

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string;
}

/**
 * Convert any thrown value into an HttpException.
 * HttpExceptions pass through; AppErrors map by kind; everything else is a 500.
 * Internal details of persistence failures are logged, not returned.
 */
export function toHttpException(err: unknown): HttpException {
  if (err instanceof HttpException) return err;

  if (err instanceof AppError) {
    const status = httpStatusFor(err.kind);
    if (err instanceof MongoActionError) {
      logger.error(err.summary(), JSON.stringify(err.toJSON()));
      const body: ErrorBody = {
        statusCode: status,
        error: err.code,
        message: err.retryable
          ? 'Persistence failure; the operation is safe to retry'
          : 'Persistence failure',
      };
      return new HttpException(body, status);
    }
    const body: ErrorBody = {
      statusCode: status,
      error: err.code,
      message: err.message,
    };
    return new HttpException(body, status);
  }

  logger.error(
    'Unhandled error',
    err instanceof Error ? err.stack : String(err),
  );
  return new InternalServerErrorException();
}
