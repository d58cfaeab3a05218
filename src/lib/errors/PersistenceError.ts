import { BadRequestError, NotFoundError } from './AppError';

/**
 * Domain errors raised by services sitting on top of a repository.
 * Repositories themselves report misses through `Lookup` and never throw these.
 */

export class RecordNotFoundError extends NotFoundError {
  constructor(
    readonly collection: string,
    readonly idHex: string,
  ) {
    super(
      `Record not found in ${collection} with id ${idHex}`,
      'RECORD_NOT_FOUND',
    );
  }
}

export class NoMatchError extends NotFoundError {
  constructor(readonly collection: string) {
    super(`No records in ${collection} match the given filter`, 'NO_MATCH');
  }
}

export class NestedRecordNotFoundError extends NotFoundError {
  constructor(
    readonly collection: string,
    readonly field: string,
    readonly parentIdHex: string,
    readonly nestedIdHex?: string,
  ) {
    super(
      nestedIdHex
        ? `No ${field} entry ${nestedIdHex} on ${collection} record ${parentIdHex}`
        : `No matching ${field} entry on ${collection} record ${parentIdHex}`,
      'NESTED_RECORD_NOT_FOUND',
    );
  }
}

export class UniqueViolationError extends BadRequestError {
  constructor(
    readonly collection: string,
    readonly fields: readonly string[],
  ) {
    super(
      `Unique constraint violated on ${fields.map((f) => `'${f}'`).join(', ')} in ${collection}`,
      'UNIQUE_VIOLATION',
    );
  }
}

export class InvalidNestedPayloadError extends BadRequestError {
  constructor(readonly received: string) {
    super(
      `Nested data must be a record, a string or an integer (received ${received})`,
      'INVALID_NESTED_PAYLOAD',
    );
  }
}

export class InvalidPageError extends BadRequestError {
  constructor(message: string) {
    super(message, 'INVALID_PAGE');
  }
}
