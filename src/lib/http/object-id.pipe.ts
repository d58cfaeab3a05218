import { Injectable, type PipeTransform } from '@nestjs/common';
import { ObjectId } from 'mongodb';
import { NotFoundError } from '../errors/AppError';
import { isHex24 } from '../utils/strings';
import { toHttpException } from '../errors/http';

/**
 * Route param to ObjectId. A malformed id cannot name a stored record,
 * so it is reported as 404 rather than 400.
 */
@Injectable()
export class ParseObjectIdPipe implements PipeTransform<string, ObjectId> {
  public transform(value: string): ObjectId {
    if (!isHex24(value)) {
      throw toHttpException(new NotFoundError(`No record with id '${value}'`, 'INVALID_ID'));
    }
    return new ObjectId(value);
  }
}
