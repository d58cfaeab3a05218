import { Injectable } from '@nestjs/common';
import type { Document } from 'mongodb';
import { BaseRepository } from '../../lib/persistence';
import { MongodbService } from '../mongodb/mongodb.service';
import {
  parseUser,
  USERS_COLLECTION,
  type UserEntity,
  type UserFilter,
} from './internal/users.types';

@Injectable()
export class UsersRepository extends BaseRepository<UserEntity, UserFilter> {
  protected readonly collectionName = USERS_COLLECTION;

  public constructor(mongo: MongodbService) {
    super(mongo);
  }

  protected parse(raw: Document): UserEntity {
    return parseUser(raw);
  }
}
