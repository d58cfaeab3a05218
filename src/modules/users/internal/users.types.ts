import type { Document, ObjectId } from 'mongodb';
import {
  isDocument,
  readArray,
  readBase,
  readBoolean,
  readDate,
  readObjectId,
  readOptionalDate,
  readString,
  type BaseEntity,
  type EntityFilter,
} from '../../../lib/persistence';

export const USERS_COLLECTION = 'users';
export const ADDRESSES_FIELD = 'addresses';

/** One postal address embedded in a user document. */
export interface AddressEntity {
  _id: ObjectId;
  createdAt: Date;
  updatedAt?: Date;
  label: string;
  street: string;
  city: string;
  primary: boolean;
}

export interface UserEntity extends BaseEntity {
  email: string;
  name: string;
  passwordHash: string;
  addresses: AddressEntity[];
}

/** Fields a user listing may filter on. */
export type UserFilter = Pick<EntityFilter<UserEntity>, 'email' | 'name'>;

export function parseAddress(raw: unknown): AddressEntity {
  if (!isDocument(raw)) throw new TypeError('Address element is not a document');
  return {
    _id: readObjectId(raw, '_id'),
    createdAt: readDate(raw, 'createdAt'),
    updatedAt: readOptionalDate(raw, 'updatedAt'),
    label: readString(raw, 'label'),
    street: readString(raw, 'street'),
    city: readString(raw, 'city'),
    primary: readBoolean(raw, 'primary'),
  };
}

export function parseUser(raw: Document): UserEntity {
  return {
    ...readBase(raw),
    email: readString(raw, 'email'),
    name: readString(raw, 'name'),
    passwordHash: readString(raw, 'passwordHash'),
    addresses: readArray(raw, ADDRESSES_FIELD).map(parseAddress),
  };
}

/** Emails compare case-insensitively; store them folded. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
