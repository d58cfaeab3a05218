import { ObjectId, type Document } from 'mongodb';

/** Fields every persisted record carries. */
export interface BaseEntity {
  _id: ObjectId;
  createdAt: Date;
  updatedAt?: Date;
}

/** Keys a caller may never overwrite once a record exists. */
export const IMMUTABLE_KEYS = ['_id', 'createdAt'] as const;
export type ImmutableKey = (typeof IMMUTABLE_KEYS)[number];

/** Entity data as accepted by `create`: identity and timestamps are optional. */
export type NewEntity<T extends BaseEntity> = Omit<T, keyof BaseEntity> &
  Partial<BaseEntity>;

/** Entity data as accepted by `update`: identity and creation time are dropped. */
export type EntityChanges<T extends BaseEntity> = Omit<T, ImmutableKey>;

/**
 * Exact-match conjunction over a record's own fields.
 * No ranges, no `$or`: every key must equal its value.
 */
export type EntityFilter<T extends BaseEntity> = {
  [K in keyof T]?: T[K];
};

/** Turns a stored document into a typed value. */
export type Parser<T> = (raw: Document) => T;

/**
 * Turns one element of an embedded array into a typed value.
 * Elements may be scalars, so the input is not known to be a document.
 */
export type ElementParser<E> = (raw: unknown) => E;

/** Ordered (key, direction) pairs. */
export type SortSpec = ReadonlyArray<readonly [string, 1 | -1]>;

export function newEntityId(): ObjectId {
  return new ObjectId();
}

/** Fill identity and creation time when the caller did not supply them. */
export function stampNew<T extends Partial<BaseEntity>>(
  data: T,
  now: Date = new Date(),
): T & Pick<BaseEntity, '_id' | 'createdAt'> {
  return {
    ...data,
    _id: data._id ?? newEntityId(),
    createdAt: data.createdAt ?? now,
  };
}

/** Copy of `data` without `_id`, `createdAt` and unset keys. */
export function withoutImmutable(data: object): Document {
  const out: Document = {};
  for (const [k, v] of Object.entries(data)) {
    if (k === '_id' || k === 'createdAt' || v === undefined) continue;
    out[k] = v;
  }
  return out;
}

/** Drop keys whose value is `undefined` (fields the caller did not set). */
/** Shallow copy without `keys`. */
export function omitFields<R extends object>(record: R, keys: ReadonlyArray<string>): R {
  const out = { ...record };
  for (const key of keys) Reflect.deleteProperty(out, key);
  return out;
}

export function definedOnly<T extends object>(data: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in data) {
    if (!Object.prototype.hasOwnProperty.call(data, key)) continue;
    if (data[key] !== undefined) out[key] = data[key];
  }
  return out;
}

/* ---------------------------
   Field readers for parsers
   --------------------------- */

export function readObjectId(raw: Document, key: string): ObjectId {
  const v: unknown = raw[key];
  if (v instanceof ObjectId) return v;
  if (typeof v === 'string' && ObjectId.isValid(v)) return new ObjectId(v);
  throw new TypeError(`Field '${key}' is not an ObjectId`);
}

export function readDate(raw: Document, key: string): Date {
  const v: unknown = raw[key];
  if (v instanceof Date) return v;
  if (typeof v === 'string' || typeof v === 'number') {
    const d = new Date(v);
    if (!Number.isNaN(d.getTime())) return d;
  }
  throw new TypeError(`Field '${key}' is not a date`);
}

export function readOptionalDate(raw: Document, key: string): Date | undefined {
  return raw[key] === undefined || raw[key] === null
    ? undefined
    : readDate(raw, key);
}

export function readString(raw: Document, key: string): string {
  const v: unknown = raw[key];
  if (typeof v === 'string') return v;
  throw new TypeError(`Field '${key}' is not a string`);
}

export function readBoolean(raw: Document, key: string, fallback = false): boolean {
  const v: unknown = raw[key];
  if (typeof v === 'boolean') return v;
  return fallback;
}

export function readArray(raw: Document, key: string): Document[] {
  const v: unknown = raw[key];
  if (!Array.isArray(v)) return [];
  return v.filter(isDocument);
}

export function isDocument(v: unknown): v is Document {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Base fields shared by every parser. */
export function readBase(raw: Document): BaseEntity {
  return {
    _id: readObjectId(raw, '_id'),
    createdAt: readDate(raw, 'createdAt'),
    updatedAt: readOptionalDate(raw, 'updatedAt'),
  };
}
