import { Logger } from '@nestjs/common';
import { ObjectId, type Collection, type Document } from 'mongodb';
import type { MongodbService } from '../../modules/mongodb/mongodb.service';
import { MongoActionError, preview } from '../errors/MongoActionError';
import {
  stampNew,
  withoutImmutable,
  type BaseEntity,
  type ElementParser,
  type EntityChanges,
  type EntityFilter,
  type NewEntity,
  type SortSpec,
} from './entity';
import { absent, found, type Lookup } from './lookup';
import { pageOffset, pageWindowOf } from './pagination';
import { classifyNestedPayload, toInsertableElement } from './nested-payload';

export interface ListQuery<F> {
  size?: number;
  page?: number;
  filter?: F;
  sort?: SortSpec;
}

export interface ListResult<T> {
  totalCount: number;
  items: T[];
}

export interface SearchOptions {
  many?: boolean;
}

export interface NestedListOptions {
  /** Keys are element keys; '' sorts by the element itself (scalar arrays). */
  sort?: SortSpec;
  limit?: number;
}

export interface NestedGetOptions {
  nestedId?: ObjectId;
  filter?: Document;
}

export interface NestedUpdateOptions {
  /** Extra constraints on the parent document. */
  filter?: Document;
  /** Append the element when the parent has none with this identity. */
  upsert?: boolean;
}

export interface NestedRemoveOptions {
  filter?: Document;
}

/**
 * CRUD against one collection, plus field-scoped CRUD on arrays embedded
 * in its documents.
 *
 * Misses are reported as `absent()`, `false` or `0`. Driver failures are
 * rethrown as `MongoActionError`; nothing here raises a domain error.
 */
export abstract class BaseRepository<
  T extends BaseEntity,
  F extends EntityFilter<T> = EntityFilter<T>,
> {
  protected readonly logger = new Logger(this.constructor.name);

  /** Collection this repository owns. */
  protected abstract readonly collectionName: string;

  protected constructor(protected readonly mongo: MongodbService) {}

  /** Typed view of a stored document. */
  protected abstract parse(raw: Document): T;

  public get name(): string {
    return this.collectionName;
  }

  /* =========================
   *        Top level
   * ========================= */

  public async list(query: ListQuery<F> = {}): Promise<ListResult<T>> {
    const filter = this.toMongoFilter(query.filter);
    const window = pageWindowOf(query.size, query.page);
    return this.run('list', { filter, ...window }, async (col) => {
      const totalCount = await col.countDocuments(filter);
      let cursor = col.find(filter);
      if (query.sort && query.sort.length > 0) {
        cursor = cursor.sort(toSortDoc(query.sort));
      }
      if (window) {
        cursor = cursor
          .skip(pageOffset(window.size, window.page))
          .limit(window.size);
      }
      const docs = await cursor.toArray();
      return { totalCount, items: docs.map((d) => this.parse(d)) };
    });
  }

  public async get(id: ObjectId): Promise<Lookup<T>> {
    return this.run('get', { id }, async (col) => {
      const doc = await col.findOne({ _id: id });
      return doc ? found(this.parse(doc)) : absent();
    });
  }

  /**
   * First match, or every match with `{ many: true }`.
   * No match is absent in both forms.
   */
  public search(filter: F, options?: { many?: false }): Promise<Lookup<T>>;
  public search(filter: F, options: { many: true }): Promise<Lookup<T[]>>;
  public async search(
    filter: F,
    options: SearchOptions = {},
  ): Promise<Lookup<T> | Lookup<T[]>> {
    const mongoFilter = this.toMongoFilter(filter);
    return this.run('search', { filter: mongoFilter, many: !!options.many }, async (col) => {
      if (options.many) {
        const docs = await col.find(mongoFilter).toArray();
        return docs.length > 0 ? found(docs.map((d) => this.parse(d))) : absent();
      }
      const doc = await col.findOne(mongoFilter);
      return doc ? found(this.parse(doc)) : absent();
    });
  }

  /**
   * First record matching a raw exact-match filter.
   * Used where filter keys are only known as strings (declared unique fields).
   */
  public async findFirst(filter: Document): Promise<Lookup<T>> {
    return this.run('findFirst', { filter }, async (col) => {
      const doc = await col.findOne(filter);
      return doc ? found(this.parse(doc)) : absent();
    });
  }

  public async count(filter?: F): Promise<number> {
    const mongoFilter = this.toMongoFilter(filter);
    return this.run('count', { filter: mongoFilter }, (col) =>
      col.countDocuments(mongoFilter),
    );
  }

  /**
   * Insert, then read the record back so server-side values are reflected.
   * A write that cannot be read back fails as retryable.
   */
  public async create(data: NewEntity<T>): Promise<T> {
    const doc = stampNew(data);
    return this.run('create', { id: doc._id }, async (col) => {
      const res = await col.insertOne(doc);
      const created = await col.findOne({ _id: res.insertedId });
      if (!created) {
        throw new MongoActionError(
          'Created record could not be read back',
          {
            operation: `${this.collectionName}.create`,
            collection: this.collectionName,
            argsPreview: { id: doc._id.toHexString() },
          },
          undefined,
          true,
        );
      }
      return this.parse(created);
    });
  }

  /** Set every given field except identity and creation time. */
  public async update(id: ObjectId, data: EntityChanges<T>): Promise<Lookup<T>> {
    const set = withoutImmutable(data);
    set.updatedAt = new Date();
    return this.run('update', { id }, async (col) => {
      const res = await col.updateOne({ _id: id }, { $set: set });
      if (res.matchedCount === 0) return absent();
      const doc = await col.findOne({ _id: id });
      return doc ? found(this.parse(doc)) : absent();
    });
  }

  public async delete(id: ObjectId): Promise<boolean> {
    return this.run('delete', { id }, async (col) => {
      const res = await col.deleteOne({ _id: id });
      return res.deletedCount === 1;
    });
  }

  /* =========================
   *     Embedded arrays
   * ========================= */

  /** Elements of `field`, optionally sorted and capped. */
  public async nestedList<E>(
    parentId: ObjectId,
    field: string,
    parser: ElementParser<E>,
    options: NestedListOptions = {},
  ): Promise<E[]> {
    const pipeline: Document[] = [
      { $match: { _id: parentId } },
      { $unwind: `$${field}` },
    ];
    if (options.sort && options.sort.length > 0) {
      pipeline.push({ $sort: toSortDoc(options.sort, field) });
    }
    if (options.limit !== undefined && options.limit > 0) {
      pipeline.push({ $limit: options.limit });
    }
    pipeline.push({
      $group: {
        _id: '$_id',
        count: { $sum: 1 },
        [field]: { $push: `$${field}` },
      },
    });

    return this.run('nestedList', { parentId, field }, async (col) => {
      const result = await col.aggregate(pipeline).next();
      if (!result) return [];
      const elements: unknown = result[field];
      return Array.isArray(elements) ? elements.map((e) => parser(e)) : [];
    });
  }

  public async nestedCount(parentId: ObjectId, field: string): Promise<number> {
    const pipeline: Document[] = [
      { $match: { _id: parentId } },
      { $unwind: `$${field}` },
      { $group: { _id: '$_id', count: { $sum: 1 } } },
    ];
    return this.run('nestedCount', { parentId, field }, async (col) => {
      const result = await col.aggregate(pipeline).next();
      const count: unknown = result?.count;
      return typeof count === 'number' ? count : 0;
    });
  }

  /**
   * Append one element (record, string or integer) to `field`.
   * Absent when the parent does not exist.
   */
  public async nestedCreate<E>(
    parentId: ObjectId,
    field: string,
    data: unknown,
    parser: ElementParser<E>,
  ): Promise<Lookup<E>> {
    const element = toInsertableElement(classifyNestedPayload(data));
    const push: Document = { [field]: element };
    return this.run('nestedCreate', { parentId, field }, async (col) => {
      const res = await col.updateOne({ _id: parentId }, { $push: push });
      if (res.matchedCount === 0) return absent();
      return found(parser(element));
    });
  }

  /**
   * One element of `field`.
   * - `nestedId` given: the element with that identity (the filter constrains the parent).
   * - only `filter` given: the first element matching the filter.
   * - neither: the first element.
   */
  public async nestedGet<E>(
    parentId: ObjectId,
    field: string,
    parser: ElementParser<E>,
    options: NestedGetOptions = {},
  ): Promise<Lookup<E>> {
    const { nestedId, filter } = options;
    let query: Document;
    let projection: Document;
    if (nestedId) {
      query = { ...filter, _id: parentId, [`${field}._id`]: nestedId };
      projection = { [field]: { $elemMatch: { _id: nestedId } } };
    } else if (filter && Object.keys(filter).length > 0) {
      query = { _id: parentId, [field]: { $elemMatch: filter } };
      projection = { [field]: { $elemMatch: filter } };
    } else {
      query = { _id: parentId };
      projection = { [field]: { $slice: 1 } };
    }

    return this.run('nestedGet', { parentId, field, nestedId }, async (col) => {
      const doc = await col.findOne(query, { projection });
      if (!doc) return absent();
      const elements: unknown = doc[field];
      if (!Array.isArray(elements) || elements.length === 0) return absent();
      return found(parser(elements[0]));
    });
  }

  /**
   * Set fields on the first element of `field` whose identity is `nestedId`.
   * Sibling elements are untouched. With `upsert`, a missing element is
   * appended to an existing parent; the parent itself is never created.
   */
  public async nestedUpdate<E>(
    parentId: ObjectId,
    nestedId: ObjectId,
    field: string,
    updates: object,
    parser: ElementParser<E>,
    options: NestedUpdateOptions = {},
  ): Promise<Lookup<E>> {
    const now = new Date();
    const changes = withoutImmutable(updates);
    const set: Document = {};
    for (const [k, v] of Object.entries(changes)) {
      set[`${field}.$.${k}`] = v;
    }
    set[`${field}.$.updatedAt`] = now;

    const parentFilter: Document = { ...options.filter, _id: parentId };
    const query: Document = { ...parentFilter, [`${field}._id`]: nestedId };
    const projection: Document = { [field]: { $elemMatch: { _id: nestedId } } };

    return this.run('nestedUpdate', { parentId, field, nestedId }, async (col) => {
      const positional = async (): Promise<Lookup<E>> => {
        const doc = await col.findOneAndUpdate(
          query,
          { $set: set },
          { returnDocument: 'after', projection },
        );
        if (!doc) return absent();
        const element = findById(doc[field], nestedId);
        return element === undefined ? absent() : found(parser(element));
      };

      const updated = await positional();
      if (updated.found || !options.upsert) return updated;

      const element: Document = {
        ...changes,
        _id: nestedId,
        createdAt: now,
      };
      const push: Document = { [field]: element };
      const pushed = await col.updateOne(
        { ...parentFilter, [`${field}._id`]: { $ne: nestedId } },
        { $push: push },
      );
      if (pushed.matchedCount > 0) return found(parser(element));

      // Either the parent is gone or a concurrent upsert added the element.
      return positional();
    });
  }

  /** Remove the element whose identity is `nestedId`; true when one was removed. */
  public async nestedRemove(
    parentId: ObjectId,
    nestedId: ObjectId,
    field: string,
    options: NestedRemoveOptions = {},
  ): Promise<boolean> {
    const query: Document = {
      ...options.filter,
      _id: parentId,
      [`${field}._id`]: nestedId,
    };
    const pull: Document = { [field]: { _id: nestedId } };
    return this.run('nestedRemove', { parentId, field, nestedId }, async (col) => {
      const res = await col.updateOne(query, { $pull: pull });
      return res.modifiedCount > 0;
    });
  }

  /* =========================
   *        Internals
   * ========================= */

  protected async collection(): Promise<Collection<Document>> {
    return this.mongo.getCollection<Document>(this.collectionName);
  }

  /** Exact-match filter with unset keys dropped. */
  protected toMongoFilter(filter?: F): Document {
    const out: Document = {};
    if (!filter) return out;
    for (const [k, v] of Object.entries(filter)) {
      if (v !== undefined) out[k] = v;
    }
    return out;
  }

  /** Run one operation against the collection, wrapping driver failures. */
  protected async run<R>(
    operation: string,
    args: Record<string, unknown>,
    fn: (col: Collection<Document>) => Promise<R>,
  ): Promise<R> {
    const qualified = `${this.collectionName}.${operation}`;
    this.logger.debug(`${qualified} ${JSON.stringify(preview(args))}`);
    const col = await this.collection();
    try {
      return await fn(col);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: qualified,
        collection: this.collectionName,
        argsPreview: preview(args),
      });
    }
  }
}

function toSortDoc(sort: SortSpec, field?: string): Record<string, 1 | -1> {
  const out: Record<string, 1 | -1> = {};
  for (const [key, dir] of sort) {
    const path = field ? (key === '' ? field : `${field}.${key}`) : key;
    out[path] = dir;
  }
  return out;
}

function findById(elements: unknown, id: ObjectId): unknown {
  if (!Array.isArray(elements)) return undefined;
  for (const el of elements) {
    if (typeof el !== 'object' || el === null || !('_id' in el)) continue;
    if (el._id instanceof ObjectId && el._id.equals(id)) return el;
  }
  return undefined;
}
