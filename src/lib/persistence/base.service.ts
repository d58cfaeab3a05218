import { Logger } from '@nestjs/common';
import type { Document, ObjectId } from 'mongodb';
import {
  NestedRecordNotFoundError,
  NoMatchError,
  RecordNotFoundError,
  UniqueViolationError,
} from '../errors/PersistenceError';
import type {
  BaseRepository,
  ListQuery,
  ListResult,
  NestedGetOptions,
  NestedListOptions,
  NestedUpdateOptions,
} from './base.repository';
import {
  definedOnly,
  omitFields,
  type BaseEntity,
  type ElementParser,
  type EntityChanges,
  type EntityFilter,
  type NewEntity,
} from './entity';
import { orThrow } from './lookup';
import { buildPage, normPage, normPageSize, toPageWindow, type Page } from './pagination';

/**
 * Service over one repository.
 *
 * Translates between wire models and stored entities, enforces the
 * declared unique fields, and turns repository misses into NotFound errors.
 * Uniqueness is checked before the write, so two concurrent writers can both
 * pass; a unique index on the collection closes that gap.
 */
export abstract class BaseService<
  T extends BaseEntity,
  TCreate,
  TUpdate,
  TOut,
  F extends EntityFilter<T> = EntityFilter<T>,
> {
  protected readonly logger = new Logger(this.constructor.name);

  /** Fields whose combined value must not repeat across records. */
  protected readonly uniqueFields: ReadonlyArray<keyof EntityChanges<T> & string> = [];

  /**
   * Embedded arrays owned by the nested operations. A top-level update never
   * writes them back.
   */
  protected readonly nestedFields: ReadonlyArray<keyof EntityChanges<T> & string> = [];

  protected constructor(protected readonly repository: BaseRepository<T, F>) {}

  /** Stored shape for a create request. */
  protected abstract toEntity(input: TCreate): NewEntity<T> | Promise<NewEntity<T>>;

  /** Fields an update request sets; `undefined` means "leave as is". */
  protected abstract toPatch(
    input: TUpdate,
  ): Partial<EntityChanges<T>> | Promise<Partial<EntityChanges<T>>>;

  /** Wire shape of a stored entity. */
  protected abstract toOutput(entity: T): TOut;

  /* =========================
   *        Top level
   * ========================= */

  public async list(query: ListQuery<F> = {}): Promise<ListResult<TOut>> {
    toPageWindow(query.size, query.page);
    const { totalCount, items } = await this.repository.list(query);
    return { totalCount, items: items.map((e) => this.toOutput(e)) };
  }

  /** `list` wrapped in a page envelope; defaults to page 1 of 20. */
  public async paginate(query: ListQuery<F> = {}): Promise<Page<TOut>> {
    const size = normPageSize(query.size);
    const page = normPage(query.page);
    const { totalCount, items } = await this.list({ ...query, size, page });
    return buildPage(totalCount, size, page, items);
  }

  public async get(id: ObjectId): Promise<TOut> {
    return this.toOutput(await this.mustGet(id));
  }

  public search(filter: F, many?: false): Promise<TOut>;
  public search(filter: F, many: true): Promise<TOut[]>;
  public async search(filter: F, many = false): Promise<TOut | TOut[]> {
    const onAbsent = () => new NoMatchError(this.repository.name);
    if (many) {
      const hits = orThrow(await this.repository.search(filter, { many: true }), onAbsent);
      return hits.map((e) => this.toOutput(e));
    }
    const hit = orThrow(await this.repository.search(filter), onAbsent);
    return this.toOutput(hit);
  }

  public async count(filter?: F): Promise<number> {
    return this.repository.count(filter);
  }

  public async create(input: TCreate): Promise<TOut> {
    const candidate = await this.toEntity(input);
    await this.assertUnique(candidate);
    const created = await this.repository.create(candidate);
    return this.toOutput(created);
  }

  /**
   * Merge the fields the input sets over the stored record and write it back,
   * leaving `nestedFields` to the nested operations.
   * A unique-field match on the record being updated is not a conflict.
   */
  public async update(id: ObjectId, input: TUpdate): Promise<TOut> {
    const existing = await this.mustGet(id);
    const patch = definedOnly(await this.toPatch(input));
    const merged = { ...existing, ...patch };
    await this.assertUnique(merged, id);

    const updated = orThrow(
      await this.repository.update(id, omitFields(merged, this.nestedFields)),
      () => new RecordNotFoundError(this.repository.name, id.toHexString()),
    );
    return this.toOutput(updated);
  }

  public async delete(id: ObjectId): Promise<void> {
    const removed = await this.repository.delete(id);
    if (!removed) {
      throw new RecordNotFoundError(this.repository.name, id.toHexString());
    }
  }

  /* =========================
   *     Embedded arrays
   * ========================= */

  /** Elements of `field`; a missing parent is NotFound, an empty array is []. */
  protected async listNested<E>(
    parentId: ObjectId,
    field: string,
    parser: ElementParser<E>,
    options?: NestedListOptions,
  ): Promise<E[]> {
    const items = await this.repository.nestedList(parentId, field, parser, options);
    if (items.length === 0) await this.mustGet(parentId);
    return items;
  }

  protected async countNested(parentId: ObjectId, field: string): Promise<number> {
    const count = await this.repository.nestedCount(parentId, field);
    if (count === 0) await this.mustGet(parentId);
    return count;
  }

  protected async addNested<E>(
    parentId: ObjectId,
    field: string,
    data: unknown,
    parser: ElementParser<E>,
  ): Promise<E> {
    return orThrow(
      await this.repository.nestedCreate(parentId, field, data, parser),
      () => new RecordNotFoundError(this.repository.name, parentId.toHexString()),
    );
  }

  protected async getNested<E>(
    parentId: ObjectId,
    field: string,
    parser: ElementParser<E>,
    options?: NestedGetOptions,
  ): Promise<E> {
    return orThrow(
      await this.repository.nestedGet(parentId, field, parser, options),
      () =>
        new NestedRecordNotFoundError(
          this.repository.name,
          field,
          parentId.toHexString(),
          options?.nestedId?.toHexString(),
        ),
    );
  }

  protected async updateNested<E>(
    parentId: ObjectId,
    nestedId: ObjectId,
    field: string,
    updates: object,
    parser: ElementParser<E>,
    options?: NestedUpdateOptions,
  ): Promise<E> {
    return orThrow(
      await this.repository.nestedUpdate(parentId, nestedId, field, updates, parser, options),
      () =>
        new NestedRecordNotFoundError(
          this.repository.name,
          field,
          parentId.toHexString(),
          nestedId.toHexString(),
        ),
    );
  }

  protected async removeNested(
    parentId: ObjectId,
    nestedId: ObjectId,
    field: string,
    filter?: Document,
  ): Promise<void> {
    const removed = await this.repository.nestedRemove(parentId, nestedId, field, { filter });
    if (!removed) {
      throw new NestedRecordNotFoundError(
        this.repository.name,
        field,
        parentId.toHexString(),
        nestedId.toHexString(),
      );
    }
  }

  /* =========================
   *        Internals
   * ========================= */

  protected async mustGet(id: ObjectId): Promise<T> {
    return orThrow(
      await this.repository.get(id),
      () => new RecordNotFoundError(this.repository.name, id.toHexString()),
    );
  }

  /** Exact-match filter over the unique fields that carry a value. */
  protected uniqueFilter(record: object): Document | undefined {
    if (this.uniqueFields.length === 0) return undefined;
    const values = new Map<string, unknown>(Object.entries(record));
    const filter: Document = {};
    for (const key of this.uniqueFields) {
      const value = values.get(key);
      if (value !== undefined && value !== null) filter[key] = value;
    }
    return Object.keys(filter).length > 0 ? filter : undefined;
  }

  /** Fails when another record already holds the unique values of `record`. */
  protected async assertUnique(record: object, selfId?: ObjectId): Promise<void> {
    const filter = this.uniqueFilter(record);
    if (!filter) return;
    const query: Document = selfId ? { ...filter, _id: { $ne: selfId } } : filter;
    const clash = await this.repository.findFirst(query);
    if (!clash.found) return;

    const fields = Object.keys(filter);
    this.logger.warn(
      `Unique conflict in ${this.repository.name} on ${fields.join(', ')} (existing id ${clash.value._id.toHexString()})`,
    );
    throw new UniqueViolationError(this.repository.name, fields);
  }
}
