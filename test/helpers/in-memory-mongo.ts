// In-process stand-in for the slice of the MongoDB driver the repositories use.
// Filters are exact-match with dotted paths plus $ne, $in, $exists and $elemMatch;
// updates support $set (including the positional `$`), $push and $pull.
import { ObjectId, type Collection, type Db, type Document } from 'mongodb';
import { LazyMongoClient } from '../../src/modules/mongodb/internal/mongodb.client';
import { MONGO_DEFAULTS } from '../../src/infra/mongo/mongo.config';

function isPlainObject(v: unknown): v is Document {
  return (
    typeof v === 'object' &&
    v !== null &&
    !Array.isArray(v) &&
    !(v instanceof ObjectId) &&
    !(v instanceof Date) &&
    !Buffer.isBuffer(v)
  );
}

function isOperatorObject(v: unknown): v is Document {
  if (!isPlainObject(v)) return false;
  const keys = Object.keys(v);
  return keys.length > 0 && keys.every((k) => k.startsWith('$'));
}

function cloneValue(v: unknown): unknown {
  if (v instanceof Date) return new Date(v.getTime());
  if (Array.isArray(v)) return v.map(cloneValue);
  if (isPlainObject(v)) return cloneDoc(v);
  return v;
}

function cloneDoc(d: Document): Document {
  const out: Document = {};
  for (const [k, v] of Object.entries(d)) out[k] = cloneValue(v);
  return out;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof ObjectId && b instanceof ObjectId) return a.equals(b);
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => valuesEqual(x, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const ka = Object.keys(a);
    return ka.length === Object.keys(b).length && ka.every((k) => valuesEqual(a[k], b[k]));
  }
  return a === b;
}

/** Values at a dotted path; arrays on the way fan out like Mongo does. */
function resolve(value: unknown, parts: readonly string[]): unknown[] {
  if (parts.length === 0) return [value];
  const [head, ...rest] = parts;
  if (Array.isArray(value)) {
    if (/^\d+$/.test(head)) return resolve(value[Number(head)], rest);
    return value.flatMap((el) => resolve(el, parts));
  }
  if (isPlainObject(value)) return resolve(value[head], rest);
  return [undefined];
}

function equalsOrContains(candidate: unknown, expected: unknown): boolean {
  if (valuesEqual(candidate, expected)) return true;
  return Array.isArray(candidate) && candidate.some((x) => valuesEqual(x, expected));
}

function matchesField(doc: Document, path: string, cond: unknown): boolean {
  const candidates = resolve(doc, path.split('.'));
  if (!isOperatorObject(cond)) {
    return candidates.some((c) => equalsOrContains(c, cond));
  }
  return Object.entries(cond).every(([op, arg]) => {
    switch (op) {
      case '$ne':
        return !candidates.some((c) => equalsOrContains(c, arg));
      case '$in':
        return Array.isArray(arg) && candidates.some((c) => arg.some((a) => equalsOrContains(c, a)));
      case '$exists':
        return arg ? candidates.some((c) => c !== undefined) : candidates.every((c) => c === undefined);
      case '$elemMatch':
        return candidates.some(
          (c) => Array.isArray(c) && c.some((el) => isPlainObject(el) && matches(el, arg)),
        );
      default:
        throw new Error(`In-memory collection does not support ${op}`);
    }
  });
}

export function matches(doc: Document, filter: Document): boolean {
  return Object.entries(filter).every(([path, cond]) => matchesField(doc, path, cond));
}

function project(doc: Document, projection?: Document): Document {
  if (!projection || Object.keys(projection).length === 0) return doc;
  const specs = Object.entries(projection);
  const inclusive = specs.some(
    ([, spec]) => spec === 1 || (isPlainObject(spec) && '$elemMatch' in spec),
  );
  const out: Document = inclusive ? { _id: doc._id } : { ...doc };
  for (const [key, spec] of specs) {
    const value: unknown = doc[key];
    if (isPlainObject(spec) && '$elemMatch' in spec) {
      const hit = Array.isArray(value)
        ? value.find((el) => isPlainObject(el) && matches(el, spec.$elemMatch))
        : undefined;
      if (hit === undefined) delete out[key];
      else out[key] = [hit];
    } else if (isPlainObject(spec) && '$slice' in spec) {
      if (Array.isArray(value)) out[key] = value.slice(0, Number(spec.$slice));
    } else if (spec === 1) {
      out[key] = value;
    } else if (spec === 0) {
      delete out[key];
    }
  }
  return out;
}

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (a instanceof ObjectId && b instanceof ObjectId) {
    return compareValues(a.toHexString(), b.toHexString());
  }
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function compareBy(spec: Document): (a: Document, b: Document) => number {
  const keys = Object.entries(spec);
  return (a, b) => {
    for (const [path, dir] of keys) {
      const parts = path.split('.');
      const c = compareValues(resolve(a, parts)[0], resolve(b, parts)[0]);
      if (c !== 0) return dir === -1 ? -c : c;
    }
    return 0;
  };
}

/** Index of the array element the query's `field.*` conditions picked. */
function positionalIndex(doc: Document, filter: Document, field: string): number | undefined {
  const arr: unknown = doc[field];
  if (!Array.isArray(arr)) return undefined;
  const prefix = `${field}.`;
  const conds = Object.entries(filter).filter(([k]) => k.startsWith(prefix));
  if (conds.length === 0) return undefined;
  const idx = arr.findIndex(
    (el) =>
      isPlainObject(el) &&
      conds.every(([k, c]) => matchesField(el, k.slice(prefix.length), c)),
  );
  return idx >= 0 ? idx : undefined;
}

function setPath(target: Document, path: string, value: unknown, positional?: number): void {
  const parts = path.split('.');
  let cur: unknown = target;
  parts.forEach((part, i) => {
    const last = i === parts.length - 1;
    if (Array.isArray(cur)) {
      const idx = part === '$' ? positional : Number(part);
      if (idx === undefined || !Number.isInteger(idx)) {
        throw new Error(`Cannot resolve '${part}' in ${path}`);
      }
      if (last) {
        cur[idx] = value;
        return;
      }
      if (!isPlainObject(cur[idx]) && !Array.isArray(cur[idx])) cur[idx] = {};
      cur = cur[idx];
    } else if (isPlainObject(cur)) {
      if (last) {
        cur[part] = value;
        return;
      }
      const next: unknown = cur[part];
      if (!isPlainObject(next) && !Array.isArray(next)) cur[part] = {};
      cur = cur[part];
    } else {
      throw new Error(`Cannot set ${path}`);
    }
  });
}

function applyUpdate(doc: Document, update: Document, filter: Document): Document {
  const next = cloneDoc(doc);
  for (const [op, spec] of Object.entries(update)) {
    if (!isPlainObject(spec)) throw new Error(`Bad ${op} spec`);
    switch (op) {
      case '$set':
        for (const [path, value] of Object.entries(spec)) {
          const dollar = path.indexOf('.$');
          let idx: number | undefined;
          if (dollar >= 0) {
            idx = positionalIndex(next, filter, path.slice(0, dollar));
            if (idx === undefined) {
              throw new Error(`The positional operator did not find the match needed (${path})`);
            }
          }
          setPath(next, path, cloneValue(value), idx);
        }
        break;
      case '$push':
        for (const [path, value] of Object.entries(spec)) {
          const arr: unknown = next[path];
          if (arr === undefined) next[path] = [cloneValue(value)];
          else if (Array.isArray(arr)) arr.push(cloneValue(value));
          else throw new Error(`Cannot $push to non-array '${path}'`);
        }
        break;
      case '$pull':
        for (const [path, cond] of Object.entries(spec)) {
          const arr: unknown = next[path];
          if (!Array.isArray(arr)) continue;
          next[path] = arr.filter((el) =>
            isPlainObject(cond) && isPlainObject(el) ? !matches(el, cond) : !valuesEqual(el, cond),
          );
        }
        break;
      default:
        throw new Error(`In-memory collection does not support ${op}`);
    }
  }
  return next;
}

function evalExpr(doc: Document, expr: unknown): unknown {
  if (typeof expr === 'string' && expr.startsWith('$')) {
    return resolve(doc, expr.slice(1).split('.'))[0];
  }
  return expr;
}

function group(docs: Document[], spec: Document): Document[] {
  const groups: Array<{ key: unknown; out: Document }> = [];
  const accumulators = Object.entries(spec).filter(([name]) => name !== '_id');
  for (const doc of docs) {
    const key = evalExpr(doc, spec._id);
    let g = groups.find((x) => valuesEqual(x.key, key));
    if (!g) {
      g = { key, out: { _id: key } };
      for (const [name, acc] of accumulators) g.out[name] = '$push' in acc ? [] : 0;
      groups.push(g);
    }
    for (const [name, acc] of accumulators) {
      if ('$sum' in acc) {
        const v = evalExpr(doc, acc.$sum);
        g.out[name] += typeof v === 'number' ? v : 0;
      } else if ('$push' in acc) {
        g.out[name].push(evalExpr(doc, acc.$push));
      } else {
        throw new Error(`Unsupported accumulator for ${name}`);
      }
    }
  }
  return groups.map((g) => g.out);
}

class InMemoryCursor {
  private sortSpec?: Document;
  private skipN = 0;
  private limitN = 0;

  constructor(
    private readonly docs: Document[],
    private readonly projection?: Document,
  ) {}

  sort(spec: Document): this {
    this.sortSpec = spec;
    return this;
  }

  skip(n: number): this {
    this.skipN = n;
    return this;
  }

  limit(n: number): this {
    this.limitN = n;
    return this;
  }

  async toArray(): Promise<Document[]> {
    let out = [...this.docs];
    if (this.sortSpec) out.sort(compareBy(this.sortSpec));
    out = out.slice(this.skipN);
    if (this.limitN > 0) out = out.slice(0, this.limitN);
    return out.map((d) => project(cloneDoc(d), this.projection));
  }
}

export interface UpdateResultLike {
  acknowledged: boolean;
  matchedCount: number;
  modifiedCount: number;
  upsertedCount: number;
  upsertedId: null;
}

export class InMemoryCollection {
  /** Stored documents, in insertion order. */
  public docs: Document[] = [];

  public constructor(public readonly collectionName: string) {}

  public async insertOne(doc: Document): Promise<{ acknowledged: boolean; insertedId: unknown }> {
    const stored = cloneDoc(doc);
    if (stored._id === undefined) stored._id = new ObjectId();
    if (this.docs.some((d) => valuesEqual(d._id, stored._id))) {
      throw Object.assign(new Error('E11000 duplicate key error'), { code: 11000 });
    }
    this.docs.push(stored);
    return { acknowledged: true, insertedId: stored._id };
  }

  public async findOne(
    filter: Document = {},
    options: { projection?: Document } = {},
  ): Promise<Document | null> {
    const doc = this.docs.find((d) => matches(d, filter));
    return doc ? project(cloneDoc(doc), options.projection) : null;
  }

  public find(filter: Document = {}, options: { projection?: Document } = {}): InMemoryCursor {
    return new InMemoryCursor(
      this.docs.filter((d) => matches(d, filter)),
      options.projection,
    );
  }

  public async countDocuments(filter: Document = {}): Promise<number> {
    return this.docs.filter((d) => matches(d, filter)).length;
  }

  public async updateOne(filter: Document, update: Document): Promise<UpdateResultLike> {
    const i = this.docs.findIndex((d) => matches(d, filter));
    if (i < 0) {
      return { acknowledged: true, matchedCount: 0, modifiedCount: 0, upsertedCount: 0, upsertedId: null };
    }
    const before = this.docs[i];
    const after = applyUpdate(before, update, filter);
    this.docs[i] = after;
    const modified = JSON.stringify(before) !== JSON.stringify(after);
    return {
      acknowledged: true,
      matchedCount: 1,
      modifiedCount: modified ? 1 : 0,
      upsertedCount: 0,
      upsertedId: null,
    };
  }

  public async findOneAndUpdate(
    filter: Document,
    update: Document,
    options: { returnDocument?: 'before' | 'after'; projection?: Document } = {},
  ): Promise<Document | null> {
    const i = this.docs.findIndex((d) => matches(d, filter));
    if (i < 0) return null;
    const before = this.docs[i];
    const after = applyUpdate(before, update, filter);
    this.docs[i] = after;
    const returned = options.returnDocument === 'after' ? after : before;
    return project(cloneDoc(returned), options.projection);
  }

  public async deleteOne(filter: Document): Promise<{ acknowledged: boolean; deletedCount: number }> {
    const i = this.docs.findIndex((d) => matches(d, filter));
    if (i < 0) return { acknowledged: true, deletedCount: 0 };
    this.docs.splice(i, 1);
    return { acknowledged: true, deletedCount: 1 };
  }

  public aggregate(pipeline: Document[]): {
    next(): Promise<Document | null>;
    toArray(): Promise<Document[]>;
  } {
    let results: Document[] | undefined;
    const run = (): Document[] => {
      let docs = this.docs.map(cloneDoc);
      for (const stage of pipeline) {
        const [[op, arg]] = Object.entries(stage);
        switch (op) {
          case '$match':
            docs = docs.filter((d) => matches(d, arg));
            break;
          case '$unwind': {
            const field = String(arg).replace(/^\$/, '');
            docs = docs.flatMap((d) => {
              const value: unknown = d[field];
              if (Array.isArray(value)) return value.map((el) => ({ ...d, [field]: el }));
              return value === undefined || value === null ? [] : [d];
            });
            break;
          }
          case '$sort':
            docs = [...docs].sort(compareBy(arg));
            break;
          case '$limit':
            docs = docs.slice(0, Number(arg));
            break;
          case '$group':
            docs = group(docs, arg);
            break;
          default:
            throw new Error(`In-memory aggregate does not support ${op}`);
        }
      }
      return docs;
    };
    return {
      next: async () => {
        results ??= run();
        return results.shift() ?? null;
      },
      toArray: async () => {
        results ??= run();
        const out = results;
        results = [];
        return out;
      },
    };
  }

  /** Typed view for code written against the driver. */
  public asCollection(): Collection<Document> {
    return this as unknown as Collection<Document>;
  }
}

export class InMemoryDb {
  private readonly collections = new Map<string, InMemoryCollection>();

  public collection(name: string): InMemoryCollection {
    let col = this.collections.get(name);
    if (!col) {
      col = new InMemoryCollection(name);
      this.collections.set(name, col);
    }
    return col;
  }
}

/**
 * LazyMongoClient that never connects; every database name maps to the
 * same in-memory database.
 */
export class InMemoryMongoClient extends LazyMongoClient {
  public readonly db = new InMemoryDb();

  public constructor() {
    super({ ...MONGO_DEFAULTS });
  }

  public async getDb(): Promise<Db> {
    return this.db as unknown as Db;
  }

  public async close(): Promise<void> {
    // nothing to release
  }
}
