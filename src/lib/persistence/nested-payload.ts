import type { Document } from 'mongodb';
import { InvalidNestedPayloadError } from '../errors/PersistenceError';
import { newEntityId } from './entity';

export type NestedScalar = string | number;

/** Raw data accepted for an array-embedded element, after boundary checks. */
export type NestedPayload =
  | { readonly kind: 'scalar'; readonly value: NestedScalar }
  | { readonly kind: 'record'; readonly value: Record<string, unknown> }
  | { readonly kind: 'sequence'; readonly value: unknown[] };

/** Value pushed into the parent's array. */
export type NestedElement = NestedScalar | Document;

function isPlainRecord(v: unknown): v is Record<string, unknown> {
  if (typeof v !== 'object' || v === null || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function describeShape(v: unknown): string {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  if (typeof v === 'number') return Number.isInteger(v) ? 'integer' : 'non-integer number';
  if (typeof v === 'object') {
    const ctor: unknown = Object.getPrototypeOf(v)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof v;
}

/** Sort raw input into one of the accepted shapes, or reject it. */
export function classifyNestedPayload(raw: unknown): NestedPayload {
  if (typeof raw === 'string') return { kind: 'scalar', value: raw };
  if (typeof raw === 'number' && Number.isInteger(raw)) {
    return { kind: 'scalar', value: raw };
  }
  if (Array.isArray(raw)) return { kind: 'sequence', value: raw };
  if (isPlainRecord(raw)) return { kind: 'record', value: raw };
  throw new InvalidNestedPayloadError(describeShape(raw));
}

/**
 * Element to append for a nested create.
 * Records get an identity and creation time when missing, so the value
 * handed back to the caller is the value stored. Sequences are refused:
 * a nested create appends exactly one element.
 */
export function toInsertableElement(
  payload: NestedPayload,
  now: Date = new Date(),
): NestedElement {
  switch (payload.kind) {
    case 'scalar':
      return payload.value;
    case 'record': {
      const value = payload.value;
      return {
        ...value,
        _id: value._id ?? newEntityId(),
        createdAt: value.createdAt ?? now,
      };
    }
    case 'sequence':
      throw new InvalidNestedPayloadError('array');
  }
}
