import { ObjectId } from 'mongodb';
import { InvalidNestedPayloadError } from '../../errors/PersistenceError';
import { classifyNestedPayload, toInsertableElement } from '../nested-payload';

describe('nested payload', () => {
  describe('classifyNestedPayload', () => {
    it('accepts strings and integers as scalars', () => {
      expect(classifyNestedPayload('tag')).toEqual({ kind: 'scalar', value: 'tag' });
      expect(classifyNestedPayload(42)).toEqual({ kind: 'scalar', value: 42 });
    });

    it('accepts plain objects as records and arrays as sequences', () => {
      expect(classifyNestedPayload({ city: 'Lyon' })).toEqual({
        kind: 'record',
        value: { city: 'Lyon' },
      });
      expect(classifyNestedPayload([1, 2])).toEqual({ kind: 'sequence', value: [1, 2] });
    });

    it.each([
      [1.5, 'non-integer number'],
      [null, 'null'],
      [true, 'boolean'],
      [undefined, 'undefined'],
      [new Date(0), 'Date'],
    ])('rejects %p', (raw, received) => {
      expect(() => classifyNestedPayload(raw)).toThrow(
        `Nested data must be a record, a string or an integer (received ${received})`,
      );
    });

    it('reports the rejection as a bad request', () => {
      let caught: unknown;
      try {
        classifyNestedPayload(2.25);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InvalidNestedPayloadError);
      expect(caught).toMatchObject({ kind: 'BAD_REQUEST', code: 'INVALID_NESTED_PAYLOAD' });
    });
  });

  describe('toInsertableElement', () => {
    const now = new Date('2024-03-01T12:00:00.000Z');

    it('stores scalars as they are', () => {
      expect(toInsertableElement({ kind: 'scalar', value: 'tag' }, now)).toBe('tag');
    });

    it('stamps identity and creation time on records', () => {
      const element = toInsertableElement({ kind: 'record', value: { city: 'Lyon' } }, now);
      expect(element).toMatchObject({ city: 'Lyon', createdAt: now });
      expect(typeof element === 'object' && element._id instanceof ObjectId).toBe(true);
    });

    it('keeps identity and creation time the caller supplied', () => {
      const id = new ObjectId();
      const created = new Date('2020-01-01T00:00:00.000Z');
      expect(
        toInsertableElement({ kind: 'record', value: { _id: id, createdAt: created } }, now),
      ).toEqual({ _id: id, createdAt: created });
    });

    it('refuses sequences', () => {
      expect(() => toInsertableElement({ kind: 'sequence', value: [1] }, now)).toThrow(
        InvalidNestedPayloadError,
      );
    });
  });
});
