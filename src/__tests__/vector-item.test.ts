import { describe, it, expect } from 'vitest';
import { toVectorItem } from '../types/VectorItem.js';
import { InvalidItemError } from '../errors.js';

describe('toVectorItem', () => {
  it('normalizes a plain record', () => {
    const item = toVectorItem({
      id: 7,
      vector: [1, 2],
      payload: { metadata: { a: 1 }, memory: 'remember this', extra: 'kept' }
    });
    expect(item).toEqual({
      id: '7',
      vector: [1, 2],
      payload: { metadata: { a: 1 }, memory: 'remember this', extra: 'kept' }
    });
  });

  it('fills in a null vector and an empty payload', () => {
    expect(toVectorItem({ id: 'a' })).toEqual({ id: 'a', vector: null, payload: {} });
  });

  it('keeps the score of search results', () => {
    expect(toVectorItem({ id: 'a', vector: [1], payload: {}, score: 0.5 }).score).toBe(0.5);
  });

  it('copies the vector instead of sharing it', () => {
    const vector = [1, 2, 3];
    const item = toVectorItem({ id: 'a', vector });
    vector[0] = 9;
    expect(item.vector).toEqual([1, 2, 3]);
  });

  it('drops a null memory', () => {
    expect(toVectorItem({ id: 'a', payload: { memory: null } }).payload).toEqual({});
  });

  it('rejects a record without an id', () => {
    expect(() => toVectorItem({ vector: [1] })).toThrow("Invalid vector item: (root) must have required property 'id'");
  });

  it('rejects non-numeric vector entries', () => {
    try {
      toVectorItem({ id: 'a', vector: [1, 'x'] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidItemError);
      if (error instanceof InvalidItemError) {
        expect(error.code).toBe('invalid_item');
        expect(error.details).toContain('/vector/1 must be number');
      }
    }
  });

  it('rejects a payload that is not an object', () => {
    expect(() => toVectorItem({ id: 'a', payload: 'text' })).toThrow(InvalidItemError);
  });

  it('rejects non-object input', () => {
    expect(() => toVectorItem(null)).toThrow(InvalidItemError);
    expect(() => toVectorItem('a')).toThrow(InvalidItemError);
  });
});
