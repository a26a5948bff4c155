import { describe, it, expect } from 'vitest';
import { isEmptyFilter, matchesWhere } from '../utils/whereFilter.js';
import { InvalidArgumentError } from '../errors.js';

const metadata = { kind: 'note', turn: 3, pinned: true };

describe('where filter', () => {
  it('treats a missing or empty filter as match-all', () => {
    expect(isEmptyFilter(undefined)).toBe(true);
    expect(isEmptyFilter({})).toBe(true);
    expect(isEmptyFilter({ kind: 'note' })).toBe(false);
    expect(matchesWhere(metadata)).toBe(true);
    expect(matchesWhere(metadata, {})).toBe(true);
  });

  it('matches plain values as equality', () => {
    expect(matchesWhere(metadata, { kind: 'note' })).toBe(true);
    expect(matchesWhere(metadata, { kind: 'event' })).toBe(false);
    expect(matchesWhere(metadata, { kind: 'note', pinned: false })).toBe(false);
  });

  it('supports comparison operators', () => {
    expect(matchesWhere(metadata, { turn: { $eq: 3 } })).toBe(true);
    expect(matchesWhere(metadata, { turn: { $ne: 3 } })).toBe(false);
    expect(matchesWhere(metadata, { turn: { $gt: 2 } })).toBe(true);
    expect(matchesWhere(metadata, { turn: { $gte: 3, $lte: 3 } })).toBe(true);
    expect(matchesWhere(metadata, { turn: { $lt: 3 } })).toBe(false);
    expect(matchesWhere(metadata, { kind: { $gt: 1 } })).toBe(false);
  });

  it('supports set membership', () => {
    expect(matchesWhere(metadata, { kind: { $in: ['note', 'event'] } })).toBe(true);
    expect(matchesWhere(metadata, { kind: { $nin: ['note'] } })).toBe(false);
  });

  it('never matches a missing field', () => {
    expect(matchesWhere(metadata, { author: { $ne: 'x' } })).toBe(false);
    expect(matchesWhere({}, { constructor: 'x' })).toBe(false);
  });

  it('combines clauses with $and and $or', () => {
    expect(matchesWhere(metadata, { $and: [{ kind: 'note' }, { turn: { $gt: 1 } }] })).toBe(true);
    expect(matchesWhere(metadata, { $and: [{ kind: 'note' }, { turn: { $gt: 5 } }] })).toBe(false);
    expect(matchesWhere(metadata, { $or: [{ kind: 'event' }, { pinned: true }] })).toBe(true);
    expect(matchesWhere(metadata, { $or: [{ kind: 'event' }, { pinned: false }] })).toBe(false);
  });

  it('rejects unknown operators and malformed logical clauses', () => {
    expect(() => matchesWhere(metadata, { turn: { $near: 3 } })).toThrow(InvalidArgumentError);
    expect(() => matchesWhere(metadata, { $and: { kind: 'note' } })).toThrow('$and expects an array of filters');
  });
});
