import type { StoredMetadata, StoredMetadataValue, WhereFilter } from '../interfaces/VecDbClient.js';
import { InvalidArgumentError } from '../errors.js';
import { isRecord } from '../types/VectorItem.js';

export function isEmptyFilter(where: WhereFilter | null | undefined): boolean {
  return !where || Object.keys(where).length === 0;
}

function compareNumbers(actual: StoredMetadataValue | undefined, expected: unknown, test: (a: number, b: number) => boolean): boolean {
  return typeof actual === 'number' && typeof expected === 'number' && test(actual, expected);
}

function matchesCondition(actual: StoredMetadataValue | undefined, condition: unknown): boolean {
  // A missing field never matches, whatever the operator.
  if (actual === undefined) return false;
  if (!isRecord(condition)) return actual === condition;

  for (const [operator, expected] of Object.entries(condition)) {
    switch (operator) {
      case '$eq':
        if (actual !== expected) return false;
        break;
      case '$ne':
        if (actual === expected) return false;
        break;
      case '$gt':
        if (!compareNumbers(actual, expected, (a, b) => a > b)) return false;
        break;
      case '$gte':
        if (!compareNumbers(actual, expected, (a, b) => a >= b)) return false;
        break;
      case '$lt':
        if (!compareNumbers(actual, expected, (a, b) => a < b)) return false;
        break;
      case '$lte':
        if (!compareNumbers(actual, expected, (a, b) => a <= b)) return false;
        break;
      case '$in':
        if (!Array.isArray(expected) || !expected.includes(actual)) return false;
        break;
      case '$nin':
        if (!Array.isArray(expected) || expected.includes(actual)) return false;
        break;
      default:
        throw new InvalidArgumentError(`Unsupported where operator ${operator}`);
    }
  }
  return true;
}

/**
 * Evaluate a Chroma-style where filter against stored (encoded) metadata.
 * An empty filter matches everything.
 */
export function matchesWhere(metadata: StoredMetadata, where?: WhereFilter): boolean {
  if (!where || isEmptyFilter(where)) return true;

  for (const [key, condition] of Object.entries(where)) {
    if (key === '$and' || key === '$or') {
      if (!Array.isArray(condition)) {
        throw new InvalidArgumentError(`${key} expects an array of filters`);
      }
      const clauses = condition.filter(isRecord);
      const matched = key === '$and'
        ? clauses.every(clause => matchesWhere(metadata, clause))
        : clauses.some(clause => matchesWhere(metadata, clause));
      if (!matched) return false;
      continue;
    }
    const actual: StoredMetadataValue | undefined = Object.hasOwn(metadata, key) ? metadata[key] : undefined;
    if (!matchesCondition(actual, condition)) return false;
  }
  return true;
}
