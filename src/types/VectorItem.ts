/**
 * Generic item model shared by every backend: an id, an optional embedding,
 * a payload and, on search results only, a score.
 */

import { InvalidItemError } from '../errors.js';
import { compileSchema, formatSchemaErrors } from '../utils/schemaValidation.js';

export type PayloadMetadata = Record<string, unknown>;

export interface VectorItemPayload {
  /** Arbitrary nested structure; encoded to flat scalars before storage. */
  metadata?: PayloadMetadata;
  /** Document body, stored as the backend's document rather than as metadata. */
  memory?: string;
  [key: string]: unknown;
}

export interface VectorItem {
  readonly id: string;
  vector: number[] | null;
  payload: VectorItemPayload;
  /** Backend distance for the query (lower is closer). Never persisted. */
  score?: number;
}

/** Plain-record form accepted at the boundary, e.g. parsed JSON. */
export interface VectorItemRecord {
  id: string | number;
  vector?: number[] | null;
  payload?: Record<string, unknown>;
  score?: number;
}

export type VectorItemInput = VectorItem | VectorItemRecord;

/** Input to update: the target id is passed separately, so the item's own id is optional and ignored. */
export type VectorItemUpdate = Partial<VectorItemRecord>;

const vectorItemSchema = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: ['string', 'number'], minLength: 1 },
    vector: {
      anyOf: [
        { type: 'array', items: { type: 'number' } },
        { type: 'null' }
      ]
    },
    payload: {
      type: 'object',
      properties: {
        metadata: { type: 'object' },
        memory: { type: ['string', 'null'] }
      }
    },
    score: { type: 'number' }
  }
};

const validateVectorItem = compileSchema<VectorItemRecord>(vectorItemSchema);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPayload(raw: Record<string, unknown> | undefined): VectorItemPayload {
  if (!raw) return {};
  const { metadata, memory, ...rest } = raw;
  const payload: VectorItemPayload = { ...rest };
  if (isRecord(metadata)) payload.metadata = { ...metadata };
  if (typeof memory === 'string') payload.memory = memory;
  return payload;
}

/**
 * Normalize any accepted representation into a canonical VectorItem.
 * Numeric ids are stringified; a missing payload becomes {} and a missing vector null.
 */
export function toVectorItem(input: unknown): VectorItem {
  if (!validateVectorItem(input)) {
    throw new InvalidItemError('Invalid vector item', formatSchemaErrors(validateVectorItem.errors));
  }

  const item: VectorItem = {
    id: String(input.id),
    vector: input.vector ? [...input.vector] : null,
    payload: toPayload(input.payload)
  };
  if (input.score !== undefined) item.score = input.score;
  return item;
}
