/**
 * VectorStoreInterface - the item store facade over one backend collection.
 * Callers work with generic VectorItems; the backend shape stays behind it.
 */

import type { VectorItem, VectorItemInput, VectorItemUpdate } from '../types/VectorItem.js';
import type { WhereFilter } from './VecDbClient.js';

export interface VectorStoreInterface {
  readonly collectionName: string;

  /**
   * Creates the configured collection unless it already exists.
   * Calling it again is a no-op.
   */
  ensureCollection(): Promise<void>;

  /** Names of every collection the backend holds. */
  listCollections(): Promise<string[]>;

  /**
   * Deletes a collection and everything in it.
   *
   * @throws CollectionNotFoundError if the collection does not exist
   */
  deleteCollection(name: string): Promise<void>;

  /** True when the named collection can be fetched; any failure reads as false. */
  collectionExists(name: string): Promise<boolean>;

  /**
   * Similarity search over the collection.
   *
   * @param vector - Query embedding
   * @param topK - Maximum number of hits, a positive integer
   * @param filter - Optional where filter on metadata; {} matches everything
   * @returns Items best first, each carrying the backend distance as score
   * @throws InvalidArgumentError if topK is not a positive integer
   */
  search(vector: number[], topK: number, filter?: WhereFilter): Promise<VectorItem[]>;

  /** The stored item, or null for an unknown id. */
  getById(id: string): Promise<VectorItem | null>;

  /** Found items only; unknown ids are skipped. */
  getByIds(ids: string[]): Promise<VectorItem[]>;

  /**
   * Items whose metadata matches the filter.
   *
   * @param limit - Defaults to 100
   */
  getByFilter(filter: WhereFilter, limit?: number): Promise<VectorItem[]>;

  getAll(limit?: number): Promise<VectorItem[]>;

  /**
   * Number of items matching the filter, counted from getByFilter and
   * therefore capped at its default limit.
   */
  count(filter?: WhereFilter): Promise<number>;

  /**
   * Writes items in one batch. Existing ids are overwritten.
   *
   * @throws InvalidItemError if an item is malformed or has no vector
   */
  add(items: VectorItemInput[]): Promise<void>;

  /**
   * Updates the item at id. With a non-empty vector the vector, metadata and
   * document are replaced; otherwise only metadata and document change.
   * The item needs no id of its own; it is written at id.
   */
  update(id: string, item: VectorItemUpdate): Promise<void>;

  upsert(items: VectorItemInput[]): Promise<void>;

  /** Unknown ids are not an error. */
  delete(ids: string[]): Promise<void>;

  /** Records the payload fields callers filter on. Neither backend builds secondary indexes. */
  ensurePayloadIndexes(fields: string[]): Promise<void>;
}

export function isVectorStoreInterface(obj: unknown): obj is VectorStoreInterface {
  if (typeof obj !== 'object' || obj === null) return false;
  const methods = [
    'ensureCollection',
    'listCollections',
    'deleteCollection',
    'collectionExists',
    'search',
    'getById',
    'getByIds',
    'getByFilter',
    'getAll',
    'count',
    'add',
    'update',
    'upsert',
    'delete',
    'ensurePayloadIndexes'
  ];
  return methods.every((method) => method in obj && typeof Reflect.get(obj, method) === 'function');
}
