/**
 * VecDbClient - the backend handle a VectorItemStore talks to.
 * Both the local (Vectra) and the remote (Chroma REST) client resolve to this
 * shape, which follows Chroma's column-oriented collection API.
 */

export type StoredMetadataValue = string | number | boolean;
export type StoredMetadata = Record<string, StoredMetadataValue>;

/**
 * Chroma "where" grammar: { field: value }, { field: { $op: value } },
 * { $and: [...] } and { $or: [...] }.
 */
export type WhereFilter = Record<string, unknown>;

export type DistanceMetric = 'cosine' | 'euclidean' | 'dot';

export interface CreateCollectionOptions {
  dimension?: number;
  distanceMetric?: DistanceMetric;
}

export interface CollectionInfo {
  name: string;
  metadata?: Record<string, unknown> | null;
}

export interface CollectionUpsertRecords {
  ids: string[];
  embeddings?: number[][];
  metadatas?: (StoredMetadata | null)[];
  documents?: (string | null)[];
}

export interface CollectionGetParams {
  ids?: string[];
  where?: WhereFilter;
  limit?: number;
}

export interface CollectionGetResult {
  ids: string[];
  embeddings: (number[] | null)[] | null;
  metadatas: (StoredMetadata | null)[] | null;
  documents: (string | null)[] | null;
}

export interface CollectionQueryParams {
  queryEmbeddings: number[][];
  nResults: number;
  where?: WhereFilter;
}

/** One inner list per query embedding. */
export interface CollectionQueryResult {
  ids: string[][];
  embeddings: (number[] | null)[][] | null;
  metadatas: (StoredMetadata | null)[][] | null;
  documents: (string | null)[][] | null;
  distances: (number | null)[][] | null;
}

export interface CollectionHandle {
  readonly name: string;
  upsert(records: CollectionUpsertRecords): Promise<void>;
  get(params?: CollectionGetParams): Promise<CollectionGetResult>;
  query(params: CollectionQueryParams): Promise<CollectionQueryResult>;
  /** Unknown ids are ignored. */
  delete(params: { ids: string[] }): Promise<void>;
  count(): Promise<number>;
}

export interface VecDbClient {
  readonly kind: 'local' | 'remote';
  createCollection(name: string, options?: CreateCollectionOptions): Promise<CollectionHandle>;
  /** @throws CollectionNotFoundError when the collection does not exist */
  getCollection(name: string): Promise<CollectionHandle>;
  listCollections(): Promise<CollectionInfo[]>;
  deleteCollection(name: string): Promise<void>;
}
