/**
 * VectorItemStore - CRUD and similarity search over one backend collection.
 * Payload metadata goes through a MetadataCodec on the way in and out;
 * payload.memory travels as the backend document.
 */

import type { VectorStoreInterface } from '../interfaces/VectorStoreInterface.js';
import type {
  CollectionGetResult,
  CollectionHandle,
  DistanceMetric,
  StoredMetadata,
  VecDbClient,
  WhereFilter
} from '../interfaces/VecDbClient.js';
import type { VectorItem, VectorItemInput, VectorItemPayload, VectorItemUpdate } from '../types/VectorItem.js';
import { toVectorItem } from '../types/VectorItem.js';
import type { MetadataCodec } from '../utils/metadataCodec.js';
import { jsonMetadataCodec } from '../utils/metadataCodec.js';
import { isEmptyFilter } from '../utils/whereFilter.js';
import {
  CollectionExistsError,
  CollectionNotFoundError,
  InvalidArgumentError,
  InvalidItemError
} from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const storeLog = createLogger(NAMESPACES.store);

export const DEFAULT_LIMIT = 100;

export interface VectorItemStoreOptions {
  collectionName: string;
  vectorDimension?: number;
  distanceMetric?: DistanceMetric;
  codec?: MetadataCodec;
}

interface BackendRecord {
  metadata: StoredMetadata | null;
  document: string | null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
  }
}

function filterOrUndefined(filter: WhereFilter | undefined): WhereFilter | undefined {
  return isEmptyFilter(filter) ? undefined : filter;
}

export class VectorItemStore implements VectorStoreInterface {
  readonly collectionName: string;
  private readonly vectorDimension?: number;
  private readonly distanceMetric: DistanceMetric;
  private readonly codec: MetadataCodec;
  private readonly payloadIndexes: Set<string> = new Set();

  private constructor(private readonly client: VecDbClient, options: VectorItemStoreOptions) {
    if (!options.collectionName) {
      throw new InvalidArgumentError('collectionName is required');
    }
    if (options.vectorDimension !== undefined) {
      assertPositiveInteger('vectorDimension', options.vectorDimension);
    }
    this.collectionName = options.collectionName;
    this.vectorDimension = options.vectorDimension;
    this.distanceMetric = options.distanceMetric ?? 'cosine';
    this.codec = options.codec ?? jsonMetadataCodec;
  }

  /** Builds a store whose collection is guaranteed to exist once the promise resolves. */
  static async create(client: VecDbClient, options: VectorItemStoreOptions): Promise<VectorItemStore> {
    const store = new VectorItemStore(client, options);
    await store.ensureCollection();
    return store;
  }

  get backendKind(): VecDbClient['kind'] {
    return this.client.kind;
  }

  async ensureCollection(): Promise<void> {
    const name = this.collectionName;
    try {
      const handle = await this.client.getCollection(name);
      const count = await handle.count();
      storeLog(`[VECTOR_STORE] Collection ${name} already exists with ${count} items`);
      return;
    } catch (error) {
      if (!(error instanceof CollectionNotFoundError)) throw error;
    }

    try {
      await this.client.createCollection(name, {
        dimension: this.vectorDimension,
        distanceMetric: this.distanceMetric
      });
      storeLog(`[VECTOR_STORE] Created collection ${name} (${this.distanceMetric}, dimension ${this.vectorDimension ?? 'unset'})`);
    } catch (error) {
      // another writer created it between the lookup and the create
      if (error instanceof CollectionExistsError) {
        storeLog(`[VECTOR_STORE] Collection ${name} was created concurrently`);
        return;
      }
      throw error;
    }
  }

  /**
   * Fetches the collection handle. A failed fetch re-runs ensureCollection
   * and tries once more; a second failure propagates.
   */
  async getCollectionHandle(): Promise<CollectionHandle> {
    try {
      return await this.client.getCollection(this.collectionName);
    } catch (error) {
      storeLog(`[VECTOR_STORE] Fetching ${this.collectionName} failed (${describeError(error)}), ensuring it exists`);
      await this.ensureCollection();
      return this.client.getCollection(this.collectionName);
    }
  }

  async listCollections(): Promise<string[]> {
    const collections = await this.client.listCollections();
    return collections.map((collection) => collection.name);
  }

  async deleteCollection(name: string): Promise<void> {
    await this.client.deleteCollection(name);
    storeLog(`[VECTOR_STORE] Deleted collection ${name}`);
  }

  async collectionExists(name: string): Promise<boolean> {
    try {
      await this.client.getCollection(name);
      return true;
    } catch (error) {
      storeLog(`[VECTOR_STORE] Collection ${name} not available: ${describeError(error)}`);
      return false;
    }
  }

  async search(vector: number[], topK: number, filter?: WhereFilter): Promise<VectorItem[]> {
    assertPositiveInteger('topK', topK);
    const handle = await this.getCollectionHandle();
    const result = await handle.query({
      queryEmbeddings: [vector],
      nResults: topK,
      where: filterOrUndefined(filter)
    });

    const ids = result.ids[0] ?? [];
    const embeddings = result.embeddings?.[0];
    const metadatas = result.metadatas?.[0];
    const documents = result.documents?.[0];
    const distances = result.distances?.[0];
    return ids.map((id, i) => this.toItem(id, embeddings?.[i], metadatas?.[i], documents?.[i], distances?.[i]));
  }

  async getById(id: string): Promise<VectorItem | null> {
    const [item] = await this.getByIds([id]);
    return item ?? null;
  }

  async getByIds(ids: string[]): Promise<VectorItem[]> {
    if (ids.length === 0) return [];
    const handle = await this.getCollectionHandle();
    const found = this.toItems(await handle.get({ ids }));

    const byId = new Map(found.map((item) => [item.id, item]));
    return ids.flatMap((id) => {
      const item = byId.get(id);
      return item ? [item] : [];
    });
  }

  async getByFilter(filter: WhereFilter, limit: number = DEFAULT_LIMIT): Promise<VectorItem[]> {
    assertPositiveInteger('limit', limit);
    const handle = await this.getCollectionHandle();
    return this.toItems(await handle.get({ where: filterOrUndefined(filter), limit }));
  }

  getAll(limit: number = DEFAULT_LIMIT): Promise<VectorItem[]> {
    return this.getByFilter({}, limit);
  }

  async count(filter?: WhereFilter): Promise<number> {
    const items = await this.getByFilter(filter ?? {});
    return items.length;
  }

  async add(items: VectorItemInput[]): Promise<void> {
    const normalized = items.map((input) => {
      const item = toVectorItem(input);
      if (!item.vector || item.vector.length === 0) {
        throw new InvalidItemError(`Item ${item.id} has no vector`);
      }
      return { item, vector: item.vector };
    });
    if (normalized.length === 0) return;

    const records = normalized.map(({ item }) => this.toBackendRecord(item));
    const handle = await this.getCollectionHandle();
    await handle.upsert({
      ids: normalized.map(({ item }) => item.id),
      embeddings: normalized.map(({ vector }) => vector),
      metadatas: records.map((record) => record.metadata),
      documents: records.map((record) => record.document)
    });
    storeLog(`[VECTOR_STORE] Upserted ${normalized.length} items into ${this.collectionName}`);
  }

  async update(id: string, input: VectorItemUpdate): Promise<void> {
    const item = toVectorItem({ ...input, id });
    const record = this.toBackendRecord(item);
    const handle = await this.getCollectionHandle();

    if (item.vector && item.vector.length > 0) {
      await handle.upsert({
        ids: [id],
        embeddings: [item.vector],
        metadatas: [record.metadata],
        documents: [record.document]
      });
      storeLog(`[VECTOR_STORE] Updated vector and payload of ${id}`);
      return;
    }

    // payload-only: the stored vector stays as it is
    await handle.upsert({
      ids: [id],
      metadatas: [record.metadata],
      documents: record.document !== null ? [record.document] : undefined
    });
    storeLog(`[VECTOR_STORE] Updated payload of ${id}`);
  }

  upsert(items: VectorItemInput[]): Promise<void> {
    return this.add(items);
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    const handle = await this.getCollectionHandle();
    await handle.delete({ ids });
    storeLog(`[VECTOR_STORE] Deleted ${ids.length} ids from ${this.collectionName}`);
  }

  async ensurePayloadIndexes(fields: string[]): Promise<void> {
    const added = fields.filter((field) => !this.payloadIndexes.has(field));
    for (const field of added) {
      this.payloadIndexes.add(field);
    }
    if (added.length > 0) {
      storeLog(`[VECTOR_STORE] Payload fields ${added.join(', ')} noted for ${this.collectionName}; the backend filters without secondary indexes`);
    }
  }

  /** Fields registered through ensurePayloadIndexes, in request order. */
  get indexedPayloadFields(): string[] {
    return [...this.payloadIndexes];
  }

  private toBackendRecord(item: VectorItem): BackendRecord {
    const { metadata, memory, ...rest } = item.payload;
    const dropped = Object.keys(rest);
    if (dropped.length > 0) {
      storeLog(`[VECTOR_STORE] Payload keys ${dropped.join(', ')} of ${item.id} are not persisted`);
    }
    const encoded = this.codec.encode(metadata ?? {});
    return {
      metadata: Object.keys(encoded).length > 0 ? encoded : null,
      document: typeof memory === 'string' ? memory : null
    };
  }

  private toItems(result: CollectionGetResult): VectorItem[] {
    return result.ids.map((id, i) =>
      this.toItem(id, result.embeddings?.[i], result.metadatas?.[i], result.documents?.[i])
    );
  }

  private toItem(
    id: string,
    embedding: number[] | null | undefined,
    metadata: StoredMetadata | null | undefined,
    document: string | null | undefined,
    distance?: number | null
  ): VectorItem {
    const payload: VectorItemPayload = { metadata: this.codec.decode(metadata ?? {}) };
    if (typeof document === 'string') payload.memory = document;

    const item: VectorItem = { id, vector: embedding ? [...embedding] : null, payload };
    if (typeof distance === 'number') item.score = distance;
    return item;
  }
}

export default VectorItemStore;
