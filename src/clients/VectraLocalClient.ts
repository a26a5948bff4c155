/**
 * VectraLocalClient - local on-disk backend built on Vectra.
 * Each collection is a folder under basePath holding a Vectra index (index.json)
 * and a collection.json sidecar with its dimension and distance metric.
 */

import { LocalIndex } from 'vectra';
import path from 'path';
import fs from 'fs/promises';
import type {
  CollectionGetParams,
  CollectionGetResult,
  CollectionHandle,
  CollectionInfo,
  CollectionQueryParams,
  CollectionQueryResult,
  CollectionUpsertRecords,
  CreateCollectionOptions,
  DistanceMetric,
  StoredMetadata,
  VecDbClient
} from '../interfaces/VecDbClient.js';
import {
  CollectionExistsError,
  CollectionNotFoundError,
  DimensionMismatchError,
  InvalidArgumentError
} from '../errors.js';
import { distanceFor } from '../utils/distance.js';
import { matchesWhere } from '../utils/whereFilter.js';
import { isRecord } from '../types/VectorItem.js';
import { createLogger, NAMESPACES } from '../logging.js';

const vectraLog = createLogger(NAMESPACES.clients.vectra);

/**
 * Metadata key the document body is kept under; stripped on read. Caller keys
 * starting with "__" are stored with one extra leading underscore, so no
 * caller key can land on it.
 */
export const DOCUMENT_KEY = '__document';
const COLLECTION_FILE = 'collection.json';
const INDEX_FILE = 'index.json';
const COLLECTION_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Pending writes per index folder, shared by every client in the process. */
const writeChains: Map<string, Promise<void>> = new Map();

export interface LocalCollectionSettings {
  name: string;
  dimension: number | null;
  distanceMetric: DistanceMetric;
  createdAt?: string;
}

interface StoredEntry {
  id: string;
  vector: number[];
  metadata: StoredMetadata;
  document: string | null;
}

function isDistanceMetric(value: unknown): value is DistanceMetric {
  return value === 'cosine' || value === 'euclidean' || value === 'dot';
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function escapeKey(key: string): string {
  return key.startsWith('__') ? `_${key}` : key;
}

function unescapeKey(key: string): string | null {
  if (key.startsWith('___')) return key.slice(1);
  // "__x" without a third underscore is a reserved key
  if (key.startsWith('__')) return null;
  return key;
}

function splitMetadata(raw: StoredMetadata): { metadata: StoredMetadata; document: string | null } {
  const metadata: StoredMetadata = {};
  for (const [key, value] of Object.entries(raw)) {
    const callerKey = unescapeKey(key);
    if (callerKey !== null) metadata[callerKey] = value;
  }
  const document = raw[DOCUMENT_KEY];
  return { metadata, document: typeof document === 'string' ? document : null };
}

function joinMetadata(metadata: StoredMetadata, document: string | null): StoredMetadata {
  const stored: StoredMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    stored[escapeKey(key)] = value;
  }
  if (document !== null) stored[DOCUMENT_KEY] = document;
  return stored;
}

class VectraCollection implements CollectionHandle {
  private readonly chainKey: string;

  constructor(
    readonly name: string,
    private readonly folder: string,
    readonly settings: LocalCollectionSettings
  ) {
    this.chainKey = path.resolve(folder);
  }

  /**
   * Vectra caches index data per LocalIndex instance, so every operation
   * opens the index afresh and sees writes made through other clients.
   */
  private openIndex(): LocalIndex {
    return new LocalIndex(this.folder);
  }

  /** Vectra allows one pending update per index, so writes to a folder queue up behind each other. */
  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const previous = writeChains.get(this.chainKey) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.catch((error: unknown) => {
      vectraLog(`[VECTOR_STORE] Write to ${this.name} failed:`, error instanceof Error ? error.message : String(error));
    });
    writeChains.set(this.chainKey, settled);
    void settled.then(() => {
      if (writeChains.get(this.chainKey) === settled) writeChains.delete(this.chainKey);
    });
    return run;
  }

  private checkDimension(vector: number[]): void {
    const expected = this.settings.dimension;
    if (expected !== null && vector.length !== expected) {
      throw new DimensionMismatchError(expected, vector.length);
    }
  }

  private async entries(): Promise<StoredEntry[]> {
    const items = await this.openIndex().listItems();
    return items.map((item) => ({ id: item.id, vector: item.vector, ...splitMetadata(item.metadata) }));
  }

  upsert(records: CollectionUpsertRecords): Promise<void> {
    const { ids, embeddings, metadatas, documents } = records;
    for (const [column, values] of [['embeddings', embeddings], ['metadatas', metadatas], ['documents', documents]] as const) {
      if (values && values.length !== ids.length) {
        return Promise.reject(new InvalidArgumentError(`${column} must have the same length as ids`));
      }
    }
    if (new Set(ids).size !== ids.length) {
      return Promise.reject(new InvalidArgumentError('ids must be unique within one upsert'));
    }

    return this.enqueueWrite(async () => {
      const index = this.openIndex();
      const pending: Array<{ id: string; vector: number[]; metadata: StoredMetadata }> = [];

      for (let i = 0; i < ids.length; i++) {
        const id = ids[i];
        const embedding = embeddings?.[i];
        const existing = await index.getItem(id);
        const previous = existing ? splitMetadata(existing.metadata) : { metadata: {}, document: null };

        let vector: number[];
        if (embedding) {
          this.checkDimension(embedding);
          vector = [...embedding];
        } else if (existing) {
          vector = existing.vector;
        } else {
          throw new InvalidArgumentError(`Cannot upsert ${id} without an embedding: no stored item to update`);
        }

        const metadata = metadatas ? (metadatas[i] ?? {}) : previous.metadata;
        const document = documents ? (documents[i] ?? null) : previous.document;
        pending.push({ id, vector, metadata: joinMetadata(metadata, document) });
      }

      await index.beginUpdate();
      try {
        for (const item of pending) {
          await index.upsertItem(item);
        }
        await index.endUpdate();
      } catch (error) {
        index.cancelUpdate();
        throw error;
      }
      vectraLog(`[VECTOR_STORE] Upserted ${pending.length} items into ${this.name}`);
    });
  }

  async get(params: CollectionGetParams = {}): Promise<CollectionGetResult> {
    let selected = await this.entries();
    if (params.ids) {
      const wanted = new Set(params.ids);
      selected = selected.filter((entry) => wanted.has(entry.id));
    }
    if (params.where) {
      const where = params.where;
      selected = selected.filter((entry) => matchesWhere(entry.metadata, where));
    }
    if (params.limit !== undefined) {
      selected = selected.slice(0, params.limit);
    }

    return {
      ids: selected.map((entry) => entry.id),
      embeddings: selected.map((entry) => entry.vector),
      metadatas: selected.map((entry) => entry.metadata),
      documents: selected.map((entry) => entry.document)
    };
  }

  async query(params: CollectionQueryParams): Promise<CollectionQueryResult> {
    const distance = distanceFor(this.settings.distanceMetric);
    const where = params.where;
    const candidates = (await this.entries()).filter((entry) => !where || matchesWhere(entry.metadata, where));

    const result: CollectionQueryResult = { ids: [], embeddings: [], metadatas: [], documents: [], distances: [] };
    for (const queryVector of params.queryEmbeddings) {
      this.checkDimension(queryVector);
      const scored = candidates
        .filter((entry) => entry.vector.length === queryVector.length)
        .map((entry) => ({ entry, distance: distance(queryVector, entry.vector) }))
        .sort((a, b) => a.distance - b.distance)
        .slice(0, params.nResults);

      result.ids.push(scored.map((s) => s.entry.id));
      result.embeddings?.push(scored.map((s) => s.entry.vector));
      result.metadatas?.push(scored.map((s) => s.entry.metadata));
      result.documents?.push(scored.map((s) => s.entry.document));
      result.distances?.push(scored.map((s) => s.distance));
    }
    return result;
  }

  delete(params: { ids: string[] }): Promise<void> {
    return this.enqueueWrite(async () => {
      const index = this.openIndex();
      await index.beginUpdate();
      try {
        for (const id of params.ids) {
          await index.deleteItem(id);
        }
        await index.endUpdate();
      } catch (error) {
        index.cancelUpdate();
        throw error;
      }
      vectraLog(`[VECTOR_STORE] Deleted ${params.ids.length} ids from ${this.name}`);
    });
  }

  async count(): Promise<number> {
    const items = await this.openIndex().listItems();
    return items.length;
  }
}

export class VectraLocalClient implements VecDbClient {
  readonly kind = 'local' as const;
  private collections: Map<string, VectraCollection> = new Map();

  constructor(readonly basePath: string = './vector_data') {
    vectraLog(`[VECTOR_STORE] Running in local mode at ${basePath} (no host and port configured)`);
  }

  private collectionPath(name: string): string {
    if (!COLLECTION_NAME_PATTERN.test(name) || name.includes('..')) {
      throw new InvalidArgumentError(`Invalid collection name: ${name}`);
    }
    return path.join(this.basePath, name);
  }

  /** A collection exists once its folder holds a created Vectra index. */
  private async indexExists(folder: string): Promise<boolean> {
    try {
      const stat = await fs.stat(path.join(folder, INDEX_FILE));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  private async readSettings(folder: string, name: string): Promise<LocalCollectionSettings> {
    const defaults: LocalCollectionSettings = { name, dimension: null, distanceMetric: 'cosine' };
    let raw: string;
    try {
      raw = await fs.readFile(path.join(folder, COLLECTION_FILE), 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) return defaults;
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) return defaults;
    return {
      name,
      dimension: typeof parsed.dimension === 'number' ? parsed.dimension : null,
      distanceMetric: isDistanceMetric(parsed.distanceMetric) ? parsed.distanceMetric : 'cosine',
      createdAt: typeof parsed.createdAt === 'string' ? parsed.createdAt : undefined
    };
  }

  async createCollection(name: string, options: CreateCollectionOptions = {}): Promise<CollectionHandle> {
    const folder = this.collectionPath(name);
    if (await this.indexExists(folder)) {
      throw new CollectionExistsError(name);
    }

    await fs.mkdir(folder, { recursive: true });
    const index = new LocalIndex(folder);
    await index.createIndex();

    const settings: LocalCollectionSettings = {
      name,
      dimension: options.dimension ?? null,
      distanceMetric: options.distanceMetric ?? 'cosine',
      createdAt: new Date().toISOString()
    };
    await fs.writeFile(path.join(folder, COLLECTION_FILE), JSON.stringify(settings, null, 2), 'utf-8');

    const collection = new VectraCollection(name, folder, settings);
    this.collections.set(name, collection);
    vectraLog(`[VECTOR_STORE] Created collection ${name} at ${folder}`);
    return collection;
  }

  async getCollection(name: string): Promise<CollectionHandle> {
    const folder = this.collectionPath(name);
    if (!(await this.indexExists(folder))) {
      this.collections.delete(name);
      throw new CollectionNotFoundError(name);
    }

    const cached = this.collections.get(name);
    if (cached) return cached;

    const settings = await this.readSettings(folder, name);
    const collection = new VectraCollection(name, folder, settings);
    this.collections.set(name, collection);
    return collection;
  }

  async listCollections(): Promise<CollectionInfo[]> {
    const entries = await fs.readdir(this.basePath, { withFileTypes: true }).catch((error: unknown) => {
      if (isMissingFileError(error)) return null;
      throw error;
    });
    if (!entries) return [];

    const collections: CollectionInfo[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const folder = path.join(this.basePath, entry.name);
      if (!(await this.indexExists(folder))) continue;
      const settings = await this.readSettings(folder, entry.name);
      collections.push({
        name: entry.name,
        metadata: { dimension: settings.dimension, distanceMetric: settings.distanceMetric }
      });
    }
    return collections;
  }

  async deleteCollection(name: string): Promise<void> {
    const folder = this.collectionPath(name);
    if (!(await this.indexExists(folder))) {
      throw new CollectionNotFoundError(name);
    }
    this.collections.delete(name);
    await fs.rm(folder, { recursive: true, force: true });
    vectraLog(`[VECTOR_STORE] Deleted collection ${name}`);
  }
}

export default VectraLocalClient;
