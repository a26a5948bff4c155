/**
 * ChromaHttpClient - remote backend speaking the Chroma server's REST API.
 * Collection-level calls go through the collection id returned on fetch.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
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
import type { RemoteTarget } from '../types/ConnectionTarget.js';
import { CollectionExistsError, CollectionNotFoundError } from '../errors.js';
import { isEmptyFilter } from '../utils/whereFilter.js';
import { createLogger, NAMESPACES } from '../logging.js';

const chromaLog = createLogger(NAMESPACES.clients.chroma);

const HNSW_SPACE: Record<DistanceMetric, string> = {
  cosine: 'cosine',
  euclidean: 'l2',
  dot: 'ip'
};

interface ChromaCollectionModel {
  id: string;
  name: string;
  metadata?: Record<string, unknown> | null;
}

interface ChromaGetResponse {
  ids: string[];
  embeddings?: (number[] | null)[] | null;
  metadatas?: (StoredMetadata | null)[] | null;
  documents?: (string | null)[] | null;
}

interface ChromaQueryResponse {
  ids: string[][];
  embeddings?: (number[] | null)[][] | null;
  metadatas?: (StoredMetadata | null)[][] | null;
  documents?: (string | null)[][] | null;
  distances?: (number | null)[][] | null;
}

function errorText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

function isCollectionMissing(error: unknown): boolean {
  if (!axios.isAxiosError(error) || !error.response) return false;
  return error.response.status === 404 || /does not exist/i.test(errorText(error.response.data));
}

function isCollectionConflict(error: unknown): boolean {
  if (!axios.isAxiosError(error) || !error.response) return false;
  return error.response.status === 409 || /already exists/i.test(errorText(error.response.data));
}

class ChromaCollection implements CollectionHandle {
  constructor(
    readonly name: string,
    readonly id: string,
    private readonly http: AxiosInstance,
    private readonly collectionsPath: string
  ) {}

  private url(action: string): string {
    return `${this.collectionsPath}/${encodeURIComponent(this.id)}/${action}`;
  }

  async upsert(records: CollectionUpsertRecords): Promise<void> {
    await this.http.post(this.url('upsert'), {
      ids: records.ids,
      embeddings: records.embeddings,
      metadatas: records.metadatas,
      documents: records.documents
    });
  }

  async get(params: CollectionGetParams = {}): Promise<CollectionGetResult> {
    const { data } = await this.http.post<ChromaGetResponse>(this.url('get'), {
      ids: params.ids,
      where: isEmptyFilter(params.where) ? undefined : params.where,
      limit: params.limit,
      include: ['embeddings', 'metadatas', 'documents']
    });
    return {
      ids: data.ids ?? [],
      embeddings: data.embeddings ?? null,
      metadatas: data.metadatas ?? null,
      documents: data.documents ?? null
    };
  }

  async query(params: CollectionQueryParams): Promise<CollectionQueryResult> {
    const { data } = await this.http.post<ChromaQueryResponse>(this.url('query'), {
      query_embeddings: params.queryEmbeddings,
      n_results: params.nResults,
      where: isEmptyFilter(params.where) ? undefined : params.where,
      include: ['embeddings', 'metadatas', 'documents', 'distances']
    });
    return {
      ids: data.ids ?? [],
      embeddings: data.embeddings ?? null,
      metadatas: data.metadatas ?? null,
      documents: data.documents ?? null,
      distances: data.distances ?? null
    };
  }

  async delete(params: { ids: string[] }): Promise<void> {
    await this.http.post(this.url('delete'), { ids: params.ids });
  }

  async count(): Promise<number> {
    const { data } = await this.http.get<number>(this.url('count'));
    return Number(data);
  }
}

export class ChromaHttpClient implements VecDbClient {
  readonly kind = 'remote' as const;
  readonly baseURL: string;
  private readonly http: AxiosInstance;
  private readonly collectionsPath: string;

  constructor(readonly target: RemoteTarget) {
    const scheme = target.tls ? 'https' : 'http';
    this.baseURL = `${scheme}://${target.host}:${target.port}`;

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (target.credentials) {
      const { username, password } = target.credentials;
      headers.Authorization = `Basic ${Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')}`;
    }

    this.http = axios.create({ baseURL: this.baseURL, timeout: target.timeoutMs, headers });
    this.collectionsPath = target.apiVersion === 'v2'
      ? `/api/v2/tenants/${encodeURIComponent(target.tenant)}/databases/${encodeURIComponent(target.database)}/collections`
      : '/api/v1/collections';
  }

  private collection(model: ChromaCollectionModel): ChromaCollection {
    return new ChromaCollection(model.name, model.id, this.http, this.collectionsPath);
  }

  async createCollection(name: string, options: CreateCollectionOptions = {}): Promise<CollectionHandle> {
    const metadata = options.distanceMetric ? { 'hnsw:space': HNSW_SPACE[options.distanceMetric] } : undefined;
    try {
      const { data } = await this.http.post<ChromaCollectionModel>(this.collectionsPath, {
        name,
        metadata,
        get_or_create: false
      });
      chromaLog(`[VECTOR_STORE] Created collection ${name} on ${this.baseURL}`);
      return this.collection(data);
    } catch (error) {
      if (isCollectionConflict(error)) throw new CollectionExistsError(name);
      throw error;
    }
  }

  async getCollection(name: string): Promise<CollectionHandle> {
    try {
      const { data } = await this.http.get<ChromaCollectionModel>(`${this.collectionsPath}/${encodeURIComponent(name)}`);
      return this.collection(data);
    } catch (error) {
      if (isCollectionMissing(error)) throw new CollectionNotFoundError(name);
      throw error;
    }
  }

  async listCollections(): Promise<CollectionInfo[]> {
    const { data } = await this.http.get<ChromaCollectionModel[]>(this.collectionsPath);
    return data.map((model) => ({ name: model.name, metadata: model.metadata ?? null }));
  }

  async deleteCollection(name: string): Promise<void> {
    try {
      await this.http.delete(`${this.collectionsPath}/${encodeURIComponent(name)}`);
      chromaLog(`[VECTOR_STORE] Deleted collection ${name} on ${this.baseURL}`);
    } catch (error) {
      if (isCollectionMissing(error)) throw new CollectionNotFoundError(name);
      throw error;
    }
  }
}

export default ChromaHttpClient;
