export { VectorItemStore, DEFAULT_LIMIT } from './stores/VectorItemStore.js';
export type { VectorItemStoreOptions } from './stores/VectorItemStore.js';
export { isVectorStoreInterface } from './interfaces/VectorStoreInterface.js';
export type { VectorStoreInterface } from './interfaces/VectorStoreInterface.js';
export type {
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
  StoredMetadataValue,
  VecDbClient,
  WhereFilter
} from './interfaces/VecDbClient.js';
export { toVectorItem } from './types/VectorItem.js';
export type { PayloadMetadata, VectorItem, VectorItemInput, VectorItemPayload, VectorItemRecord, VectorItemUpdate } from './types/VectorItem.js';
export type { ConnectionTarget, LocalTarget, RemoteCredentials, RemoteTarget } from './types/ConnectionTarget.js';
export { decodeMetadata, decodeMetadataValue, encodeMetadata, jsonMetadataCodec } from './utils/metadataCodec.js';
export type { MetadataCodec } from './utils/metadataCodec.js';
export { VectraLocalClient } from './clients/VectraLocalClient.js';
export { ChromaHttpClient } from './clients/ChromaHttpClient.js';
export { ConfigManager, resolveTarget, applyEnvOverrides, DEFAULT_VECTOR_DB_SETTINGS } from './configManager.js';
export type { VectorConfig, VectorDbSettings } from './configManager.js';
export { VectorStoreFactory, createVecDbClient, createVectorItemStore } from './utils/vectorStoreFactory.js';
export { applyDebugSettings, createLogger, NAMESPACES } from './logging.js';
export type { DebugSettings } from './logging.js';
export * from './errors.js';
