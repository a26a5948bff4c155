/**
 * Vector Store Factory - resolves settings into a backend client and a ready
 * VectorItemStore. Stores are cached per settings so callers share one.
 */

import type { VecDbClient } from '../interfaces/VecDbClient.js';
import type { ConnectionTarget } from '../types/ConnectionTarget.js';
import type { MetadataCodec } from './metadataCodec.js';
import type { VectorDbSettings } from '../configManager.js';
import { ConfigManager, resolveTarget } from '../configManager.js';
import { VectraLocalClient } from '../clients/VectraLocalClient.js';
import { ChromaHttpClient } from '../clients/ChromaHttpClient.js';
import { VectorItemStore } from '../stores/VectorItemStore.js';
import { applyDebugSettings, createLogger, NAMESPACES } from '../logging.js';

const factoryLog = createLogger(NAMESPACES.factory);

export function createVecDbClient(target: ConnectionTarget): VecDbClient {
  switch (target.kind) {
    case 'local':
      return new VectraLocalClient(target.path);
    case 'remote':
      return new ChromaHttpClient(target);
  }
}

export async function createVectorItemStore(settings: VectorDbSettings, codec?: MetadataCodec): Promise<VectorItemStore> {
  const client = createVecDbClient(resolveTarget(settings));
  return VectorItemStore.create(client, {
    collectionName: settings.collectionName,
    vectorDimension: settings.vectorDimension ?? undefined,
    distanceMetric: settings.distanceMetric,
    codec
  });
}

function cacheKey(settings: VectorDbSettings): string {
  const { password: _password, ...rest } = settings;
  const entries = Object.entries(rest).sort(([a], [b]) => a.localeCompare(b));
  return JSON.stringify({ ...Object.fromEntries(entries), hasPassword: Boolean(settings.password) });
}

class VectorStoreFactory {
  private static instances: Map<string, Promise<VectorItemStore>> = new Map();

  /**
   * Create or get the store for these settings.
   * A failed creation is evicted so the next call retries.
   */
  static createVectorStore(settings: VectorDbSettings): Promise<VectorItemStore> {
    const key = cacheKey(settings);
    const cached = this.instances.get(key);
    if (cached) return cached;

    const pending = createVectorItemStore(settings);
    this.instances.set(key, pending);
    void pending.then(
      (store) => factoryLog(`[VECTOR_STORE] Created ${store.backendKind} store for ${settings.collectionName}`),
      (error: unknown) => {
        this.instances.delete(key);
        factoryLog(`[VECTOR_STORE] Creating store for ${settings.collectionName} failed:`, error instanceof Error ? error.message : String(error));
      }
    );
    return pending;
  }

  /**
   * Get a cached store, or null when none was created for these settings
   */
  static getVectorStore(settings: VectorDbSettings): Promise<VectorItemStore> | null {
    return this.instances.get(cacheKey(settings)) ?? null;
  }

  static clearCache(): void {
    this.instances.clear();
    factoryLog('[VECTOR_STORE] Cleared all cached instances');
  }

  /** Build (or reuse) the store described by the config file, applying its debug settings. */
  static fromConfig(configManager: ConfigManager = new ConfigManager()): Promise<VectorItemStore> {
    applyDebugSettings(configManager.getDebugSettings());
    return this.createVectorStore(configManager.getVectorDbSettings());
  }
}

export default VectorStoreFactory;
export { VectorStoreFactory };
