import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import type { DistanceMetric } from './interfaces/VecDbClient.js';
import type { ChromaApiVersion, ConnectionTarget, RemoteTarget } from './types/ConnectionTarget.js';
import type { DebugSettings } from './logging.js';
import { createLogger, NAMESPACES } from './logging.js';
import { VectorConfigError } from './errors.js';
import { compileSchema, formatSchemaErrors } from './utils/schemaValidation.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const configLog = createLogger(NAMESPACES.config);

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', 'config', 'vectorConfig.json');
export const DEFAULT_REMOTE_HOST = 'localhost';
export const DEFAULT_REMOTE_PORT = 8000;

export interface VectorDbSettings {
  collectionName: string;
  vectorDimension?: number | null;
  distanceMetric: DistanceMetric;
  /** Folder for the local backend; used when neither host nor port is set. */
  path: string;
  host?: string | null;
  port?: number | null;
  username?: string | null;
  password?: string | null;
  tls: boolean;
  apiVersion: ChromaApiVersion;
  tenant: string;
  database: string;
  timeoutMs: number;
}

export interface VectorConfig {
  vectorDb: VectorDbSettings;
  debug?: DebugSettings;
}

interface VectorConfigFile {
  vectorDb?: Partial<VectorDbSettings>;
  debug?: DebugSettings;
}

export const DEFAULT_VECTOR_DB_SETTINGS: VectorDbSettings = {
  collectionName: 'memories',
  vectorDimension: null,
  distanceMetric: 'cosine',
  path: './vector_data',
  host: null,
  port: null,
  username: null,
  password: null,
  tls: false,
  apiVersion: 'v1',
  tenant: 'default_tenant',
  database: 'default_database',
  timeoutMs: 30000
};

const nullableString = { type: ['string', 'null'] };

const vectorConfigSchema = {
  type: 'object',
  properties: {
    vectorDb: {
      type: 'object',
      additionalProperties: false,
      properties: {
        collectionName: { type: 'string', minLength: 1 },
        vectorDimension: { type: ['integer', 'null'], minimum: 1 },
        distanceMetric: { enum: ['cosine', 'euclidean', 'dot'] },
        path: { type: 'string', minLength: 1 },
        host: nullableString,
        port: { type: ['integer', 'null'], minimum: 1, maximum: 65535 },
        username: nullableString,
        password: nullableString,
        tls: { type: 'boolean' },
        apiVersion: { enum: ['v1', 'v2'] },
        tenant: { type: 'string', minLength: 1 },
        database: { type: 'string', minLength: 1 },
        timeoutMs: { type: 'integer', minimum: 1 }
      }
    },
    debug: {
      type: 'object',
      properties: {
        enabledNamespaces: { type: 'string' }
      }
    }
  }
};

const validateVectorConfig = compileSchema<VectorConfigFile>(vectorConfigSchema);

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new VectorConfigError('Invalid VECDB_PORT', [`expected an integer between 1 and 65535, got "${raw}"`]);
  }
  return port;
}

/**
 * Environment variables win over the file: VECDB_COLLECTION, VECDB_PATH,
 * VECDB_HOST, VECDB_PORT, VECDB_USERNAME, VECDB_PASSWORD and VECDB_TLS.
 */
export function applyEnvOverrides(settings: VectorDbSettings, env: NodeJS.ProcessEnv): VectorDbSettings {
  const next: VectorDbSettings = { ...settings };
  if (env.VECDB_COLLECTION) next.collectionName = env.VECDB_COLLECTION;
  if (env.VECDB_PATH) next.path = env.VECDB_PATH;
  if (env.VECDB_HOST) next.host = env.VECDB_HOST;
  if (env.VECDB_PORT) next.port = parsePort(env.VECDB_PORT);
  if (env.VECDB_USERNAME) next.username = env.VECDB_USERNAME;
  if (env.VECDB_PASSWORD) next.password = env.VECDB_PASSWORD;
  if (env.VECDB_TLS) next.tls = env.VECDB_TLS === 'true' || env.VECDB_TLS === '1';
  return next;
}

/**
 * Resolve settings into a connection target. No host and no port means the
 * local on-disk backend; either one selects a remote server, the other
 * falling back to localhost:8000.
 */
export function resolveTarget(settings: VectorDbSettings): ConnectionTarget {
  const host = settings.host ?? null;
  const port = settings.port ?? null;
  if (host === null && port === null) {
    return { kind: 'local', path: settings.path };
  }

  const target: RemoteTarget = {
    kind: 'remote',
    host: host ?? DEFAULT_REMOTE_HOST,
    port: port ?? DEFAULT_REMOTE_PORT,
    tls: settings.tls,
    apiVersion: settings.apiVersion,
    tenant: settings.tenant,
    database: settings.database,
    timeoutMs: settings.timeoutMs
  };
  if (settings.username && settings.password) {
    target.credentials = { username: settings.username, password: settings.password };
  } else if (settings.username || settings.password) {
    configLog('Ignoring credentials: both username and password are needed for basic auth');
  }
  return target;
}

export class ConfigManager {
  private config: VectorConfig;

  constructor(
    private readonly configPath: string = DEFAULT_CONFIG_PATH,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.config = this.loadConfig();
  }

  private loadConfig(): VectorConfig {
    let file: VectorConfigFile = {};
    if (fs.existsSync(this.configPath)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
      } catch (error) {
        throw new VectorConfigError(`Failed to parse ${this.configPath}`, [error instanceof Error ? error.message : String(error)]);
      }
      if (!validateVectorConfig(parsed)) {
        throw new VectorConfigError(`Invalid vector config ${this.configPath}`, formatSchemaErrors(validateVectorConfig.errors));
      }
      file = parsed;
    } else {
      configLog(`No config at ${this.configPath}, using defaults`);
    }

    const vectorDb = applyEnvOverrides({ ...DEFAULT_VECTOR_DB_SETTINGS, ...file.vectorDb }, this.env);
    return { vectorDb, debug: file.debug };
  }

  getConfig(): VectorConfig {
    return { vectorDb: { ...this.config.vectorDb }, debug: this.config.debug ? { ...this.config.debug } : undefined };
  }

  getVectorDbSettings(): VectorDbSettings {
    return { ...this.config.vectorDb };
  }

  getDebugSettings(): DebugSettings | undefined {
    return this.config.debug;
  }

  getTarget(): ConnectionTarget {
    return resolveTarget(this.config.vectorDb);
  }

  reload(): void {
    this.config = this.loadConfig();
  }
}
