export interface LocalTarget {
  kind: 'local';
  path: string;
}

export interface RemoteCredentials {
  username: string;
  password: string;
}

export type ChromaApiVersion = 'v1' | 'v2';

export interface RemoteTarget {
  kind: 'remote';
  host: string;
  port: number;
  credentials?: RemoteCredentials;
  tls: boolean;
  apiVersion: ChromaApiVersion;
  tenant: string;
  database: string;
  timeoutMs: number;
}

export type ConnectionTarget = LocalTarget | RemoteTarget;
