import debug from 'debug';

export const NAMESPACES = {
  store: 'vecdb:store',
  codec: 'vecdb:codec',
  clients: {
    vectra: 'vecdb:client:vectra',
    chroma: 'vecdb:client:chroma'
  },
  factory: 'vecdb:factory',
  config: 'vecdb:config'
} as const;

export interface DebugSettings {
  enabledNamespaces?: string;
}

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Enable debug namespaces at runtime (e.g. "vecdb:*" or "vecdb:store,vecdb:client:*").
 * Without settings, whatever DEBUG selected at startup stays in effect.
 */
export function applyDebugSettings(settings?: DebugSettings): void {
  if (!settings?.enabledNamespaces) return;
  debug.enable(settings.enabledNamespaces);
}
