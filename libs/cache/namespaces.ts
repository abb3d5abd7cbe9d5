import type { CacheSettings } from '../bootstrap/settings.js';
import type { ArtifactNamespace } from '../orchestrator/requestSchema.js';
import type { KeyValueStore } from './kvStore.js';

export type CacheNamespace = ArtifactNamespace | 'backpressure';

export interface CacheNamespaceConfig {
    readonly store: KeyValueStore;
    readonly maxEntries: number;
    readonly maxBytes: number;
    readonly ttlSeconds: number;
}

/**
 * Which store and bounds back each namespace. Callers only ever name the
 * namespace, so the split between stores can change here alone.
 */
export type CacheNamespaces = Readonly<Record<CacheNamespace, CacheNamespaceConfig>>;

export function buildCacheNamespaces(
    settings: CacheSettings,
    stores: { readonly general: KeyValueStore; readonly dedicated: KeyValueStore }
): CacheNamespaces {
    const bounds = {
        maxEntries: settings.maxEntries,
        maxBytes: settings.maxBytes,
        ttlSeconds: settings.ttlSeconds
    };
    return Object.freeze({
        results: { store: stores.general, ...bounds },
        vectors: { store: stores.dedicated, ...bounds },
        backpressure: { store: stores.dedicated, ...bounds }
    });
}

export function artifactKey(namespace: ArtifactNamespace, fingerprint: string): string {
    return `artifact:${namespace}:${fingerprint}`;
}
