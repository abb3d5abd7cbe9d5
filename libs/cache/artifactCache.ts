/**
 * Artifact Cache
 *
 * Content-addressed, per-namespace store of immutable artifacts with
 * single-flight computation of misses.
 *
 * Lookup order: in-process LRU index, then the namespace's key-value store,
 * then computation. Concurrent misses for the same namespace and fingerprint
 * share one computation; every caller receives the same artifact or the same
 * failure, and failures are never cached.
 *
 * A caller's signal ends only that caller's wait. The shared computation is
 * aborted once every waiter has gone.
 */

import { LRUCache } from 'lru-cache';
import { OrchestrationError } from '../errors/sanitizer.js';
import { raceAbort, throwIfCancelled } from '../execution/abort.js';
import { logger } from '../logging/logger.js';
import { SpanNames, withSpan } from '../observability/tracing.js';
import type { ArtifactNamespace } from '../orchestrator/requestSchema.js';
import type { Artifact } from './artifact.js';
import { decodeArtifact, encodeArtifact } from './artifactCodec.js';
import { artifactKey, CacheNamespaces } from './namespaces.js';

export type CacheSource = 'hit' | 'computed' | 'joined';

export interface CacheResult {
    readonly artifact: Artifact;
    readonly source: CacheSource;
}

export type ComputeFn = (signal: AbortSignal) => Promise<Artifact>;

export interface GetOrComputeOptions {
    readonly signal?: AbortSignal;
    /** Called once when this caller starts waiting on a computation */
    readonly onPending?: () => void;
}

interface FlightResult {
    readonly artifact: Artifact;
    readonly fromStore: boolean;
}

interface Flight {
    readonly promise: Promise<FlightResult>;
    readonly controller: AbortController;
    waiters: number;
    computing: boolean;
    readonly pending: Set<() => void>;
}

export interface CacheStats {
    readonly entries: Readonly<Record<ArtifactNamespace, number>>;
    readonly bytes: Readonly<Record<ArtifactNamespace, number>>;
    readonly inFlight: number;
}

export class ArtifactCache {
    private readonly indexes: Record<ArtifactNamespace, LRUCache<string, Artifact>>;
    private readonly inFlight = new Map<string, Flight>();

    constructor(private readonly namespaces: CacheNamespaces) {
        this.indexes = {
            results: this.createIndex('results'),
            vectors: this.createIndex('vectors')
        };
    }

    async getOrCompute(
        namespace: ArtifactNamespace,
        fingerprint: string,
        compute: ComputeFn,
        options: GetOrComputeOptions = {}
    ): Promise<CacheResult> {
        throwIfCancelled(options.signal, 'ArtifactCache:GetOrCompute');

        const indexed = this.indexes[namespace].get(fingerprint);
        if (indexed) {
            return { artifact: indexed, source: 'hit' };
        }

        const key = artifactKey(namespace, fingerprint);
        let flight = this.inFlight.get(key);
        const owner = flight === undefined || flight.controller.signal.aborted;
        if (!flight || owner) {
            flight = this.startFlight(namespace, fingerprint, key, compute);
        }

        flight.waiters += 1;
        if (options.onPending) {
            if (flight.computing) options.onPending();
            else flight.pending.add(options.onPending);
        }

        try {
            const result = await raceAbort(flight.promise, options.signal, 'ArtifactCache:Wait');
            return {
                artifact: result.artifact,
                source: result.fromStore ? 'hit' : owner ? 'computed' : 'joined'
            };
        } catch (error) {
            if (error instanceof OrchestrationError && error.kind === 'Cancelled' && options.signal?.aborted) {
                this.leave(flight, key);
            }
            throw error;
        } finally {
            if (options.onPending) flight.pending.delete(options.onPending);
        }
    }

    stats(): CacheStats {
        return {
            entries: { results: this.indexes.results.size, vectors: this.indexes.vectors.size },
            bytes: { results: this.indexes.results.calculatedSize, vectors: this.indexes.vectors.calculatedSize },
            inFlight: this.inFlight.size
        };
    }

    private startFlight(namespace: ArtifactNamespace, fingerprint: string, key: string, compute: ComputeFn): Flight {
        const controller = new AbortController();
        const pending = new Set<() => void>();

        const run = async (): Promise<FlightResult> => {
            try {
                const stored = await this.readStore(namespace, fingerprint);
                if (stored) {
                    this.indexes[namespace].set(fingerprint, stored);
                    return { artifact: stored, fromStore: true };
                }

                flight.computing = true;
                for (const notify of pending) notify();
                pending.clear();

                const artifact = await compute(controller.signal);
                await this.persist(namespace, key, artifact);
                this.indexes[namespace].set(fingerprint, artifact);
                return { artifact, fromStore: false };
            } finally {
                if (this.inFlight.get(key) === flight) this.inFlight.delete(key);
            }
        };

        const flight: Flight = {
            promise: Promise.resolve().then(run),
            controller,
            waiters: 0,
            computing: false,
            pending
        };
        this.inFlight.set(key, flight);
        return flight;
    }

    private leave(flight: Flight, key: string): void {
        flight.waiters -= 1;
        if (flight.waiters > 0) return;
        logger.info({ key }, 'All waiters left; aborting shared computation');
        flight.controller.abort(new Error('All waiters cancelled'));
    }

    private async readStore(namespace: ArtifactNamespace, fingerprint: string): Promise<Artifact | undefined> {
        const { store } = this.namespaces[namespace];
        const key = artifactKey(namespace, fingerprint);

        let raw: string | null;
        try {
            raw = await withSpan(SpanNames.CACHE_LOOKUP, { namespace, store: store.name }, () => store.get(key));
        } catch (error) {
            logger.warn({ namespace, key, error }, 'Cache store read failed; treating as miss');
            return undefined;
        }
        if (raw === null) return undefined;

        try {
            return decodeArtifact(raw, fingerprint);
        } catch (error) {
            // Logged as CacheCorruption on construction; drop the entry and recompute
            const incidentId = error instanceof OrchestrationError ? error.incidentId : undefined;
            await store.delete(key).then(
                removed => logger.info({ namespace, key, removed, incidentId }, 'Corrupted cache entry removed'),
                (deleteError: unknown) => logger.error({ namespace, key, incidentId, error: deleteError }, 'Failed to remove corrupted cache entry')
            );
            return undefined;
        }
    }

    private async persist(namespace: ArtifactNamespace, key: string, artifact: Artifact): Promise<void> {
        const { store, ttlSeconds } = this.namespaces[namespace];
        try {
            const written = await store.setIfAbsent(key, encodeArtifact(artifact), ttlSeconds);
            if (!written) {
                logger.debug({ namespace, key }, 'Artifact already stored; keeping existing entry');
            }
        } catch (error) {
            logger.warn({ namespace, key, error }, 'Cache store write failed; artifact kept in memory only');
        }
    }

    private createIndex(namespace: ArtifactNamespace): LRUCache<string, Artifact> {
        const config = this.namespaces[namespace];
        return new LRUCache<string, Artifact>({
            max: config.maxEntries,
            maxSize: config.maxBytes,
            sizeCalculation: artifact => Math.max(1, artifact.size),
            dispose: (_artifact, fingerprint, reason) => {
                if (reason !== 'evict') return;
                const key = artifactKey(namespace, fingerprint);
                config.store.delete(key).then(
                    () => logger.debug({ namespace, key }, 'Evicted artifact removed from store'),
                    (error: unknown) => logger.warn({ namespace, key, error }, 'Failed to remove evicted artifact')
                );
            }
        });
    }
}
