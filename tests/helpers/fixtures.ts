import assert from 'node:assert';
import type { BackpressureSettings, DispatchSettings } from '../../libs/bootstrap/settings.js';
import type { Decision, Lease, QueueTicket } from '../../libs/backpressure/controller.js';
import { createArtifact, Artifact } from '../../libs/cache/artifact.js';
import { buildCacheNamespaces, CacheNamespaces } from '../../libs/cache/namespaces.js';
import { InMemoryKeyValueStore } from '../../libs/cache/kvStore.js';
import type { AuditRecord, AuditSink, LineageEvent, LineageSink } from '../../libs/audit/schema.js';

export const TEST_SECRET = 'test-secret-value-0123456789';

export function backpressureSettings(overrides: Partial<BackpressureSettings> = {}): BackpressureSettings {
    return {
        capacity: 2,
        queueBound: 2,
        queueWaitMs: 5_000,
        errorWindow: 4,
        errorMinSamples: 2,
        errorThreshold: 0.5,
        cooldownMs: 1_000,
        ...overrides
    };
}

export function dispatchSettings(overrides: Partial<DispatchSettings> = {}): DispatchSettings {
    return {
        defaultTimeoutMs: 5_000,
        maxTimeoutMs: 10_000,
        graphMaxRetries: 2,
        retryBaseMs: 10,
        retryMaxMs: 100,
        ...overrides
    };
}

export function memoryNamespaces(
    overrides: { maxEntries?: number; maxBytes?: number } = {}
): { namespaces: CacheNamespaces; general: InMemoryKeyValueStore; dedicated: InMemoryKeyValueStore } {
    const general = new InMemoryKeyValueStore('general');
    const dedicated = new InMemoryKeyValueStore('dedicated');
    const namespaces = buildCacheNamespaces({
        general: { url: 'redis://unused', database: 0 },
        dedicated: { url: 'redis://unused', database: 1 },
        maxEntries: overrides.maxEntries ?? 100,
        maxBytes: overrides.maxBytes ?? 1_000_000,
        ttlSeconds: 60
    }, { general, dedicated });
    return { namespaces, general, dedicated };
}

export function jsonArtifact(fingerprint: string, value: unknown, backend: 'sandbox' | 'graph' = 'sandbox'): Artifact {
    return createArtifact({
        fingerprint,
        payload: Buffer.from(JSON.stringify(value), 'utf8'),
        contentType: 'application/json',
        backend,
        createdAt: new Date('2026-01-01T00:00:00.000Z')
    });
}

export function expectAdmit(decision: Decision): Lease {
    if (decision.kind !== 'admit') assert.fail(`expected admit, got ${decision.kind}`);
    return decision.lease;
}

export function expectQueue(decision: Decision): { position: number; ticket: QueueTicket } {
    if (decision.kind !== 'queue') assert.fail(`expected queue, got ${decision.kind}`);
    return { position: decision.position, ticket: decision.ticket };
}

export class RecordingAuditSink implements AuditSink, LineageSink {
    readonly records: AuditRecord[] = [];
    readonly lineage: LineageEvent[] = [];

    record(record: AuditRecord): void {
        this.records.push(record);
    }

    recordLineage(event: LineageEvent): void {
        this.lineage.push(event);
    }
}

/** Manually advanced clock */
export class TestClock {
    constructor(public value = Date.parse('2026-01-01T00:00:00.000Z')) { }

    readonly now = (): number => this.value;

    advance(ms: number): void {
        this.value += ms;
    }
}

/** Promise whose settlement the test controls */
export function deferred<T>(): { promise: Promise<T>; resolve(value: T): void; reject(error: unknown): void } {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
