import { LRUCache } from 'lru-cache';
import type { Artifact } from '../cache/artifact.js';
import type { CacheSource } from '../cache/artifactCache.js';
import type { AdmissionDecision } from '../audit/schema.js';
import type { QueueTicket } from '../backpressure/controller.js';
import type { FailureKind } from '../execution/failureTypes.js';
import type { PriorityClass } from './requestSchema.js';
import { assertTransition, RequestState } from './stateMachine.js';

export interface PublicFailure {
    readonly kind: FailureKind;
    readonly message: string;
    readonly incidentId: string;
    readonly details?: readonly { readonly path: string; readonly message: string }[];
}

/**
 * Read-only view of a tracked request, as returned to pollers.
 */
export interface RequestStatus {
    readonly requestId: string;
    readonly state: RequestState;
    readonly priority: PriorityClass;
    readonly submittedAt: string;
    readonly updatedAt: string;
    readonly decision?: AdmissionDecision;
    readonly position?: number;
    readonly fingerprint?: string;
    readonly source?: CacheSource;
    readonly artifact?: Artifact;
    readonly failure?: PublicFailure;
    readonly retryAfterSeconds?: number;
}

/**
 * Mutable tracking record, owned by the orchestrator.
 */
export class RequestHandle {
    public state: RequestState = 'Received';
    public decision?: AdmissionDecision;
    public fingerprint?: string;
    public source?: CacheSource;
    public artifact?: Artifact;
    public failure?: PublicFailure;
    public retryAfterSeconds?: number;
    public ticket?: QueueTicket;
    public audited = false;
    public updatedAt: string;
    public readonly controller = new AbortController();

    constructor(
        public readonly requestId: string,
        public readonly priority: PriorityClass,
        public readonly submittedAt: string,
        public readonly receivedAt: number,
        public readonly subject?: string
    ) {
        this.updatedAt = submittedAt;
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    transition(to: RequestState, at: Date = new Date()): void {
        assertTransition(this.requestId, this.state, to);
        this.state = to;
        this.updatedAt = at.toISOString();
    }

    toStatus(): RequestStatus {
        const position = this.state === 'Queued' ? this.ticket?.position() : undefined;
        return {
            requestId: this.requestId,
            state: this.state,
            priority: this.priority,
            submittedAt: this.submittedAt,
            updatedAt: this.updatedAt,
            ...(this.decision ? { decision: this.decision } : {}),
            ...(position !== undefined ? { position } : {}),
            ...(this.fingerprint ? { fingerprint: this.fingerprint } : {}),
            ...(this.source ? { source: this.source } : {}),
            ...(this.artifact ? { artifact: this.artifact } : {}),
            ...(this.failure ? { failure: this.failure } : {}),
            ...(this.retryAfterSeconds !== undefined ? { retryAfterSeconds: this.retryAfterSeconds } : {})
        };
    }
}

/**
 * Bounded, TTL'd index of requests for polling and cancellation.
 */
export class RequestRegistry {
    private readonly handles: LRUCache<string, RequestHandle>;

    constructor(options: { maxEntries: number; ttlMs: number }) {
        this.handles = new LRUCache<string, RequestHandle>({
            max: options.maxEntries,
            ttl: options.ttlMs,
            updateAgeOnGet: false
        });
    }

    get size(): number {
        return this.handles.size;
    }

    get(requestId: string): RequestHandle | undefined {
        return this.handles.get(requestId);
    }

    add(handle: RequestHandle): void {
        this.handles.set(handle.requestId, handle);
    }
}
