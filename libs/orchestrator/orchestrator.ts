/**
 * Orchestrator
 *
 * Drives each request through admission, cache resolution and dispatch, and
 * records exactly one audit entry when it reaches a terminal state.
 *
 * Admitted requests are processed while the caller waits. Queued requests
 * return at once and continue in the background after promotion.
 */

import crypto from 'crypto';
import type { AuditSink, AdmissionDecision, TerminalOutcome } from '../audit/schema.js';
import type { BackpressureController, ControllerView, Decision, Lease, LeaseOutcome } from '../backpressure/controller.js';
import type { ArtifactCache } from '../cache/artifactCache.js';
import type { DispatchSettings } from '../bootstrap/settings.js';
import { ErrorSanitizer, OrchestrationError } from '../errors/sanitizer.js';
import type { ExecutionDispatcher } from '../execution/dispatcher.js';
import { FAILURE_KIND_METADATA } from '../execution/failureTypes.js';
import { PreparedWork, prepareWork, resolveTimeoutMs, scheduleWork } from '../execution/workUnit.js';
import { logger } from '../logging/logger.js';
import { addSpanEvent, SpanNames, withSpan } from '../observability/tracing.js';
import { RequestValidationError } from '../validation/zod-middleware.js';
import { RequestHandle, RequestRegistry, RequestStatus } from './requestRegistry.js';
import { AnalysisRequest, parseAnalysisRequest } from './requestSchema.js';
import { isTerminal, RequestState } from './stateMachine.js';

export interface OrchestratorDependencies {
    readonly controller: BackpressureController;
    readonly cache: ArtifactCache;
    readonly dispatcher: ExecutionDispatcher;
    readonly audit: AuditSink;
    readonly registry: RequestRegistry;
    readonly dispatch: DispatchSettings;
    readonly now?: () => number;
}

export interface SubmitOptions {
    readonly subject?: string;
    /** Aborts this caller's waits only */
    readonly signal?: AbortSignal;
}

export type CancelResult =
    | { readonly outcome: 'not_found' }
    | { readonly outcome: 'terminal'; readonly status: RequestStatus }
    | { readonly outcome: 'cancelled'; readonly status: RequestStatus };

const OUTCOME_BY_STATE: Partial<Record<RequestState, TerminalOutcome>> = {
    Completed: 'Completed',
    CacheHit: 'CacheHit',
    Failed: 'Failed',
    Rejected: 'Rejected'
};

export class Orchestrator {
    private readonly controller: BackpressureController;
    private readonly cache: ArtifactCache;
    private readonly dispatcher: ExecutionDispatcher;
    private readonly audit: AuditSink;
    private readonly registry: RequestRegistry;
    private readonly dispatchSettings: DispatchSettings;
    private readonly now: () => number;
    private readonly active = new Set<Promise<void>>();

    constructor(deps: OrchestratorDependencies) {
        this.controller = deps.controller;
        this.cache = deps.cache;
        this.dispatcher = deps.dispatcher;
        this.audit = deps.audit;
        this.registry = deps.registry;
        this.dispatchSettings = deps.dispatch;
        this.now = deps.now ?? Date.now;
    }

    get activeCount(): number {
        return this.active.size;
    }

    async submit(raw: unknown, options: SubmitOptions = {}): Promise<RequestStatus> {
        const receivedAt = this.now();

        let request: AnalysisRequest;
        try {
            request = parseAnalysisRequest(raw, new Date(receivedAt));
        } catch (error) {
            if (error instanceof RequestValidationError) {
                return this.rejectInvalid(error, receivedAt, options.subject);
            }
            throw error;
        }

        const existing = this.registry.get(request.requestId);
        if (existing) {
            logger.info({ requestId: request.requestId, state: existing.state }, 'Duplicate submission; returning tracked status');
            return existing.toStatus();
        }

        const handle = new RequestHandle(request.requestId, request.priority, request.submittedAt, receivedAt, options.subject);
        const work = prepareWork(request);
        handle.fingerprint = work.fingerprint;
        this.registry.add(handle);

        let decision: Decision;
        try {
            decision = await withSpan(SpanNames.ADMISSION, { priority: request.priority }, async () => {
                const admitted = this.controller.admit({ requestId: request.requestId, priority: request.priority }, { signal: handle.signal });
                addSpanEvent('admission_decision', { decision: admitted.kind });
                return admitted;
            });
        } catch (error) {
            handle.decision = 'rejected';
            this.fail(handle, 'Rejected', ErrorSanitizer.sanitize(error, 'Orchestrator:Admission', 'BackendUnavailable'));
            return handle.toStatus();
        }

        switch (decision.kind) {
            case 'reject': {
                handle.decision = 'rejected';
                handle.retryAfterSeconds = decision.retryAfterSeconds;
                this.fail(handle, 'Rejected', new OrchestrationError('CapacityExceeded', {
                    requestId: request.requestId,
                    priority: request.priority
                }, { contextLabel: 'Orchestrator:Admission' }));
                return handle.toStatus();
            }

            case 'queue': {
                handle.decision = 'queued';
                handle.ticket = decision.ticket;
                handle.transition('Queued', this.clock());
                this.track(this.continueWhenPromoted(handle, request, work, decision.ticket.promoted));
                logger.info({ requestId: request.requestId, position: decision.position }, 'Request queued');
                return handle.toStatus();
            }

            case 'admit': {
                handle.decision = 'admitted';
                handle.transition('Admitted', this.clock());
                const signal = options.signal ? AbortSignal.any([options.signal, handle.signal]) : handle.signal;
                const processing = this.process(handle, request, work, decision.lease, signal);
                this.track(processing);
                await processing;
                return handle.toStatus();
            }
        }
    }

    get(requestId: string): RequestStatus | undefined {
        return this.registry.get(requestId)?.toStatus();
    }

    /**
     * Cancels a queued or running request. Queued requests become
     * Rejected(Cancelled) at once; running ones become Failed(Cancelled) as
     * soon as their wait observes the abort.
     */
    cancel(requestId: string): CancelResult {
        const handle = this.registry.get(requestId);
        if (!handle) return { outcome: 'not_found' };
        if (isTerminal(handle.state)) return { outcome: 'terminal', status: handle.toStatus() };

        if (handle.state === 'Queued') {
            this.fail(handle, 'Rejected', new OrchestrationError('Cancelled', { requestId, reason: 'cancel requested' }, {
                contextLabel: 'Orchestrator:Cancel'
            }));
        }
        handle.controller.abort(new Error('Cancelled by caller'));
        logger.info({ requestId, state: handle.state }, 'Cancellation requested');
        return { outcome: 'cancelled', status: handle.toStatus() };
    }

    loadView(): ControllerView {
        return this.controller.snapshot();
    }

    /**
     * Waits for in-progress requests, up to `timeoutMs`. Returns whether
     * everything finished.
     */
    async drain(timeoutMs: number): Promise<boolean> {
        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<false>(resolve => {
            timer = setTimeout(() => resolve(false), timeoutMs);
        });
        try {
            return await Promise.race([Promise.allSettled([...this.active]).then(() => true), timedOut]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async continueWhenPromoted(handle: RequestHandle, request: AnalysisRequest, work: PreparedWork, promoted: Promise<Lease>): Promise<void> {
        let lease: Lease;
        try {
            lease = await promoted;
        } catch (error) {
            if (!isTerminal(handle.state)) {
                this.fail(handle, 'Rejected', ErrorSanitizer.sanitize(error, 'Orchestrator:Queue', 'QueueTimeout'));
            }
            return;
        }

        if (isTerminal(handle.state)) {
            lease.release('neutral');
            return;
        }
        handle.transition('Admitted', this.clock());
        await this.process(handle, request, work, lease, handle.signal);
    }

    /**
     * Cache resolution and dispatch for an admitted request. Always releases
     * the lease and leaves the handle terminal.
     *
     * Only the request whose compute function reached the backend reports a
     * gate outcome; cache hits and joined waiters release neutral, so the
     * error window counts backend calls rather than waiters.
     */
    private async process(
        handle: RequestHandle,
        request: AnalysisRequest,
        work: PreparedWork,
        lease: Lease,
        signal: AbortSignal
    ): Promise<void> {
        let gate: LeaseOutcome = 'neutral';
        let calledBackend = false;
        try {
            const unit = scheduleWork(work, this.now() + resolveTimeoutMs(request, this.dispatchSettings));

            if (!unit.cacheable) {
                calledBackend = true;
                handle.transition('Dispatching', this.clock());
                handle.artifact = await this.dispatcher.dispatch(unit, signal);
                handle.source = 'computed';
                gate = 'success';
                this.complete(handle, 'Completed');
                return;
            }

            let dispatching = false;
            const result = await this.cache.getOrCompute(
                unit.namespace,
                unit.fingerprint,
                computeSignal => {
                    calledBackend = true;
                    return this.dispatcher.dispatch(unit, computeSignal);
                },
                {
                    signal,
                    onPending: () => {
                        dispatching = true;
                        handle.transition('Dispatching', this.clock());
                    }
                }
            );

            handle.artifact = result.artifact;
            handle.source = result.source;
            gate = calledBackend ? 'success' : 'neutral';
            this.complete(handle, dispatching ? 'Completed' : 'CacheHit');
        } catch (error) {
            const failure = ErrorSanitizer.sanitize(error, 'Orchestrator:Process');
            gate = calledBackend ? FAILURE_KIND_METADATA[failure.kind].gateOutcome : 'neutral';
            this.fail(handle, 'Failed', failure);
        } finally {
            lease.release(gate);
        }
    }

    private rejectInvalid(error: RequestValidationError, receivedAt: number, subject?: string): RequestStatus {
        const submitted = new Date(receivedAt).toISOString();
        const handle = new RequestHandle(crypto.randomUUID(), 'interactive', submitted, receivedAt, subject);
        handle.decision = 'rejected';

        const failure = new OrchestrationError('InvalidRequest', { issues: error.issues }, {
            contextLabel: 'Orchestrator:Validate'
        });
        this.fail(handle, 'Rejected', failure);
        handle.failure = { ...failure.toPublic(), details: error.issues };

        logger.debug({ requestId: handle.requestId, issues: error.issues.length }, 'Invalid request rejected');
        return handle.toStatus();
    }

    private complete(handle: RequestHandle, state: 'Completed' | 'CacheHit'): void {
        handle.transition(state, this.clock());
        this.recordAudit(handle);
    }

    private fail(handle: RequestHandle, state: 'Failed' | 'Rejected', failure: OrchestrationError): void {
        handle.failure = failure.toPublic();
        handle.transition(state, this.clock());
        this.recordAudit(handle);
    }

    private recordAudit(handle: RequestHandle): void {
        const outcome = OUTCOME_BY_STATE[handle.state];
        if (handle.audited || !outcome) return;
        handle.audited = true;

        const decision: AdmissionDecision = handle.decision ?? 'rejected';
        this.audit.record({
            requestId: handle.requestId,
            decision,
            outcome,
            ...(handle.failure ? { failureKind: handle.failure.kind } : {}),
            latencyMs: Math.max(0, this.now() - handle.receivedAt),
            ...(handle.fingerprint ? { fingerprint: handle.fingerprint } : {}),
            ...(handle.subject ? { subject: handle.subject } : {})
        });
    }

    private track(work: Promise<void>): void {
        const tracked = work.then(undefined, (error: unknown) => {
            logger.error({ error }, 'Request processing failed unexpectedly');
        });
        this.active.add(tracked);
        void tracked.finally(() => this.active.delete(tracked));
    }

    private clock(): Date {
        return new Date(this.now());
    }
}
