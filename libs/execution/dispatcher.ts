/**
 * Execution Dispatcher
 *
 * Submits work units to the sandbox or graph backend, enforces the unit's
 * deadline, and retries transient failures of idempotent units with
 * exponential backoff. Sandbox executions and graph writes are attempted
 * exactly once.
 *
 * Every attempt emits lineage events; the sink persists them off the hot path.
 */

import { logger } from '../logging/logger.js';
import { ErrorSanitizer, OrchestrationError } from '../errors/sanitizer.js';
import { LineageEvent, LineagePhase, LineageSink } from '../audit/schema.js';
import { BackendOutput, ExecutionBackend } from '../backends/types.js';
import { Artifact, createArtifact } from '../cache/artifact.js';
import { addSpanEvent, SpanNames, withSpan } from '../observability/tracing.js';
import { abortableSleep, throwIfCancelled } from './abort.js';
import { classifyFailure } from './failureClassifier.js';
import { FailureKind } from './failureTypes.js';
import { backoffDelayMs, RetryPolicy, shouldRetry } from './retryPolicy.js';
import { BackendTarget, WorkUnit } from './workUnit.js';

export interface DispatcherDependencies {
    readonly backends: readonly ExecutionBackend[];
    readonly retryPolicy: RetryPolicy;
    readonly lineage: LineageSink;
    readonly now?: () => number;
    readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class ExecutionDispatcher {
    private readonly backends: ReadonlyMap<BackendTarget, ExecutionBackend>;
    private readonly retryPolicy: RetryPolicy;
    private readonly lineage: LineageSink;
    private readonly now: () => number;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(deps: DispatcherDependencies) {
        this.backends = new Map(deps.backends.map(b => [b.target, b]));
        this.retryPolicy = deps.retryPolicy;
        this.lineage = deps.lineage;
        this.now = deps.now ?? Date.now;
        this.sleep = deps.sleep ?? abortableSleep;
    }

    /**
     * Run a work unit to an Artifact, or throw an OrchestrationError whose
     * kind is Timeout, BackendUnavailable, ExecutionError or Cancelled.
     */
    public async dispatch(unit: WorkUnit, signal?: AbortSignal): Promise<Artifact> {
        const backend = this.backends.get(unit.target);
        if (!backend) {
            throw new OrchestrationError('BackendUnavailable', { reason: 'No backend registered', target: unit.target }, {
                contextLabel: 'ExecutionDispatcher:Route'
            });
        }

        return withSpan(
            SpanNames.DISPATCH,
            { requestId: unit.requestId, target: unit.target, fingerprint: unit.fingerprint },
            () => this.attempts(backend, unit, signal)
        );
    }

    private async attempts(backend: ExecutionBackend, unit: WorkUnit, signal?: AbortSignal): Promise<Artifact> {
        let retries = 0;
        for (let attempt = 1; ; attempt++) {
            throwIfCancelled(signal, 'ExecutionDispatcher:Dispatch');

            const remainingMs = unit.deadline - this.now();
            if (remainingMs <= 0) {
                this.emit(unit, attempt, 'timed_out', { failureKind: 'Timeout' });
                throw new OrchestrationError('Timeout', { requestId: unit.requestId, attempt, reason: 'Deadline passed before attempt' }, {
                    contextLabel: 'ExecutionDispatcher:Deadline'
                });
            }

            this.emit(unit, attempt, 'started');
            const startedAt = this.now();

            try {
                const output = await withSpan(
                    unit.target === 'sandbox' ? SpanNames.SANDBOX_EXECUTION : SpanNames.GRAPH_QUERY,
                    { fingerprint: unit.fingerprint, attempt },
                    () => this.attemptWithDeadline(backend, unit, remainingMs, signal)
                );

                this.emit(unit, attempt, 'succeeded', { durationMs: this.now() - startedAt });
                return createArtifact({
                    fingerprint: unit.fingerprint,
                    payload: output.payload,
                    contentType: output.contentType,
                    backend: unit.target,
                    createdAt: new Date(this.now())
                });
            } catch (error) {
                const kind = classifyFailure(error, { requestId: unit.requestId, backend: unit.target });
                const durationMs = this.now() - startedAt;

                if (kind === 'Timeout') {
                    this.emit(unit, attempt, 'timed_out', { failureKind: kind, durationMs });
                    throw ErrorSanitizer.sanitize(error, 'ExecutionDispatcher:Attempt', kind);
                }

                this.emit(unit, attempt, 'failed', { failureKind: kind, durationMs });

                if (shouldRetry(kind, unit.idempotent, retries, this.retryPolicy)) {
                    const delayMs = backoffDelayMs(retries + 1, this.retryPolicy);
                    if (this.now() + delayMs < unit.deadline) {
                        retries += 1;
                        this.emit(unit, attempt, 'retry_scheduled', { failureKind: kind, delayMs });
                        addSpanEvent('retry_scheduled', { attempt, failureKind: kind, delayMs });
                        logger.warn({ requestId: unit.requestId, target: unit.target, attempt, delayMs, kind }, 'Retrying backend call');
                        await this.sleep(delayMs, signal);
                        continue;
                    }
                    logger.warn({ requestId: unit.requestId, attempt, delayMs }, 'Retry would pass deadline; giving up');
                }

                throw ErrorSanitizer.sanitize(error, 'ExecutionDispatcher:Attempt', kind);
            }
        }
    }

    /**
     * One backend call bounded by the remaining deadline. On expiry the
     * backend's signal is aborted (best-effort remote cancel) and the wait
     * ends immediately whether or not the backend honours it.
     */
    private attemptWithDeadline(
        backend: ExecutionBackend,
        unit: WorkUnit,
        remainingMs: number,
        callerSignal?: AbortSignal
    ): Promise<BackendOutput> {
        const controller = new AbortController();

        return new Promise<BackendOutput>((resolve, reject) => {
            let settled = false;
            const settle = (fn: () => void) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                callerSignal?.removeEventListener('abort', onCallerAbort);
                fn();
            };

            const timer = setTimeout(() => {
                controller.abort(new Error('DEADLINE_EXCEEDED'));
                settle(() => reject(new OrchestrationError('Timeout', {
                    requestId: unit.requestId,
                    target: unit.target,
                    remainingMs
                }, { contextLabel: 'ExecutionDispatcher:Deadline' })));
            }, remainingMs);

            const onCallerAbort = () => {
                controller.abort(callerSignal?.reason);
                settle(() => reject(new OrchestrationError('Cancelled', { requestId: unit.requestId }, {
                    contextLabel: 'ExecutionDispatcher:Attempt'
                })));
            };

            if (callerSignal?.aborted) {
                onCallerAbort();
                return;
            }
            callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

            backend.execute(unit, controller.signal).then(
                output => settle(() => resolve(output)),
                error => settle(() => reject(error))
            );
        });
    }

    private emit(
        unit: WorkUnit,
        attempt: number,
        phase: LineagePhase,
        extra: { failureKind?: FailureKind; delayMs?: number; durationMs?: number } = {}
    ): void {
        const event: LineageEvent = {
            requestId: unit.requestId,
            fingerprint: unit.fingerprint,
            backend: unit.target,
            attempt,
            phase,
            ...extra,
            at: new Date(this.now()).toISOString()
        };
        this.lineage.recordLineage(event);
    }
}
