/**
 * Backpressure Controller
 *
 * Decides, per request, whether to admit now, queue, or reject, based on
 * in-flight work, queue depth and the recent backend error rate.
 *
 * Policy:
 * - in-flight < effective capacity: admit
 * - else queue depth < queue bound: queue at the tail of the request's lane
 * - else: reject with CapacityExceeded
 *
 * Error gate: once `errorMinSamples` outcomes are recorded, an error rate
 * above `errorThreshold` over the last `errorWindow` outcomes halves the
 * effective capacity (never below 1). The gate reopens only after the rate
 * has stayed at or under the threshold for `cooldownMs`. The gate is
 * re-evaluated on every admit, release and snapshot read.
 *
 * Every public method is one synchronous block: no caller can observe a
 * partially applied admit or release.
 */

import { OrchestrationError } from '../errors/sanitizer.js';
import { throwIfCancelled } from '../execution/abort.js';
import type { GateOutcome } from '../execution/failureTypes.js';
import { logger } from '../logging/logger.js';
import type { BackpressureSettings } from '../bootstrap/settings.js';
import type { PriorityClass } from '../orchestrator/requestSchema.js';
import { LoadSnapshot, LoadView } from './loadSnapshot.js';
import { PriorityLanes } from './priorityLanes.js';

export type LeaseOutcome = GateOutcome;

/**
 * One in-flight slot. Releasing is idempotent; only the first outcome counts.
 */
export interface Lease {
    readonly requestId: string;
    readonly priority: PriorityClass;
    readonly released: boolean;
    release(outcome: LeaseOutcome): void;
}

export interface QueueTicket {
    readonly requestId: string;
    /**
     * Resolves with a lease on promotion. Rejects with QueueTimeout after the
     * queue-wait bound, or Cancelled on cancel() or signal abort.
     */
    readonly promoted: Promise<Lease>;
    /** Current 1-based position, or undefined once out of the queue */
    position(): number | undefined;
    cancel(): void;
}

export type Decision =
    | { readonly kind: 'admit'; readonly lease: Lease }
    | { readonly kind: 'queue'; readonly position: number; readonly ticket: QueueTicket }
    | { readonly kind: 'reject'; readonly reason: 'CapacityExceeded'; readonly retryAfterSeconds: number };

export interface AdmissionRequest {
    readonly requestId: string;
    readonly priority: PriorityClass;
}

export interface ControllerView extends LoadView {
    readonly capacity: number;
    readonly effectiveCapacity: number;
    readonly queueBound: number;
    readonly degraded: boolean;
}

export type ControllerListener = (view: ControllerView) => void;

interface Waiter {
    readonly requestId: string;
    readonly priority: PriorityClass;
    resolve(lease: Lease): void;
    reject(error: OrchestrationError): void;
    timer?: NodeJS.Timeout;
    detach?: () => void;
    settled: boolean;
}

export class BackpressureController {
    private readonly lanes = new PriorityLanes<Waiter>();
    private readonly listeners = new Set<ControllerListener>();
    private degraded = false;
    private healthySince: number | null = null;
    private closed = false;

    constructor(
        private readonly settings: BackpressureSettings,
        private readonly load: LoadSnapshot = new LoadSnapshot(settings.errorWindow),
        private readonly now: () => number = Date.now
    ) {
        if (load.windowSize !== settings.errorWindow) {
            throw new RangeError('LoadSnapshot window size must match errorWindow');
        }
    }

    get isDegraded(): boolean {
        return this.degraded;
    }

    get effectiveCapacity(): number {
        return this.degraded
            ? Math.max(1, Math.floor(this.settings.capacity / 2))
            : this.settings.capacity;
    }

    admit(request: AdmissionRequest, options: { signal?: AbortSignal } = {}): Decision {
        if (this.closed) {
            throw new OrchestrationError('BackendUnavailable', { reason: 'Controller closed' }, {
                contextLabel: 'BackpressureController:Admit'
            });
        }

        throwIfCancelled(options.signal, 'BackpressureController:Admit');

        this.evaluateGate();
        this.promote();

        if (this.lanes.size === 0 && this.load.tryAcquire(this.effectiveCapacity)) {
            this.load.increment('admitted');
            this.notify();
            return { kind: 'admit', lease: this.createLease(request) };
        }

        if (this.lanes.size < this.settings.queueBound) {
            const { ticket, position } = this.enqueue(request, options.signal);
            this.load.increment('queued');
            this.syncDepth();
            this.notify();
            return { kind: 'queue', position, ticket };
        }

        this.load.increment('rejected');
        this.notify();
        logger.info({
            requestId: request.requestId,
            inFlight: this.load.inFlight,
            queued: this.lanes.size
        }, 'Admission rejected: capacity exceeded');
        return {
            kind: 'reject',
            reason: 'CapacityExceeded',
            retryAfterSeconds: Math.max(1, Math.ceil(this.settings.queueWaitMs / 1000))
        };
    }

    /**
     * Current load, after re-evaluating the error gate.
     */
    snapshot(): ControllerView {
        if (this.evaluateGate()) {
            this.promote();
            this.notify();
        }
        return this.view();
    }

    onChange(listener: ControllerListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    /**
     * Rejects every queued ticket with Cancelled and refuses new admissions.
     * Leases already granted stay valid until released.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const waiter of this.lanes.drainAll()) {
            this.settleWaiter(waiter);
            this.load.increment('cancelled');
            waiter.reject(new OrchestrationError('Cancelled', { requestId: waiter.requestId, reason: 'shutdown' }, {
                contextLabel: 'BackpressureController:Close'
            }));
        }
        this.syncDepth();
        this.notify();
    }

    private enqueue(request: AdmissionRequest, signal?: AbortSignal): { ticket: QueueTicket; position: number } {
        let resolveFn: (lease: Lease) => void = () => undefined;
        let rejectFn: (error: OrchestrationError) => void = () => undefined;
        const promoted = new Promise<Lease>((resolve, reject) => {
            resolveFn = resolve;
            rejectFn = reject;
        });

        const waiter: Waiter = {
            requestId: request.requestId,
            priority: request.priority,
            resolve: resolveFn,
            reject: rejectFn,
            settled: false
        };

        const cancel = () => this.abandon(waiter, 'Cancelled');

        const position = this.lanes.enqueue(request.priority, waiter);
        waiter.timer = setTimeout(() => this.abandon(waiter, 'QueueTimeout'), this.settings.queueWaitMs);
        if (signal) {
            signal.addEventListener('abort', cancel, { once: true });
            waiter.detach = () => signal.removeEventListener('abort', cancel);
        }

        const ticket: QueueTicket = {
            requestId: request.requestId,
            promoted,
            position: () => this.lanes.position(waiter),
            cancel
        };
        return { ticket, position };
    }

    /**
     * Timed-out or cancelled waiters leave their lane and can never be
     * promoted afterwards.
     */
    private abandon(waiter: Waiter, kind: 'QueueTimeout' | 'Cancelled'): void {
        if (waiter.settled) return;
        this.lanes.remove(waiter);
        this.settleWaiter(waiter);
        this.load.increment(kind === 'QueueTimeout' ? 'queueTimeouts' : 'cancelled');
        this.syncDepth();
        this.notify();
        waiter.reject(new OrchestrationError(kind, {
            requestId: waiter.requestId,
            queueWaitMs: this.settings.queueWaitMs
        }, { contextLabel: 'BackpressureController:Queue' }));
    }

    private settleWaiter(waiter: Waiter): void {
        waiter.settled = true;
        if (waiter.timer) clearTimeout(waiter.timer);
        waiter.detach?.();
    }

    /**
     * Moves queue heads into free slots, interactive first.
     */
    private promote(): void {
        let promotedAny = false;
        while (this.lanes.size > 0 && this.load.tryAcquire(this.effectiveCapacity)) {
            const waiter = this.lanes.dequeue();
            if (!waiter) {
                this.load.release();
                break;
            }
            this.settleWaiter(waiter);
            this.load.increment('promoted');
            promotedAny = true;
            waiter.resolve(this.createLease(waiter));
        }
        if (promotedAny) this.syncDepth();
    }

    private createLease(request: AdmissionRequest): Lease {
        let released = false;
        return {
            requestId: request.requestId,
            priority: request.priority,
            get released() {
                return released;
            },
            release: (outcome: LeaseOutcome) => {
                if (released) return;
                released = true;
                this.load.release();
                if (outcome !== 'neutral') {
                    this.load.recordOutcome(outcome === 'failure');
                }
                this.load.increment(outcome === 'failure' ? 'failed' : 'completed');
                this.evaluateGate();
                this.promote();
                this.notify();
            }
        };
    }

    /**
     * Returns true when the gate reopened during this call.
     */
    private evaluateGate(): boolean {
        const rate = this.load.errorRate(this.settings.errorMinSamples);
        const over = rate !== null && rate > this.settings.errorThreshold;
        const now = this.now();

        if (!this.degraded) {
            if (over) {
                this.degraded = true;
                this.healthySince = null;
                logger.warn({
                    errorRate: rate,
                    threshold: this.settings.errorThreshold,
                    effectiveCapacity: this.effectiveCapacity
                }, 'Error rate over threshold; entering degraded state');
            }
            return false;
        }

        // Recovery needs the rate strictly below the threshold
        if (rate !== null && rate >= this.settings.errorThreshold) {
            this.healthySince = null;
            return false;
        }

        this.healthySince ??= now;
        if (now - this.healthySince < this.settings.cooldownMs) {
            return false;
        }

        this.degraded = false;
        this.healthySince = null;
        logger.info({ errorRate: rate, effectiveCapacity: this.effectiveCapacity }, 'Error rate recovered; leaving degraded state');
        return true;
    }

    private syncDepth(): void {
        this.load.setQueueDepth('interactive', this.lanes.depth('interactive'));
        this.load.setQueueDepth('batch', this.lanes.depth('batch'));
    }

    private view(): ControllerView {
        return Object.freeze({
            ...this.load.view(),
            capacity: this.settings.capacity,
            effectiveCapacity: this.effectiveCapacity,
            queueBound: this.settings.queueBound,
            degraded: this.degraded
        });
    }

    private notify(): void {
        if (this.listeners.size === 0) return;
        const view = this.view();
        for (const listener of this.listeners) {
            try {
                listener(view);
            } catch (error) {
                logger.error({ error }, 'Load listener failed');
            }
        }
    }
}
