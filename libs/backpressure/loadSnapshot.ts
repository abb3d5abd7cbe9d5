import type { PriorityClass } from '../orchestrator/requestSchema.js';

export interface LoadCounters {
    admitted: number;
    queued: number;
    rejected: number;
    promoted: number;
    completed: number;
    failed: number;
    queueTimeouts: number;
    cancelled: number;
}

export type LoadCounter = keyof LoadCounters;

/**
 * Point-in-time copy of the load state. Never mutated.
 */
export interface LoadView {
    readonly version: number;
    readonly inFlight: number;
    readonly queueDepth: Readonly<Record<PriorityClass, number>> & { readonly total: number };
    readonly window: {
        readonly size: number;
        readonly samples: number;
        readonly failures: number;
        readonly errorRate: number;
    };
    readonly decayedErrorRate: number;
    readonly counters: Readonly<LoadCounters>;
}

/**
 * Process-wide load state, one per controller. All mutations are
 * synchronous and bump `version`.
 *
 * The rolling window holds the last N recorded outcomes (true = failure).
 * The decayed rate is an EWMA over the same outcomes with alpha 2/(N+1).
 */
export class LoadSnapshot {
    private inFlightCount = 0;
    private readonly depth: Record<PriorityClass, number> = { interactive: 0, batch: 0 };
    private readonly ring: boolean[] = [];
    private ringNext = 0;
    private ringFailures = 0;
    private ewma = 0;
    private readonly alpha: number;
    private readonly counterValues: LoadCounters = {
        admitted: 0,
        queued: 0,
        rejected: 0,
        promoted: 0,
        completed: 0,
        failed: 0,
        queueTimeouts: 0,
        cancelled: 0
    };
    private versionValue = 0;

    constructor(public readonly windowSize: number) {
        if (!Number.isInteger(windowSize) || windowSize < 1) {
            throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
        }
        this.alpha = 2 / (windowSize + 1);
    }

    get inFlight(): number {
        return this.inFlightCount;
    }

    get version(): number {
        return this.versionValue;
    }

    get samples(): number {
        return this.ring.length;
    }

    /**
     * Takes one in-flight slot if fewer than `limit` are taken.
     */
    tryAcquire(limit: number): boolean {
        if (this.inFlightCount >= limit) return false;
        this.inFlightCount += 1;
        this.versionValue += 1;
        return true;
    }

    release(): void {
        if (this.inFlightCount === 0) {
            throw new Error('LoadSnapshot.release called with nothing in flight');
        }
        this.inFlightCount -= 1;
        this.versionValue += 1;
    }

    setQueueDepth(lane: PriorityClass, depth: number): void {
        if (this.depth[lane] === depth) return;
        this.depth[lane] = depth;
        this.versionValue += 1;
    }

    recordOutcome(failed: boolean): void {
        if (this.ring.length < this.windowSize) {
            this.ring.push(failed);
        } else {
            if (this.ring[this.ringNext]) this.ringFailures -= 1;
            this.ring[this.ringNext] = failed;
        }
        if (failed) this.ringFailures += 1;
        this.ringNext = (this.ringNext + 1) % this.windowSize;

        this.ewma = this.alpha * (failed ? 1 : 0) + (1 - this.alpha) * this.ewma;
        this.versionValue += 1;
    }

    /**
     * Failure ratio over the window, or null below `minSamples`.
     */
    errorRate(minSamples = 1): number | null {
        if (this.ring.length === 0 || this.ring.length < minSamples) return null;
        return this.ringFailures / this.ring.length;
    }

    increment(counter: LoadCounter): void {
        this.counterValues[counter] += 1;
        this.versionValue += 1;
    }

    view(): LoadView {
        return Object.freeze({
            version: this.versionValue,
            inFlight: this.inFlightCount,
            queueDepth: Object.freeze({
                interactive: this.depth.interactive,
                batch: this.depth.batch,
                total: this.depth.interactive + this.depth.batch
            }),
            window: Object.freeze({
                size: this.windowSize,
                samples: this.ring.length,
                failures: this.ringFailures,
                errorRate: this.errorRate() ?? 0
            }),
            decayedErrorRate: this.ewma,
            counters: Object.freeze({ ...this.counterValues })
        });
    }
}
