import { logger } from '../logging/logger.js';
import type { KeyValueStore } from '../cache/kvStore.js';
import type { ControllerView } from './controller.js';

export interface LoadPublisherOptions {
    readonly instanceId: string;
    /** Minimum spacing between writes */
    readonly minIntervalMs?: number;
    /** Published entries expire so dead instances drop out */
    readonly ttlSeconds?: number;
    readonly now?: () => number;
}

/**
 * Publishes controller snapshots to the backpressure namespace for other
 * instances to read. Best effort: writes are throttled to one per interval
 * (the latest view wins) and failures are logged, never raised.
 */
export class LoadPublisher {
    private readonly minIntervalMs: number;
    private readonly ttlSeconds: number;
    private readonly now: () => number;
    private lastPublishedAt = Number.NEGATIVE_INFINITY;
    private pendingView: ControllerView | null = null;
    private timer: NodeJS.Timeout | null = null;
    private inFlightWrite: Promise<void> = Promise.resolve();
    private failures = 0;

    constructor(private readonly store: KeyValueStore, private readonly options: LoadPublisherOptions) {
        this.minIntervalMs = options.minIntervalMs ?? 1_000;
        this.ttlSeconds = options.ttlSeconds ?? 30;
        this.now = options.now ?? Date.now;
    }

    get key(): string {
        return `load:${this.options.instanceId}`;
    }

    get failureCount(): number {
        return this.failures;
    }

    publish(view: ControllerView): void {
        this.pendingView = view;
        const wait = this.lastPublishedAt + this.minIntervalMs - this.now();
        if (wait <= 0) {
            this.writePending();
            return;
        }
        if (!this.timer) {
            this.timer = setTimeout(() => {
                this.timer = null;
                this.writePending();
            }, wait);
            this.timer.unref();
        }
    }

    /**
     * Writes any pending view now and waits for outstanding writes.
     */
    async flush(): Promise<void> {
        this.cancelTimer();
        this.writePending();
        await this.inFlightWrite;
    }

    close(): Promise<void> {
        return this.flush();
    }

    private writePending(): void {
        const view = this.pendingView;
        if (!view) return;
        this.pendingView = null;
        this.lastPublishedAt = this.now();

        const body = JSON.stringify({ instanceId: this.options.instanceId, publishedAt: new Date(this.lastPublishedAt).toISOString(), ...view });
        this.inFlightWrite = this.inFlightWrite
            .then(() => this.store.set(this.key, body, this.ttlSeconds))
            .then(
                () => logger.debug({ key: this.key, version: view.version }, 'Load snapshot published'),
                (error: unknown) => {
                    this.failures += 1;
                    logger.warn({ key: this.key, error }, 'Load snapshot publish failed');
                }
            );
    }

    private cancelTimer(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
