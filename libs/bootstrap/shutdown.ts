import type { Server } from 'node:http';
import { logger } from '../logging/logger.js';
import { shutdownTracing } from '../observability/tracing.js';
import type { ServiceContainer } from './startup.js';

export interface ShutdownStep {
    readonly name: string;
    run(): Promise<void>;
}

export interface ShutdownOptions {
    /** Upper bound on the whole sequence */
    readonly timeoutMs: number;
}

/**
 * Runs shutdown steps in order. A failing step is logged and the sequence
 * continues; a second trigger returns the sequence already running.
 */
export class GracefulShutdown {
    private running: Promise<boolean> | null = null;

    constructor(private readonly steps: readonly ShutdownStep[], private readonly options: ShutdownOptions) { }

    get inProgress(): boolean {
        return this.running !== null;
    }

    /**
     * Resolves true when every step completed in time.
     */
    shutdown(reason: string): Promise<boolean> {
        if (this.running) {
            logger.info({ reason }, 'Shutdown already in progress');
            return this.running;
        }
        logger.info({ reason, steps: this.steps.length }, 'Initiating graceful shutdown');
        this.running = this.runWithTimeout();
        return this.running;
    }

    private async runWithTimeout(): Promise<boolean> {
        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<boolean>(resolve => {
            timer = setTimeout(() => {
                logger.error({ timeoutMs: this.options.timeoutMs }, 'Shutdown timeout reached');
                resolve(false);
            }, this.options.timeoutMs);
        });
        try {
            return await Promise.race([this.runSteps(), timedOut]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async runSteps(): Promise<boolean> {
        let clean = true;
        for (const step of this.steps) {
            try {
                await step.run();
                logger.debug({ step: step.name }, 'Shutdown step completed');
            } catch (error) {
                clean = false;
                logger.error({ step: step.name, error }, 'Shutdown step failed');
            }
        }
        logger.info({ clean }, 'Graceful shutdown finished');
        return clean;
    }
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
        server.closeIdleConnections();
    });
}

/**
 * Stop intake, let in-progress requests finish, flush the audit trail, then
 * close backends and stores.
 */
export function serviceShutdownSteps(server: Server, container: ServiceContainer, drainTimeoutMs: number): ShutdownStep[] {
    return [
        { name: 'http', run: () => closeServer(server) },
        { name: 'admission', run: async () => container.controller.close() },
        {
            name: 'drain',
            run: async () => {
                const drained = await container.orchestrator.drain(drainTimeoutMs);
                if (!drained) {
                    logger.warn({ active: container.orchestrator.activeCount }, 'Requests still running after drain timeout');
                }
            }
        },
        { name: 'audit', run: () => container.auditWriter.flush() },
        { name: 'load-publisher', run: () => container.publisher.close() },
        { name: 'sandbox', run: () => container.sandbox.close() },
        { name: 'graph', run: () => container.graph.close() },
        { name: 'cache:general', run: () => container.stores.general.close() },
        { name: 'cache:dedicated', run: () => container.stores.dedicated.close() },
        { name: 'database', run: () => container.database.close() },
        { name: 'tracing', run: () => shutdownTracing() }
    ];
}
