import { logger } from "../logging/logger.js";

export type ReadinessState = "ready" | "degraded" | "unavailable";

export interface DependencyProbe {
    readonly name: string;
    /** A failing required dependency makes the service unavailable */
    readonly required: boolean;
    probe(): Promise<boolean>;
}

export interface DependencyResult {
    readonly name: string;
    readonly required: boolean;
    readonly healthy: boolean;
    readonly latencyMs: number;
}

export interface ReadinessReport {
    readonly status: ReadinessState;
    readonly checkedAt: string;
    readonly degradedCapacity: boolean;
    readonly dependencies: readonly DependencyResult[];
}

/**
 * Readiness gate.
 * - unavailable: a required dependency does not answer
 * - degraded: all required answer, but the controller runs at reduced
 *   capacity or an optional dependency is down
 * - ready: otherwise
 */
export class HealthVerifier {
    constructor(
        private readonly probes: readonly DependencyProbe[],
        private readonly isDegraded: () => boolean,
        private readonly probeTimeoutMs = 2_000
    ) { }

    async check(): Promise<ReadinessReport> {
        const dependencies = await Promise.all(this.probes.map(probe => this.run(probe)));
        const degradedCapacity = this.isDegraded();

        let status: ReadinessState = "ready";
        if (dependencies.some(d => d.required && !d.healthy)) {
            status = "unavailable";
        } else if (degradedCapacity || dependencies.some(d => !d.healthy)) {
            status = "degraded";
        }

        if (status !== "ready") {
            logger.warn({
                status,
                degradedCapacity,
                failing: dependencies.filter(d => !d.healthy).map(d => d.name)
            }, "Readiness check not ready");
        }

        return {
            status,
            checkedAt: new Date().toISOString(),
            degradedCapacity,
            dependencies
        };
    }

    private async run(probe: DependencyProbe): Promise<DependencyResult> {
        const startedAt = Date.now();
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<boolean>(resolve => {
            timer = setTimeout(() => resolve(false), this.probeTimeoutMs);
        });

        let healthy: boolean;
        try {
            healthy = await Promise.race([probe.probe(), timeout]);
        } catch (error) {
            logger.warn({ dependency: probe.name, error }, "Dependency probe threw");
            healthy = false;
        } finally {
            clearTimeout(timer);
        }

        return {
            name: probe.name,
            required: probe.required,
            healthy,
            latencyMs: Date.now() - startedAt
        };
    }
}
