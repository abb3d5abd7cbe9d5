import { OrchestrationError } from '../errors/sanitizer.js';
import type { WorkUnit } from '../execution/workUnit.js';
import type { GraphClient } from './neo4jGraphClient.js';
import { BackendOutput, ExecutionBackend, jsonOutput } from './types.js';

/**
 * Parameterized graph queries. Request-level parameters are bound alongside
 * the task's own; the task's win on a name clash.
 */
export class GraphBackend implements ExecutionBackend {
    public readonly target = 'graph' as const;

    constructor(
        private readonly client: GraphClient,
        private readonly now: () => number = Date.now
    ) { }

    async execute(unit: WorkUnit, signal: AbortSignal): Promise<BackendOutput> {
        if (unit.task.type !== 'graph') {
            throw new OrchestrationError('InvalidRequest', { reason: 'Not a graph task', target: unit.target }, {
                contextLabel: 'GraphBackend:Execute'
            });
        }

        const rows = await this.client.run(
            unit.task.query,
            { ...unit.parameters, ...unit.task.parameters },
            {
                mode: unit.task.mode ?? 'read',
                timeoutMs: Math.max(1, unit.deadline - this.now()),
                signal
            }
        );

        return jsonOutput({ rows, rowCount: rows.length });
    }

    ping(): Promise<boolean> {
        return this.client.ping();
    }

    close(): Promise<void> {
        return this.client.close();
    }
}
