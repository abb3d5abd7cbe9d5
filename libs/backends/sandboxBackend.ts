import { OrchestrationError } from '../errors/sanitizer.js';
import type { WorkUnit } from '../execution/workUnit.js';
import type { SandboxClient } from './e2bSandboxClient.js';
import { BackendOutput, ExecutionBackend, jsonOutput } from './types.js';

/**
 * Sandboxed code execution. Runs are never retried by the dispatcher: code
 * may have side effects.
 */
export class SandboxBackend implements ExecutionBackend {
    public readonly target = 'sandbox' as const;

    constructor(
        private readonly client: SandboxClient,
        private readonly defaultTemplateId: string,
        private readonly now: () => number = Date.now
    ) { }

    async execute(unit: WorkUnit, signal: AbortSignal): Promise<BackendOutput> {
        if (unit.task.type !== 'sandbox') {
            throw new OrchestrationError('InvalidRequest', { reason: 'Not a sandbox task', target: unit.target }, {
                contextLabel: 'SandboxBackend:Execute'
            });
        }

        const run = await this.client.run(unit.task.code, {
            templateId: unit.task.templateId ?? this.defaultTemplateId,
            timeoutMs: Math.max(1, unit.deadline - this.now()),
            signal
        });

        if (run.error) {
            throw new OrchestrationError('ExecutionError', {
                requestId: unit.requestId,
                errorName: run.error.name,
                errorValue: run.error.value,
                traceback: run.error.traceback
            }, { contextLabel: 'SandboxBackend:Execute' });
        }

        return jsonOutput({
            text: run.text ?? null,
            stdout: run.stdout,
            stderr: run.stderr,
            results: run.results
        });
    }

    ping(): Promise<boolean> {
        return this.client.ping();
    }

    close(): Promise<void> {
        return this.client.close();
    }
}
