import { DispatchSettings } from '../bootstrap/settings.js';
import { computeFingerprint, normalizeTask } from '../fingerprint/fingerprint.js';
import { AnalysisRequest, AnalysisTask, ArtifactNamespace } from '../orchestrator/requestSchema.js';

export type BackendTarget = 'sandbox' | 'graph';

/**
 * Unit of backend work derived from a request. Owned by the dispatcher
 * from dispatch until completion or timeout.
 */
export interface WorkUnit {
    readonly requestId: string;
    readonly fingerprint: string;
    readonly target: BackendTarget;
    /** Read-only graph queries only: safe to retry */
    readonly idempotent: boolean;
    /** Write-mode graph queries bypass the artifact cache */
    readonly cacheable: boolean;
    readonly namespace: ArtifactNamespace;
    /** Epoch milliseconds */
    readonly deadline: number;
    readonly task: AnalysisTask;
    readonly parameters: Readonly<Record<string, unknown>>;
}

/**
 * Deadline budget for a request: its own timeout if given, bounded by the
 * configured maximum.
 */
export function resolveTimeoutMs(request: Pick<AnalysisRequest, 'timeoutMs'>, settings: DispatchSettings): number {
    return Math.min(request.timeoutMs ?? settings.defaultTimeoutMs, settings.maxTimeoutMs);
}

/** Work unit before admission: everything but the deadline */
export type PreparedWork = Omit<WorkUnit, 'deadline'>;

/**
 * Normalizes the task and fingerprints it. Runs on receipt, before the
 * request is admitted.
 */
export function prepareWork(request: AnalysisRequest): PreparedWork {
    const task = normalizeTask(request.task);
    const readOnlyGraph = task.type === 'graph' && task.mode !== 'write';

    return Object.freeze({
        requestId: request.requestId,
        fingerprint: computeFingerprint(request.task, { ...request.parameters }),
        target: task.type,
        idempotent: readOnlyGraph,
        cacheable: task.type === 'sandbox' || readOnlyGraph,
        namespace: request.artifactNamespace,
        task,
        parameters: request.parameters
    });
}

/** Deadlines start when the request is admitted or promoted */
export function scheduleWork(work: PreparedWork, deadline: number): WorkUnit {
    return Object.freeze({ ...work, deadline });
}
