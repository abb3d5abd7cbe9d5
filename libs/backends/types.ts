import type { BackendTarget, WorkUnit } from '../execution/workUnit.js';

/**
 * Raw backend output before it becomes an Artifact.
 */
export interface BackendOutput {
    readonly payload: Buffer;
    readonly contentType: string;
}

/**
 * An execution backend. Implementations must observe `signal`: on abort they
 * cancel the remote operation on a best-effort basis and settle promptly.
 * The dispatcher stops waiting at the deadline either way.
 */
export interface ExecutionBackend {
    readonly target: BackendTarget;
    execute(unit: WorkUnit, signal: AbortSignal): Promise<BackendOutput>;
    /** Cheap reachability probe for readiness */
    ping(): Promise<boolean>;
    close(): Promise<void>;
}

export function jsonOutput(value: unknown): BackendOutput {
    return {
        payload: Buffer.from(JSON.stringify(value), 'utf8'),
        contentType: 'application/json'
    };
}
