/**
 * Audit and lineage record shapes.
 * Both are append-only: written once, never updated, never read on the
 * request path.
 */

import type { FailureKind } from '../execution/failureTypes.js';
import type { BackendTarget } from '../execution/workUnit.js';

export type AdmissionDecision = 'admitted' | 'queued' | 'rejected';

export type TerminalOutcome = 'Completed' | 'CacheHit' | 'Failed' | 'Rejected';

export interface AuditRecord {
    readonly requestId: string;
    readonly decision: AdmissionDecision;
    readonly outcome: TerminalOutcome;
    readonly failureKind?: FailureKind;
    readonly latencyMs: number;
    readonly fingerprint?: string;
    readonly subject?: string;
}

export type LineagePhase = 'started' | 'succeeded' | 'failed' | 'timed_out' | 'retry_scheduled';

export interface LineageEvent {
    readonly requestId: string;
    readonly fingerprint: string;
    readonly backend: BackendTarget;
    readonly attempt: number;
    readonly phase: LineagePhase;
    readonly failureKind?: FailureKind;
    readonly delayMs?: number;
    readonly durationMs?: number;
    /** ISO-8601 */
    readonly at: string;
}

/**
 * Consumer of dispatch lineage. Must not block or throw into the dispatcher.
 */
export interface LineageSink {
    recordLineage(event: LineageEvent): void;
}

/**
 * Consumer of terminal audit records. Must not block or throw into the
 * orchestrator.
 */
export interface AuditSink {
    record(record: AuditRecord): void;
}

export interface IntegrityEnvelope {
    readonly prevHash: string;
    readonly hash: string;
}

export const GENESIS_HASH = '0'.repeat(64);
