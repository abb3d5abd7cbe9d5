import crypto from 'crypto';
import type { Queryable } from '../db/index.js';
import { GENESIS_HASH, LineageEvent } from './schema.js';
import type { SignedAuditEntry } from './integrity.js';

/**
 * Append-only SQL for the audit and lineage tables. Rows are inserted,
 * never updated or deleted.
 */
export class AuditRepository {
    constructor(private readonly dbClient: Queryable) { }

    async lastHash(): Promise<string> {
        const result = await this.dbClient.query(
            `SELECT metadata->'integrity'->>'hash' AS last_hash
             FROM analysis_audit_log
             ORDER BY created_at DESC
             LIMIT 1`
        );
        const hash: unknown = result.rows[0]?.last_hash;
        return typeof hash === 'string' ? hash : GENESIS_HASH;
    }

    async insertAudit(entry: SignedAuditEntry): Promise<void> {
        const { body, integrity } = entry;
        await this.dbClient.query(
            `INSERT INTO analysis_audit_log
                (id, request_id, decision, outcome, failure_kind, latency_ms, fingerprint, metadata, created_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
            [
                body.eventId,
                body.requestId,
                body.decision,
                body.outcome,
                body.failureKind ?? null,
                body.latencyMs,
                body.fingerprint ?? null,
                { ...body, integrity },
                body.recordedAt
            ]
        );
    }

    async insertLineage(event: LineageEvent): Promise<void> {
        await this.dbClient.query(
            `INSERT INTO dispatch_lineage
                (id, request_id, fingerprint, backend, attempt, phase, failure_kind, metadata, created_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
            [
                crypto.randomUUID(),
                event.requestId,
                event.fingerprint,
                event.backend,
                event.attempt,
                event.phase,
                event.failureKind ?? null,
                {
                    ...(event.delayMs !== undefined ? { delayMs: event.delayMs } : {}),
                    ...(event.durationMs !== undefined ? { durationMs: event.durationMs } : {})
                },
                event.at
            ]
        );
    }
}
