import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { SpanNames, withSpan } from '../observability/tracing.js';
import type { AuditRepository } from './auditRepository.js';
import { signEntry } from './integrity.js';
import { AuditRecord, AuditSink, LineageEvent, LineageSink } from './schema.js';

/**
 * Persistence adapter (PostgreSQL substrate).
 *
 * record() and recordLineage() return immediately. Writes run one at a time
 * on a single promise chain so the integrity chain is extended in call
 * order. A failed write is logged and counted; it never reaches the caller
 * and never breaks the chain for later writes.
 */
export class AuditWriter implements AuditSink, LineageSink {
    private chain: Promise<void> = Promise.resolve();
    private lastHash: string | null = null;
    private pending = 0;
    private failures = 0;

    constructor(
        private readonly repository: AuditRepository,
        private readonly now: () => Date = () => new Date()
    ) { }

    get pendingCount(): number {
        return this.pending;
    }

    get failureCount(): number {
        return this.failures;
    }

    record(record: AuditRecord): void {
        const recordedAt = this.now().toISOString();
        this.enqueue(record.requestId, 'audit', () => this.writeAudit(record, recordedAt));
    }

    recordLineage(event: LineageEvent): void {
        this.enqueue(event.requestId, 'lineage', () => this.repository.insertLineage(event));
    }

    /**
     * Resolves once every write queued so far has settled.
     */
    flush(): Promise<void> {
        return this.chain;
    }

    private enqueue(requestId: string, kind: 'audit' | 'lineage', write: () => Promise<void>): void {
        this.pending += 1;
        this.chain = this.chain
            .then(() => withSpan(SpanNames.AUDIT_WRITE, { kind }, write))
            .then(
                () => {
                    logger.debug({ requestId, kind }, 'Audit write committed');
                },
                (error: unknown) => {
                    this.failures += 1;
                    logger.error({ requestId, kind, error }, 'Audit write failed');
                }
            )
            .finally(() => {
                this.pending -= 1;
            });
    }

    private async writeAudit(record: AuditRecord, recordedAt: string): Promise<void> {
        // Continues from the last stored hash; read again after a failed read
        this.lastHash ??= await this.repository.lastHash();

        const entry = signEntry({ eventId: crypto.randomUUID(), ...record, recordedAt }, this.lastHash);
        await this.repository.insertAudit(entry);
        this.lastHash = entry.integrity.hash;
    }
}
