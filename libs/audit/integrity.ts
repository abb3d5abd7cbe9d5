import crypto from 'crypto';
import { stableStringify } from '../fingerprint/stableStringify.js';
import { AuditRecord, GENESIS_HASH, IntegrityEnvelope } from './schema.js';

/**
 * Audit record as persisted: the terminal record plus its event id and
 * write time.
 */
export interface AuditEntryBody extends AuditRecord {
    readonly eventId: string;
    /** ISO-8601 */
    readonly recordedAt: string;
}

export interface SignedAuditEntry {
    readonly body: AuditEntryBody;
    readonly integrity: IntegrityEnvelope;
}

/**
 * sha256(canonical JSON of body + prevHash). Canonical JSON keeps the hash
 * stable across a JSONB round trip, which reorders keys.
 */
export function chainHash(body: AuditEntryBody, prevHash: string): string {
    return crypto.createHash('sha256')
        .update(stableStringify(body) + prevHash)
        .digest('hex');
}

export function signEntry(body: AuditEntryBody, prevHash: string): SignedAuditEntry {
    return { body, integrity: { prevHash, hash: chainHash(body, prevHash) } };
}

export type ChainVerification =
    | { readonly valid: true; readonly length: number }
    | { readonly valid: false; readonly brokenAt: number; readonly reason: string };

/**
 * Checks entries, in write order, link from the genesis hash (or `anchor`)
 * and each hash matches its body.
 */
export function verifyAuditChain(entries: readonly SignedAuditEntry[], anchor: string = GENESIS_HASH): ChainVerification {
    let expectedPrev = anchor;
    for (const [index, entry] of entries.entries()) {
        if (entry.integrity.prevHash !== expectedPrev) {
            return { valid: false, brokenAt: index, reason: 'prevHash does not link to previous entry' };
        }
        if (chainHash(entry.body, entry.integrity.prevHash) !== entry.integrity.hash) {
            return { valid: false, brokenAt: index, reason: 'hash does not match body' };
        }
        expectedPrev = entry.integrity.hash;
    }
    return { valid: true, length: entries.length };
}
