import crypto from 'crypto';
import { z } from 'zod';
import { OrchestrationError } from '../errors/sanitizer.js';
import { Artifact } from './artifact.js';

/**
 * Stored form of an artifact: JSON with a base64 payload and a SHA-256
 * checksum over the payload bytes.
 */
const StoredArtifactSchema = z.object({
    v: z.literal(1),
    fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
    contentType: z.string().min(1),
    backend: z.enum(['sandbox', 'graph']),
    createdAt: z.string().datetime(),
    size: z.number().int().nonnegative(),
    checksum: z.string().regex(/^[0-9a-f]{64}$/),
    payload: z.string(),
});

function checksum(payload: Buffer): string {
    return crypto.createHash('sha256').update(payload).digest('hex');
}

export function encodeArtifact(artifact: Artifact): string {
    return JSON.stringify({
        v: 1,
        fingerprint: artifact.fingerprint,
        contentType: artifact.contentType,
        backend: artifact.backend,
        createdAt: artifact.createdAt,
        size: artifact.size,
        checksum: checksum(artifact.payload),
        payload: artifact.payload.toString('base64'),
    });
}

function corrupt(reason: string, expectedFingerprint: string, details?: unknown): OrchestrationError {
    return new OrchestrationError('CacheCorruption', { reason, fingerprint: expectedFingerprint, details }, {
        contextLabel: 'ArtifactCodec:Decode'
    });
}

/**
 * Decodes a stored artifact. Throws CacheCorruption when the entry is not
 * valid JSON, fails the schema, fails its checksum or belongs to another
 * fingerprint.
 */
export function decodeArtifact(raw: string, expectedFingerprint: string): Artifact {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw corrupt('Invalid JSON', expectedFingerprint, error instanceof Error ? error.message : String(error));
    }

    const parsed = StoredArtifactSchema.safeParse(json);
    if (!parsed.success) {
        throw corrupt('Schema mismatch', expectedFingerprint, parsed.error.issues.map(i => i.path.join('.')));
    }
    const stored = parsed.data;

    if (stored.fingerprint !== expectedFingerprint) {
        throw corrupt('Fingerprint mismatch', expectedFingerprint, { stored: stored.fingerprint });
    }

    const payload = Buffer.from(stored.payload, 'base64');
    if (payload.byteLength !== stored.size || checksum(payload) !== stored.checksum) {
        throw corrupt('Checksum mismatch', expectedFingerprint);
    }

    return Object.freeze({
        fingerprint: stored.fingerprint,
        payload,
        contentType: stored.contentType,
        backend: stored.backend,
        createdAt: stored.createdAt,
        size: stored.size,
    });
}
