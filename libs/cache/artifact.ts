import type { BackendTarget } from '../execution/workUnit.js';

/**
 * Immutable result of a work unit, keyed by fingerprint.
 */
export interface Artifact {
    readonly fingerprint: string;
    readonly payload: Buffer;
    readonly contentType: string;
    readonly backend: BackendTarget;
    /** ISO-8601 */
    readonly createdAt: string;
    /** Payload size in bytes */
    readonly size: number;
}

export function createArtifact(params: {
    fingerprint: string;
    payload: Buffer;
    contentType: string;
    backend: BackendTarget;
    createdAt?: Date;
}): Artifact {
    return Object.freeze({
        fingerprint: params.fingerprint,
        payload: params.payload,
        contentType: params.contentType,
        backend: params.backend,
        createdAt: (params.createdAt ?? new Date()).toISOString(),
        size: params.payload.byteLength
    });
}

/**
 * JSON artifacts are decoded for callers; anything else is returned base64.
 */
export function renderArtifactBody(artifact: Artifact): { result: unknown } | { resultBase64: string } {
    if (artifact.contentType === 'application/json') {
        return { result: JSON.parse(artifact.payload.toString('utf8')) as unknown };
    }
    return { resultBase64: artifact.payload.toString('base64') };
}
