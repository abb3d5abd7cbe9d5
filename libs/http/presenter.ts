import { renderArtifactBody } from '../cache/artifact.js';
import { FAILURE_KIND_METADATA } from '../execution/failureTypes.js';
import type { RequestStatus } from '../orchestrator/requestRegistry.js';
import { isTerminal, RequestState } from '../orchestrator/stateMachine.js';

const STATUS_LABELS: Record<RequestState, string> = {
    Received: 'received',
    Admitted: 'admitted',
    Queued: 'queued',
    Rejected: 'rejected',
    CacheHit: 'cache_hit',
    Dispatching: 'dispatching',
    Completed: 'completed',
    Failed: 'failed'
};

/**
 * HTTP status for a submission response. Failures map through their kind;
 * anything still in progress is 202.
 */
export function submissionStatusCode(status: RequestStatus): number {
    if (status.failure) return FAILURE_KIND_METADATA[status.failure.kind].httpStatus;
    return status.state === 'Completed' || status.state === 'CacheHit' ? 200 : 202;
}

/**
 * Public body for a request. Never carries internal error details.
 */
export function renderStatus(status: RequestStatus, basePath: string): Record<string, unknown> {
    const body: Record<string, unknown> = {
        status: STATUS_LABELS[status.state],
        requestId: status.requestId,
        priority: status.priority,
        submittedAt: status.submittedAt,
        updatedAt: status.updatedAt
    };

    if (status.position !== undefined) body.position = status.position;
    if (!isTerminal(status.state)) body.pollUrl = `${basePath}/${encodeURIComponent(status.requestId)}`;
    if (status.fingerprint) body.fingerprint = status.fingerprint;
    if (status.source) body.source = status.source;

    if (status.artifact) {
        body.artifact = {
            contentType: status.artifact.contentType,
            backend: status.artifact.backend,
            size: status.artifact.size,
            createdAt: status.artifact.createdAt,
            ...renderArtifactBody(status.artifact)
        };
    }

    if (status.failure) {
        body.failure = {
            kind: status.failure.kind,
            message: status.failure.message,
            incidentId: status.failure.incidentId,
            ...(status.failure.details ? { details: status.failure.details } : {})
        };
    }

    return body;
}
