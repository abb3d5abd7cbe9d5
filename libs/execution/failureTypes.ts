/**
 * Failure taxonomy for orchestration.
 *
 * Every terminal failure a caller can observe is one of these kinds. The kind
 * is stable and public; the underlying backend error never is.
 */

export type FailureKind =
    | 'CapacityExceeded'    // Admission refused: in-flight and queue full
    | 'QueueTimeout'        // Waited in queue longer than the queue-wait bound
    | 'Timeout'             // Backend did not answer before the work unit deadline
    | 'BackendUnavailable'  // Transient backend failure; retried for idempotent work only
    | 'ExecutionError'      // Task-level failure reported by the backend; never retried
    | 'CacheCorruption'     // Stored artifact unreadable; recovered as a miss
    | 'InvalidRequest'      // Request failed validation before admission
    | 'Cancelled';          // Caller cancelled or disconnected

/**
 * How a failure kind feeds the backpressure error gate.
 * - failure: counts against backend health
 * - success: backend answered; the task itself may have failed
 * - neutral: not recorded
 */
export type GateOutcome = 'success' | 'failure' | 'neutral';

export interface FailureKindMetadata {
    /** Retried by the dispatcher when the work unit is idempotent */
    readonly retryable: boolean;
    readonly httpStatus: number;
    readonly publicMessage: string;
    readonly gateOutcome: GateOutcome;
    readonly logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export const FAILURE_KIND_METADATA: Record<FailureKind, FailureKindMetadata> = {
    CapacityExceeded: {
        retryable: false,
        httpStatus: 429,
        publicMessage: 'The service is at capacity; retry later.',
        gateOutcome: 'neutral',
        logLevel: 'info'
    },
    QueueTimeout: {
        retryable: false,
        httpStatus: 503,
        publicMessage: 'The request waited too long for capacity and was dropped.',
        gateOutcome: 'neutral',
        logLevel: 'info'
    },
    Timeout: {
        retryable: false,
        httpStatus: 504,
        publicMessage: 'The execution backend did not respond before the deadline.',
        gateOutcome: 'failure',
        logLevel: 'warn'
    },
    BackendUnavailable: {
        retryable: true,
        httpStatus: 503,
        publicMessage: 'An execution backend is temporarily unavailable.',
        gateOutcome: 'failure',
        logLevel: 'warn'
    },
    ExecutionError: {
        retryable: false,
        httpStatus: 422,
        publicMessage: 'The analysis task failed during execution.',
        gateOutcome: 'success',
        logLevel: 'info'
    },
    CacheCorruption: {
        retryable: false,
        httpStatus: 500,
        publicMessage: 'A cached artifact could not be read.',
        gateOutcome: 'neutral',
        logLevel: 'warn'
    },
    InvalidRequest: {
        retryable: false,
        httpStatus: 400,
        publicMessage: 'The analysis request is invalid.',
        gateOutcome: 'neutral',
        logLevel: 'debug'
    },
    Cancelled: {
        retryable: false,
        httpStatus: 409,
        publicMessage: 'The request was cancelled.',
        gateOutcome: 'neutral',
        logLevel: 'debug'
    }
};
