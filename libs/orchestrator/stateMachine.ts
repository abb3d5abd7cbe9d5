/**
 * Per-request lifecycle.
 *
 *   Received    -> Admitted | Queued | Rejected
 *   Queued      -> Admitted | Rejected
 *   Admitted    -> CacheHit | Dispatching | Failed
 *   Dispatching -> Completed | Failed
 *
 * Admitted -> Failed covers a request cancelled before its computation
 * starts. Any other move is a programming error.
 */

export type RequestState =
    | 'Received'
    | 'Admitted'
    | 'Queued'
    | 'Rejected'
    | 'CacheHit'
    | 'Dispatching'
    | 'Completed'
    | 'Failed';

const TRANSITIONS: Readonly<Record<RequestState, readonly RequestState[]>> = {
    Received: ['Admitted', 'Queued', 'Rejected'],
    Queued: ['Admitted', 'Rejected'],
    Admitted: ['CacheHit', 'Dispatching', 'Failed'],
    Dispatching: ['Completed', 'Failed'],
    Rejected: [],
    CacheHit: [],
    Completed: [],
    Failed: []
};

export const TERMINAL_STATES: readonly RequestState[] = ['Rejected', 'CacheHit', 'Completed', 'Failed'];

export class InvalidTransitionError extends Error {
    constructor(
        public readonly requestId: string,
        public readonly from: RequestState,
        public readonly to: RequestState
    ) {
        super(`INVALID_TRANSITION: ${requestId} ${from} -> ${to}`);
        this.name = 'InvalidTransitionError';
    }
}

export function isTerminal(state: RequestState): boolean {
    return TRANSITIONS[state].length === 0;
}

export function canTransition(from: RequestState, to: RequestState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function assertTransition(requestId: string, from: RequestState, to: RequestState): void {
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(requestId, from, to);
    }
}
