import { DispatchSettings } from '../bootstrap/settings.js';
import { FAILURE_KIND_METADATA, FailureKind } from './failureTypes.js';

export interface RetryPolicy {
    /** Retries after the first attempt */
    readonly maxRetries: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
}

export function retryPolicyFrom(settings: DispatchSettings): RetryPolicy {
    return {
        maxRetries: settings.graphMaxRetries,
        baseDelayMs: settings.retryBaseMs,
        maxDelayMs: settings.retryMaxMs
    };
}

/**
 * Delay before retry number `retry` (1-based): base * 2^(retry-1), capped.
 * Settings validation keeps the cap above the last delay.
 */
export function backoffDelayMs(retry: number, policy: RetryPolicy): number {
    const exponential = policy.baseDelayMs * 2 ** Math.max(0, retry - 1);
    return Math.min(exponential, policy.maxDelayMs);
}

/**
 * Whether a failed attempt may be retried. Only idempotent units are retried,
 * only for retryable kinds, and only within the retry bound.
 */
export function shouldRetry(kind: FailureKind, idempotent: boolean, retriesSoFar: number, policy: RetryPolicy): boolean {
    return idempotent && FAILURE_KIND_METADATA[kind].retryable && retriesSoFar < policy.maxRetries;
}
