/**
 * Failure classifier for backend errors.
 *
 * Backend adapters raise typed OrchestrationErrors where they can tell what
 * went wrong. Anything else (driver exceptions, socket errors, SDK errors)
 * is classified here by code and message. First match wins.
 */

import { logger } from '../logging/logger.js';
import { ErrorSanitizer, OrchestrationError } from '../errors/sanitizer.js';
import { FailureKind } from './failureTypes.js';

interface ErrorPattern {
    readonly patterns: readonly (string | RegExp)[];
    readonly kind: FailureKind;
}

const ERROR_PATTERNS: readonly ErrorPattern[] = [
    // Deadline expiry reported by the backend itself
    {
        patterns: ['DEADLINE_EXCEEDED', 'TransactionTimedOut', /timed\s+out/i],
        kind: 'Timeout'
    },
    // Transport and availability failures (safe to retry when idempotent)
    {
        patterns: [
            'ECONNRESET',
            'ECONNREFUSED',
            'EPIPE',
            'ETIMEDOUT',
            'EAI_AGAIN',
            'ServiceUnavailable',
            'SessionExpired',
            'Neo.TransientError',
            /connection (reset|refused|closed)/i,
            /unavailable/i,
            /\b(502|503)\b/
        ],
        kind: 'BackendUnavailable'
    }
];

export interface ClassificationContext {
    readonly requestId: string;
    readonly backend: string;
}

function matches(pattern: string | RegExp, value: string): boolean {
    return typeof pattern === 'string'
        ? value.toUpperCase().includes(pattern.toUpperCase())
        : pattern.test(value);
}

/**
 * Classify an error raised by a backend call.
 * Unrecognized errors are task-level ExecutionErrors: they are surfaced,
 * never retried.
 */
export function classifyFailure(error: unknown, context: ClassificationContext): FailureKind {
    if (error instanceof OrchestrationError) {
        return error.kind;
    }

    const { code, message } = ErrorSanitizer.describe(error);

    let kind: FailureKind = 'ExecutionError';
    for (const candidate of [code, message]) {
        if (!candidate) continue;
        const matched = ERROR_PATTERNS.find(p => p.patterns.some(pattern => matches(pattern, candidate)));
        if (matched) {
            kind = matched.kind;
            break;
        }
    }

    logger.debug({ requestId: context.requestId, backend: context.backend, code, kind }, 'Failure classified');
    return kind;
}
