import { logger } from '../logging/logger.js';
import { FAILURE_KIND_METADATA, FailureKind } from '../execution/failureTypes.js';
import crypto from 'crypto';

/**
 * Error Information Disclosure Prevention
 * Internal errors are wrapped in a typed failure with a stable public message
 * and a unique incidentId for log correlation.
 */

export class OrchestrationError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly kind: FailureKind,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; publicMessage?: string }
    ) {
        super(options?.publicMessage ?? FAILURE_KIND_METADATA[kind].publicMessage);
        this.name = 'OrchestrationError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Full internal details are logged once, keyed by incidentId
        logger[FAILURE_KIND_METADATA[kind].logLevel]({
            incidentId: this.incidentId,
            kind,
            contextLabel: this.contextLabel,
            internalDetails
        }, this.message);
    }

    get publicMessage(): string {
        return this.message;
    }

    get httpStatus(): number {
        return FAILURE_KIND_METADATA[this.kind].httpStatus;
    }

    /** Caller-facing shape; never includes internal details */
    toPublic(): { kind: FailureKind; message: string; incidentId: string } {
        return { kind: this.kind, message: this.message, incidentId: this.incidentId };
    }
}

function describe(err: unknown): { message?: string; stack?: string; code?: string } {
    if (err instanceof Error) {
        const code = 'code' in err ? err.code : undefined;
        return { message: err.message, stack: err.stack, code: typeof code === 'string' ? code : undefined };
    }
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err && typeof err === 'object') {
        const message = 'message' in err ? err.message : undefined;
        const stack = 'stack' in err ? err.stack : undefined;
        const code = 'code' in err ? err.code : undefined;
        return {
            message: typeof message === 'string' ? message : undefined,
            stack: typeof stack === 'string' ? stack : undefined,
            code: typeof code === 'string' ? code : undefined
        };
    }
    return { message: String(err) };
}

export const ErrorSanitizer = {
    /**
     * Wraps any error into an OrchestrationError of the given kind.
     * An OrchestrationError passes through unchanged.
     */
    sanitize: (err: unknown, contextLabel: string, kind: FailureKind = 'ExecutionError'): OrchestrationError => {
        if (err instanceof OrchestrationError) return err;

        const { message, stack, code } = describe(err);
        return new OrchestrationError(
            kind,
            { originalError: message, code, stack, context: contextLabel },
            { cause: err, contextLabel }
        );
    },

    describe
};
