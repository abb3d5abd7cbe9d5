import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

/**
 * Raised when input fails its schema. Issues carry the path and message
 * only, never the offending values.
 */
export class RequestValidationError extends Error {
    readonly code = 'INVALID_REQUEST';
    readonly statusCode = 400;

    constructor(public readonly context: string, public readonly issues: readonly ValidationIssue[]) {
        super(`Validation failed in ${context}: ${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')}`);
        this.name = 'RequestValidationError';
    }
}

/**
 * Fail-closed validation: returns the parsed value or throws
 * RequestValidationError.
 */
export function validate<Out, In = Out>(schema: ZodType<Out, ZodTypeDef, In>, data: unknown, context: string): Out {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Values are not logged; request payloads may carry code or credentials
        logger.warn({ context, errors: issues }, "Input validation failure");

        throw new RequestValidationError(context, issues);
    }

    return result.data;
}

