import { Request, Response, NextFunction } from 'express';
import { AuthenticationError } from '../auth/bearerAuth.js';
import { ErrorSanitizer, OrchestrationError } from '../errors/sanitizer.js';
import { currentLogger } from '../logging/logger.js';
import { RequestContext } from '../context/requestContext.js';
import { RequestValidationError } from '../validation/zod-middleware.js';

function isBodyParseError(err: unknown): boolean {
    return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Last middleware in the chain. Every error leaves as
 * { status, requestId, failure: { kind, message } } with a stable message.
 */
export function errorHandler() {
    return (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(err);
            return;
        }
        const requestId = RequestContext.tryGet()?.requestId;

        if (err instanceof AuthenticationError) {
            res.setHeader('WWW-Authenticate', `Bearer error="${err.reason === 'missing_token' ? 'invalid_request' : 'invalid_token'}"`);
            res.status(401).json({
                status: 'unauthenticated',
                requestId,
                failure: { kind: 'Unauthenticated', message: err.message }
            });
            return;
        }

        if (err instanceof RequestValidationError || isBodyParseError(err)) {
            res.status(400).json({
                status: 'rejected',
                requestId,
                failure: {
                    kind: 'InvalidRequest',
                    message: 'The analysis request is invalid.',
                    ...(err instanceof RequestValidationError ? { details: err.issues } : {})
                }
            });
            return;
        }

        const failure = err instanceof OrchestrationError
            ? err
            : ErrorSanitizer.sanitize(err, 'HttpApi:Unhandled', 'ExecutionError');
        const status = err instanceof OrchestrationError ? failure.httpStatus : 500;

        currentLogger().error({ incidentId: failure.incidentId, kind: failure.kind, status }, 'Request failed');
        res.status(status).json({
            status: 'failed',
            requestId,
            failure: status === 500
                ? { kind: 'InternalError', message: 'An internal error occurred.', incidentId: failure.incidentId }
                : failure.toPublic()
        });
    };
}
