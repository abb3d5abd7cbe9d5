import { Router, Request, Response } from 'express';
import { getPrincipal } from '../../auth/bearerAuth.js';
import { getContextLogger } from '../../logging/logger.js';
import type { Orchestrator } from '../../orchestrator/orchestrator.js';
import { asyncHandler } from '../asyncHandler.js';
import { renderStatus, submissionStatusCode } from '../presenter.js';

/**
 * Aborts when the client goes away before the response is written.
 */
function clientSignal(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) controller.abort(new Error('Client disconnected'));
    });
    return controller.signal;
}

function notFound(res: Response, requestId: string): void {
    res.status(404).json({
        status: 'not_found',
        requestId,
        failure: { kind: 'NotFound', message: 'No request with this id is tracked.' }
    });
}

/**
 * Submit, poll and cancel analysis requests.
 * @param basePath - public path the router is mounted on, used for poll URLs
 */
export function createAnalysisRoutes(orchestrator: Orchestrator, basePath: string): Router {
    const router = Router();

    router.post('/', asyncHandler(async (req: Request, res: Response) => {
        const principal = getPrincipal(res);
        const status = await orchestrator.submit(req.body, {
            subject: principal.subject,
            signal: clientSignal(res)
        });

        const log = getContextLogger({ requestId: status.requestId, subject: principal.subject, priority: status.priority });
        log.info({ state: status.state, failure: status.failure?.kind }, 'Analysis request handled');

        if (res.headersSent || res.destroyed) return;
        if (status.retryAfterSeconds !== undefined) {
            res.setHeader('Retry-After', String(status.retryAfterSeconds));
        }
        res.status(submissionStatusCode(status)).json(renderStatus(status, basePath));
    }));

    router.get('/:requestId', asyncHandler(async (req: Request, res: Response) => {
        const requestId = req.params.requestId ?? '';
        const status = orchestrator.get(requestId);
        if (!status) {
            notFound(res, requestId);
            return;
        }
        res.json(renderStatus(status, basePath));
    }));

    router.delete('/:requestId', asyncHandler(async (req: Request, res: Response) => {
        const requestId = req.params.requestId ?? '';
        const result = orchestrator.cancel(requestId);

        switch (result.outcome) {
            case 'not_found':
                notFound(res, requestId);
                return;
            case 'terminal':
                res.status(409).json({
                    ...renderStatus(result.status, basePath),
                    failure: { kind: 'AlreadyTerminal', message: 'The request has already finished.' }
                });
                return;
            case 'cancelled':
                res.status(202).json({ ...renderStatus(result.status, basePath), cancelRequested: true });
                return;
        }
    }));

    return router;
}
