import { Router, Request, Response } from 'express';
import type { HealthVerifier } from '../../health/healthVerifier.js';
import { asyncHandler } from '../asyncHandler.js';

/**
 * Liveness and readiness. Unauthenticated.
 */
export function createHealthRoutes(verifier: HealthVerifier): Router {
    const router = Router();

    router.get('/live', (_req: Request, res: Response) => {
        res.json({
            status: 'alive',
            uptimeSeconds: Math.round(process.uptime()),
            timestamp: new Date().toISOString()
        });
    });

    router.get('/ready', asyncHandler(async (_req: Request, res: Response) => {
        const report = await verifier.check();
        res.status(report.status === 'unavailable' ? 503 : 200).json(report);
    }));

    return router;
}
