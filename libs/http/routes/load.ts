import { Router, Request, Response } from 'express';
import type { Orchestrator } from '../../orchestrator/orchestrator.js';

export function createLoadRoutes(orchestrator: Orchestrator): Router {
    const router = Router();

    router.get('/', (_req: Request, res: Response) => {
        res.json(orchestrator.loadView());
    });

    return router;
}
