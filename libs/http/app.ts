import crypto from 'crypto';
import express, { Application, Request, Response, NextFunction } from 'express';
import { createBearerAuth, BearerAuthSettings } from '../auth/bearerAuth.js';
import { RequestContext } from '../context/requestContext.js';
import type { HealthVerifier } from '../health/healthVerifier.js';
import type { Orchestrator } from '../orchestrator/orchestrator.js';
import { errorHandler } from './errorHandler.js';
import { createAnalysisRoutes } from './routes/analyses.js';
import { createHealthRoutes } from './routes/health.js';
import { createLoadRoutes } from './routes/load.js';

export const API_PREFIX = '/api/v1';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export interface AppDependencies {
    readonly orchestrator: Orchestrator;
    readonly health: HealthVerifier;
    readonly auth: BearerAuthSettings;
    readonly corsOrigins: readonly string[];
}

/**
 * Binds a request scope (X-Request-Id or a fresh UUID) for the lifetime of
 * the request so every log line carries it.
 */
function requestScope() {
    return (req: Request, res: Response, next: NextFunction): void => {
        const supplied = req.header('x-request-id');
        const requestId = supplied && REQUEST_ID_PATTERN.test(supplied) ? supplied : crypto.randomUUID();
        res.setHeader('X-Request-Id', requestId);
        RequestContext.run({ requestId }, () => next());
    };
}

function cors(origins: readonly string[]) {
    const allowed = new Set(origins);
    return (req: Request, res: Response, next: NextFunction): void => {
        const origin = req.header('origin');
        if (origin && allowed.has(origin)) {
            res.setHeader('Access-Control-Allow-Origin', origin);
            res.setHeader('Vary', 'Origin');
            res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type, X-Request-Id');
            res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
        }
        if (req.method === 'OPTIONS') {
            res.status(204).end();
            return;
        }
        next();
    };
}

export function createApp(deps: AppDependencies): Application {
    const app = express();
    app.disable('x-powered-by');

    app.use(requestScope());
    app.use(cors(deps.corsOrigins));
    app.use(express.json({ limit: '1mb' }));

    app.use(`${API_PREFIX}/health`, createHealthRoutes(deps.health));

    const bearer = createBearerAuth(deps.auth);
    app.use(`${API_PREFIX}/analyses`, bearer, createAnalysisRoutes(deps.orchestrator, `${API_PREFIX}/analyses`));
    app.use(`${API_PREFIX}/load`, bearer, createLoadRoutes(deps.orchestrator));

    app.use((req: Request, res: Response) => {
        res.status(404).json({
            status: 'not_found',
            failure: { kind: 'NotFound', message: `No route for ${req.method} ${req.path}` }
        });
    });

    app.use(errorHandler());
    return app;
}
