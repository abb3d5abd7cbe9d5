import { Request, Response, NextFunction } from 'express';
import { jwtVerify, JWTPayload } from 'jose';
import { logger } from '../logging/logger.js';

const CLOCK_TOLERANCE_SECONDS = 30;

export interface BearerAuthSettings {
    readonly secret: string;
    readonly algorithm: 'HS256';
    readonly audience: string;
    readonly issuer: string;
}

/**
 * Authenticated caller, attached to res.locals for downstream handlers.
 */
export interface Principal {
    readonly subject: string;
    readonly scope?: string;
    readonly expiresAt?: number;
}

export class AuthenticationError extends Error {
    readonly statusCode = 401;

    constructor(public readonly reason: 'missing_token' | 'invalid_token') {
        super(reason === 'missing_token' ? 'A bearer token is required.' : 'The bearer token is invalid or expired.');
        this.name = 'AuthenticationError';
    }
}

function isPrincipal(value: unknown): value is Principal {
    return typeof value === 'object' && value !== null && 'subject' in value && typeof value.subject === 'string';
}

/**
 * Principal set by the bearer middleware. Throws when called on a route the
 * middleware does not guard.
 */
export function getPrincipal(res: Response): Principal {
    const principal: unknown = res.locals.principal;
    if (!isPrincipal(principal)) {
        throw new AuthenticationError('missing_token');
    }
    return principal;
}

export async function verifyBearerToken(token: string, settings: BearerAuthSettings, key: Uint8Array): Promise<Principal> {
    const { payload } = await jwtVerify<JWTPayload & { scope?: unknown }>(token, key, {
        issuer: settings.issuer,
        audience: settings.audience,
        algorithms: [settings.algorithm], // Prevent alg confusion
        requiredClaims: ['sub', 'exp'],
        clockTolerance: CLOCK_TOLERANCE_SECONDS
    });

    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw new Error('Token subject is empty');
    }

    return {
        subject: payload.sub,
        ...(typeof payload.scope === 'string' ? { scope: payload.scope } : {}),
        ...(payload.exp !== undefined ? { expiresAt: payload.exp } : {})
    };
}

/**
 * Express middleware factory: HS256 bearer JWT verified with jose.
 */
export function createBearerAuth(settings: BearerAuthSettings) {
    const key = new TextEncoder().encode(settings.secret);

    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const header = req.headers.authorization;
        const match = header ? /^Bearer\s+(\S+)$/i.exec(header) : null;
        const token = match?.[1];
        if (!token) {
            next(new AuthenticationError('missing_token'));
            return;
        }

        let principal: Principal;
        try {
            principal = await verifyBearerToken(token, settings, key);
        } catch (error: unknown) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            logger.warn({ error: errorMessage }, 'JWT verification failed');
            next(new AuthenticationError('invalid_token'));
            return;
        }
        res.locals.principal = principal;
        next();
    };
}
