import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Express 4 does not observe rejected handler promises; route them to next().
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}
