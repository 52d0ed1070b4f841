import type { Request, Response } from 'express';
import { createLogger } from '../utils/logger';
import { extractErrorMessage } from '../utils/errors';
import type { GatewayContext, GatewayMiddleware } from './types';

const log = createLogger('pipeline');

// =================================================================
// MIDDLEWARE PIPELINE
// =================================================================
//
// Chains middleware together in order.
// Each middleware calls next() to continue, or doesn't to stop.
//
//   pipeline.use(logger);       // 1st
//   pipeline.use(rateLimit);    // 2nd — might stop here (429)
//   pipeline.use(loadBalance);  // 3rd — might stop here (503)
//   pipeline.use(proxy);        // 4th — final destination
//
// The order MATTERS:
//   Logger runs first (always logs, even rejected requests)
//   Rate limit before load balancing (rejected traffic never
//     advances a round-robin cursor or touches a node)
//   Proxy is always last (the actual work)
// =================================================================

export function resolveClientIp(req: Request): string {
    return req.ip || req.socket.remoteAddress || 'unknown';
}

export class MiddlewarePipeline {
    private middleware: GatewayMiddleware[] = [];

    use(mw: GatewayMiddleware): MiddlewarePipeline {
        this.middleware.push(mw);
        return this; // Chainable: pipeline.use(a).use(b).use(c)
    }

    /**
     * Execute the pipeline for a request.
     * Each middleware gets a next() that calls the NEXT middleware.
     */
    async execute(req: Request, res: Response): Promise<void> {
        const ctx: GatewayContext = {
            req,
            res,
            startTime: Date.now(),
            clientIp: resolveClientIp(req),
            meta: {},
        };

        let index = 0;

        const next = async (): Promise<void> => {
            if (index >= this.middleware.length) return;

            const mw = this.middleware[index];
            index++;

            try {
                await mw.handle(ctx, next);
            } catch (err) {
                const message = extractErrorMessage(err);
                log.error(`Middleware [${mw.name}] error: ${message}`);

                if (!res.headersSent) {
                    res.status(500).json({
                        error: 'Internal Gateway Error',
                        middleware: mw.name,
                        message,
                    });
                }
            }
        };

        await next();
    }

    getMiddlewareNames(): string[] {
        return this.middleware.map(m => m.name);
    }
}
