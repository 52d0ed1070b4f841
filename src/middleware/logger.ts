import { createLogger } from '../utils/logger';
import type { GatewayMiddleware, GatewayContext, NextFunction } from './types';

const log = createLogger('access');

// =================================================================
// ACCESS LOG MIDDLEWARE
// =================================================================
// Runs FIRST — logs every request, even rejected ones, once the
// response has finished (so status and timing are known).
// =================================================================

export class LoggerMiddleware implements GatewayMiddleware {
    name = 'logger';

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res, startTime } = ctx;

        res.on('finish', () => {
            const elapsed = Date.now() - startTime;
            const node = ctx.node ? ctx.node.id : 'none';
            log.info(`${req.method} ${req.originalUrl} → ${node} [${res.statusCode}] ${elapsed}ms`, {
                ip: ctx.clientIp,
                ...(ctx.meta.rateLimited ? { rateLimited: ctx.meta.rateLimited } : {}),
            });
        });

        await next();
    }
}
