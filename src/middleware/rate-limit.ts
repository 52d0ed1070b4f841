import type { AdaptiveRateLimiter } from '../rate-limiters/adaptive-limiter';
import type { RateLimitDecision } from '../rate-limiters/types';
import type { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// RATE LIMIT MIDDLEWARE
// =================================================================
// Asks the limiter for a decision. If rejected, returns 429 with
//   Retry-After        seconds until the current window resets
//   X-RateLimit-Limit  quota for this endpoint
//   X-RateLimit-Reset  window reset, epoch seconds
// Does NOT call next() on rejection — stops the pipeline.
// =================================================================

export interface GatewayCounters {
    totalRequests: number;
    rateLimited: number;
    noHealthyNode: number;
    proxied: number;
    errors: number;
    byNode: Record<string, number>;
}

function retryAfterSeconds(decision: RateLimitDecision, now: number): number {
    return Math.max(1, Math.ceil((decision.resetAt - now) / 1000));
}

export class RateLimitMiddleware implements GatewayMiddleware {
    name = 'rate-limit';

    constructor(
        private limiter: AdaptiveRateLimiter,
        private counters: GatewayCounters,
        private clock: () => number = Date.now,
    ) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res, clientIp } = ctx;
        this.counters.totalRequests++;

        const now = this.clock();
        const decision = await this.limiter.check({
            ip: clientIp,
            endpoint: req.path,
            method: req.method,
            headers: req.headers,
        }, now);

        res.setHeader('X-RateLimit-Limit', decision.limit);

        if (decision.limited) {
            const retryAfter = retryAfterSeconds(decision, now);
            this.counters.rateLimited++;
            ctx.meta.rateLimited = decision.reason;

            res.setHeader('Retry-After', retryAfter);
            res.setHeader('X-RateLimit-Reset', Math.floor(decision.resetAt / 1000));
            res.status(429).json({
                error: 'Too Many Requests',
                detail: 'Rate limit exceeded. Please try again later.',
                retryAfter,
            });
            return; // STOP — don't call next()
        }

        await next();
    }
}
