import type { LoadBalancer } from '../load-balancers/load-balancer';
import type { LoadBalancingStrategy } from '../load-balancers/types';
import type { GatewayCounters } from './rate-limit';
import type { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// LOAD BALANCE MIDDLEWARE
// =================================================================
// Picks a node with the active strategy and attaches it to the
// context for the proxy. No healthy node → 503, pipeline stops.
// =================================================================

export class LoadBalanceMiddleware implements GatewayMiddleware {
    name = 'load-balance';

    constructor(
        private balancer: LoadBalancer,
        private getStrategy: () => LoadBalancingStrategy,
        private counters: GatewayCounters,
    ) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const strategy = this.getStrategy();
        const node = await this.balancer.getNextNode(strategy);
        ctx.meta.strategy = strategy;

        if (!node) {
            this.counters.noHealthyNode++;
            ctx.meta.noHealthyNode = true;
            ctx.res.status(503).json({
                error: 'Service Unavailable',
                message: 'No healthy backend node is available.',
            });
            return;
        }

        ctx.node = node;
        await next();
    }
}
