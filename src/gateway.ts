import express, { type Express, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AdaptiveRateLimiter } from './rate-limiters/adaptive-limiter';
import type { LoadBalancer } from './load-balancers/load-balancer';
import { isStrategy } from './load-balancers/strategies';
import { STRATEGY_NAMES, type LoadBalancingStrategy } from './load-balancers/types';
import { MiddlewarePipeline } from './middleware/pipeline';
import { LoggerMiddleware } from './middleware/logger';
import { RateLimitMiddleware, type GatewayCounters } from './middleware/rate-limit';
import { LoadBalanceMiddleware } from './middleware/load-balance';
import { ProxyMiddleware } from './middleware/proxy';
import { createLogger } from './utils/logger';

const log = createLogger('gateway');

// =================================================================
// GATEWAY — RATE LIMIT + LOAD BALANCE + PROXY
// =================================================================
//
//   /gateway/*   management API (not rate limited, not proxied)
//   everything   logger → rate-limit → load-balance → proxy
//
// The management API is meant for the deploying collaborator
// (node registration, health reporting) and operators (lifting a
// block). Put it behind a private network.
// =================================================================

export interface GatewayOptions {
    rateLimiter: AdaptiveRateLimiter;
    loadBalancer: LoadBalancer;
    strategy?: LoadBalancingStrategy;
    proxyTimeoutMs?: number;
    /** Mark a node DOWN on a proxy connection error (default true). Only health checks revive it. */
    markDownOnError?: boolean;
    clock?: () => number;
}

export interface Gateway {
    app: Express;
    counters: GatewayCounters;
    getStrategy(): LoadBalancingStrategy;
    setStrategy(strategy: LoadBalancingStrategy): void;
}

const AddNodeSchema = z.object({
    id: z.string().min(1).max(128),
    url: z.string().url(),
    weight: z.number().int().optional(),
});

const NodeStatusSchema = z
    .object({
        isHealthy: z.boolean().optional(),
        responseTime: z.number().min(0).optional(),
        connections: z.number().int().min(0).optional(),
    })
    .strict();

function badRequest(res: Response, error: z.ZodError): void {
    res.status(400).json({
        error: 'Invalid request body',
        issues: error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`),
    });
}

function emptyCounters(): GatewayCounters {
    return {
        totalRequests: 0,
        rateLimited: 0,
        noHealthyNode: 0,
        proxied: 0,
        errors: 0,
        byNode: {},
    };
}

export function createGateway(options: GatewayOptions): Gateway {
    const { rateLimiter, loadBalancer } = options;
    const app = express();
    const counters = emptyCounters();
    let activeStrategy: LoadBalancingStrategy = options.strategy ?? loadBalancer.defaultStrategy;

    const pipeline = new MiddlewarePipeline()
        .use(new LoggerMiddleware())
        .use(new RateLimitMiddleware(rateLimiter, counters, options.clock))
        .use(new LoadBalanceMiddleware(loadBalancer, () => activeStrategy, counters))
        .use(new ProxyMiddleware(loadBalancer, counters, options.proxyTimeoutMs, options.markDownOnError));

    // ── Management Endpoints ────────────────────────────────────

    app.get('/gateway/health', (_req, res) => {
        const nodes = loadBalancer.getNodeStatus();
        const healthyNodes = Object.values(nodes).filter(n => n.healthy).length;

        res.status(healthyNodes > 0 ? 200 : 503).json({
            status: healthyNodes > 0 ? 'ok' : 'degraded',
            strategy: activeStrategy,
            healthyNodes,
            nodes,
            rateLimiter: rateLimiter.getStats(),
            metrics: counters,
        });
    });

    app.get('/gateway/nodes', (_req, res) => {
        res.json(loadBalancer.getNodeStatus());
    });

    app.post('/gateway/nodes', express.json(), async (req, res) => {
        const parsed = AddNodeSchema.safeParse(req.body);
        if (!parsed.success) {
            badRequest(res, parsed.error);
            return;
        }

        const { id, url, weight } = parsed.data;
        await loadBalancer.addNode(id, url, weight);
        res.status(201).json({ id, ...loadBalancer.getNodeStatus()[id] });
    });

    app.delete('/gateway/nodes/:id', async (req, res) => {
        const { id } = req.params;
        if (!loadBalancer.getNode(id)) {
            res.status(404).json({ error: 'Node not found' });
            return;
        }
        await loadBalancer.removeNode(id);
        res.status(204).end();
    });

    app.patch('/gateway/nodes/:id', express.json(), async (req, res) => {
        const { id } = req.params;
        const parsed = NodeStatusSchema.safeParse(req.body);
        if (!parsed.success) {
            badRequest(res, parsed.error);
            return;
        }
        if (!loadBalancer.getNode(id)) {
            res.status(404).json({ error: 'Node not found' });
            return;
        }

        await loadBalancer.updateNodeStatus(id, parsed.data);
        res.json({ id, ...loadBalancer.getNodeStatus()[id] });
    });

    // Switch load balancing strategy
    app.post('/gateway/strategy/:name', (req, res) => {
        const { name } = req.params;
        if (!isStrategy(name)) {
            res.status(400).json({ error: `Unknown strategy: ${name}`, available: STRATEGY_NAMES });
            return;
        }
        activeStrategy = name;
        log.info(`Load balancing strategy → ${name}`);
        res.json({ status: 'switched', strategy: name });
    });

    app.get('/gateway/clients/:ip', async (req, res) => {
        const { ip } = req.params;
        res.json({ ip, ...(await rateLimiter.getClientStatus(ip)) });
    });

    // Lift a block and forget past suspicious activity
    app.delete('/gateway/clients/:ip/block', async (req, res) => {
        const { ip } = req.params;
        await rateLimiter.unblock(ip);
        rateLimiter.resetSuspicion(ip);
        res.json({ ip, blocked: false, reason: null, suspicionScore: 0 });
    });

    app.post('/gateway/metrics/reset', (_req, res) => {
        Object.assign(counters, emptyCounters());
        res.json({ status: 'reset' });
    });

    // ── Rate Limited + Load Balanced Proxy ──────────────────────

    app.all('/{*path}', async (req: Request, res: Response) => {
        await pipeline.execute(req, res);
    });

    return {
        app,
        counters,
        getStrategy: () => activeStrategy,
        setStrategy: (strategy) => {
            activeStrategy = strategy;
        },
    };
}
