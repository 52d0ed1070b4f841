import http from 'http';
import https from 'https';
import { createLogger } from '../utils/logger';
import type { LoadBalancer } from '../load-balancers/load-balancer';
import type { ServiceNode } from '../load-balancers/types';
import type { GatewayCounters } from './rate-limit';
import type { GatewayMiddleware, GatewayContext, NextFunction } from './types';

const log = createLogger('proxy');

// =================================================================
// PROXY MIDDLEWARE — Final step in the pipeline
// =================================================================
// Forwards the request to the node picked by load-balance and
// feeds the outcome back into the balancer:
//
//   response          → updateMetrics(latency)  (adapts the weight)
//   connection error  → node marked DOWN, 502   (health checks
//                       bring it back; with markDownOnError off
//                       the node stays in rotation)
//   timeout           → 504, latency = timeout  (weight drops)
//
// activeConnections is held for the whole exchange, so
// least_connections sees in-flight requests.
// =================================================================

type ProxyOutcome =
    | { kind: 'response'; status: number; elapsedMs: number }
    | { kind: 'timeout'; elapsedMs: number }
    | { kind: 'error'; message: string };

export class ProxyMiddleware implements GatewayMiddleware {
    name = 'proxy';

    constructor(
        private balancer: LoadBalancer,
        private counters: GatewayCounters,
        private timeoutMs: number = 5000,
        private markDownOnError: boolean = true,
    ) {}

    async handle(ctx: GatewayContext, _next: NextFunction): Promise<void> {
        const { res, node } = ctx;

        if (!node) {
            res.status(500).json({ error: 'No backend selected' });
            return;
        }

        await this.balancer.acquireConnection(node.id);
        let outcome: ProxyOutcome;
        try {
            outcome = await this.forward(ctx, node);
        } finally {
            await this.balancer.releaseConnection(node.id);
        }

        switch (outcome.kind) {
        case 'response':
            this.counters.proxied++;
            this.counters.byNode[node.id] = (this.counters.byNode[node.id] || 0) + 1;
            ctx.meta.upstreamStatus = outcome.status;
            await this.balancer.updateMetrics(node.id, outcome.elapsedMs / 1000);
            break;

        case 'timeout':
            ctx.meta.upstreamError = 'timeout';
            log.warn(`${node.id} TIMEOUT`, { timeoutMs: this.timeoutMs });
            await this.balancer.updateMetrics(node.id, outcome.elapsedMs / 1000);
            break;

        case 'error':
            this.counters.errors++;
            ctx.meta.upstreamError = 'connection';
            log.error(`${node.id} error: ${outcome.message}`);
            if (this.markDownOnError) {
                await this.balancer.updateNodeStatus(node.id, { isHealthy: false });
            }
            break;
        }
    }

    private forward(ctx: GatewayContext, node: ServiceNode): Promise<ProxyOutcome> {
        const { req, res, startTime } = ctx;
        const target = new URL(node.url);
        const basePath = target.pathname.replace(/\/+$/, '');

        const options: http.RequestOptions = {
            protocol: target.protocol,
            hostname: target.hostname,
            port: target.port || undefined,
            path: basePath + req.originalUrl,
            method: req.method,
            headers: {
                ...req.headers,
                host: target.host,
                'x-forwarded-for': ctx.clientIp,
            },
            timeout: this.timeoutMs,
        };

        return new Promise<ProxyOutcome>((resolve) => {
            const onResponse = (backendRes: http.IncomingMessage) => {
                const elapsed = Date.now() - startTime;
                const status = backendRes.statusCode || 502;

                res.setHeader('x-gateway', 'traffic-control-gateway');
                res.setHeader('x-backend', node.id);
                res.setHeader('x-response-time', `${elapsed}ms`);
                res.setHeader('x-lb-strategy', ctx.meta.strategy || '');

                res.writeHead(status, backendRes.headers);
                backendRes.pipe(res);

                backendRes.on('end', () => resolve({ kind: 'response', status, elapsedMs: elapsed }));
                backendRes.on('error', (err) => resolve({ kind: 'error', message: err.message }));
            };

            const backendReq = target.protocol === 'https:'
                ? https.request(options, onResponse)
                : http.request(options, onResponse);

            backendReq.on('timeout', () => {
                backendReq.destroy();

                if (!res.headersSent) {
                    res.writeHead(504, { 'Content-Type': 'application/json' });
                    res.end(JSON.stringify({
                        error: 'Gateway Timeout',
                        message: `${node.id} did not respond in time`,
                    }));
                }
                resolve({ kind: 'timeout', elapsedMs: Date.now() - startTime });
            });

            backendReq.on('error', (err) => {
                if (!res.headersSent) {
                    res.writeHead(502, { 'Content-Type': 'application/json' });
                    res.end(JSON.stringify({
                        error: 'Bad Gateway',
                        message: `${node.id} is unavailable`,
                    }));
                }
                resolve({ kind: 'error', message: err.message });
            });

            req.pipe(backendReq);
        });
    }
}
