import 'dotenv/config';
import type { Server } from 'http';
import { loadConfig } from './config';
import { createGateway } from './gateway';
import { closeRedisClient, createRedisClient } from './infrastructure/redis';
import { HealthChecker } from './load-balancers/health-checker';
import { LoadBalancer } from './load-balancers/load-balancer';
import { AdaptiveRateLimiter } from './rate-limiters/adaptive-limiter';
import { RedisKeyValueStore } from './rate-limiters/stores/redis-store';
import { ConfigError, extractErrorMessage } from './utils/errors';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('server');

// =================================================================
// SERVER — wires config, Redis, limiter, balancer, health checks
// =================================================================

async function main(): Promise<void> {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const redis = config.redisUrl ? createRedisClient(config.redisUrl) : undefined;
    if (!redis) {
        log.warn('REDIS_URL not set — rate limits are counted per process');
    }

    const rateLimiter = new AdaptiveRateLimiter({
        store: redis ? new RedisKeyValueStore(redis) : undefined,
        windowMs: config.rateLimit.windowMs,
        blockDurationMs: config.rateLimit.blockDurationMs,
        suspicionThreshold: config.rateLimit.suspicionThreshold,
        defaultQuota: config.rateLimit.defaultQuota,
    });

    const loadBalancer = new LoadBalancer(config.loadBalancer.strategy);
    for (const node of config.loadBalancer.nodes) {
        await loadBalancer.addNode(node.id, node.url, node.weight);
    }

    const healthChecker = new HealthChecker(loadBalancer, {
        intervalMs: config.healthCheck.intervalMs,
        timeoutMs: config.healthCheck.timeoutMs,
        healthPath: config.healthCheck.path,
        failureThreshold: config.healthCheck.failureThreshold,
    });

    const { app } = createGateway({
        rateLimiter,
        loadBalancer,
        strategy: config.loadBalancer.strategy,
        proxyTimeoutMs: config.loadBalancer.proxyTimeoutMs,
        markDownOnError: config.healthCheck.intervalMs > 0,
    });

    const server: Server = app.listen(config.port, () => {
        log.info('Gateway listening', {
            port: config.port,
            strategy: config.loadBalancer.strategy,
            nodes: config.loadBalancer.nodes.map(n => `${n.id}=${n.url}@${n.weight}`),
            sharedStore: redis !== undefined,
        });
    });
    healthChecker.start();

    const shutdown = (signal: string) => {
        log.info(`${signal} received, shutting down`);
        healthChecker.stop();
        server.close(() => {
            const closing = redis ? closeRedisClient(redis) : Promise.resolve();
            closing
                .catch((err: unknown) => log.error('Shutdown error', { error: extractErrorMessage(err) }))
                .finally(() => process.exit(0));
        });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
        for (const issue of err.issues) log.error(issue);
    } else {
        log.error('Failed to start gateway', { error: extractErrorMessage(err) });
    }
    process.exit(1);
});
