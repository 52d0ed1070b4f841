/**
 * Gateway Configuration
 *
 * Loaded from environment variables (a `.env` file is read by the server
 * entrypoint) and validated with zod. Invalid values fail startup with a
 * ConfigError naming every offending variable.
 *
 * ## Server
 * - `PORT` - Port to listen on (default: 4000)
 * - `NODE_ENV` - development | production | test (default: development)
 * - `LOG_LEVEL` - debug | info | warn | error (default: info)
 *
 * ## Rate Limiting
 * - `REDIS_URL` - Shared counter store; unset means per-process counting
 * - `RATE_LIMIT_WINDOW_MS` - Window length (default: 60000)
 * - `RATE_LIMIT_DEFAULT` - Requests per window for unlisted endpoints (default: 60)
 * - `RATE_LIMIT_BLOCK_DURATION_MS` - Block length (default: 1800000)
 * - `RATE_LIMIT_SUSPICION_THRESHOLD` - Suspicious hits before a block (default: 3)
 *
 * ## Load Balancing
 * - `LB_STRATEGY` - round_robin | least_connections | weighted | response_time
 * - `LB_NODES` - Comma-separated `id=url[@weight]`, e.g. `a=http://10.0.0.1:3001@3`
 * - `PROXY_TIMEOUT_MS` - Upstream timeout (default: 5000)
 *
 * ## Health Checks
 * - `HEALTH_CHECK_INTERVAL_MS` - 0 disables (default: 30000)
 * - `HEALTH_CHECK_PATH` - (default: /health)
 * - `HEALTH_CHECK_TIMEOUT_MS` - (default: 5000)
 * - `HEALTH_CHECK_FAILURE_THRESHOLD` - Consecutive failures before DOWN (default: 3)
 */

import { z } from 'zod';
import { STRATEGY_NAMES } from './load-balancers/types';
import { ConfigError, extractErrorMessage } from './utils/errors';

export interface NodeDefinition {
    id: string;
    url: string;
    weight: number;
}

const intFromEnv = (fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER) =>
    z.coerce.number().int().min(min).max(max).default(fallback);

/**
 * Parse `id=url[@weight]` entries. The weight suffix is only taken when it
 * is all digits, so credentials in a URL (`user@host`) survive.
 */
export function parseNodeList(raw: string): NodeDefinition[] {
    return raw
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0)
        .map((entry) => {
            const eq = entry.indexOf('=');
            if (eq <= 0) {
                throw new Error(`expected id=url, got "${entry}"`);
            }
            const id = entry.slice(0, eq).trim();
            let url = entry.slice(eq + 1).trim();
            let weight = 1;

            const at = url.lastIndexOf('@');
            if (at > 0 && /^\d+$/.test(url.slice(at + 1))) {
                weight = parseInt(url.slice(at + 1), 10);
                url = url.slice(0, at);
            }
            return { id, url, weight };
        });
}

const NodeSchema = z.object({
    id: z.string().min(1),
    url: z.string().url(),
    weight: z.number().int().min(1).max(10),
});

export const EnvSchema = z.object({
    PORT: intFromEnv(4000, 1, 65535),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    REDIS_URL: z.string().url().optional(),
    RATE_LIMIT_WINDOW_MS: intFromEnv(60000, 1000),
    RATE_LIMIT_DEFAULT: intFromEnv(60, 1),
    RATE_LIMIT_BLOCK_DURATION_MS: intFromEnv(30 * 60 * 1000, 1000),
    RATE_LIMIT_SUSPICION_THRESHOLD: intFromEnv(3, 1),

    LB_STRATEGY: z.enum(STRATEGY_NAMES).default('round_robin'),
    LB_NODES: z
        .string()
        .default('')
        .transform((raw, ctx) => {
            try {
                return parseNodeList(raw);
            } catch (err) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: extractErrorMessage(err) });
                return z.NEVER;
            }
        })
        .pipe(z.array(NodeSchema)),
    PROXY_TIMEOUT_MS: intFromEnv(5000, 1),

    HEALTH_CHECK_INTERVAL_MS: intFromEnv(30000),
    HEALTH_CHECK_PATH: z.string().startsWith('/').default('/health'),
    HEALTH_CHECK_TIMEOUT_MS: intFromEnv(5000, 1),
    HEALTH_CHECK_FAILURE_THRESHOLD: intFromEnv(3, 1),
});

export type GatewayConfig = ReturnType<typeof toConfig>;

function toConfig(env: z.infer<typeof EnvSchema>) {
    return {
        port: env.PORT,
        nodeEnv: env.NODE_ENV,
        logLevel: env.LOG_LEVEL,

        redisUrl: env.REDIS_URL,

        rateLimit: {
            windowMs: env.RATE_LIMIT_WINDOW_MS,
            defaultQuota: env.RATE_LIMIT_DEFAULT,
            blockDurationMs: env.RATE_LIMIT_BLOCK_DURATION_MS,
            suspicionThreshold: env.RATE_LIMIT_SUSPICION_THRESHOLD,
        },

        loadBalancer: {
            strategy: env.LB_STRATEGY,
            nodes: env.LB_NODES,
            proxyTimeoutMs: env.PROXY_TIMEOUT_MS,
        },

        healthCheck: {
            intervalMs: env.HEALTH_CHECK_INTERVAL_MS,
            path: env.HEALTH_CHECK_PATH,
            timeoutMs: env.HEALTH_CHECK_TIMEOUT_MS,
            failureThreshold: env.HEALTH_CHECK_FAILURE_THRESHOLD,
        },
    };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    // Empty strings mean "unset" (docker-compose passes them through)
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
    );

    const result = EnvSchema.safeParse(cleaned);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
        );
    }
    return toConfig(result.data);
}
