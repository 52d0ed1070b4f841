/**
 * Redis connection for the shared rate-limit counters.
 *
 * Tuned to fail fast: with no offline queue and a single retry per command,
 * a dead Redis makes commands reject immediately, and the limiter drops to
 * local counting. The client keeps reconnecting in the background and the
 * limiter picks the shared store back up on its own once it answers.
 */

import Redis from 'ioredis';
import { createLogger } from '../utils/logger';
import { extractErrorMessage } from '../utils/errors';

const log = createLogger('redis');

function redactUrl(url: string): string {
    return url.replace(/\/\/.*@/, '//<credentials>@');
}

export function createRedisClient(url: string): Redis {
    const client = new Redis(url, {
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        connectTimeout: 2000,
        retryStrategy(times) {
            const delay = Math.min(times * 200, 5000);
            if (times % 10 === 1) {
                log.warn(`Redis reconnect attempt ${times}, next in ${delay}ms`);
            }
            return delay;
        },
    });

    client.on('ready', () => log.info('Redis connected', { url: redactUrl(url) }));
    client.on('error', (err: Error) => log.debug('Redis connection error', { error: err.message }));

    return client;
}

export async function closeRedisClient(client: Redis): Promise<void> {
    try {
        await client.quit();
    } catch (err) {
        log.warn('Redis quit failed, disconnecting', { error: extractErrorMessage(err) });
        client.disconnect();
    }
}
