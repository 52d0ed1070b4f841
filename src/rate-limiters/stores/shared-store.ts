import { createLogger } from '../../utils/logger';
import { extractErrorMessage } from '../../utils/errors';
import type { BlockEntry, ClientKey, CounterStore, KeyValueStore } from '../types';

const log = createLogger('shared-store');

// =================================================================
// SHARED COUNTER STORE — counters and blocks in a key-value store
// =================================================================
//
// Keys:
//   ratelimit:<ip>:<endpoint>:<windowIndex>   request count
//   blocked:<ip>                              block reason
//
// windowIndex = floor(now / windowMs), so every window gets a fresh
// counter. The counter's TTL is set to 2× the window on its first
// increment: a read near the boundary never sees it vanish early.
//
// Errors propagate, except from EXPIRE: once INCR succeeds its
// count stands. A key whose EXPIRE failed stays pending and is
// retried after the next successful INCR of any key.
//
// The fallback adapter decides what an outage means.
// =================================================================

export function counterKey(key: ClientKey, windowIndex: number): string {
    return `ratelimit:${key.ip}:${key.endpoint}:${windowIndex}`;
}

export function blockKey(ip: string): string {
    return `blocked:${ip}`;
}

export class SharedCounterStore implements CounterStore {
    readonly name = 'shared';
    private pendingExpiry: Set<string> = new Set();

    constructor(
        private kv: KeyValueStore,
        private windowMs: number = 60000,
    ) {}

    async isBlocked(ip: string): Promise<boolean> {
        return (await this.kv.exists(blockKey(ip))) > 0;
    }

    async getBlockReason(ip: string): Promise<string | null> {
        return this.kv.get(blockKey(ip));
    }

    async block(entry: BlockEntry, now: number): Promise<void> {
        const ttlSeconds = Math.max(1, Math.ceil((entry.expiresAt - now) / 1000));
        await this.kv.setex(blockKey(entry.ip), ttlSeconds, entry.reason);
    }

    async unblock(ip: string): Promise<void> {
        await this.kv.del(blockKey(ip));
    }

    async increment(key: ClientKey, now: number): Promise<number> {
        const redisKey = counterKey(key, Math.floor(now / this.windowMs));
        const count = await this.kv.incr(redisKey);

        if (count === 1) {
            this.pendingExpiry.add(redisKey);
        }
        await this.flushPendingExpiry();
        return count;
    }

    /** Counter keys still waiting for their TTL */
    pendingExpiryCount(): number {
        return this.pendingExpiry.size;
    }

    private async flushPendingExpiry(): Promise<void> {
        const ttlSeconds = Math.ceil((this.windowMs * 2) / 1000);

        for (const redisKey of [...this.pendingExpiry]) {
            try {
                await this.kv.expire(redisKey, ttlSeconds);
                this.pendingExpiry.delete(redisKey);
            } catch (err) {
                log.warn('Failed to set counter TTL, will retry', {
                    key: redisKey,
                    error: extractErrorMessage(err),
                });
                return;
            }
        }
    }
}
