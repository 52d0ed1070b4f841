import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    RedisKeyValueStore,
    RedisCommandTimeoutError,
    type RedisCommands,
} from '../../../src/rate-limiters/stores/redis-store';

function fakeRedis(): RedisCommands {
    return {
        exists: vi.fn(async () => 1),
        get: vi.fn(async () => 'reason'),
        incr: vi.fn(async () => 7),
        expire: vi.fn(async () => 1),
        setex: vi.fn(async () => 'OK'),
        del: vi.fn(async () => 1),
    };
}

describe('RedisKeyValueStore', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('passes commands through with the key prefix', async () => {
        const redis = fakeRedis();
        const store = new RedisKeyValueStore(redis, { keyPrefix: 'gw:' });

        expect(await store.incr('ratelimit:a')).toBe(7);
        expect(await store.exists('blocked:a')).toBe(1);
        expect(await store.get('blocked:a')).toBe('reason');
        await store.expire('ratelimit:a', 120);
        await store.setex('blocked:a', 1800, 'why');
        await store.del('blocked:a');

        expect(redis.incr).toHaveBeenCalledWith('gw:ratelimit:a');
        expect(redis.exists).toHaveBeenCalledWith('gw:blocked:a');
        expect(redis.expire).toHaveBeenCalledWith('gw:ratelimit:a', 120);
        expect(redis.setex).toHaveBeenCalledWith('gw:blocked:a', 1800, 'why');
        expect(redis.del).toHaveBeenCalledWith('gw:blocked:a');
    });

    it('uses keys unchanged without a prefix', async () => {
        const redis = fakeRedis();
        const store = new RedisKeyValueStore(redis);
        await store.incr('ratelimit:a');
        expect(redis.incr).toHaveBeenCalledWith('ratelimit:a');
    });

    it('propagates command errors', async () => {
        const redis = fakeRedis();
        redis.incr = vi.fn(async () => {
            throw new Error('Connection is closed.');
        });
        const store = new RedisKeyValueStore(redis);
        await expect(store.incr('k')).rejects.toThrow('Connection is closed.');
    });

    it('rejects a command that hangs past the timeout', async () => {
        vi.useFakeTimers();
        const redis = fakeRedis();
        redis.incr = vi.fn(() => new Promise<number>(() => {}));
        const store = new RedisKeyValueStore(redis, { commandTimeoutMs: 100 });

        const pending = store.incr('k');
        const assertion = expect(pending).rejects.toBeInstanceOf(RedisCommandTimeoutError);
        await vi.advanceTimersByTimeAsync(100);
        await assertion;
    });
});
