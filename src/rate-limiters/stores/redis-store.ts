import type { KeyValueStore } from '../types';

// =================================================================
// REDIS KEY-VALUE STORE
// =================================================================
// Adapter from an ioredis client to KeyValueStore.
//
//   - every key gets an optional namespace prefix
//   - every command races a timeout, so a hung connection turns
//     into a rejection (→ local fallback) instead of a stalled request
//
// Anything with the same command signatures works: a cluster
// client, or a fake in tests.
// =================================================================

export interface RedisCommands {
    exists(key: string): Promise<number>;
    get(key: string): Promise<string | null>;
    incr(key: string): Promise<number>;
    expire(key: string, seconds: number): Promise<number>;
    setex(key: string, seconds: number, value: string): Promise<string>;
    del(key: string): Promise<number>;
}

export interface RedisStoreOptions {
    keyPrefix?: string;
    commandTimeoutMs?: number;
}

export class RedisCommandTimeoutError extends Error {
    constructor(command: string, timeoutMs: number) {
        super(`Redis ${command} timed out after ${timeoutMs}ms`);
        this.name = 'RedisCommandTimeoutError';
    }
}

export class RedisKeyValueStore implements KeyValueStore {
    private keyPrefix: string;
    private commandTimeoutMs: number;

    constructor(
        private redis: RedisCommands,
        options: RedisStoreOptions = {},
    ) {
        this.keyPrefix = options.keyPrefix ?? '';
        this.commandTimeoutMs = options.commandTimeoutMs ?? 250;
    }

    exists(key: string): Promise<number> {
        return this.run('exists', () => this.redis.exists(this.prefixed(key)));
    }

    get(key: string): Promise<string | null> {
        return this.run('get', () => this.redis.get(this.prefixed(key)));
    }

    incr(key: string): Promise<number> {
        return this.run('incr', () => this.redis.incr(this.prefixed(key)));
    }

    expire(key: string, ttlSeconds: number): Promise<number> {
        return this.run('expire', () => this.redis.expire(this.prefixed(key), ttlSeconds));
    }

    setex(key: string, ttlSeconds: number, value: string): Promise<string> {
        return this.run('setex', () => this.redis.setex(this.prefixed(key), ttlSeconds, value));
    }

    del(key: string): Promise<number> {
        return this.run('del', () => this.redis.del(this.prefixed(key)));
    }

    private prefixed(key: string): string {
        return this.keyPrefix + key;
    }

    private run<T>(command: string, call: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const timer = setTimeout(() => {
                reject(new RedisCommandTimeoutError(command, this.commandTimeoutMs));
            }, this.commandTimeoutMs);

            call().then(
                (value) => {
                    clearTimeout(timer);
                    resolve(value);
                },
                (err: unknown) => {
                    clearTimeout(timer);
                    reject(err);
                },
            );
        });
    }
}
