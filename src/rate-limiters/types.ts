// =================================================================
// Rate Limiter Types — admission control contracts
// =================================================================

import type { IncomingHttpHeaders } from 'http';

/** What the HTTP layer hands the limiter. Raw HTTP is never parsed here. */
export interface RequestInfo {
    ip: string;
    endpoint: string;
    method: string;
    headers: IncomingHttpHeaders;
}

/** A rate-limited subject: one client on one endpoint. */
export interface ClientKey {
    ip: string;
    endpoint: string;
}

export interface BlockEntry {
    ip: string;
    reason: string;
    expiresAt: number; // epoch ms
}

export type RejectionReason = 'blocked' | 'suspicious' | 'quota';

export interface RateLimitDecision {
    limited: boolean;
    reason?: RejectionReason;
    limit: number; // Quota for the endpoint
    count?: number; // Window count, when the counter was reached
    resetAt: number; // End of the current window, epoch ms
}

export interface ClientStatus {
    blocked: boolean;
    reason: string | null; // Recorded with the block, e.g. "suspicious activity"
    suspicionScore: number;
}

/**
 * Minimal key-value contract for the shared store.
 * Every method may reject; callers treat that as "unavailable".
 */
export interface KeyValueStore {
    exists(key: string): Promise<number>;
    get(key: string): Promise<string | null>;
    incr(key: string): Promise<number>;
    expire(key: string, ttlSeconds: number): Promise<number>;
    setex(key: string, ttlSeconds: number, value: string): Promise<string>;
    del(key: string): Promise<number>;
}

/**
 * Counting + blocklist backend. Implemented by the shared store,
 * the process-local fallback, and the adapter composing the two.
 */
export interface CounterStore {
    /** Backend name (for logs) */
    readonly name: string;

    isBlocked(ip: string, now: number): Promise<boolean>;

    /** Reason recorded with the active block, or null when not blocked */
    getBlockReason(ip: string, now: number): Promise<string | null>;

    block(entry: BlockEntry, now: number): Promise<void>;

    unblock(ip: string): Promise<void>;

    /** Count this request in the current window and return the new total */
    increment(key: ClientKey, now: number): Promise<number>;
}

export interface RateLimiterOptions {
    /** Shared store; absent means local-only counting */
    store?: KeyValueStore;
    windowMs?: number;
    blockDurationMs?: number;
    suspicionThreshold?: number;
    defaultQuota?: number;
    endpointQuotas?: Record<string, number>;
    clock?: () => number;
}
