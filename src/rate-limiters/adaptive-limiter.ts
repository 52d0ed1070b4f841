import { createLogger } from '../utils/logger';
import { AnomalyDetector, RequestHistory } from './anomaly-detector';
import { QuotaTable, DEFAULT_QUOTA, ENDPOINT_QUOTAS } from './quotas';
import { FallbackCounterStore } from './stores/fallback-store';
import { LocalCounterStore } from './stores/local-store';
import { SharedCounterStore } from './stores/shared-store';
import type { BlockEntry, ClientStatus, RateLimitDecision, RateLimiterOptions, RequestInfo } from './types';

const log = createLogger('rate-limiter');

// =================================================================
// ADAPTIVE RATE LIMITER
// =================================================================
//
// Per request, in this order:
//
//   1. Blocked?          shared blocklist, then local   → reject
//   2. Suspicious?       score++; at threshold → block  → reject
//   3. Quota             per-endpoint table, default 60/min
//   4. Count             shared counter, else local counter
//   5. Over quota?       block for 30 min               → reject
//
// A block rejects EVERYTHING from that IP (all endpoints) until it
// expires. Suspicion scores never decay; only resetSuspicion()
// or a restart clears them.
//
// Shared-store outages are invisible to the caller: the fallback
// store switches to local counting and the limiter keeps admitting.
// =================================================================

export class AdaptiveRateLimiter {
    name = 'adaptive-window';

    private store: FallbackCounterStore;
    private local: LocalCounterStore;
    private shared?: SharedCounterStore;
    private quotas: QuotaTable;
    private detector = new AnomalyDetector();
    private history = new RequestHistory();
    private suspicion: Map<string, number> = new Map();

    private windowMs: number;
    private blockDurationMs: number;
    private suspicionThreshold: number;
    private clock: () => number;

    constructor(options: RateLimiterOptions = {}) {
        this.windowMs = options.windowMs ?? 60000;
        this.blockDurationMs = options.blockDurationMs ?? 30 * 60 * 1000;
        this.suspicionThreshold = options.suspicionThreshold ?? 3;
        this.clock = options.clock ?? Date.now;
        this.quotas = new QuotaTable(
            options.defaultQuota ?? DEFAULT_QUOTA,
            options.endpointQuotas ?? ENDPOINT_QUOTAS,
        );

        this.local = new LocalCounterStore(this.windowMs, this.clock());
        this.shared = options.store ? new SharedCounterStore(options.store, this.windowMs) : undefined;
        this.store = new FallbackCounterStore(this.shared, this.local);
    }

    async isRateLimited(request: RequestInfo, now: number = this.clock()): Promise<boolean> {
        const decision = await this.check(request, now);
        return decision.limited;
    }

    async check(request: RequestInfo, now: number = this.clock()): Promise<RateLimitDecision> {
        const { ip, endpoint } = request;
        const limit = this.quotas.quotaFor(endpoint);
        const resetAt = (Math.floor(now / this.windowMs) + 1) * this.windowMs;

        // 1. Existing block
        if (await this.store.isBlocked(ip, now)) {
            log.warn('Request rejected: IP is blocked', { ip, endpoint });
            return { limited: true, reason: 'blocked', limit, resetAt };
        }

        // 2. Anomaly heuristic — looks at requests BEFORE this one
        const recent = this.history.countSince(ip, endpoint, now);
        this.history.record(ip, endpoint, now);

        if (this.detector.isSuspicious(request, recent)) {
            const score = (this.suspicion.get(ip) || 0) + 1;
            this.suspicion.set(ip, score);
            log.warn('Suspicious activity detected', { ip, endpoint, score });

            if (score >= this.suspicionThreshold) {
                await this.blockIp(ip, 'suspicious activity', now);
                return { limited: true, reason: 'suspicious', limit, resetAt };
            }
        }

        // 3–4. Count against the endpoint quota
        const count = await this.store.increment({ ip, endpoint }, now);

        // 5. Over quota
        if (count > limit) {
            await this.blockIp(ip, `rate limit exceeded: ${count}/${limit}`, now);
            log.warn('Rate limit exceeded', { ip, endpoint, count, limit });
            return { limited: true, reason: 'quota', limit, count, resetAt };
        }

        return { limited: false, limit, count, resetAt };
    }

    quotaFor(endpoint: string): number {
        return this.quotas.quotaFor(endpoint);
    }

    // ── Administration ──────────────────────────────────────────

    async unblock(ip: string): Promise<void> {
        await this.store.unblock(ip);
        log.info('IP unblocked', { ip });
    }

    resetSuspicion(ip: string): void {
        this.suspicion.delete(ip);
    }

    getSuspicionScore(ip: string): number {
        return this.suspicion.get(ip) || 0;
    }

    async getClientStatus(ip: string, now: number = this.clock()): Promise<ClientStatus> {
        const reason = await this.store.getBlockReason(ip, now);
        return {
            blocked: reason !== null,
            reason,
            suspicionScore: this.getSuspicionScore(ip),
        };
    }

    getStats() {
        return {
            name: this.name,
            windowMs: this.windowMs,
            blockDurationMs: this.blockDurationMs,
            suspicionThreshold: this.suspicionThreshold,
            sharedStore: this.shared !== undefined,
            degraded: this.store.isDegraded(),
            localKeys: this.local.trackedKeys(),
            suspiciousClients: this.suspicion.size,
        };
    }

    private async blockIp(ip: string, reason: string, now: number): Promise<void> {
        const entry: BlockEntry = { ip, reason, expiresAt: now + this.blockDurationMs };
        await this.store.block(entry, now);
        log.warn('IP blocked', { ip, reason, until: new Date(entry.expiresAt).toISOString() });
    }
}
