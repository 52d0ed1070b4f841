import type { BlockEntry, ClientKey, CounterStore } from '../types';

// =================================================================
// LOCAL COUNTER STORE — process-memory fallback
// =================================================================
//
// Keeps request timestamps per client+endpoint and counts the ones
// that fall in the current fixed window (same partitioning as the
// shared store: windowIndex = floor(now / windowMs)).
//
// Cleanup is lazy: the first increment after more than one window
// has passed prunes every timestamp older than the current window,
// and every block that has expired.
//
// Only correct for ONE process. With several replicas each one
// counts its own share — the limit effectively multiplies.
// =================================================================

export class LocalCounterStore implements CounterStore {
    readonly name = 'local';
    private counters: Map<string, number[]> = new Map();
    private blocks: Map<string, BlockEntry> = new Map();
    private lastCleanup: number;

    constructor(
        private windowMs: number = 60000,
        now: number = Date.now(),
    ) {
        this.lastCleanup = now;
    }

    async isBlocked(ip: string, now: number): Promise<boolean> {
        return this.getBlock(ip, now) !== undefined;
    }

    async getBlockReason(ip: string, now: number): Promise<string | null> {
        return this.getBlock(ip, now)?.reason ?? null;
    }

    /** Active block for ip, if any. Expired entries are removed on read. */
    getBlock(ip: string, now: number): BlockEntry | undefined {
        const entry = this.blocks.get(ip);
        if (!entry) return undefined;

        if (now >= entry.expiresAt) {
            this.blocks.delete(ip);
            return undefined;
        }
        return entry;
    }

    async block(entry: BlockEntry): Promise<void> {
        this.blocks.set(entry.ip, { ...entry });
    }

    async unblock(ip: string): Promise<void> {
        this.blocks.delete(ip);
    }

    async increment(key: ClientKey, now: number): Promise<number> {
        if (now - this.lastCleanup > this.windowMs) {
            this.cleanup(now);
        }

        const counterKey = `${key.ip}|${key.endpoint}`;
        const timestamps = this.counters.get(counterKey) || [];
        timestamps.push(now);
        this.counters.set(counterKey, timestamps);

        const windowStart = this.windowStart(now);
        return timestamps.filter(t => t >= windowStart).length;
    }

    /** Drop every timestamp older than the current window, and expired blocks. */
    cleanup(now: number): void {
        this.lastCleanup = now;
        const windowStart = this.windowStart(now);

        for (const [ip, entry] of this.blocks) {
            if (now >= entry.expiresAt) this.blocks.delete(ip);
        }

        for (const [key, timestamps] of this.counters) {
            const current = timestamps.filter(t => t >= windowStart);
            if (current.length === 0) {
                this.counters.delete(key);
            } else {
                this.counters.set(key, current);
            }
        }
    }

    /** Number of client+endpoint pairs currently tracked */
    trackedKeys(): number {
        return this.counters.size;
    }

    /** Number of block entries held, expired ones included until cleanup */
    trackedBlocks(): number {
        return this.blocks.size;
    }

    private windowStart(now: number): number {
        return Math.floor(now / this.windowMs) * this.windowMs;
    }
}
