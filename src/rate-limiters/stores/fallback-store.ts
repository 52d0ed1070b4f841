import { createLogger } from '../../utils/logger';
import { extractErrorMessage } from '../../utils/errors';
import type { BlockEntry, ClientKey, CounterStore } from '../types';
import type { LocalCounterStore } from './local-store';

const log = createLogger('counter-store');

// =================================================================
// FALLBACK COUNTER STORE — try shared, else local
// =================================================================
//
//   isBlocked  → shared OR local (a shared error counts as "no")
//   getBlockReason → shared reason, else local
//   block      → written to BOTH
//   unblock    → removed from BOTH
//   increment  → shared; on error / no shared store → local
//
// Counts from the two backends are NEVER added together. During an
// outage each process counts on its own, so across N replicas a
// client can get up to N× its quota. Availability wins over
// precision: the store being down never rejects a request.
//
// No retries. One failed call = unavailable for that call.
// =================================================================

export class FallbackCounterStore implements CounterStore {
    readonly name = 'fallback';
    private degraded = false;

    constructor(
        private primary: CounterStore | undefined,
        private secondary: LocalCounterStore,
    ) {}

    isDegraded(): boolean {
        return this.primary === undefined || this.degraded;
    }

    async isBlocked(ip: string, now: number): Promise<boolean> {
        if (this.primary) {
            try {
                if (await this.primary.isBlocked(ip, now)) return true;
            } catch (err) {
                this.onPrimaryFailure('isBlocked', err);
            }
        }
        return this.secondary.isBlocked(ip, now);
    }

    async getBlockReason(ip: string, now: number): Promise<string | null> {
        if (this.primary) {
            try {
                const reason = await this.primary.getBlockReason(ip, now);
                if (reason !== null) return reason;
            } catch (err) {
                this.onPrimaryFailure('getBlockReason', err);
            }
        }
        return this.secondary.getBlockReason(ip, now);
    }

    async block(entry: BlockEntry, now: number): Promise<void> {
        if (this.primary) {
            try {
                await this.primary.block(entry, now);
            } catch (err) {
                this.onPrimaryFailure('block', err);
            }
        }
        await this.secondary.block(entry);
    }

    async unblock(ip: string): Promise<void> {
        if (this.primary) {
            try {
                await this.primary.unblock(ip);
            } catch (err) {
                this.onPrimaryFailure('unblock', err);
            }
        }
        await this.secondary.unblock(ip);
    }

    async increment(key: ClientKey, now: number): Promise<number> {
        if (this.primary) {
            try {
                const count = await this.primary.increment(key, now);
                this.onPrimarySuccess();
                return count;
            } catch (err) {
                this.onPrimaryFailure('increment', err);
            }
        }
        return this.secondary.increment(key, now);
    }

    private onPrimaryFailure(operation: string, err: unknown): void {
        if (!this.degraded) {
            log.warn('Shared store unavailable, counting locally', {
                operation,
                error: extractErrorMessage(err),
            });
        } else {
            log.debug('Shared store call failed', { operation, error: extractErrorMessage(err) });
        }
        this.degraded = true;
    }

    private onPrimarySuccess(): void {
        if (this.degraded) {
            log.info('Shared store recovered');
            this.degraded = false;
        }
    }
}
