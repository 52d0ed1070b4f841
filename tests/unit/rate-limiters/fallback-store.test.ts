import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FallbackCounterStore } from '../../../src/rate-limiters/stores/fallback-store';
import { LocalCounterStore } from '../../../src/rate-limiters/stores/local-store';
import { SharedCounterStore } from '../../../src/rate-limiters/stores/shared-store';
import { MockKeyValueStore } from '../../mocks/kv-store';

const client = { ip: '10.0.0.1', endpoint: '/api/health' };

describe('FallbackCounterStore', () => {
    let kv: MockKeyValueStore;
    let local: LocalCounterStore;
    let store: FallbackCounterStore;
    let now: number;

    beforeEach(() => {
        now = Date.now();
        kv = new MockKeyValueStore();
        local = new LocalCounterStore(60000, now);
        store = new FallbackCounterStore(new SharedCounterStore(kv, 60000), local);
    });

    it('counts in the shared store while it is available', async () => {
        expect(await store.increment(client, now)).toBe(1);
        expect(await store.increment(client, now)).toBe(2);
        expect(local.trackedKeys()).toBe(0);
        expect(store.isDegraded()).toBe(false);
    });

    it('counts locally during an outage without adding shared counts', async () => {
        await store.increment(client, now);
        await store.increment(client, now);

        kv.shouldFail = true;
        expect(await store.increment(client, now)).toBe(1);
        expect(store.isDegraded()).toBe(true);
    });

    it('returns to the shared counter once it recovers', async () => {
        await store.increment(client, now);
        kv.shouldFail = true;
        await store.increment(client, now);

        kv.shouldFail = false;
        expect(await store.increment(client, now)).toBe(2);
        expect(store.isDegraded()).toBe(false);
    });

    it('does not count a request locally when only the TTL update fails', async () => {
        vi.spyOn(kv, 'expire').mockRejectedValueOnce(new Error('EXPIRE failed'));

        expect(await store.increment(client, now)).toBe(1);
        expect(local.trackedKeys()).toBe(0);
        expect(store.isDegraded()).toBe(false);
    });

    it('reads the block reason from either store', async () => {
        await kv.setex('blocked:10.0.0.9', 60, 'set by another replica');
        expect(await store.getBlockReason('10.0.0.9', now)).toBe('set by another replica');

        await store.block({ ip: '10.0.0.1', reason: 'suspicious activity', expiresAt: now + 60000 }, now);
        kv.shouldFail = true;
        expect(await store.getBlockReason('10.0.0.1', now)).toBe('suspicious activity');
        expect(await store.getBlockReason('10.0.0.2', now)).toBeNull();
    });

    it('writes blocks to both stores', async () => {
        await store.block({ ip: '10.0.0.1', reason: 'test', expiresAt: now + 60000 }, now);

        expect(kv.data.has('blocked:10.0.0.1')).toBe(true);
        expect(local.getBlock('10.0.0.1', now)?.reason).toBe('test');
    });

    it('still sees a local block while the shared store is down', async () => {
        await store.block({ ip: '10.0.0.1', reason: 'test', expiresAt: now + 60000 }, now);
        kv.shouldFail = true;

        expect(await store.isBlocked('10.0.0.1', now)).toBe(true);
        expect(await store.isBlocked('10.0.0.2', now)).toBe(false);
    });

    it('records a block locally when the shared write fails', async () => {
        kv.shouldFail = true;
        await store.block({ ip: '10.0.0.1', reason: 'test', expiresAt: now + 60000 }, now);

        expect(await store.isBlocked('10.0.0.1', now)).toBe(true);
    });

    it('honours a block that only the shared store knows', async () => {
        await kv.setex('blocked:10.0.0.9', 60, 'set by another replica');
        expect(await store.isBlocked('10.0.0.9', now)).toBe(true);
    });

    it('removes blocks from both stores', async () => {
        await store.block({ ip: '10.0.0.1', reason: 'test', expiresAt: now + 60000 }, now);
        await store.unblock('10.0.0.1');

        expect(kv.data.has('blocked:10.0.0.1')).toBe(false);
        expect(await store.isBlocked('10.0.0.1', now)).toBe(false);
    });

    it('works with no shared store at all', async () => {
        const localOnly = new FallbackCounterStore(undefined, new LocalCounterStore(60000, now));

        expect(localOnly.isDegraded()).toBe(true);
        expect(await localOnly.increment(client, now)).toBe(1);
        expect(await localOnly.increment(client, now)).toBe(2);
    });
});
