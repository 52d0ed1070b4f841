import { describe, it, expect, beforeEach } from 'vitest';
import { LoadBalancer, clampWeight } from '../../../src/load-balancers/load-balancer';
import { UnsupportedStrategyError } from '../../../src/utils/errors';

describe('clampWeight', () => {
    it('keeps weights within 1..10', () => {
        expect(clampWeight(25)).toBe(10);
        expect(clampWeight(0)).toBe(1);
        expect(clampWeight(-3)).toBe(1);
        expect(clampWeight(2.6)).toBe(3);
        expect(clampWeight(Number.NaN)).toBe(1);
    });
});

describe('LoadBalancer', () => {
    let balancer: LoadBalancer;

    beforeEach(async () => {
        balancer = new LoadBalancer();
        await balancer.addNode('a', 'http://a:3001');
        await balancer.addNode('b', 'http://b:3002');
        await balancer.addNode('c', 'http://c:3003');
    });

    describe('registry', () => {
        it('registers nodes as healthy with no history', () => {
            expect(balancer.getNode('a')).toEqual({
                id: 'a',
                url: 'http://a:3001',
                weight: 1,
                activeConnections: 0,
                lastResponseTime: 0,
                lastHealthCheck: null,
                isHealthy: true,
            });
            expect(balancer.size()).toBe(3);
        });

        it('clamps the weight given at registration', async () => {
            await balancer.addNode('d', 'http://d:3004', 50);
            expect(balancer.getNode('d')?.weight).toBe(10);
        });

        it('replaces a node in place when its id is added again', async () => {
            await balancer.updateNodeStatus('a', { isHealthy: false });
            await balancer.addNode('a', 'http://a2:4001', 2);

            expect(Object.keys(balancer.getNodeStatus())).toEqual(['a', 'b', 'c']);
            expect(balancer.getNode('a')).toMatchObject({ url: 'http://a2:4001', weight: 2, isHealthy: true });
        });

        it('removes nodes and ignores unknown ids', async () => {
            await balancer.removeNode('b');
            await balancer.removeNode('missing');
            expect(Object.keys(balancer.getNodeStatus())).toEqual(['a', 'c']);
        });

        it('reports status per node', async () => {
            await balancer.acquireConnection('b');
            const status = balancer.getNodeStatus();

            expect(status.b).toEqual({
                url: 'http://b:3002',
                healthy: true,
                connections: 1,
                responseTime: 0,
                lastCheck: null,
            });
        });
    });

    describe('selection', () => {
        it('uses round robin by default', async () => {
            const picks: (string | undefined)[] = [];
            for (let i = 0; i < 4; i++) picks.push((await balancer.getNextNode())?.id);
            expect(picks).toEqual(['a', 'b', 'c', 'a']);
        });

        it('skips unhealthy nodes', async () => {
            await balancer.updateNodeStatus('b', { isHealthy: false });
            const picks: (string | undefined)[] = [];
            for (let i = 0; i < 4; i++) picks.push((await balancer.getNextNode())?.id);
            expect(picks).toEqual(['a', 'c', 'a', 'c']);
        });

        it('returns null when no node is healthy', async () => {
            for (const id of ['a', 'b', 'c']) {
                await balancer.updateNodeStatus(id, { isHealthy: false });
            }
            expect(await balancer.getNextNode()).toBeNull();
            expect(await balancer.getNextNode('weighted')).toBeNull();
        });

        it('returns null for an empty registry', async () => {
            expect(await new LoadBalancer().getNextNode()).toBeNull();
        });

        it('rejects unknown strategies even with no nodes', async () => {
            await expect(new LoadBalancer().getNextNode('random')).rejects.toBeInstanceOf(UnsupportedStrategyError);
        });

        it('rejects an unknown default strategy', () => {
            expect(() => new LoadBalancer('fastest')).toThrow(UnsupportedStrategyError);
        });

        it('hands out copies', async () => {
            const picked = await balancer.getNextNode();
            if (!picked) throw new Error('expected a node');
            picked.isHealthy = false;
            picked.weight = 9;

            expect(balancer.getNode(picked.id)).toMatchObject({ isHealthy: true, weight: 1 });
        });

        it('serialises concurrent selections', async () => {
            const picks = await Promise.all(Array.from({ length: 6 }, () => balancer.getNextNode()));
            const counts: Record<string, number> = {};
            for (const picked of picks) {
                if (picked) counts[picked.id] = (counts[picked.id] ?? 0) + 1;
            }
            expect(counts).toEqual({ a: 2, b: 2, c: 2 });
        });

        it('follows connection counts for least_connections', async () => {
            await balancer.acquireConnection('a');
            await balancer.acquireConnection('b');
            expect((await balancer.getNextNode('least_connections'))?.id).toBe('c');

            await balancer.releaseConnection('a');
            expect((await balancer.getNextNode('least_connections'))?.id).toBe('a');
        });

        it('follows measured latency for response_time', async () => {
            await balancer.updateMetrics('a', 0.5);
            await balancer.updateMetrics('b', 0.2);
            await balancer.updateMetrics('c', 0.9);
            expect((await balancer.getNextNode('response_time'))?.id).toBe('b');
        });

        it('splits weighted traffic by weight', async () => {
            const weighted = new LoadBalancer('weighted');
            await weighted.addNode('a', 'http://a:3001', 1);
            await weighted.addNode('b', 'http://b:3002', 3);

            const counts: Record<string, number> = { a: 0, b: 0 };
            for (let i = 0; i < 4000; i++) {
                const picked = await weighted.getNextNode();
                if (picked) counts[picked.id]++;
            }
            expect(counts).toEqual({ a: 1000, b: 3000 });
        });
    });

    describe('metrics', () => {
        it('raises the weight of fast nodes up to 10', async () => {
            for (let i = 0; i < 12; i++) await balancer.updateMetrics('a', 0.05);
            expect(balancer.getNode('a')).toMatchObject({ weight: 10, lastResponseTime: 0.05 });
        });

        it('lowers the weight of slow nodes down to 1', async () => {
            await balancer.addNode('d', 'http://d:3004', 3);
            await balancer.updateMetrics('d', 1.5);
            expect(balancer.getNode('d')?.weight).toBe(2);

            await balancer.updateMetrics('d', 2);
            await balancer.updateMetrics('d', 2);
            expect(balancer.getNode('d')?.weight).toBe(1);
        });

        it('leaves the weight alone between the thresholds', async () => {
            await balancer.updateMetrics('a', 0.1);
            await balancer.updateMetrics('a', 1.0);
            expect(balancer.getNode('a')).toMatchObject({ weight: 1, lastResponseTime: 1.0 });
        });

        it('ignores metrics for unknown nodes', async () => {
            await balancer.updateMetrics('missing', 0.01);
            expect(balancer.getNode('missing')).toBeUndefined();
        });
    });

    describe('status updates', () => {
        it('applies only the fields given', async () => {
            await balancer.updateNodeStatus('a', { connections: 4 });
            expect(balancer.getNode('a')).toMatchObject({ isHealthy: true, activeConnections: 4, lastResponseTime: 0 });

            await balancer.updateNodeStatus('a', { responseTime: 0.25 });
            expect(balancer.getNode('a')).toMatchObject({ activeConnections: 4, lastResponseTime: 0.25 });
        });

        it('stamps the check time', async () => {
            await balancer.updateNodeStatus('a', {});
            expect(balancer.getNode('a')?.lastHealthCheck).toBeInstanceOf(Date);
            expect(balancer.getNodeStatus().a.lastCheck).toEqual(expect.any(String));
        });

        it('never lets connections go negative', async () => {
            await balancer.updateNodeStatus('a', { connections: -2 });
            await balancer.releaseConnection('b');
            expect(balancer.getNode('a')?.activeConnections).toBe(0);
            expect(balancer.getNode('b')?.activeConnections).toBe(0);
        });

        it('brings a recovered node back into a fixed rotation', async () => {
            expect((await balancer.getNextNode())?.id).toBe('a');

            await balancer.updateNodeStatus('b', { isHealthy: false });
            expect((await balancer.getNextNode())?.id).toBe('c');

            await balancer.updateNodeStatus('b', { isHealthy: true });
            const picks: (string | undefined)[] = [];
            for (let i = 0; i < 6; i++) picks.push((await balancer.getNextNode())?.id);
            expect(picks).toEqual(['a', 'b', 'c', 'a', 'b', 'c']);
        });
    });
});
