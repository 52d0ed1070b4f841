import { Mutex } from 'async-mutex';
import { createLogger } from '../utils/logger';
import { createSelectors, parseStrategy } from './strategies';
import {
    MAX_WEIGHT,
    MIN_WEIGHT,
    type LoadBalancingStrategy,
    type NodeSelector,
    type NodeStatus,
    type NodeStatusUpdate,
    type ServiceNode,
} from './types';

const log = createLogger('load-balancer');

// =================================================================
// LOAD BALANCER — node registry + strategy selection
// =================================================================
//
// Owns every ServiceNode. Nothing outside this class mutates a node;
// callers get copies.
//
// ONE mutex guards registration, selection and every update.
// Selection advances cursor state (round robin, weighted), so two
// concurrent selections must not interleave with each other or
// with a registry change.
//
// Adaptive weights:
//   response < 0.1s  → weight + 1 (max 10)
//   response > 1.0s  → weight - 1 (min 1)
//   in between       → unchanged
//
// Unknown node ids are ignored by every update — a late metrics
// report for a node that was just removed is not an error.
// =================================================================

const FAST_RESPONSE_SECONDS = 0.1;
const SLOW_RESPONSE_SECONDS = 1.0;

export function clampWeight(weight: number): number {
    if (!Number.isFinite(weight)) return MIN_WEIGHT;
    return Math.min(MAX_WEIGHT, Math.max(MIN_WEIGHT, Math.round(weight)));
}

export class LoadBalancer {
    private nodes: Map<string, ServiceNode> = new Map();
    private selectors: Record<LoadBalancingStrategy, NodeSelector> = createSelectors();
    private lock = new Mutex();
    readonly defaultStrategy: LoadBalancingStrategy;

    constructor(defaultStrategy: string = 'round_robin') {
        this.defaultStrategy = parseStrategy(defaultStrategy);
    }

    async addNode(id: string, url: string, weight: number = 1): Promise<void> {
        await this.lock.runExclusive(() => {
            const replaced = this.nodes.has(id);
            this.nodes.set(id, {
                id,
                url,
                weight: clampWeight(weight),
                activeConnections: 0,
                lastResponseTime: 0,
                lastHealthCheck: null,
                isHealthy: true,
            });
            log.info(replaced ? 'Node replaced' : 'Node added', { id, url, weight: clampWeight(weight) });
        });
    }

    async removeNode(id: string): Promise<void> {
        await this.lock.runExclusive(() => {
            if (this.nodes.delete(id)) {
                log.info('Node removed', { id });
            }
        });
    }

    /**
     * Next node under `strategy`, or null when no node is healthy.
     * Throws UnsupportedStrategyError for an unknown strategy name.
     */
    async getNextNode(strategy: string = this.defaultStrategy): Promise<ServiceNode | null> {
        const selector = this.selectors[parseStrategy(strategy)];

        return this.lock.runExclusive(() => {
            const healthy = [...this.nodes.values()].filter(n => n.isHealthy);
            const node = selector.select(healthy);
            return node ? { ...node } : null;
        });
    }

    async updateMetrics(id: string, responseTime: number): Promise<void> {
        await this.lock.runExclusive(() => {
            const node = this.nodes.get(id);
            if (!node) return;

            node.lastResponseTime = Math.max(0, responseTime);

            if (responseTime < FAST_RESPONSE_SECONDS) {
                node.weight = Math.min(node.weight + 1, MAX_WEIGHT);
            } else if (responseTime > SLOW_RESPONSE_SECONDS) {
                node.weight = Math.max(node.weight - 1, MIN_WEIGHT);
            }
        });
    }

    async updateNodeStatus(id: string, update: NodeStatusUpdate): Promise<void> {
        await this.lock.runExclusive(() => {
            const node = this.nodes.get(id);
            if (!node) return;

            if (update.isHealthy !== undefined) {
                if (node.isHealthy !== update.isHealthy) {
                    log.info(`Node ${update.isHealthy ? 'HEALTHY' : 'DOWN'}`, { id });
                }
                node.isHealthy = update.isHealthy;
            }
            if (update.responseTime !== undefined) {
                node.lastResponseTime = Math.max(0, update.responseTime);
            }
            if (update.connections !== undefined) {
                node.activeConnections = Math.max(0, Math.floor(update.connections));
            }
            node.lastHealthCheck = new Date();
        });
    }

    /** Count a request forwarded to `id` (for least_connections). */
    async acquireConnection(id: string): Promise<void> {
        await this.lock.runExclusive(() => {
            const node = this.nodes.get(id);
            if (node) node.activeConnections++;
        });
    }

    async releaseConnection(id: string): Promise<void> {
        await this.lock.runExclusive(() => {
            const node = this.nodes.get(id);
            if (node) node.activeConnections = Math.max(0, node.activeConnections - 1);
        });
    }

    getNodeStatus(): Record<string, NodeStatus> {
        const status: Record<string, NodeStatus> = {};
        for (const [id, node] of this.nodes) {
            status[id] = {
                url: node.url,
                healthy: node.isHealthy,
                connections: node.activeConnections,
                responseTime: node.lastResponseTime,
                lastCheck: node.lastHealthCheck ? node.lastHealthCheck.toISOString() : null,
            };
        }
        return status;
    }

    getNode(id: string): ServiceNode | undefined {
        const node = this.nodes.get(id);
        return node ? { ...node } : undefined;
    }

    size(): number {
        return this.nodes.size;
    }
}
