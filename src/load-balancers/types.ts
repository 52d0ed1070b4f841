export const STRATEGY_NAMES = ['round_robin', 'least_connections', 'weighted', 'response_time'] as const;

export type LoadBalancingStrategy = (typeof STRATEGY_NAMES)[number];

export const MIN_WEIGHT = 1;
export const MAX_WEIGHT = 10;

export interface ServiceNode {
    id: string;
    url: string;
    weight: number; // Always within [MIN_WEIGHT, MAX_WEIGHT]
    activeConnections: number;
    lastResponseTime: number; // Seconds; 0 = never measured
    lastHealthCheck: Date | null;
    isHealthy: boolean;
}

export interface NodeStatus {
    url: string;
    healthy: boolean;
    connections: number;
    responseTime: number;
    lastCheck: string | null;
}

export interface NodeStatusUpdate {
    isHealthy?: boolean;
    responseTime?: number;
    connections?: number;
}

export interface NodeSelector {
    /** Strategy this selector implements */
    name: LoadBalancingStrategy;

    /**
     * Pick one node. `healthy` is already filtered and in registry
     * (insertion) order; it may be empty.
     */
    select(healthy: readonly ServiceNode[]): ServiceNode | null;
}
