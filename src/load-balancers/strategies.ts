import { UnsupportedStrategyError } from '../utils/errors';
import { LeastConnectionsSelector } from './least-connections';
import { ResponseTimeSelector } from './response-time';
import { RoundRobinSelector } from './round-robin';
import { STRATEGY_NAMES, type LoadBalancingStrategy, type NodeSelector } from './types';
import { WeightedSelector } from './weighted';

const KNOWN_STRATEGIES: ReadonlySet<string> = new Set(STRATEGY_NAMES);

export function isStrategy(name: string): name is LoadBalancingStrategy {
    return KNOWN_STRATEGIES.has(name);
}

/** Validate a strategy name coming from config, an API call, etc. */
export function parseStrategy(name: string): LoadBalancingStrategy {
    if (!isStrategy(name)) {
        throw new UnsupportedStrategyError(name);
    }
    return name;
}

/** One fresh selector per strategy. Cursor state is per balancer. */
export function createSelectors(): Record<LoadBalancingStrategy, NodeSelector> {
    return {
        round_robin: new RoundRobinSelector(),
        least_connections: new LeastConnectionsSelector(),
        weighted: new WeightedSelector(),
        response_time: new ResponseTimeSelector(),
    };
}
