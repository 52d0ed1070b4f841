import type { NodeSelector, ServiceNode } from './types';

// =================================================================
// WEIGHTED (cumulative weight)
// =================================================================
//
// Servers with higher weight get proportionally more traffic.
//
//   A (weight 1)  covers slot  1
//   B (weight 3)  covers slots 2..4
//
//   pointer: 0 1 2 3 4 5 6 7 ...
//   target:  1 2 3 4 1 2 3 4 ...   (pointer mod total) + 1
//   node:    A B B B A B B B ...
//
// Walk the nodes in registry order adding up weights; the first
// node whose running total reaches the target wins.
//
// No expanded list to rebuild: weights change on every metrics
// update, and nodes come and go. The pointer just keeps advancing
// and is re-read against whatever the weights are NOW.
// =================================================================

export class WeightedSelector implements NodeSelector {
    name = 'weighted' as const;
    private pointer = 0;

    select(healthy: readonly ServiceNode[]): ServiceNode | null {
        if (healthy.length === 0) return null;

        const totalWeight = healthy.reduce((sum, node) => sum + node.weight, 0);
        if (totalWeight <= 0) return null;

        const target = (this.pointer % totalWeight) + 1;
        this.pointer = (this.pointer + 1) % Number.MAX_SAFE_INTEGER;

        let cumulative = 0;
        for (const node of healthy) {
            cumulative += node.weight;
            if (cumulative >= target) return node;
        }

        return healthy[healthy.length - 1];
    }
}
