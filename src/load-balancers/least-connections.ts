import type { NodeSelector, ServiceNode } from './types';

// =================================================================
// LEAST CONNECTIONS
// =================================================================
//
// Send each request to the node with the fewest ACTIVE connections.
//
//   Node A: 5 active requests
//   Node B: 2 active requests  ← PICK THIS
//   Node C: 8 active requests
//
// A slow node holds on to its connections longer, so it naturally
// gets less new traffic. Ties go to the node registered first.
//
// Connection counts live on the node itself (acquire/release in
// the balancer, or pushed in by a health reporter).
// =================================================================

export class LeastConnectionsSelector implements NodeSelector {
    name = 'least_connections' as const;

    select(healthy: readonly ServiceNode[]): ServiceNode | null {
        if (healthy.length === 0) return null;

        let minNode = healthy[0];
        for (const node of healthy) {
            if (node.activeConnections < minNode.activeConnections) {
                minNode = node;
            }
        }
        return minNode;
    }
}
