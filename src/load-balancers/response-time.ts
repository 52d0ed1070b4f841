import type { NodeSelector, ServiceNode } from './types';

// =================================================================
// RESPONSE TIME
// =================================================================
//
// Pick the node that answered fastest last time.
//
// A node that was never measured (lastResponseTime = 0) counts as
// infinitely slow: any measured node beats it. If NOTHING has been
// measured yet, the first healthy node gets the traffic, which
// produces the first measurement.
// =================================================================

function effectiveResponseTime(node: ServiceNode): number {
    return node.lastResponseTime > 0 ? node.lastResponseTime : Infinity;
}

export class ResponseTimeSelector implements NodeSelector {
    name = 'response_time' as const;

    select(healthy: readonly ServiceNode[]): ServiceNode | null {
        if (healthy.length === 0) return null;

        let fastest = healthy[0];
        for (const node of healthy) {
            if (effectiveResponseTime(node) < effectiveResponseTime(fastest)) {
                fastest = node;
            }
        }
        return fastest;
    }
}
