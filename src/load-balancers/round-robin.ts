import type { NodeSelector, ServiceNode } from './types';

// =================================================================
// ROUND ROBIN
// =================================================================
//
// Rotate through healthy nodes in registry order:
//
//   Request 1 → A
//   Request 2 → B
//   Request 3 → C
//   Request 4 → A (wraps around)
//
// The cursor is taken modulo the CURRENT healthy count, so a node
// going down and coming back never breaks the rotation: any n
// consecutive calls over n healthy nodes hit each exactly once.
// =================================================================

export class RoundRobinSelector implements NodeSelector {
    name = 'round_robin' as const;
    private cursor = 0;

    select(healthy: readonly ServiceNode[]): ServiceNode | null {
        if (healthy.length === 0) return null;

        const node = healthy[this.cursor % healthy.length];
        this.cursor = (this.cursor + 1) % healthy.length;

        return node;
    }
}
