// =================================================================
// MIDDLEWARE TYPES
// =================================================================
//
// Every middleware receives a GatewayContext and a next() function.
//
// GatewayContext carries data between middleware:
//   - The Express req/res
//   - The client IP (resolved once, used by the rate limiter)
//   - Selected node (set by the load-balance middleware)
//   - Decision metadata for logs and response headers
//
// next() passes control to the next middleware in the chain.
// If a middleware doesn't call next(), the chain stops.
// This is how rate limiting rejects requests — it never calls next().
// =================================================================

import type { Request, Response } from 'express';
import type { ServiceNode } from '../load-balancers/types';
import type { RejectionReason } from '../rate-limiters/types';

export interface GatewayMeta {
    rateLimited?: RejectionReason;
    strategy?: string;
    noHealthyNode?: boolean;
    upstreamStatus?: number;
    upstreamError?: 'timeout' | 'connection';
}

export interface GatewayContext {
    req: Request;
    res: Response;
    startTime: number;

    clientIp: string;
    node?: ServiceNode;

    meta: GatewayMeta;
}

export type NextFunction = () => Promise<void>;

export interface GatewayMiddleware {
    name: string;
    handle(ctx: GatewayContext, next: NextFunction): Promise<void>;
}
