import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { MiddlewarePipeline } from '../../../src/middleware/pipeline';
import type { GatewayContext, GatewayMiddleware, NextFunction } from '../../../src/middleware/types';

function recorder(name: string, calls: string[], stop = false): GatewayMiddleware {
    return {
        name,
        async handle(ctx: GatewayContext, next: NextFunction) {
            calls.push(name);
            if (stop) {
                ctx.res.status(418).json({ stoppedBy: name });
                return;
            }
            await next();
        },
    };
}

function appFor(pipeline: MiddlewarePipeline): express.Express {
    const app = express();
    app.all('/{*path}', async (req, res) => {
        await pipeline.execute(req, res);
        if (!res.headersSent) res.status(204).end();
    });
    return app;
}

describe('MiddlewarePipeline', () => {
    it('runs middleware in registration order', async () => {
        const calls: string[] = [];
        const pipeline = new MiddlewarePipeline()
            .use(recorder('first', calls))
            .use(recorder('second', calls))
            .use(recorder('third', calls));

        await request(appFor(pipeline)).get('/anything').expect(204);

        expect(calls).toEqual(['first', 'second', 'third']);
        expect(pipeline.getMiddlewareNames()).toEqual(['first', 'second', 'third']);
    });

    it('stops when a middleware does not call next', async () => {
        const calls: string[] = [];
        const pipeline = new MiddlewarePipeline()
            .use(recorder('first', calls))
            .use(recorder('gate', calls, true))
            .use(recorder('never', calls));

        const res = await request(appFor(pipeline)).get('/anything');

        expect(res.status).toBe(418);
        expect(res.body).toEqual({ stoppedBy: 'gate' });
        expect(calls).toEqual(['first', 'gate']);
    });

    it('answers 500 when a middleware throws', async () => {
        const pipeline = new MiddlewarePipeline().use({
            name: 'broken',
            async handle() {
                throw new Error('boom');
            },
        });

        const res = await request(appFor(pipeline)).get('/anything');

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ error: 'Internal Gateway Error', middleware: 'broken', message: 'boom' });
    });

    it('resolves the client ip once for every middleware', async () => {
        const seen: string[] = [];
        const pipeline = new MiddlewarePipeline().use({
            name: 'ip',
            async handle(ctx: GatewayContext, next: NextFunction) {
                seen.push(ctx.clientIp);
                await next();
            },
        });

        await request(appFor(pipeline)).get('/anything').expect(204);

        expect(seen).toHaveLength(1);
        expect(seen[0]).toMatch(/127\.0\.0\.1$/);
    });
});
