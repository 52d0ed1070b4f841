import http from 'http';
import https from 'https';
import { createLogger } from '../utils/logger';
import { extractErrorMessage } from '../utils/errors';
import type { LoadBalancer } from './load-balancer';

const log = createLogger('health-checker');

// =================================================================
// HEALTH CHECKER — active probing of registered nodes
// =================================================================
//
// Every interval: GET <node.url><healthPath> on every node.
//
//   2xx                → healthy now, probe latency recorded
//   error/timeout/5xx  → failures++; DOWN once failures ≥ threshold
//
// One blip doesn't pull a node out of rotation, but one good probe
// puts it back. Probes run in parallel and never throw.
// =================================================================

export interface ProbeResult {
    ok: boolean;
    statusCode?: number;
    elapsedMs: number;
}

export type Probe = (url: string, timeoutMs: number) => Promise<ProbeResult>;

export interface HealthCheckerOptions {
    intervalMs?: number;
    timeoutMs?: number;
    healthPath?: string;
    failureThreshold?: number;
    probe?: Probe;
}

export const httpProbe: Probe = (url, timeoutMs) => {
    const startTime = Date.now();

    return new Promise<ProbeResult>((resolve, reject) => {
        const onResponse = (res: http.IncomingMessage) => {
            res.resume(); // Drain — the body doesn't matter
            const statusCode = res.statusCode ?? 0;
            resolve({
                ok: statusCode >= 200 && statusCode < 300,
                statusCode,
                elapsedMs: Date.now() - startTime,
            });
        };

        const req = url.startsWith('https:')
            ? https.get(url, { timeout: timeoutMs }, onResponse)
            : http.get(url, { timeout: timeoutMs }, onResponse);

        req.on('timeout', () => {
            req.destroy(new Error(`Health probe timed out after ${timeoutMs}ms`));
        });
        req.on('error', reject);
    });
};

export class HealthChecker {
    private failures: Map<string, number> = new Map();
    private timer?: NodeJS.Timeout;
    private running = false;

    private intervalMs: number;
    private timeoutMs: number;
    private healthPath: string;
    private failureThreshold: number;
    private probe: Probe;

    constructor(
        private balancer: LoadBalancer,
        options: HealthCheckerOptions = {},
    ) {
        this.intervalMs = options.intervalMs ?? 30000;
        this.timeoutMs = options.timeoutMs ?? 5000;
        this.healthPath = options.healthPath ?? '/health';
        this.failureThreshold = options.failureThreshold ?? 3;
        this.probe = options.probe ?? httpProbe;
    }

    start(): void {
        if (this.timer || this.intervalMs <= 0) return;

        this.timer = setInterval(() => {
            this.tick().catch((err: unknown) => {
                log.error('Health check round failed', { error: extractErrorMessage(err) });
            });
        }, this.intervalMs);
        this.timer.unref();

        log.info('Health checks started', { intervalMs: this.intervalMs, path: this.healthPath });
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    /** One probe round over every registered node. */
    async checkAll(): Promise<void> {
        const nodes = Object.entries(this.balancer.getNodeStatus());

        // Forget nodes that were deregistered
        for (const id of this.failures.keys()) {
            if (!nodes.some(([nodeId]) => nodeId === id)) this.failures.delete(id);
        }

        await Promise.all(nodes.map(([id, status]) => this.checkNode(id, status.url)));
    }

    getFailureCount(id: string): number {
        return this.failures.get(id) || 0;
    }

    private async tick(): Promise<void> {
        // Skip a round rather than pile up when probes are slow
        if (this.running) return;
        this.running = true;
        try {
            await this.checkAll();
        } finally {
            this.running = false;
        }
    }

    private async checkNode(id: string, baseUrl: string): Promise<void> {
        const url = baseUrl.replace(/\/+$/, '') + this.healthPath;

        let result: ProbeResult;
        try {
            result = await this.probe(url, this.timeoutMs);
        } catch (err) {
            log.debug('Health probe error', { id, url, error: extractErrorMessage(err) });
            result = { ok: false, elapsedMs: this.timeoutMs };
        }

        if (result.ok) {
            this.failures.set(id, 0);
            await this.balancer.updateNodeStatus(id, {
                isHealthy: true,
                responseTime: result.elapsedMs / 1000,
            });
            return;
        }

        const failures = (this.failures.get(id) || 0) + 1;
        this.failures.set(id, failures);

        if (failures >= this.failureThreshold) {
            log.warn('Node failed health checks', { id, url, failures, statusCode: result.statusCode });
            await this.balancer.updateNodeStatus(id, { isHealthy: false });
        } else {
            await this.balancer.updateNodeStatus(id, {});
        }
    }
}
