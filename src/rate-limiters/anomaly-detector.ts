import type { IncomingHttpHeaders } from 'http';
import type { RequestInfo } from './types';

// =================================================================
// ANOMALY DETECTOR
// =================================================================
//
// Cheap heuristic for scripted clients. Four signals:
//
//   (a) burst       ≥10 earlier requests to this endpoint in 1s
//   (b) user agent  missing, empty, or a bare HTTP client token
//   (c) accept      Accept header missing
//   (d) forwarding  X-Forwarded-For present and ≠ connecting IP
//
// Two or more signals → suspicious. One alone is normal noise
// (plenty of real clients send no Accept header).
//
// This is NOT authentication. False positives are expected; the
// limiter only blocks after repeated hits.
// =================================================================

const BURST_WINDOW_MS = 1000;
const BURST_THRESHOLD = 10;
const SIGNALS_REQUIRED = 2;

const GENERIC_USER_AGENTS = new Set([
    'curl',
    'wget',
    'python-requests',
    'python-urllib',
    'python-httpx',
    'aiohttp',
    'go-http-client',
    'axios',
    'node-fetch',
    'undici',
    'okhttp',
    'java',
    'libwww-perl',
]);

export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() !== wanted || value === undefined) continue;
        return Array.isArray(value) ? value.join(', ') : value;
    }
    return undefined;
}

/**
 * "curl/8.4.0" and "python-requests" are generic,
 * "Mozilla/5.0 (X11; Linux x86_64)" is not.
 */
export function isGenericUserAgent(userAgent: string | undefined): boolean {
    if (userAgent === undefined) return true;

    const ua = userAgent.trim().toLowerCase();
    if (ua === '') return true;
    if (/\s/.test(ua)) return false;

    const product = ua.split('/')[0];
    return GENERIC_USER_AGENTS.has(product);
}

/**
 * Per (ip, endpoint) timestamps of the last second, kept regardless of
 * which counter backend is serving quotas.
 */
export class RequestHistory {
    private entries: Map<string, number[]> = new Map();
    private lastSweep = 0;

    constructor(private windowMs: number = BURST_WINDOW_MS) {}

    countSince(ip: string, endpoint: string, now: number): number {
        const timestamps = this.entries.get(this.key(ip, endpoint));
        if (!timestamps) return 0;
        return timestamps.filter(t => now - t < this.windowMs).length;
    }

    record(ip: string, endpoint: string, now: number): void {
        const key = this.key(ip, endpoint);
        const recent = (this.entries.get(key) || []).filter(t => now - t < this.windowMs);
        recent.push(now);
        this.entries.set(key, recent);

        // Drop idle clients once in a while so the map doesn't grow forever
        if (now - this.lastSweep > this.windowMs * 60) {
            this.sweep(now);
        }
    }

    size(): number {
        return this.entries.size;
    }

    private sweep(now: number): void {
        this.lastSweep = now;
        for (const [key, timestamps] of this.entries) {
            if (timestamps.every(t => now - t >= this.windowMs)) {
                this.entries.delete(key);
            }
        }
    }

    private key(ip: string, endpoint: string): string {
        return `${ip}|${endpoint}`;
    }
}

export class AnomalyDetector {
    /**
     * @param recentRequests requests already seen for (ip, endpoint) in the last second
     */
    isSuspicious(request: RequestInfo, recentRequests: number): boolean {
        const { ip, headers } = request;
        const forwardedFor = headerValue(headers, 'x-forwarded-for');

        const signals = [
            recentRequests >= BURST_THRESHOLD,
            isGenericUserAgent(headerValue(headers, 'user-agent')),
            headerValue(headers, 'accept') === undefined,
            forwardedFor !== undefined && forwardedFor.trim() !== ip,
        ];

        return signals.filter(Boolean).length >= SIGNALS_REQUIRED;
    }
}
