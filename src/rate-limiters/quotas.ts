// =================================================================
// ENDPOINT QUOTAS — requests per client per window
// =================================================================
// Resource-heavy endpoints get less, health checks get more.
// Anything not listed falls back to the default.
// =================================================================

export const DEFAULT_QUOTA = 60;

export const ENDPOINT_QUOTAS: Readonly<Record<string, number>> = {
    '/api/analyze': 30,
    '/api/analyze-image': 20,
    '/api/health': 120,
};

export class QuotaTable {
    constructor(
        private defaultQuota: number = DEFAULT_QUOTA,
        private overrides: Readonly<Record<string, number>> = ENDPOINT_QUOTAS,
    ) {}

    quotaFor(endpoint: string): number {
        return Object.hasOwn(this.overrides, endpoint) ? this.overrides[endpoint] : this.defaultQuota;
    }
}
