// =================================================================
// GATEWAY ERRORS
// =================================================================
// Only configuration problems are thrown. Store outages degrade to
// the local fallback, rejections are plain decisions, and "no
// healthy node" is a null — none of those are exceptions.
// =================================================================

export class GatewayError extends Error {
    constructor(
        message: string,
        public readonly code: string,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class UnsupportedStrategyError extends GatewayError {
    constructor(public readonly strategy: string) {
        super(`Unsupported load balancing strategy: ${strategy}`, 'UNSUPPORTED_STRATEGY');
    }
}

export class ConfigError extends GatewayError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIG');
    }
}

/**
 * Human-readable message for anything caught in a catch block.
 */
export function extractErrorMessage(error: unknown, fallback = 'Unknown error'): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return fallback;
}
