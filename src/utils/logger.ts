// =================================================================
// LOGGER
// =================================================================
// Structured console logger, one prefix per module:
//
//   [2025-01-01T12:00:00.000Z] WARN  [rate-limiter] IP blocked {"ip":"10.0.0.1"}
//
// The level is process-wide. It starts from LOG_LEVEL and can be
// changed at runtime (the server applies the validated config).
// =================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL ?? 'info';
let currentLevel: number = isLogLevel(envLevel) ? LOG_LEVELS[envLevel] : LOG_LEVELS.info;

export function setLogLevel(level: LogLevel): void {
    currentLevel = LOG_LEVELS[level];
}

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= currentLevel;
}

function format(level: LogLevel, prefix: string, message: string, meta?: LogMeta): string {
    const line = `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;
    return meta ? `${line} ${JSON.stringify(meta)}` : line;
}

export function createLogger(module: string): Logger {
    const prefix = `[${module}]`;

    return {
        debug: (message, meta) => {
            if (shouldLog('debug')) console.log(format('debug', prefix, message, meta));
        },
        info: (message, meta) => {
            if (shouldLog('info')) console.log(format('info', prefix, message, meta));
        },
        warn: (message, meta) => {
            if (shouldLog('warn')) console.warn(format('warn', prefix, message, meta));
        },
        error: (message, meta) => {
            if (shouldLog('error')) console.error(format('error', prefix, message, meta));
        },
    };
}
