/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Token bucket settings for one rate-limit group.
 */
export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * HTTP transport configuration used by the download manager.
 */
export interface HttpConfig {
    timeoutMs: number;
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    userAgent: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface BiostrataConfig {
    // Cache
    cacheDir: string;
    forceRefresh: boolean;
    /** Hours a cached download is trusted before it is revalidated against the remote. */
    revalidateAfterHours: number;
    useBronze: boolean;

    // Mapping
    strict: boolean;

    // Network
    http: HttpConfig;
    rateLimits: Record<string, RateLimit>;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BiostrataConfig = {
    cacheDir: '.biostrata-cache',
    forceRefresh: false,
    revalidateAfterHours: 24,
    useBronze: true,
    strict: false,
    http: {
        timeoutMs: 60000,
        maxRetries: 3,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
        userAgent: 'biostrata/0.1.0',
    },
    rateLimits: {
        default: { tokensPerSecond: 5, maxBurst: 5 },
    },
    logLevel: 'info',
    jsonLogs: false,
};
