/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Retry policy for the HTTP client.
 */
export interface RetryConfig {
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
}

/**
 * Full pubcost configuration merged from CLI flags, env vars, and config file.
 */
export interface PubCostConfig {
    // Source
    /** Contact address sent as `mailto` to OpenAlex */
    email: string;
    articlesOnly: boolean;
    perPage: number;

    // Analysis
    /** Most recent works analysed per run */
    maxWorks: number;
    /** Taxonomy JSON; the bundled data/taxonomy.json when unset */
    taxonomyPath?: string;

    // Cache
    cacheDir: string;
    noCache: boolean;

    // HTTP
    timeoutMs: number;
    retry: RetryConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PubCostConfig = {
    email: 'pubcost@example.com',
    articlesOnly: true,
    perPage: 200,
    maxWorks: 2000,
    cacheDir: '.pubcost-cache',
    noCache: false,
    timeoutMs: 30000,
    retry: {
        maxRetries: 3,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
    },
    logLevel: 'info',
    jsonLogs: false,
};
