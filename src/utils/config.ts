import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type PubCostConfig, type RetryConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Raised when the merged configuration fails validation.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Config as it may appear in a file, env var or CLI flag: every field optional.
 */
export type PartialConfig = Partial<Omit<PubCostConfig, 'retry'>> & {
    retry?: Partial<RetryConfig>;
};

const ConfigSchema = z.object({
    email: z.string().email('email must be a valid contact address'),
    articlesOnly: z.boolean(),
    perPage: z.number().int().min(1).max(200),
    maxWorks: z.number().int().positive('maxWorks must be a positive integer'),
    taxonomyPath: z.string().min(1).optional(),
    cacheDir: z.string().min(1),
    noCache: z.boolean(),
    timeoutMs: z.number().int().positive(),
    retry: z.object({
        maxRetries: z.number().int().min(0),
        initialBackoffMs: z.number().int().min(0),
        maxBackoffMs: z.number().int().min(0),
    }),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    jsonLogs: z.boolean(),
});

/**
 * Load configuration from pubcost.config.json using cosmiconfig.
 * Returns null when no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<object | null> {
    const explorer = cosmiconfig('pubcost', {
        searchPlaces: ['pubcost.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty && typeof result.config === 'object' && result.config !== null) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): PartialConfig {
    const config: PartialConfig = {};

    if (env['OPENALEX_EMAIL']) {
        config.email = env['OPENALEX_EMAIL'];
    }

    const maxWorks = env['PUBCOST_MAX_WORKS'];
    if (maxWorks) {
        const parsed = Number(maxWorks);
        if (!Number.isInteger(parsed)) {
            throw new ConfigError(`PUBCOST_MAX_WORKS must be an integer, got "${maxWorks}"`);
        }
        config.maxWorks = parsed;
    }

    if (env['PUBCOST_TAXONOMY']) {
        config.taxonomyPath = env['PUBCOST_TAXONOMY'];
    }

    return config;
}

/**
 * Merge and validate configuration layers, later layers winning.
 * Undefined values never override an earlier layer.
 * Precedence used by `resolveConfig`: CLI flags > environment variables > config file > defaults
 */
export function mergeConfig(...layers: Array<object | null>): PubCostConfig {
    const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
    const retry: Record<string, unknown> = { ...DEFAULT_CONFIG.retry };

    for (const layer of layers) {
        if (!layer) continue;
        for (const [key, value] of Object.entries(layer)) {
            if (value === undefined) continue;
            if (key === 'retry' && typeof value === 'object' && value !== null) {
                for (const [retryKey, retryValue] of Object.entries(value)) {
                    if (retryValue !== undefined) retry[retryKey] = retryValue;
                }
                continue;
            }
            merged[key] = value;
        }
    }
    merged['retry'] = retry;

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${msg}`);
    }
    return parsed.data;
}

/**
 * Resolve the effective configuration for a run.
 */
export async function resolveConfig(cliFlags: PartialConfig): Promise<PubCostConfig> {
    const fileConfig = await loadConfigFile();
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
