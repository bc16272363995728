import type { LogLevel } from '../types/index.js';
import type { PartialConfig } from '../utils/config.js';

/**
 * Flags shared by the commands that reach OpenAlex. Unset flags stay
 * undefined so the config file and environment can supply them.
 */
export interface CommonOptions {
    email?: string;
    logLevel?: string;
    jsonLogs?: boolean;
    cache: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new Error(`--log-level must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
    }
    return level;
}

export function parseIntOption(value: string | undefined, flag: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new Error(`${flag} must be an integer, got "${value}"`);
    }
    return parsed;
}

/**
 * CLI layer of the config: only the flags the user actually passed.
 */
export function commonFlags(opts: CommonOptions): PartialConfig {
    return {
        email: opts.email,
        logLevel: opts.logLevel === undefined ? undefined : parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
        noCache: opts.cache ? undefined : true,
    };
}
