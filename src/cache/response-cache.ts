import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

export const DEFAULT_CACHE_DIR = '.pubcost-cache';

export interface CacheStats {
    enabled: boolean;
    directory: string;
    entries: number;
    bytes: number;
}

/**
 * File-system cache for OpenAlex responses, one JSON file per URL.
 *
 * Cache key = SHA-256 of the full request URL.
 * TTL = 24 hours by default.
 */
export class ResponseCache {
    private readonly cacheDir: string;
    private readonly ttlMs: number;
    private readonly enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR;
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private pathFor(url: string): string {
        const key = createHash('sha256').update(url).digest('hex');
        return join(this.cacheDir, `${key}.json`);
    }

    /**
     * Get a cached response, or null if not found/expired.
     */
    get<T>(url: string): T | null {
        if (!this.enabled) return null;

        const filePath = this.pathFor(url);
        if (!existsSync(filePath)) return null;

        try {
            const entry = JSON.parse(readFileSync(filePath, 'utf-8')) as { timestamp: number; data: T };

            if (Date.now() - entry.timestamp > this.ttlMs) {
                getLogger().debug({ url: url.slice(0, 80) }, 'Cache expired');
                return null;
            }

            getLogger().debug({ url: url.slice(0, 80) }, 'Cache hit');
            return entry.data;
        } catch (error) {
            getLogger().warn({ error, filePath }, 'Ignoring unreadable cache entry');
            return null;
        }
    }

    set<T>(url: string, data: T): void {
        if (!this.enabled) return;

        try {
            const entry = {
                timestamp: Date.now(),
                url: url.replace(/api_key=[^&]+/, 'api_key=***').slice(0, 200),
                data,
            };
            writeFileSync(this.pathFor(url), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Remove every cached entry.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
        }
    }

    getStats(): CacheStats {
        let entries = 0;
        let bytes = 0;
        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                if (!file.endsWith('.json')) continue;
                entries++;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }
        return { enabled: this.enabled, directory: this.cacheDir, entries, bytes };
    }
}
