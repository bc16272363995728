import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ResponseCache } from '../cache/response-cache.js';
import { getLogger } from '../utils/logger.js';

const URL_A = 'https://api.openalex.org/works?filter=author.id:A1&api_key=test-key&mailto=test@example.com';
const URL_B = 'https://api.openalex.org/authors/A1';

describe('ResponseCache', () => {
    let root: string;
    let cacheDir: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'pubcost-cache-'));
        cacheDir = join(root, 'cache');
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(root, { recursive: true, force: true });
    });

    it('should return stored responses', () => {
        const cache = new ResponseCache({ cacheDir });
        cache.set(URL_A, { results: [1, 2] });

        expect(cache.get(URL_A)).toEqual({ results: [1, 2] });
        expect(cache.get(URL_B)).toBeNull();
    });

    it('should mask the API key in stored entries', () => {
        const cache = new ResponseCache({ cacheDir });
        cache.set(URL_A, {});

        const [file] = readdirSync(cacheDir);
        const entry = JSON.parse(readFileSync(join(cacheDir, String(file)), 'utf-8'));
        expect(entry.url).toBe('https://api.openalex.org/works?filter=author.id:A1&api_key=***&mailto=test@example.com');
    });

    it('should expire entries after the TTL', () => {
        const cache = new ResponseCache({ cacheDir, ttlHours: 1 });
        const now = Date.now();
        cache.set(URL_A, { ok: true });

        vi.spyOn(Date, 'now').mockReturnValue(now + 2 * 60 * 60 * 1000);
        expect(cache.get(URL_A)).toBeNull();
    });

    it('should ignore unreadable entries', () => {
        vi.spyOn(getLogger(), 'warn').mockImplementation(() => undefined);
        const cache = new ResponseCache({ cacheDir });
        cache.set(URL_A, { ok: true });

        const [file] = readdirSync(cacheDir);
        writeFileSync(join(cacheDir, String(file)), '{not json', 'utf-8');

        expect(cache.get(URL_A)).toBeNull();
        expect(getLogger().warn).toHaveBeenCalledTimes(1);
    });

    it('should do nothing when disabled', () => {
        const cache = new ResponseCache({ cacheDir, enabled: false });
        cache.set(URL_A, { ok: true });

        expect(cache.get(URL_A)).toBeNull();
        expect(existsSync(cacheDir)).toBe(false);
        expect(cache.getStats()).toEqual({ enabled: false, directory: cacheDir, entries: 0, bytes: 0 });
    });

    it('should report stats and clear entries', () => {
        const cache = new ResponseCache({ cacheDir });
        cache.set(URL_A, { a: 1 });
        cache.set(URL_B, { b: 2 });

        const stats = cache.getStats();
        expect(stats.entries).toBe(2);
        expect(stats.bytes).toBeGreaterThan(0);

        cache.clear();
        expect(cache.getStats().entries).toBe(0);
        expect(cache.get(URL_A)).toBeNull();
        expect(existsSync(cacheDir)).toBe(true);
    });
});
