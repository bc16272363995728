import { describe, it, expect } from 'vitest';
import { ConfigError, loadEnvVars, mergeConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('mergeConfig', () => {
    it('should fall back to defaults', () => {
        expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        expect(mergeConfig(null, {})).toEqual(DEFAULT_CONFIG);
    });

    it('should let later layers win', () => {
        const config = mergeConfig(
            { email: 'file@example.com', maxWorks: 500 },
            { maxWorks: 800 },
            { maxWorks: 100, logLevel: 'debug' }
        );

        expect(config.email).toBe('file@example.com');
        expect(config.maxWorks).toBe(100);
        expect(config.logLevel).toBe('debug');
    });

    it('should ignore undefined values', () => {
        const config = mergeConfig({ maxWorks: 500 }, { maxWorks: undefined, taxonomyPath: undefined });
        expect(config.maxWorks).toBe(500);
        expect(config.taxonomyPath).toBeUndefined();
    });

    it('should merge retry settings field by field', () => {
        const config = mergeConfig({ retry: { maxRetries: 5 } }, { retry: { maxBackoffMs: 100 } });
        expect(config.retry).toEqual({ maxRetries: 5, initialBackoffMs: 1000, maxBackoffMs: 100 });
    });

    it('should reject invalid values', () => {
        expect(() => mergeConfig({ maxWorks: 0 })).toThrow(ConfigError);
        expect(() => mergeConfig({ perPage: 500 })).toThrow(/^Invalid configuration: perPage: /);
        expect(() => mergeConfig({ email: 'not-an-address' })).toThrow(
            'Invalid configuration: email: email must be a valid contact address'
        );
    });
});

describe('loadEnvVars', () => {
    it('should read known variables', () => {
        expect(loadEnvVars({
            OPENALEX_EMAIL: 'env@example.com',
            PUBCOST_MAX_WORKS: '250',
            PUBCOST_TAXONOMY: '/tmp/taxonomy.json',
            UNRELATED: 'x',
        })).toEqual({
            email: 'env@example.com',
            maxWorks: 250,
            taxonomyPath: '/tmp/taxonomy.json',
        });
    });

    it('should return nothing for an empty environment', () => {
        expect(loadEnvVars({})).toEqual({});
    });

    it('should reject a non-integer work cap', () => {
        expect(() => loadEnvVars({ PUBCOST_MAX_WORKS: 'lots' })).toThrow(
            'PUBCOST_MAX_WORKS must be an integer, got "lots"'
        );
    });
});
