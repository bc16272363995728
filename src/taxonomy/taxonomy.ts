import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { PublisherAlias, Taxonomy } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Bundled taxonomy, resolved relative to this module so it works from src/ and dist/.
 */
export const DEFAULT_TAXONOMY_PATH = fileURLToPath(new URL('../../data/taxonomy.json', import.meta.url));

/**
 * Raised when the taxonomy cannot be loaded. Fatal at startup: nothing can be
 * classified without it.
 */
export class TaxonomyError extends Error {
    constructor(message: string, public readonly path?: string) {
        super(message);
        this.name = 'TaxonomyError';
    }
}

const publisherKey = z.string().trim().min(1).transform((s) => s.toLowerCase());

const TaxonomySchema = z.object({
    forProfitPublishers: z.array(publisherKey),
    preprintServers: z.array(publisherKey),
    // Suffix tokens keep their surrounding spaces; they are matched as written.
    companySuffixes: z.array(z.string().min(1).transform((s) => s.toLowerCase())),
    aliases: z
        .array(z.tuple([publisherKey, publisherKey]))
        .min(1, 'alias table must not be empty'),
    estimatedApc: z
        .record(z.number().nonnegative('APC estimates must not be negative'))
        .refine((apc) => apc['default'] !== undefined, { message: 'a "default" APC estimate is required' }),
});

export type TaxonomyInput = z.input<typeof TaxonomySchema>;

/**
 * Validate raw taxonomy data and freeze it into a Taxonomy.
 */
export function createTaxonomy(data: unknown, path?: string): Taxonomy {
    const parsed = TaxonomySchema.safeParse(data);
    if (!parsed.success) {
        const msg = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new TaxonomyError(`Invalid taxonomy${path ? ` in ${path}` : ''}: ${msg}`, path);
    }

    const { forProfitPublishers, preprintServers, companySuffixes, aliases, estimatedApc } = parsed.data;

    return Object.freeze({
        forProfitPublishers: new Set(forProfitPublishers),
        preprintServers: new Set(preprintServers),
        companySuffixes: Object.freeze([...companySuffixes]),
        aliases: Object.freeze(aliases.map(([pattern, canonical]): PublisherAlias => Object.freeze([pattern, canonical] as const))),
        estimatedApc: new Map(Object.entries(estimatedApc).map(([publisher, apc]) => [publisher.toLowerCase(), apc])),
    });
}

/**
 * Load and validate a taxonomy JSON file.
 * @param path - Defaults to the bundled data/taxonomy.json
 */
export function loadTaxonomy(path: string = DEFAULT_TAXONOMY_PATH): Taxonomy {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new TaxonomyError(
            `Cannot read taxonomy file ${path}: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new TaxonomyError(
            `Taxonomy file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    const taxonomy = createTaxonomy(data, path);
    getLogger().debug(
        { path, aliases: taxonomy.aliases.length, forProfit: taxonomy.forProfitPublishers.size },
        'Taxonomy loaded'
    );
    return taxonomy;
}

/**
 * APC estimate for a publisher, falling back to the 'default' entry.
 */
export function estimatedApcFor(taxonomy: Taxonomy, publisher: string): number {
    return taxonomy.estimatedApc.get(publisher) ?? taxonomy.estimatedApc.get('default') ?? 0;
}
