import type { CanonicalPublisher } from './work.js';

/**
 * Ordered (pattern, canonical) pair. Matching is first-match-wins in declaration order.
 */
export type PublisherAlias = readonly [pattern: string, canonical: CanonicalPublisher];

/**
 * Curated classification tables, immutable after load.
 */
export interface Taxonomy {
    readonly forProfitPublishers: ReadonlySet<CanonicalPublisher>;
    readonly preprintServers: ReadonlySet<CanonicalPublisher>;
    readonly companySuffixes: readonly string[];
    readonly aliases: readonly PublisherAlias[];

    /** Always contains a 'default' entry */
    readonly estimatedApc: ReadonlyMap<CanonicalPublisher, number>;
}
