import { UNKNOWN_PUBLISHER, type CanonicalPublisher, type Source, type Taxonomy, type WorkRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { normalizePublisherName } from './name-normalizer.js';

/**
 * Resolves the single canonical publisher of a work from the sources of all its locations.
 */
export class PublisherResolver {
    /** Canonical name → position of its first alias, for deterministic tie-breaks */
    private readonly aliasRank = new Map<CanonicalPublisher, number>();

    constructor(private readonly taxonomy: Taxonomy) {
        taxonomy.aliases.forEach(([, canonical], index) => {
            if (!this.aliasRank.has(canonical)) this.aliasRank.set(canonical, index);
        });
    }

    /**
     * Resolve a work to exactly one canonical publisher, or 'unknown'.
     *
     * When locations disagree, the publisher declared earliest in the alias
     * table is returned and the conflict is logged; it is never an error.
     */
    resolve(work: WorkRecord): CanonicalPublisher {
        const sources = work.locations
            .map((location) => location.source)
            .filter((source): source is Source => source !== null);

        if (sources.length === 0) return UNKNOWN_PUBLISHER;

        const candidates = new Set<CanonicalPublisher>();
        for (const source of sources) {
            const publisher = this.resolveSource(source);
            if (publisher && publisher !== UNKNOWN_PUBLISHER) {
                candidates.add(publisher);
            }
        }

        if (candidates.size === 0) return UNKNOWN_PUBLISHER;

        const [first, ...rest] = [...candidates].sort((a, b) => this.rankOf(a) - this.rankOf(b));
        if (rest.length > 0) {
            getLogger().warn(
                { work: work.id, candidates: [first, ...rest], chosen: first },
                'Conflicting publishers across locations'
            );
        }
        return first ?? UNKNOWN_PUBLISHER;
    }

    /**
     * Contribution of one source: the first of its names that normalizes to a
     * known publisher. Institution-hosted sources never name a publisher.
     */
    resolveSource(source: Source): CanonicalPublisher {
        if (source.hostOrganization?.kind === 'institution') return UNKNOWN_PUBLISHER;

        const lineage = typeof source.lineage === 'string' ? [source.lineage] : source.lineage;
        const names = [...lineage, source.hostOrganizationName, source.displayName];

        for (const name of names) {
            const publisher = normalizePublisherName(name, this.taxonomy);
            if (publisher !== UNKNOWN_PUBLISHER) return publisher;
        }
        return UNKNOWN_PUBLISHER;
    }

    private rankOf(publisher: CanonicalPublisher): number {
        return this.aliasRank.get(publisher) ?? Number.MAX_SAFE_INTEGER;
    }
}
