import {
    UNKNOWN_PUBLISHER,
    type AggregateResult,
    type AggregateSummary,
    type CanonicalPublisher,
    type ResolvedWork,
    type Taxonomy,
    type WorkRecord,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { estimateCost } from './cost-estimator.js';
import { PublisherResolver } from './publisher-resolver.js';

/** Sort key for works without a publication date */
export const EARLIEST_DATE = '1900-01-01';

export function emptySummary(): AggregateSummary {
    return {
        inputCount: 0,
        totalCount: 0,
        forProfitCount: 0,
        totalCost: 0,
        costByPublisher: new Map(),
        countByPublisher: new Map(),
    };
}

/**
 * Order works newest first. Array.prototype.sort is stable, so works sharing
 * a date keep their input order.
 */
export function sortByDateDesc(works: readonly WorkRecord[]): WorkRecord[] {
    return [...works].sort((a, b) => {
        const da = a.publicationDate ?? EARLIEST_DATE;
        const db = b.publicationDate ?? EARLIEST_DATE;
        return da < db ? 1 : da > db ? -1 : 0;
    });
}

/**
 * Drives publisher resolution and cost estimation over a batch of works.
 * Holds only the injected taxonomy; every call builds its own accumulator.
 */
export class AggregationEngine {
    private readonly resolver: PublisherResolver;

    constructor(private readonly taxonomy: Taxonomy) {
        this.resolver = new PublisherResolver(taxonomy);
    }

    /**
     * Analyse a batch: sort newest first, keep at most `cap` works, drop works
     * with an unknown or preprint-server publisher, and accumulate costs.
     */
    aggregate(works: readonly WorkRecord[], cap?: number): AggregateResult {
        if (cap !== undefined && !(Number.isInteger(cap) && cap >= 0)) {
            throw new RangeError(`cap must be a non-negative integer, got ${cap}`);
        }

        let selected = sortByDateDesc(works);
        if (cap !== undefined && selected.length > cap) {
            getLogger().info({ available: selected.length, cap }, 'Capping to most recent works');
            selected = selected.slice(0, cap);
        }

        const rows: ResolvedWork[] = [];
        const summary = emptySummary();
        summary.inputCount = selected.length;

        for (const work of selected) {
            let row: ResolvedWork | null;
            try {
                row = this.analyseWork(work);
            } catch (error) {
                getLogger().warn({ work: work.id, error }, 'Skipping work that could not be analysed');
                continue;
            }
            if (!row) continue;

            rows.push(row);
            summary.totalCount += 1;
            summary.totalCost += row.cost;
            addTo(summary.costByPublisher, row.publisher, row.cost);
            addTo(summary.countByPublisher, row.publisher, 1);
            if (row.isForProfit && row.cost > 0) {
                summary.forProfitCount += 1;
            }
        }

        getLogger().debug(
            { input: works.length, analysed: summary.inputCount, kept: summary.totalCount },
            'Aggregation complete'
        );

        return { rows, summary };
    }

    /**
     * Resolve and price one work; null when it is excluded from the analysis.
     */
    analyseWork(work: WorkRecord): ResolvedWork | null {
        const publisher = this.resolver.resolve(work);
        if (publisher === UNKNOWN_PUBLISHER || this.taxonomy.preprintServers.has(publisher)) {
            return null;
        }

        const { cost, isOpenAccess } = estimateCost(work, publisher, this.taxonomy);

        return {
            id: work.id,
            title: work.title,
            doi: work.doi,
            publicationDate: work.publicationDate,
            publisher,
            cost,
            isOpenAccess,
            isForProfit: this.taxonomy.forProfitPublishers.has(publisher),
            oaStatus: work.openAccess.oaStatus,
        };
    }
}

function addTo(map: Map<CanonicalPublisher, number>, key: CanonicalPublisher, amount: number): void {
    map.set(key, (map.get(key) ?? 0) + amount);
}

/**
 * Share of analysed works that are paid-for outputs of for-profit publishers, in percent.
 */
export function forProfitPercentage(summary: AggregateSummary): number {
    return summary.totalCount > 0 ? (summary.forProfitCount / summary.totalCount) * 100 : 0;
}

/**
 * Publishers by number of works, most first; ties broken by name.
 */
export function topPublishers(
    summary: AggregateSummary,
    limit = 10
): Array<{ publisher: CanonicalPublisher; count: number; cost: number }> {
    return [...summary.countByPublisher.entries()]
        .sort(([pa, ca], [pb, cb]) => cb - ca || pa.localeCompare(pb))
        .slice(0, limit)
        .map(([publisher, count]) => ({
            publisher,
            count,
            cost: summary.costByPublisher.get(publisher) ?? 0,
        }));
}
