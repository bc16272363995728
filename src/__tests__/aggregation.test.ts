import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    AggregationEngine,
    forProfitPercentage,
    sortByDateDesc,
    topPublishers,
} from '../analysis/aggregation.js';
import { loadTaxonomy } from '../taxonomy/taxonomy.js';
import { getLogger } from '../utils/logger.js';
import type { WorkRecord } from '../types/index.js';
import { at, makeWork, publisherSource } from './fixtures.js';

const taxonomy = loadTaxonomy();

function dayAfter2000(offset: number): string {
    return new Date(Date.UTC(2000, 0, 1) + offset * 86_400_000).toISOString().slice(0, 10);
}

describe('AggregationEngine', () => {
    let engine: AggregationEngine;

    beforeEach(() => {
        engine = new AggregationEngine(taxonomy);
        vi.spyOn(getLogger(), 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return an empty result for no works', () => {
        const { rows, summary } = engine.aggregate([]);
        expect(rows).toEqual([]);
        expect(summary.inputCount).toBe(0);
        expect(summary.totalCount).toBe(0);
        expect(summary.forProfitCount).toBe(0);
        expect(summary.totalCost).toBe(0);
        expect(summary.costByPublisher.size).toBe(0);
        expect(summary.countByPublisher.size).toBe(0);
    });

    it('should price a gold Springer Nature work and count it as for-profit', () => {
        const work = makeWork({
            id: 'W1',
            title: 'Gold paper',
            doi: '10.1234/gold',
            oa: [true, 'gold'],
            locations: [at(publisherSource('Springer Nature'))],
        });

        const { rows, summary } = engine.aggregate([work]);

        expect(rows).toEqual([{
            id: 'W1',
            title: 'Gold paper',
            doi: '10.1234/gold',
            publicationDate: '2024-01-01',
            publisher: 'springer nature',
            cost: 2800,
            isOpenAccess: true,
            isForProfit: true,
            oaStatus: 'gold',
        }]);
        expect(summary.totalCount).toBe(1);
        expect(summary.forProfitCount).toBe(1);
        expect(summary.totalCost).toBe(2800);
    });

    it('should drop preprint servers entirely', () => {
        const work = makeWork({ locations: [at(publisherSource('bioRxiv'))] });
        const { rows, summary } = engine.aggregate([work]);

        expect(rows).toEqual([]);
        expect(summary.inputCount).toBe(1);
        expect(summary.totalCount).toBe(0);
        expect(summary.totalCost).toBe(0);
        expect(summary.costByPublisher.has('biorxiv')).toBe(false);
    });

    it('should drop works with unknown publishers', () => {
        const work = makeWork({ locations: [at(publisherSource('Acme Academic Press'))] });
        expect(engine.aggregate([work]).rows).toEqual([]);
    });

    it('should resolve aliases of one publisher across locations', () => {
        const work = makeWork({
            locations: [at(publisherSource('Elsevier')), at(publisherSource('ScienceDirect'))],
        });
        const { rows } = engine.aggregate([work]);

        expect(rows.map((r) => r.publisher)).toEqual(['elsevier']);
        expect(getLogger().warn).not.toHaveBeenCalled();
    });

    it('should accumulate totals and count only paid for-profit works', () => {
        const works: WorkRecord[] = [
            makeWork({ id: 'W1', oa: [true, 'gold'], locations: [at(publisherSource('Elsevier'))] }),
            makeWork({ id: 'W2', oa: [false, 'closed'], locations: [at(publisherSource('Elsevier'))] }),
            makeWork({ id: 'W3', oa: [true, 'gold'], locations: [at(publisherSource('PLOS'))] }),
            makeWork({
                id: 'W4',
                oa: [false, 'closed'],
                apcPaid: { value: 500, currency: 'USD' },
                locations: [at(publisherSource('Wiley'))],
            }),
        ];

        const { rows, summary } = engine.aggregate(works);

        expect(summary.totalCount).toBe(4);
        expect(summary.forProfitCount).toBe(2);
        expect(summary.totalCost).toBe(5200);
        expect(summary.totalCost).toBe(rows.reduce((sum, r) => sum + r.cost, 0));
        expect(Object.fromEntries(summary.costByPublisher)).toEqual({ elsevier: 3000, plos: 1700, wiley: 500 });
        expect(Object.fromEntries(summary.countByPublisher)).toEqual({ elsevier: 2, plos: 1, wiley: 1 });
        expect(forProfitPercentage(summary)).toBe(50);
    });

    it('should cap to the most recent works', () => {
        const works = Array.from({ length: 3000 }, (_, i) => makeWork({
            id: `W${i}`,
            publicationDate: dayAfter2000(i),
            locations: [at(publisherSource('Elsevier'))],
        }));

        const { rows, summary } = engine.aggregate(works, 2000);

        expect(rows).toHaveLength(2000);
        expect(summary.inputCount).toBe(2000);
        expect(rows[0]?.id).toBe('W2999');
        expect(rows[1999]?.id).toBe('W1000');
    });

    it('should not cap when the batch fits', () => {
        const works = [makeWork({ id: 'W1', locations: [at(publisherSource('Wiley'))] })];
        expect(engine.aggregate(works, 2000).rows).toHaveLength(1);
    });

    it('should reject a negative or fractional cap', () => {
        const works = [
            makeWork({ id: 'W1', locations: [at(publisherSource('Wiley'))] }),
            makeWork({ id: 'W2', locations: [at(publisherSource('Wiley'))] }),
        ];

        expect(() => engine.aggregate(works, -1)).toThrow(RangeError);
        expect(() => engine.aggregate(works, 1.5)).toThrow('cap must be a non-negative integer, got 1.5');
        expect(engine.aggregate(works, 0).summary.inputCount).toBe(0);
    });

    it('should return rows newest first', () => {
        const works = [
            makeWork({ id: 'old', publicationDate: '2019-05-01', locations: [at(publisherSource('Wiley'))] }),
            makeWork({ id: 'undated', publicationDate: null, locations: [at(publisherSource('Wiley'))] }),
            makeWork({ id: 'new', publicationDate: '2023-02-10', locations: [at(publisherSource('Wiley'))] }),
        ];
        expect(engine.aggregate(works).rows.map((r) => r.id)).toEqual(['new', 'old', 'undated']);
    });

    it('should skip a work that fails to evaluate and keep going', () => {
        const broken = makeWork({ id: 'broken' });
        Object.defineProperty(broken, 'locations', {
            get() {
                throw new Error('malformed record');
            },
        });
        const works = [broken, makeWork({ id: 'ok', locations: [at(publisherSource('Wiley'))] })];

        const { rows, summary } = engine.aggregate(works);

        expect(rows.map((r) => r.id)).toEqual(['ok']);
        expect(summary.inputCount).toBe(2);
        expect(getLogger().warn).toHaveBeenCalledTimes(1);
    });
});

describe('sortByDateDesc', () => {
    it('should keep input order for equal dates', () => {
        const works = [
            makeWork({ id: 'a', publicationDate: '2020-01-01' }),
            makeWork({ id: 'b', publicationDate: '2021-01-01' }),
            makeWork({ id: 'c', publicationDate: '2020-01-01' }),
            makeWork({ id: 'd', publicationDate: null }),
            makeWork({ id: 'e', publicationDate: '1900-01-01' }),
        ];
        expect(sortByDateDesc(works).map((w) => w.id)).toEqual(['b', 'a', 'c', 'd', 'e']);
    });
});

describe('topPublishers', () => {
    it('should order by work count, then name', () => {
        const engine = new AggregationEngine(taxonomy);
        const { summary } = engine.aggregate([
            makeWork({ id: 'W1', locations: [at(publisherSource('Wiley'))] }),
            makeWork({ id: 'W2', locations: [at(publisherSource('MDPI'))] }),
            makeWork({ id: 'W3', locations: [at(publisherSource('MDPI'))] }),
            makeWork({ id: 'W4', locations: [at(publisherSource('Elsevier'))] }),
        ]);

        expect(topPublishers(summary, 2)).toEqual([
            { publisher: 'mdpi', count: 2, cost: 3000 },
            { publisher: 'elsevier', count: 1, cost: 3000 },
        ]);
    });

    it('should report 0% for an empty summary', () => {
        const { summary } = new AggregationEngine(taxonomy).aggregate([]);
        expect(forProfitPercentage(summary)).toBe(0);
    });
});
