import { AggregationEngine } from '../analysis/aggregation.js';
import { ResponseCache } from '../cache/response-cache.js';
import { OpenAlexSource } from '../sources/openalex.js';
import { loadTaxonomy } from '../taxonomy/taxonomy.js';
import type {
    AggregateResult,
    MetadataSource,
    PresentationContext,
    PubCostConfig,
    Subject,
    Taxonomy,
} from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';

export interface AnalysisRun extends AggregateResult {
    context: PresentationContext;
    taxonomy: Taxonomy;
    /** Records returned by the source, before capping */
    fetched: number;
}

/**
 * Build the OpenAlex source for a config.
 */
export function createSource(config: PubCostConfig): MetadataSource {
    return new OpenAlexSource({
        apiKey: getApiKey('OPENALEX_API_KEY'),
        email: config.email,
        articlesOnly: config.articlesOnly,
        perPage: config.perPage,
        cache: config.noCache ? null : new ResponseCache({ cacheDir: config.cacheDir }),
    });
}

/**
 * Full analysis pipeline:
 *
 * 1. Load the taxonomy (fatal if invalid)
 * 2. Fetch the subject's works, newest first, bounded by maxWorks
 * 3. Look up the author profile for display (authors only)
 * 4. Resolve publishers, estimate costs and aggregate
 */
export async function runAnalysis(
    config: PubCostConfig,
    subject: Subject,
    source: MetadataSource = createSource(config),
    taxonomy: Taxonomy = loadTaxonomy(config.taxonomyPath)
): Promise<AnalysisRun> {
    const startTime = Date.now();
    getLogger().info({ subject: subject.id, kind: subject.kind, maxWorks: config.maxWorks }, 'Starting analysis');

    const works = await source.fetchWorks(subject, config.maxWorks);
    const author = subject.kind === 'author' ? await source.fetchAuthor(subject.id) : null;

    const engine = new AggregationEngine(taxonomy);
    const { rows, summary } = engine.aggregate(works, config.maxWorks);

    getLogger().info(
        {
            fetched: works.length,
            analysed: summary.totalCount,
            forProfit: summary.forProfitCount,
            totalCost: summary.totalCost,
            durationMs: Date.now() - startTime,
        },
        'Analysis complete'
    );

    return { rows, summary, context: { subject, author }, taxonomy, fetched: works.length };
}
