#!/usr/bin/env node
import { Command } from 'commander';
import { runAnalysis, createSource } from '../builder/analysis-builder.js';
import { ResponseCache } from '../cache/response-cache.js';
import { ConsolePresenter } from '../exporters/console.js';
import { EXPORT_FORMATS, FileExportPresenter, isExportFormat } from '../exporters/export.js';
import { HtmlViewerPresenter } from '../viewer/html-viewer.js';
import { cleanOpenAlexId } from '../sources/utils.js';
import { resolveConfig, type PartialConfig } from '../utils/config.js';
import { commonFlags, parseIntOption, type CommonOptions } from './options.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import type { MetadataSource, Presenter, PubCostConfig, Subject } from '../types/index.js';

const VERSION = '1.0.0';

const program = new Command();

program
    .name('pubcost')
    .description('Estimate open-access publishing costs and for-profit publisher exposure from OpenAlex.')
    .version(VERSION);

async function setup(opts: CommonOptions, extra: PartialConfig = {}): Promise<PubCostConfig> {
    const flags = commonFlags(opts);
    initLogger({ level: flags.logLevel, jsonLogs: flags.jsonLogs });

    const config = await resolveConfig({ ...flags, ...extra });

    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: config.timeoutMs, version: VERSION, email: config.email, retry: config.retry });
    return config;
}

// ─── ANALYZE command ──────────────────────────────────────

program
    .command('analyze')
    .description('Analyse the publishers and APC costs of an author, institution or funder')
    .option('-a, --author <id>', 'OpenAlex author ID (e.g. A5008020290)')
    .option('--orcid <orcid>', 'Author ORCID (e.g. 0000-0002-1825-0097)')
    .option('-i, --institution <id>', 'OpenAlex institution ID')
    .option('-f, --funder <id>', 'OpenAlex funder ID')
    .option('-m, --max-works <n>', 'Most recent works to analyse (default 2000)')
    .option('--all-types', 'Include all work types, not only articles')
    .option('--format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Export file path (stdout when omitted)')
    .option('--html <path>', 'Write a self-contained HTML report')
    .option('--taxonomy <path>', 'Taxonomy JSON file')
    .option('--email <email>', 'Contact e-mail sent to OpenAlex')
    .option('--log-level <level>', 'Log level: debug | info | warn | error (default info)')
    .option('--json-logs', 'Output JSON logs')
    .option('--no-cache', 'Disable response caching')
    .action(async (opts) => {
        try {
            const config = await setup(opts, {
                maxWorks: parseIntOption(opts.maxWorks, '--max-works'),
                articlesOnly: opts.allTypes ? false : undefined,
                taxonomyPath: opts.taxonomy,
            });

            const source = createSource(config);
            const subject = await resolveSubject(opts, source);

            const presenters: Presenter[] = [];
            if (opts.format !== undefined) {
                if (!isExportFormat(opts.format)) {
                    throw new Error(`Invalid format: ${opts.format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
                }
                presenters.push(new FileExportPresenter(opts.format, opts.out));
            }

            const run = await runAnalysis(config, subject, source);

            if (opts.html) {
                presenters.push(new HtmlViewerPresenter(run.taxonomy, opts.html));
            }
            // The console report would interleave with CSV/JSON written to stdout
            if (opts.format === undefined || opts.out) {
                presenters.push(new ConsolePresenter());
            }

            for (const presenter of presenters) {
                presenter.render(run.rows, run.summary, run.context);
            }
            getLogger().debug({ requests: getHttpClient().getAllRequestCounts() }, 'HTTP requests made');
        } catch (error) {
            getLogger().error({ error }, 'Analysis failed');
            process.exit(1);
        }
    });

async function resolveSubject(
    opts: { author?: string; orcid?: string; institution?: string; funder?: string },
    source: MetadataSource
): Promise<Subject> {
    const given = [opts.author, opts.orcid, opts.institution, opts.funder].filter((v) => v !== undefined);
    if (given.length !== 1) {
        throw new Error('Specify exactly one of --author, --orcid, --institution or --funder');
    }

    if (opts.author) return { kind: 'author', id: cleanOpenAlexId(opts.author, 'A') };
    if (opts.institution) return { kind: 'institution', id: cleanOpenAlexId(opts.institution, 'I') };
    if (opts.funder) return { kind: 'funder', id: cleanOpenAlexId(opts.funder, 'F') };

    const author = await source.findAuthorByOrcid(opts.orcid ?? '');
    if (!author) {
        throw new Error(`No author found with ORCID ${opts.orcid}`);
    }
    return { kind: 'author', id: author.id };
}

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Find OpenAlex author IDs by name')
    .argument('<name>', 'Author name')
    .option('-l, --limit <n>', 'Maximum results', '10')
    .option('--email <email>', 'Contact e-mail sent to OpenAlex')
    .option('--log-level <level>', 'Log level: debug | info | warn | error (default info)')
    .option('--json-logs', 'Output JSON logs')
    .option('--no-cache', 'Disable response caching')
    .action(async (name: string, opts) => {
        try {
            const config = await setup(opts);
            const authors = await createSource(config).searchAuthors(name, parseIntOption(opts.limit, '--limit'));

            if (authors.length === 0) {
                console.log('No authors found. Try refining your search.');
                return;
            }

            console.log('');
            for (const author of authors) {
                console.log(`  ${author.id.padEnd(14)} ${author.name}`);
                console.log(`  ${''.padEnd(14)} ${author.affiliation} (${author.worksCount} works)`);
            }
            console.log('');
        } catch (error) {
            getLogger().error({ error }, 'Search failed');
            process.exit(1);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the response cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string) => {
        const config = await resolveConfig({});
        const cache = new ResponseCache({ cacheDir: config.cacheDir, enabled: false });

        switch (action) {
            case 'clear':
                cache.clear();
                console.log('Cache cleared.');
                break;
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB (${stats.directory})`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

await program.parseAsync();
