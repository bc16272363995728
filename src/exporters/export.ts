import { writeFileSync } from 'node:fs';
import { forProfitPercentage } from '../analysis/aggregation.js';
import type {
    AggregateSummary,
    PresentationContext,
    Presenter,
    ResolvedWork,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { formatCurrency, formatPercentage } from './format.js';

export const EXPORT_VERSION = '1.0.0';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv'];

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Serialize an analysis in the given format.
 */
export function renderExport(
    rows: readonly ResolvedWork[],
    summary: AggregateSummary,
    context: PresentationContext,
    format: ExportFormat
): string {
    switch (format) {
        case 'json':
            return exportJson(rows, summary, context);
        case 'csv':
            return exportCSV(rows, summary, context);
    }
}

/**
 * Presenter writing the analysis to a file, or to stdout when no path is given.
 */
export class FileExportPresenter implements Presenter {
    constructor(
        private readonly format: ExportFormat,
        private readonly outputPath?: string
    ) {}

    render(rows: readonly ResolvedWork[], summary: AggregateSummary, context: PresentationContext): void {
        const content = renderExport(rows, summary, context, this.format);

        if (this.outputPath) {
            writeFileSync(this.outputPath, content, 'utf-8');
            getLogger().info({ format: this.format, outputPath: this.outputPath, works: rows.length }, 'Analysis exported');
        } else {
            process.stdout.write(content.endsWith('\n') ? content : `${content}\n`);
        }
    }
}

// ─── Format Implementations ─────────────────────────────

function subjectLabel(context: PresentationContext): string {
    return `${context.subject.kind} ${context.subject.id}`;
}

function exportJson(
    rows: readonly ResolvedWork[],
    summary: AggregateSummary,
    context: PresentationContext
): string {
    return JSON.stringify({
        pubcost: {
            version: EXPORT_VERSION,
            exported_at: new Date().toISOString(),
        },
        subject: context.subject,
        author: context.author ?? null,
        summary: {
            analysed: summary.inputCount,
            total: summary.totalCount,
            for_profit: summary.forProfitCount,
            for_profit_percentage: Number(forProfitPercentage(summary).toFixed(1)),
            total_cost: summary.totalCost,
            cost_by_publisher: Object.fromEntries(summary.costByPublisher),
            count_by_publisher: Object.fromEntries(summary.countByPublisher),
        },
        works: rows.map((r) => ({
            id: r.id,
            title: r.title,
            doi: r.doi,
            publication_date: r.publicationDate,
            publisher: r.publisher,
            cost: r.cost,
            open_access: r.isOpenAccess,
            oa_status: r.oaStatus,
            for_profit: r.isForProfit,
        })),
    }, null, 2);
}

function csvField(value: string | null | undefined): string {
    return `"${(value ?? '').replace(/"/g, '""')}"`;
}

function exportCSV(
    rows: readonly ResolvedWork[],
    summary: AggregateSummary,
    context: PresentationContext
): string {
    const metrics: Array<[string, string]> = [['Subject', subjectLabel(context)]];
    if (context.author) {
        metrics.push(['Author', context.author.name], ['Affiliation', context.author.affiliation]);
    }
    metrics.push(
        ['Total Publications', String(summary.totalCount)],
        ['For-Profit Publications', String(summary.forProfitCount)],
        ['For-Profit Percentage', formatPercentage(forProfitPercentage(summary))],
        ['Total Estimated Cost', formatCurrency(summary.totalCost)],
    );

    let csv = 'Metric,Value\n';
    for (const [metric, value] of metrics) {
        csv += `${csvField(metric)},${csvField(value)}\n`;
    }

    csv += '\nTitle,Publisher,DOI,Publication Date,Estimated Cost,Open Access,For Profit\n';
    for (const row of rows) {
        csv += [
            csvField(row.title),
            csvField(row.publisher),
            csvField(row.doi),
            row.publicationDate ?? '',
            row.cost,
            row.isOpenAccess,
            row.isForProfit,
        ].join(',') + '\n';
    }

    return csv;
}
