import { forProfitPercentage, topPublishers } from '../analysis/aggregation.js';
import type { AggregateSummary, PresentationContext, Presenter, ResolvedWork } from '../types/index.js';
import { displayPublisher, formatCurrency, formatPercentage } from './format.js';

/**
 * Plain-text report: metrics, publisher distribution and the per-work cost table.
 */
export class ConsolePresenter implements Presenter {
    constructor(
        private readonly out: (line: string) => void = console.log,
        private readonly maxRows = 50
    ) {}

    render(rows: readonly ResolvedWork[], summary: AggregateSummary, context: PresentationContext): void {
        const { author, subject } = context;

        this.out('');
        this.out(author
            ? `📚 ${author.name} (${author.affiliation})`
            : `📚 ${subject.kind} ${subject.id}`);
        this.out('');
        this.out(`  Analysed:           ${summary.totalCount} of ${summary.inputCount} recent works`);
        this.out(`  For-profit:         ${summary.forProfitCount} (${formatPercentage(forProfitPercentage(summary))})`);
        this.out(`  Estimated cost:     ${formatCurrency(summary.totalCost)}`);

        const top = topPublishers(summary);
        if (top.length > 0) {
            this.out('');
            this.out('  Publishers:');
            for (const { publisher, count, cost } of top) {
                this.out(`    ${displayPublisher(publisher).padEnd(30)} ${String(count).padStart(5)}  ${formatCurrency(cost)}`);
            }
        }

        if (rows.length > 0) {
            this.out('');
            this.out('  Cost breakdown:');
            for (const row of rows.slice(0, this.maxRows)) {
                const title = row.title.length > 60 ? `${row.title.slice(0, 57)}...` : row.title;
                this.out(`    ${formatCurrency(row.cost).padStart(10)}  ${displayPublisher(row.publisher).padEnd(24)} ${title}`);
            }
            if (rows.length > this.maxRows) {
                this.out(`    ... ${rows.length - this.maxRows} more (use --format csv for the full list)`);
            }
        }

        this.out('');
    }
}
