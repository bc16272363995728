import { writeFileSync } from 'node:fs';
import { forProfitPercentage, topPublishers } from '../analysis/aggregation.js';
import { displayPublisher, formatCurrency, formatPercentage } from '../exporters/format.js';
import type {
    AggregateSummary,
    PresentationContext,
    Presenter,
    ResolvedWork,
    Taxonomy,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const FOR_PROFIT_COLOR = '#ff6b6b';
const OTHER_COLOR = '#4a90e2';

/**
 * Generate a self-contained HTML report using Chart.js.
 *
 * Features:
 * - Metric cards (works, for-profit share, estimated cost)
 * - Bar chart of the top 10 publishers, for-profit publishers highlighted
 * - Per-work cost table with DOI links
 */
export function generateViewer(
    rows: readonly ResolvedWork[],
    summary: AggregateSummary,
    context: PresentationContext,
    taxonomy: Taxonomy,
    outputPath: string
): void {
    const html = buildViewerHtml(rows, summary, context, taxonomy);
    writeFileSync(outputPath, html, 'utf-8');
    getLogger().info({ outputPath, works: rows.length }, 'HTML report generated');
}

/**
 * Presenter form of `generateViewer`.
 */
export class HtmlViewerPresenter implements Presenter {
    constructor(
        private readonly taxonomy: Taxonomy,
        private readonly outputPath: string
    ) {}

    render(rows: readonly ResolvedWork[], summary: AggregateSummary, context: PresentationContext): void {
        generateViewer(rows, summary, context, this.taxonomy, this.outputPath);
    }
}

function esc(s: string | null | undefined): string {
    return (s ?? '')
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

/**
 * Chart.js dataset for the publisher distribution. Serialized so it can be
 * inlined inside a <script> tag.
 */
export function buildChartData(summary: AggregateSummary, taxonomy: Taxonomy): string {
    const top = topPublishers(summary, 10);
    const data = {
        labels: top.map((p) => displayPublisher(p.publisher)),
        datasets: [{
            label: 'Number of Publications',
            data: top.map((p) => p.count),
            backgroundColor: top.map((p) =>
                taxonomy.forProfitPublishers.has(p.publisher) ? FOR_PROFIT_COLOR : OTHER_COLOR),
        }],
    };
    return JSON.stringify(data).replace(/</g, '\\u003c');
}

export function buildViewerHtml(
    rows: readonly ResolvedWork[],
    summary: AggregateSummary,
    context: PresentationContext,
    taxonomy: Taxonomy
): string {
    const heading = context.author
        ? `${esc(context.author.name)} <span class="muted">(${esc(context.author.affiliation)})</span>`
        : `${esc(context.subject.kind)} ${esc(context.subject.id)}`;

    const tableRows = rows.map((r) => `      <tr>
        <td>${r.doi ? `<a href="https://doi.org/${esc(r.doi)}" target="_blank">${esc(r.title)}</a>` : esc(r.title)}</td>
        <td>${esc(displayPublisher(r.publisher))}</td>
        <td>${esc(r.publicationDate ?? '')}</td>
        <td class="num">${formatCurrency(r.cost)}</td>
        <td>${r.isForProfit ? 'yes' : 'no'}</td>
      </tr>`).join('\n');

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Publication Cost Report</title>
<script src="https://unpkg.com/chart.js@4.4.6/dist/chart.umd.js"></script>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: 'Inter', -apple-system, BlinkMacSystemFont, sans-serif;
    background: #f8fafc;
    color: #0f172a;
    padding: 24px;
  }
  h1 { font-size: 20px; margin-bottom: 16px; }
  h2 { font-size: 15px; margin: 24px 0 8px; }
  .muted { color: #64748b; font-weight: 400; }
  .cards { display: flex; gap: 12px; }
  .card {
    flex: 1;
    background: #fff;
    border: 1px solid #e2e8f0;
    border-radius: 12px;
    padding: 16px;
  }
  .card .label { font-size: 12px; color: #64748b; }
  .card .value { font-size: 22px; font-weight: 700; margin-top: 4px; }
  .chart { background: #fff; border: 1px solid #e2e8f0; border-radius: 12px; padding: 16px; height: 320px; }
  table { width: 100%; border-collapse: collapse; background: #fff; font-size: 13px; }
  th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #e2e8f0; }
  td.num { text-align: right; font-variant-numeric: tabular-nums; }
  a { color: #4a90e2; text-decoration: none; }
  footer { margin-top: 24px; font-size: 12px; color: #64748b; }
</style>
</head>
<body>
  <h1>${heading}</h1>

  <div class="cards">
    <div class="card"><div class="label">Publications analysed</div><div class="value">${summary.totalCount} of ${summary.inputCount}</div></div>
    <div class="card"><div class="label">For-profit publications</div><div class="value">${summary.forProfitCount} (${formatPercentage(forProfitPercentage(summary))})</div></div>
    <div class="card"><div class="label">Estimated total cost</div><div class="value">${formatCurrency(summary.totalCost)}</div></div>
  </div>

  <h2>Publisher distribution</h2>
  <div class="chart"><canvas id="publishers"></canvas></div>

  <h2>Cost breakdown</h2>
  <table>
    <thead><tr><th>Title</th><th>Publisher</th><th>Date</th><th>Estimated cost</th><th>For profit</th></tr></thead>
    <tbody>
${tableRows}
    </tbody>
  </table>

  <footer>
    Data from OpenAlex (https://openalex.org/). Works with unknown publishers and preprints are excluded.
    Costs are reported APCs where available, otherwise publisher estimates for open-access works.
  </footer>

<script>
const chartData = ${buildChartData(summary, taxonomy)};
new Chart(document.getElementById('publishers'), {
  type: 'bar',
  data: chartData,
  options: {
    maintainAspectRatio: false,
    plugins: { legend: { display: false } },
    scales: {
      x: { title: { display: true, text: 'Publisher' } },
      y: { beginAtZero: true, title: { display: true, text: 'Number of Publications' }, ticks: { precision: 0 } },
    },
  },
});
</script>
</body>
</html>`;
}
