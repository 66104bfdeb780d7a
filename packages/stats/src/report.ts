import type { RunTotals, StatsSnapshot } from './types';

export interface TotalsReport extends RunTotals {
  /** succeeded / (succeeded + failed); null before any decided run */
  successRate: number | null;
}

export interface SelectorReport {
  selector: string;
  successes: number;
  failures: number;
  successRate: number;
}

export interface FlowReport extends TotalsReport {
  flowId: string;
}

/**
 * JSON-friendly view of a snapshot. Histogram bounds use `"+Inf"` for the
 * unbounded bucket.
 */
export interface StatsReport {
  totals: TotalsReport;
  averageDurationMs: number | null;
  failureCounts: Record<string, number>;
  selectors: SelectorReport[];
  runsPerDay: Record<string, number>;
  runsPerWeek: Record<string, number>;
  runsPerMonth: Record<string, number>;
  flows: FlowReport[];
  durations: {
    count: number;
    minMs: number | null;
    maxMs: number | null;
    meanMs: number | null;
    histogram: Array<{ le: number | '+Inf'; count: number }>;
  };
  firstRunAt: string | null;
  lastRunAt: string | null;
}

function successRate(totals: RunTotals): number | null {
  const decided = totals.succeeded + totals.failed;
  return decided === 0 ? null : totals.succeeded / decided;
}

function withRate(totals: RunTotals): TotalsReport {
  return {
    total: totals.total,
    succeeded: totals.succeeded,
    failed: totals.failed,
    skipped: totals.skipped,
    successRate: successRate(totals),
  };
}

function counts(buckets: Readonly<Record<string, RunTotals>>): Record<string, number> {
  return Object.fromEntries(
    Object.entries(buckets)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, totals]) => [key, totals.total])
  );
}

function isoOrNull(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

export function toStatsReport(snapshot: StatsSnapshot): StatsReport {
  return {
    totals: withRate(snapshot.totals),
    averageDurationMs: snapshot.durations.meanMs,
    failureCounts: { ...snapshot.failuresByReason },
    selectors: Object.entries(snapshot.selectors)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([selector, s]) => ({
        selector,
        successes: s.successes,
        failures: s.failures,
        successRate: s.successes / (s.successes + s.failures),
      })),
    runsPerDay: counts(snapshot.byDay),
    runsPerWeek: counts(snapshot.byWeek),
    runsPerMonth: counts(snapshot.byMonth),
    flows: Object.entries(snapshot.byFlow)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([flowId, totals]) => ({ flowId, ...withRate(totals) })),
    durations: {
      count: snapshot.durations.count,
      minMs: snapshot.durations.minMs,
      maxMs: snapshot.durations.maxMs,
      meanMs: snapshot.durations.meanMs,
      histogram: snapshot.durations.buckets.map(b => ({
        le: Number.isFinite(b.le) ? b.le : '+Inf',
        count: b.count,
      })),
    },
    firstRunAt: isoOrNull(snapshot.firstRunAt),
    lastRunAt: isoOrNull(snapshot.lastRunAt),
  };
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

function percent(rate: number | null): string {
  return rate === null ? 'n/a' : `${(rate * 100).toFixed(1)}%`;
}

function cells(values: ReadonlyArray<string | number>): string {
  return `<tr>${values.map(v => `<td>${escapeHtml(String(v))}</td>`).join('')}</tr>`;
}

function table(caption: string, headers: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
  return [
    `<h2>${escapeHtml(caption)}</h2>`,
    '<table>',
    `<tr>${headers.map(h => `<th>${escapeHtml(h)}</th>`).join('')}</tr>`,
    ...rows.map(cells),
    '</table>',
  ].join('\n');
}

export interface HtmlReportOptions {
  title?: string;
}

/**
 * Plain HTML document for the same data as `toStatsReport`.
 */
export function renderStatsHtml(snapshot: StatsSnapshot, options: HtmlReportOptions = {}): string {
  const report = toStatsReport(snapshot);
  const title = options.title ?? 'Run statistics';
  const average = report.averageDurationMs === null ? 'n/a' : `${Math.round(report.averageDurationMs)} ms`;

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    '</head>',
    '<body>',
    `<h1>${escapeHtml(title)}</h1>`,
    table(
      'Totals',
      ['Runs', 'Succeeded', 'Failed', 'Skipped', 'Success rate', 'Average duration'],
      [
        [
          report.totals.total,
          report.totals.succeeded,
          report.totals.failed,
          report.totals.skipped,
          percent(report.totals.successRate),
          average,
        ],
      ]
    ),
    table('Failures by reason', ['Reason', 'Count'], Object.entries(report.failureCounts)),
    table(
      'Selectors',
      ['Selector', 'Successes', 'Failures', 'Success rate'],
      report.selectors.map(s => [s.selector, s.successes, s.failures, percent(s.successRate)])
    ),
    table(
      'Flows',
      ['Flow', 'Runs', 'Succeeded', 'Failed', 'Skipped', 'Success rate'],
      report.flows.map(f => [f.flowId, f.total, f.succeeded, f.failed, f.skipped, percent(f.successRate)])
    ),
    table('Runs per day', ['Day', 'Runs'], Object.entries(report.runsPerDay)),
    table('Runs per week', ['Week', 'Runs'], Object.entries(report.runsPerWeek)),
    table('Runs per month', ['Month', 'Runs'], Object.entries(report.runsPerMonth)),
    table(
      'Durations',
      ['Up to (ms)', 'Runs'],
      report.durations.histogram.map(b => [b.le, b.count])
    ),
    '</body>',
    '</html>',
  ].join('\n');
}
